import { z } from 'zod';

import { InvalidUpdateError } from '../../runtime/errors.js';
import type { Message } from '../../messages/message.js';
import { buildTelegramUser, type TelegramUser } from './user.js';

export const TELEGRAM_PLATFORM = 'telegram';

// https://core.telegram.org/bots/api#message (text messages only)
const TELEGRAM_TEXT_MESSAGE_SCHEMA = z.object({
  message_id: z.number().int(),
  date: z.number().int(),
  text: z.string(),
  from: z.unknown(),
});

export type TelegramMessage = Message<TelegramUser>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Builds a message from a raw update (https://core.telegram.org/bots/api#update).
 *
 * Returns `null` for updates without a `message` (edits, callbacks, channel
 * posts). A `message` without text or sender is rejected.
 */
export function buildTelegramMessage(update: unknown): TelegramMessage | null {
  const messageData = isRecord(update) ? update.message : undefined;
  if (!messageData) {
    return null;
  }

  const res = TELEGRAM_TEXT_MESSAGE_SCHEMA.safeParse(messageData);
  if (!res.success) {
    const fields = res.error.issues.map((issue) => issue.path.join('.') || 'message');
    throw new InvalidUpdateError(`Invalid Telegram message: ${Array.from(new Set(fields)).join(', ')}`);
  }

  return {
    id: res.data.message_id,
    platform: TELEGRAM_PLATFORM,
    text: res.data.text,
    user: buildTelegramUser(res.data.from),
    timestamp: res.data.date,
    raw: update,
  };
}

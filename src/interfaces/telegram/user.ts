import { z } from 'zod';

import { InvalidUpdateError } from '../../runtime/errors.js';
import type { ChannelUser } from '../../messages/message.js';

// https://core.telegram.org/bots/api#user
const TELEGRAM_USER_SCHEMA = z.object({
  id: z.number().int(),
  first_name: z.string(),
  last_name: z.string().optional(),
  username: z.string().optional(),
  language_code: z.string().optional(),
});

export type TelegramUser = ChannelUser & {
  readonly id: number;
  readonly firstName: string;
  readonly lastName?: string;
  readonly username?: string;
  readonly language?: string;
};

export function formatTelegramUser(user: Pick<TelegramUser, 'id' | 'firstName' | 'lastName'>): string {
  const name = user.lastName ? `${user.firstName} ${user.lastName}` : user.firstName;
  return `${name} (${user.id})`;
}

export function buildTelegramUser(sender: unknown): TelegramUser {
  const res = TELEGRAM_USER_SCHEMA.safeParse(sender);
  if (!res.success) {
    const fields = res.error.issues.map((issue) => issue.path.join('.') || 'from');
    throw new InvalidUpdateError(`Invalid Telegram user: ${Array.from(new Set(fields)).join(', ')}`);
  }

  const { id, first_name, last_name, username, language_code } = res.data;
  const user = {
    id,
    firstName: first_name,
    lastName: last_name,
    username,
    language: language_code,
  };

  return Object.freeze({
    ...user,
    displayName: formatTelegramUser(user),
  });
}

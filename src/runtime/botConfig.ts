import path from 'node:path';
import { z } from 'zod';

import { TELEGRAM_API_URL } from '../interfaces/telegram/api.js';
import { getBotHome } from './botHome.js';
import { ImproperlyConfiguredError } from './errors.js';
import { normalizeLogLevel, type RuntimeLogLevel } from '../utils/runtimeLogger.js';

export const DEFAULT_GATEWAY_HOST = '127.0.0.1';
export const DEFAULT_GATEWAY_PORT = 8787;

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

// Mode stays a plain string here; the engine owns the list of known modes.
const BOT_ENV_SCHEMA = z.object({
  TELEGRAM_BOT_TOKEN: z
    .string({ required_error: 'Missing TELEGRAM_BOT_TOKEN in environment' })
    .trim()
    .min(1, 'Missing TELEGRAM_BOT_TOKEN in environment'),
  BOT_MODE: optionalString.transform((value) => value?.toLowerCase() ?? 'polling'),
  BOT_HOSTNAME: optionalString,
  GATEWAY_HOST: optionalString.transform((value) => value ?? DEFAULT_GATEWAY_HOST),
  GATEWAY_PORT: z.coerce
    .number({ invalid_type_error: 'Invalid GATEWAY_PORT' })
    .int('Invalid GATEWAY_PORT')
    .positive('Invalid GATEWAY_PORT')
    .default(DEFAULT_GATEWAY_PORT),
  POLL_TIMEOUT_SECONDS: z.coerce
    .number({ invalid_type_error: 'Invalid POLL_TIMEOUT_SECONDS' })
    .int('Invalid POLL_TIMEOUT_SECONDS')
    .min(0, 'Invalid POLL_TIMEOUT_SECONDS')
    .default(30),
  TELEGRAM_API_URL: optionalString.transform((value) => value ?? TELEGRAM_API_URL),
  LOG_DIR: optionalString,
  BOTLINE_LOG_LEVEL: optionalString,
});

export type BotConfig = {
  token: string;
  mode: string;
  hostname?: string;
  gateway: {
    host: string;
    port: number;
  };
  pollTimeoutSeconds: number;
  apiUrl: string;
  botHome: string;
  logDir: string;
  logLevel: RuntimeLogLevel;
};

export function loadBotConfig(env: NodeJS.ProcessEnv): BotConfig {
  const res = BOT_ENV_SCHEMA.safeParse(env);
  if (!res.success) {
    const reasons = res.error.issues.map((issue) => issue.message);
    throw new ImproperlyConfiguredError(Array.from(new Set(reasons)).join('; '));
  }

  const botHome = getBotHome(env);
  const data = res.data;

  return {
    token: data.TELEGRAM_BOT_TOKEN,
    mode: data.BOT_MODE,
    hostname: data.BOT_HOSTNAME,
    gateway: {
      host: data.GATEWAY_HOST,
      port: data.GATEWAY_PORT,
    },
    pollTimeoutSeconds: data.POLL_TIMEOUT_SECONDS,
    apiUrl: data.TELEGRAM_API_URL.replace(/\/+$/, ''),
    botHome,
    logDir: data.LOG_DIR ?? path.join(botHome, 'logs'),
    logLevel: normalizeLogLevel(data.BOTLINE_LOG_LEVEL),
  };
}

import path from 'node:path';
import { z } from 'zod';

import { emptyResponse, type RouteHandler, type Router } from '../../gateway/server.js';
import { getBotHome } from '../../runtime/botHome.js';
import { ImproperlyConfiguredError, TelegramApiError } from '../../runtime/errors.js';
import type { TaskScheduler } from '../../runtime/taskScheduler.js';
import { appendJsonl, createEventLog } from '../../utils/logging.js';
import { createRuntimeLogger, serializeError, type RuntimeLogger } from '../../utils/runtimeLogger.js';
import { getResponse, type ViewResolver } from '../../views/patterns.js';
import { readTelegramResult, type TelegramApi, type TelegramMethodParams } from './api.js';
import { buildTelegramMessage, TELEGRAM_PLATFORM } from './message.js';

const ENGINE_MODES = ['polling', 'webhook'] as const;

export type EngineModeName = (typeof ENGINE_MODES)[number];

export type EngineMode = { kind: 'polling' } | { kind: 'webhook'; hostname: string };

type EngineState = 'unconfigured' | EngineModeName;

export const POLLING_TASK_NAME = 'telegram.polling';

const DEFAULT_POLL_TIMEOUT_SECONDS = 30;

// https://core.telegram.org/bots/api#getupdates
const UPDATE_BATCH_SCHEMA = z.array(z.object({ update_id: z.number().int() }).passthrough());

type TelegramEngineDeps = {
  appendJsonl: typeof appendJsonl;
};

export type TelegramEngineOptions = {
  api: TelegramApi;
  mode: string;
  hostname?: string;
  scheduler: Pick<TaskScheduler, 'add'>;
  router: Pick<Router, 'addPost'>;
  resolveView: ViewResolver;
  pollTimeoutSeconds?: number;
  engineName?: string;
  logDir?: string;
  logger?: RuntimeLogger;
  now?: () => Date;
  deps?: Partial<TelegramEngineDeps>;
};

export type TelegramEngine = {
  readonly platform: typeof TELEGRAM_PLATFORM;
  getState: () => EngineState;
  configure: () => Promise<EngineMode>;
  configurePolling: () => Promise<void>;
  configureWebhook: (hostname: string) => Promise<void>;
  poll: (signal: AbortSignal) => Promise<void>;
  pollOnce: (cursor: number | null, signal?: AbortSignal) => Promise<number | null>;
  handleWebhook: RouteHandler;
  handleUpdate: (update: unknown) => Promise<void>;
};

const isModeName = (value: string): value is EngineModeName =>
  ENGINE_MODES.some((mode) => mode === value);

/**
 * Turns the configured mode string into the mode the engine runs in. Both
 * failure cases are raised before any remote call is made.
 */
export function resolveEngineMode(mode: string, hostname?: string): EngineMode {
  const normalized = mode.trim().toLowerCase();
  if (!isModeName(normalized)) {
    throw new ImproperlyConfiguredError(`There's no configuration routine for "${mode}" mode`);
  }

  if (normalized === 'polling') {
    return { kind: 'polling' };
  }

  const trimmedHostname = hostname?.trim();
  if (!trimmedHostname) {
    throw new ImproperlyConfiguredError('Missing BOT_HOSTNAME setting required by webhook mode');
  }
  return { kind: 'webhook', hostname: trimmedHostname };
}

const readUpdateId = (update: unknown): number | null => {
  if (typeof update !== 'object' || update === null || !('update_id' in update)) {
    return null;
  }
  return typeof update.update_id === 'number' ? update.update_id : null;
};

export function createTelegramEngine(options: TelegramEngineOptions): TelegramEngine {
  const {
    api,
    scheduler,
    router,
    resolveView,
    pollTimeoutSeconds = DEFAULT_POLL_TIMEOUT_SECONDS,
    engineName = 'telegram',
    logDir = path.join(getBotHome(process.env), 'logs'),
    now = () => new Date(),
    deps = {},
  } = options;

  const { appendJsonl: appendJsonlImpl } = { appendJsonl, ...deps };

  const eventLog = createEventLog({ logDir, now, append: appendJsonlImpl });
  const logger =
    options.logger ??
    createRuntimeLogger({
      logDir,
      component: `${engineName}.engine`,
    });

  let state: EngineState = 'unconfigured';
  let configuring = false;

  logger.info('engine initialized', {
    mode: options.mode,
    pollTimeoutSeconds,
  });

  const reportDispatchError = (updateId: number | null, err: unknown) => {
    logger.error('update handling failed', { updateId, error: serializeError(err) });
    void eventLog.write('telegram.dispatch.error', { updateId, error: serializeError(err) }).catch((logErr) => {
      logger.error('event log write failed', { error: serializeError(logErr) });
    });
  };

  const handleUpdate = async (update: unknown) => {
    const updateId = readUpdateId(update);
    const message = buildTelegramMessage(update);
    if (!message) {
      logger.debug('update without message skipped', { updateId });
      return;
    }

    logger.info(`message from ${message.user.displayName}`, {
      updateId,
      messageId: message.id,
    });
    await eventLog.write('telegram.update', {
      updateId,
      messageId: message.id,
      userId: message.user.id,
      text: message.text,
    });

    const view = resolveView(message);
    if (!view) {
      return;
    }

    const text = await getResponse(view, message);
    if (text === null) {
      logger.debug('view produced no response', { messageId: message.id });
      return;
    }

    const response = await api.sendMessage({
      chat_id: message.user.id,
      text,
      parse_mode: 'Markdown',
    });

    // Delivery failures are reported, never thrown back into the ingestion path.
    const result = await readTelegramResult(response);
    if (!result.ok) {
      const failure = {
        messageId: message.id,
        chatId: message.user.id,
        errorCode: result.error_code ?? null,
        description: result.description ?? null,
      };
      logger.warn('reply delivery failed', failure);
      await eventLog.write('telegram.delivery.failed', failure);
      return;
    }

    await eventLog.write('telegram.reply', {
      messageId: message.id,
      chatId: message.user.id,
      length: text.length,
    });
  };

  const pollOnce = async (cursor: number | null, signal?: AbortSignal): Promise<number | null> => {
    const params: TelegramMethodParams['get_updates'] = {};
    if (cursor !== null) {
      // Acknowledges everything up to the cursor so Telegram stops redelivering it.
      params.offset = cursor + 1;
    }
    if (pollTimeoutSeconds > 0) {
      params.timeout = pollTimeoutSeconds;
    }

    const response = await api.getUpdates(params, signal ? { signal } : undefined);
    const result = await readTelegramResult(response);
    if (!result.ok) {
      throw new TelegramApiError('get_updates', result.description, result.error_code);
    }

    const batch = UPDATE_BATCH_SCHEMA.safeParse(result.result ?? []);
    if (!batch.success) {
      throw new TelegramApiError('get_updates', 'result is not a list of updates');
    }

    const updates = batch.data;
    if (signal?.aborted) {
      // Left unacknowledged; Telegram redelivers them to the next poller.
      logger.info('batch received after stop left undispatched', { count: updates.length });
      return cursor;
    }

    const last = updates[updates.length - 1];
    const nextCursor = last
      ? Math.max(cursor ?? last.update_id, last.update_id)
      : cursor;

    const outcomes = await Promise.allSettled(updates.map((update) => handleUpdate(update)));
    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'rejected') {
        reportDispatchError(updates[index].update_id, outcome.reason);
      }
    });

    return nextCursor;
  };

  const poll = async (signal: AbortSignal) => {
    let cursor: number | null = null;
    while (!signal.aborted) {
      try {
        cursor = await pollOnce(cursor, signal);
      } catch (err) {
        if (signal.aborted) break;
        throw err;
      }
    }
    logger.info('polling stopped', { cursor });
  };

  const handleWebhook: RouteHandler = async (req) => {
    const update = await req.json();
    await handleUpdate(update);
    return emptyResponse(200);
  };

  const configurePolling = async () => {
    const result = await readTelegramResult(await api.deleteWebhook());
    if (result.ok) {
      logger.info(`[${engineName}] polling mode set`);
    } else {
      logger.warn(`[${engineName}] deleteWebhook was not acknowledged`, {
        description: result.description ?? null,
      });
    }

    scheduler.add(POLLING_TASK_NAME, poll);
  };

  const configureWebhook = async (hostname: string) => {
    const result = await readTelegramResult(await api.setWebhook({ url: hostname }));
    if (result.ok) {
      logger.info(`[${engineName}] webhook mode set`, { hostname });
    } else {
      logger.warn(`[${engineName}] setWebhook was not acknowledged`, {
        hostname,
        description: result.description ?? null,
      });
    }

    router.addPost('/', handleWebhook);
  };

  const configure = async (): Promise<EngineMode> => {
    if (configuring || state !== 'unconfigured') {
      throw new ImproperlyConfiguredError(`Engine "${engineName}" is already configured`);
    }
    const mode = resolveEngineMode(options.mode, options.hostname);

    configuring = true;
    try {
      if (mode.kind === 'polling') {
        await configurePolling();
      } else {
        await configureWebhook(mode.hostname);
      }
    } finally {
      configuring = false;
    }
    state = mode.kind;
    return mode;
  };

  return {
    platform: TELEGRAM_PLATFORM,
    getState: () => state,
    configure,
    configurePolling,
    configureWebhook,
    poll,
    pollOnce,
    handleWebhook,
    handleUpdate,
  };
}

import { createTelegramApi } from '../interfaces/telegram/api.js';
import { createTelegramEngine, type EngineMode, type TelegramEngine } from '../interfaces/telegram/engine.js';
import { createFetchHttpClient, type HttpClient } from '../interfaces/telegram/httpClient.js';
import type { BotConfig } from '../runtime/botConfig.js';
import { createTaskScheduler, type TaskScheduler } from '../runtime/taskScheduler.js';
import { createRuntimeLogger, type RuntimeLogger } from '../utils/runtimeLogger.js';
import type { ViewResolver } from '../views/patterns.js';
import {
  createRouter,
  jsonResponse,
  startHttpServer,
  type HttpServer,
  type HttpServerOptions,
  type Router,
} from './server.js';

type ListeningServer = Pick<HttpServer, 'port' | 'close'>;

export type BotOptions = {
  config: BotConfig;
  resolveView: ViewResolver;
  http?: HttpClient;
  logger?: RuntimeLogger;
  listen?: (options: HttpServerOptions) => Promise<ListeningServer>;
};

export type BotRuntime = {
  mode: EngineMode;
  engine: TelegramEngine;
  scheduler: TaskScheduler;
  router: Router;
  server: ListeningServer | null;
  /** Settles once the scheduled tasks return; webhook mode schedules none. */
  done: Promise<void>;
  stop: () => Promise<void>;
};

/**
 * Builds the Telegram engine, configures its mode and starts ingesting.
 * Configuration errors reject before anything is listening or polling.
 */
export async function startBot(options: BotOptions): Promise<BotRuntime> {
  const { config, resolveView } = options;
  const logger =
    options.logger ??
    createRuntimeLogger({
      logDir: config.logDir,
      component: 'botline',
      level: config.logLevel,
    });
  const listen = options.listen ?? startHttpServer;

  const api = createTelegramApi({
    token: config.token,
    http: options.http ?? createFetchHttpClient(),
    apiUrl: config.apiUrl,
  });
  const scheduler = createTaskScheduler({ logger: logger.child('tasks') });
  const router = createRouter({ logger: logger.child('http') });
  router.addGet('/healthz', async () => jsonResponse(200, { ok: true }));

  const engine = createTelegramEngine({
    api,
    mode: config.mode,
    hostname: config.hostname,
    scheduler,
    router,
    resolveView,
    pollTimeoutSeconds: config.pollTimeoutSeconds,
    logDir: config.logDir,
    logger: logger.child('telegram', { mode: config.mode }),
  });

  const mode = await engine.configure();

  let server: ListeningServer | null = null;
  if (mode.kind === 'webhook') {
    server = await listen({
      host: config.gateway.host,
      port: config.gateway.port,
      router,
    });
    logger.info('webhook server listening', {
      host: config.gateway.host,
      port: server.port,
    });
  }

  const done = scheduler.run();

  const stop = async () => {
    scheduler.stop();
    if (server) {
      await server.close();
    }
  };

  return { mode, engine, scheduler, router, server, done, stop };
}

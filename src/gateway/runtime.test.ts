import { describe, expect, it, vi } from 'vitest';

import type { HttpClient } from '../interfaces/telegram/httpClient.js';
import type { BotConfig } from '../runtime/botConfig.js';
import { ImproperlyConfiguredError, TelegramApiError } from '../runtime/errors.js';
import type { RuntimeLogger } from '../utils/runtimeLogger.js';
import { startBot } from './runtime.js';
import type { HttpServerOptions, ServerResponseLike } from './server.js';

const makeConfig = (overrides: Partial<BotConfig> = {}): BotConfig => ({
  token: 'test-token',
  mode: 'polling',
  gateway: { host: '127.0.0.1', port: 8787 },
  pollTimeoutSeconds: 0,
  apiUrl: 'https://api.telegram.org',
  botHome: '/botline-test',
  logDir: '/botline-test/logs',
  logLevel: 'info',
  ...overrides,
});

const makeLogger = () => {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: (): RuntimeLogger => logger,
  };
  return logger;
};

const makeHttp = (payloads: Record<string, unknown>) => {
  const methods: string[] = [];
  const http: HttpClient = {
    post: async (url) => {
      const method = url.slice(url.lastIndexOf('/') + 1);
      methods.push(method);
      return { status: 200, json: async () => payloads[method] ?? { ok: true, result: true } };
    },
  };
  return { http, methods };
};

const makeListen = () => {
  const close = vi.fn(async () => undefined);
  const listen = vi.fn(async (options: HttpServerOptions) => ({ port: options.port, close }));
  return { listen, close };
};

describe('startBot', () => {
  it('polls until getUpdates fails and reports the failure through done', async () => {
    const { http, methods } = makeHttp({
      getUpdates: { ok: false, error_code: 401, description: 'Unauthorized' },
    });
    const { listen } = makeListen();

    const bot = await startBot({
      config: makeConfig(),
      resolveView: () => null,
      http,
      logger: makeLogger(),
      listen,
    });

    await expect(bot.done).rejects.toThrow(TelegramApiError);
    expect(bot.mode).toEqual({ kind: 'polling' });
    expect(bot.server).toBeNull();
    expect(listen).not.toHaveBeenCalled();
    expect(methods).toEqual(['deleteWebhook', 'getUpdates']);
    expect(bot.scheduler.getStatus()).toEqual([
      { name: 'telegram.polling', state: 'failed', error: 'Telegram get_updates failed: Unauthorized' },
    ]);
  });

  it('registers the webhook and serves it with a health check', async () => {
    const { http, methods } = makeHttp({});
    const { listen, close } = makeListen();

    const bot = await startBot({
      config: makeConfig({ mode: 'webhook', hostname: 'https://bot.example.test/' }),
      resolveView: () => null,
      http,
      logger: makeLogger(),
      listen,
    });

    expect(methods).toEqual(['setWebhook']);
    expect(listen).toHaveBeenCalledWith({ host: '127.0.0.1', port: 8787, router: bot.router });
    expect(bot.router.hasRoute('POST', '/')).toBe(true);
    await expect(bot.done).resolves.toBeUndefined();

    const res: ServerResponseLike & { body: string } = {
      statusCode: 0,
      body: '',
      setHeader: () => undefined,
      end: (body) => {
        res.body = body ?? '';
      },
    };
    await bot.router.handle(
      {
        method: 'GET',
        url: '/healthz',
        async *[Symbol.asyncIterator]() {
          yield '';
        },
      },
      res,
    );
    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body)).toEqual({ ok: true });

    await bot.stop();
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('refuses to start webhook mode without a hostname', async () => {
    const { http, methods } = makeHttp({});
    const { listen } = makeListen();

    await expect(
      startBot({
        config: makeConfig({ mode: 'webhook' }),
        resolveView: () => null,
        http,
        logger: makeLogger(),
        listen,
      }),
    ).rejects.toThrow(ImproperlyConfiguredError);

    expect(methods).toEqual([]);
    expect(listen).not.toHaveBeenCalled();
  });
});

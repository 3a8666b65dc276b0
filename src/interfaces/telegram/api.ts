import { z } from 'zod';

import { UnsupportedOperationError } from '../../runtime/errors.js';
import type { HttpClient, HttpRequestOptions, HttpResponse } from './httpClient.js';

export const TELEGRAM_API_URL = 'https://api.telegram.org';

export const TELEGRAM_METHODS = [
  'delete_webhook',
  'send_message',
  'set_webhook',
  'get_updates',
] as const;

export type TelegramMethod = (typeof TELEGRAM_METHODS)[number];

export type TelegramParseMode = 'Markdown' | 'MarkdownV2' | 'HTML';

// Only the parameters this adapter sends; Telegram validates the rest.
export type TelegramMethodParams = {
  delete_webhook: { drop_pending_updates?: boolean };
  send_message: { chat_id: number | string; text: string; parse_mode?: TelegramParseMode };
  set_webhook: { url: string };
  get_updates: { offset?: number; timeout?: number };
};

const TELEGRAM_RESULT_SCHEMA = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().int().optional(),
});

type TelegramResult = z.infer<typeof TELEGRAM_RESULT_SCHEMA>;

export type TelegramApi = {
  readonly token: string;
  makeUrl: (method: string) => string;
  call: <M extends TelegramMethod>(
    method: M,
    params: TelegramMethodParams[M],
    options?: HttpRequestOptions,
  ) => Promise<HttpResponse>;
  deleteWebhook: (params?: TelegramMethodParams['delete_webhook']) => Promise<HttpResponse>;
  sendMessage: (params: TelegramMethodParams['send_message']) => Promise<HttpResponse>;
  setWebhook: (params: TelegramMethodParams['set_webhook']) => Promise<HttpResponse>;
  getUpdates: (
    params?: TelegramMethodParams['get_updates'],
    options?: HttpRequestOptions,
  ) => Promise<HttpResponse>;
};

export type TelegramApiOptions = {
  token: string;
  http: HttpClient;
  apiUrl?: string;
};

export function isTelegramMethod(name: string): name is TelegramMethod {
  return TELEGRAM_METHODS.some((method) => method === name);
}

/** `get_updates` -> `getUpdates` */
export function toMixedCase(name: string): string {
  const [first = '', ...rest] = name.split('_');
  const tail = rest
    .map((word) => (word ? word.charAt(0).toUpperCase() + word.slice(1).toLowerCase() : ''))
    .join('');
  return first.toLowerCase() + tail;
}

export async function readTelegramResult(response: HttpResponse): Promise<TelegramResult> {
  const payload = await response.json();
  const res = TELEGRAM_RESULT_SCHEMA.safeParse(payload);
  if (!res.success) {
    return {
      ok: false,
      description: `Unexpected Telegram response (HTTP ${response.status})`,
    };
  }
  return res.data;
}

export function createTelegramApi(options: TelegramApiOptions): TelegramApi {
  const { token, http } = options;
  const apiUrl = options.apiUrl ?? TELEGRAM_API_URL;

  const makeUrl = (method: string): string => {
    if (!isTelegramMethod(method)) {
      throw new UnsupportedOperationError(method);
    }
    return `${apiUrl}/bot${token}/${toMixedCase(method)}`;
  };

  const call = async <M extends TelegramMethod>(
    method: M,
    params: TelegramMethodParams[M],
    options?: HttpRequestOptions,
  ): Promise<HttpResponse> => {
    const url = makeUrl(method);
    return options ? http.post(url, { ...params }, options) : http.post(url, { ...params });
  };

  return {
    token,
    makeUrl,
    call,
    deleteWebhook: (params = {}) => call('delete_webhook', params),
    sendMessage: (params) => call('send_message', params),
    setWebhook: (params) => call('set_webhook', params),
    getUpdates: (params = {}, options) => call('get_updates', params, options),
  };
}

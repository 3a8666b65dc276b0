export type HttpResponse = {
  status: number;
  json: () => Promise<unknown>;
};

export type HttpRequestOptions = {
  signal?: AbortSignal;
};

/** Shared, stateless transport used by every Telegram call. */
export type HttpClient = {
  post: (url: string, body: Record<string, unknown>, options?: HttpRequestOptions) => Promise<HttpResponse>;
};

export function createFetchHttpClient(fetchImpl: typeof fetch = fetch): HttpClient {
  return {
    post: async (url, body, options = {}) => {
      const response = await fetchImpl(url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(body),
        ...(options.signal ? { signal: options.signal } : {}),
      });

      return {
        status: response.status,
        json: () => response.json(),
      };
    },
  };
}

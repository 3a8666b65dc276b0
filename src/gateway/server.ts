import { createServer, type Server } from 'node:http';

import { serializeError, type RuntimeLogger } from '../utils/runtimeLogger.js';

const MAX_BODY_BYTES = 1024 * 1024;

export type RouteRequest = {
  method: string;
  path: string;
  json: () => Promise<unknown>;
};

export type RouteResponse = {
  statusCode: number;
  body?: string;
  contentType?: string;
};

export type RouteHandler = (req: RouteRequest) => Promise<RouteResponse>;

export type ServerRequestLike = AsyncIterable<Uint8Array | string> & {
  method?: string;
  url?: string;
};

export type ServerResponseLike = {
  statusCode: number;
  setHeader: (name: string, value: string) => void;
  end: (body?: string) => void;
};

export type Router = {
  addGet: (path: string, handler: RouteHandler) => void;
  addPost: (path: string, handler: RouteHandler) => void;
  hasRoute: (method: string, path: string) => boolean;
  handle: (req: ServerRequestLike, res: ServerResponseLike) => Promise<void>;
};

class RequestBodyError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'RequestBodyError';
    this.statusCode = statusCode;
  }
}

async function readBody(req: ServerRequestLike): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk);
    size += buffer.byteLength;
    if (size > MAX_BODY_BYTES) {
      throw new RequestBodyError(413, 'request body too large');
    }
    chunks.push(buffer);
  }
  return Buffer.concat(chunks).toString('utf8');
}

export const jsonResponse = (statusCode: number, payload: unknown): RouteResponse => ({
  statusCode,
  body: JSON.stringify(payload),
  contentType: 'application/json; charset=utf-8',
});

export const emptyResponse = (statusCode = 200): RouteResponse => ({ statusCode });

type RouterOptions = {
  logger?: Pick<RuntimeLogger, 'error'>;
};

export function createRouter(options: RouterOptions = {}): Router {
  // Registering the same method and path again replaces the handler.
  const routes = new Map<string, RouteHandler>();
  const routeKey = (method: string, path: string) => `${method.toUpperCase()} ${path}`;

  const send = (res: ServerResponseLike, response: RouteResponse) => {
    res.statusCode = response.statusCode;
    if (response.contentType) {
      res.setHeader('content-type', response.contentType);
    }
    res.end(response.body ?? '');
  };

  const handle = async (req: ServerRequestLike, res: ServerResponseLike) => {
    const method = (req.method ?? 'GET').toUpperCase();
    const path = req.url?.split('?')[0] ?? '/';
    const handler = routes.get(routeKey(method, path));

    if (!handler) {
      send(res, jsonResponse(404, { error: 'not_found' }));
      return;
    }

    let cachedBody: Promise<string> | null = null;
    const request: RouteRequest = {
      method,
      path,
      json: async () => {
        const body = cachedBody ?? readBody(req);
        cachedBody = body;
        const raw = await body;
        try {
          return JSON.parse(raw) as unknown;
        } catch {
          throw new RequestBodyError(400, 'request body is not valid JSON');
        }
      },
    };

    try {
      send(res, await handler(request));
    } catch (err) {
      if (err instanceof RequestBodyError) {
        send(res, jsonResponse(err.statusCode, { error: err.message }));
        return;
      }
      options.logger?.error('route handler failed', {
        method,
        path,
        error: serializeError(err),
      });
      send(res, emptyResponse(500));
    }
  };

  return {
    addGet: (path, handler) => {
      routes.set(routeKey('GET', path), handler);
    },
    addPost: (path, handler) => {
      routes.set(routeKey('POST', path), handler);
    },
    hasRoute: (method, path) => routes.has(routeKey(method, path)),
    handle,
  };
}

export type HttpServerOptions = {
  host: string;
  port: number;
  router: Router;
};

export type HttpServer = {
  server: Server;
  port: number;
  close: () => Promise<void>;
};

export async function startHttpServer(options: HttpServerOptions): Promise<HttpServer> {
  const server = createServer((req, res) => {
    void options.router.handle(req, res);
  });

  let port = options.port;
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      const address = server.address();
      if (address && typeof address === 'object') {
        port = address.port;
      }
      resolve();
    });
  });

  const close = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });

  return { server, port, close };
}

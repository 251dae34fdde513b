/**
 * Satori Telegram — Satori HTTP API
 *
 * Serves the Satori resource API for one adapter:
 *
 *   POST {path}/v1/{method}          JSON body in, JSON out
 *   GET  {path}/v1/proxy/{locator}   bytes of an internal: file
 *
 * When a token is configured every request must carry
 * `Authorization: Bearer <token>`.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { URL } from 'node:url';
import { z, ZodError } from 'zod';
import type { ServerConfig } from '../config/types.js';
import { ElementValidationError } from '../element/markup.js';
import type { TelegramAdapter } from '../telegram/adapter.js';
import { AdapterError } from '../telegram/adapter.js';
import { PartialDeliveryError, UnsupportedContentError } from '../telegram/send.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Server');

/** Message content may carry data: URIs, so bodies can be large. */
const MAX_BODY_SIZE = 16 * 1024 * 1024;

const PROXY_PREFIX = 'proxy/';

export type SatoriBackend = Pick<
  TelegramAdapter,
  'getLogin' | 'getUser' | 'createMessage' | 'updateMessage' | 'getMessage' | 'downloadInternal'
>;

// ============================================================================
// ERRORS
// ============================================================================

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

const ADAPTER_STATUS: Record<AdapterError['code'], number> = {
  INVALID_ARGUMENT: 400,
  NOT_FOUND: 404,
  NOT_SUPPORTED: 501,
  NOT_READY: 503,
};

/**
 * HTTP status for a failed request.
 */
export function statusForError(error: unknown): number {
  if (error instanceof HttpError) return error.status;
  if (error instanceof AdapterError) return ADAPTER_STATUS[error.code];
  if (
    error instanceof ZodError ||
    error instanceof ElementValidationError ||
    error instanceof UnsupportedContentError
  ) {
    return 400;
  }
  return 500;
}

function errorBody(error: unknown): Record<string, unknown> {
  if (error instanceof ZodError) {
    return {
      code: 'INVALID_REQUEST',
      message: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  const code =
    error instanceof Error && 'code' in error && typeof error.code === 'string'
      ? error.code
      : 'INTERNAL_ERROR';

  if (error instanceof PartialDeliveryError) {
    return { code, message, delivered: error.delivered };
  }
  return { code, message };
}

// ============================================================================
// ROUTES
// ============================================================================

const UserGetSchema = z.object({ user_id: z.string() });

const MessageCreateSchema = z.object({
  channel_id: z.string(),
  content: z.string(),
});

const MessageUpdateSchema = z.object({
  channel_id: z.string(),
  message_id: z.string(),
  content: z.string(),
});

const MessageGetSchema = z.object({
  channel_id: z.string(),
  message_id: z.string(),
});

type Route = (backend: SatoriBackend, body: unknown) => Promise<unknown>;

const ROUTES = new Map<string, Route>([
  ['login.get', async (backend) => backend.getLogin()],
  [
    'user.get',
    async (backend, body) => {
      const { user_id } = UserGetSchema.parse(body);
      return backend.getUser(user_id);
    },
  ],
  [
    'message.create',
    async (backend, body) => {
      const { channel_id, content } = MessageCreateSchema.parse(body);
      return backend.createMessage(channel_id, content);
    },
  ],
  [
    'message.update',
    async (backend, body) => {
      const { channel_id, message_id, content } = MessageUpdateSchema.parse(body);
      await backend.updateMessage(channel_id, message_id, content);
      return {};
    },
  ],
  [
    'message.get',
    async (backend, body) => {
      const { channel_id, message_id } = MessageGetSchema.parse(body);
      return backend.getMessage(channel_id, message_id);
    },
  ],
]);

export const SUPPORTED_METHODS: readonly string[] = [...ROUTES.keys()];

// ============================================================================
// SERVER
// ============================================================================

export interface ListeningAddress {
  host: string;
  port: number;
}

export class SatoriServer {
  private server: Server | null = null;

  constructor(
    private readonly backend: SatoriBackend,
    private readonly config: ServerConfig
  ) {}

  listen(): Promise<ListeningAddress> {
    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => {
        this.handle(req, res).catch((error: unknown) => {
          log.error('Unhandled request failure', error instanceof Error ? error : { error: String(error) });
          if (!res.headersSent) sendJson(res, 500, { error: errorBody(error) });
          else res.destroy();
        });
      });

      server.once('error', (err) => {
        reject(new Error(`Failed to start server: ${err.message}`));
      });

      server.listen(this.config.port, this.config.host, () => {
        const address = server.address();
        if (!address || typeof address === 'string') {
          reject(new Error('Failed to get server address'));
          return;
        }
        this.server = server;
        log.info('Satori API listening', {
          host: this.config.host,
          port: address.port,
          path: `${this.config.path}/v1`,
        });
        resolve({ host: this.config.host, port: address.port });
      });
    });
  }

  close(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();

    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url || '/', 'http://localhost');
    const prefix = `${this.config.path}/v1/`;

    try {
      if (!url.pathname.startsWith(prefix)) {
        throw new HttpError(404, 'NOT_FOUND', `No route for ${url.pathname}`);
      }
      if (!this.isAuthorized(req)) {
        throw new HttpError(401, 'UNAUTHORIZED', 'Invalid or missing token');
      }

      const rest = url.pathname.slice(prefix.length);

      if (rest.startsWith(PROXY_PREFIX)) {
        if (req.method !== 'GET') {
          throw new HttpError(405, 'METHOD_NOT_ALLOWED', 'Proxy only serves GET');
        }
        await this.proxy(decodePath(rest.slice(PROXY_PREFIX.length)), res);
        return;
      }

      const route = ROUTES.get(rest);
      if (!route) {
        throw new HttpError(404, 'UNKNOWN_METHOD', `Unknown method: ${rest}`);
      }
      if (req.method !== 'POST') {
        throw new HttpError(405, 'METHOD_NOT_ALLOWED', 'API methods are called with POST');
      }

      const body = await readJsonBody(req);
      log.debug('API call', { method: rest });
      const result = await route(this.backend, body);
      sendJson(res, 200, result ?? {});
    } catch (error) {
      const status = statusForError(error);
      if (status >= 500) {
        log.error('Request failed', {
          path: url.pathname,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      sendJson(res, status, { error: errorBody(error) });
    }
  }

  private async proxy(locator: string, res: ServerResponse): Promise<void> {
    const file = await this.backend.downloadInternal(locator);
    res.writeHead(200, {
      'Content-Type': file.mime,
      'Content-Length': String(file.data.byteLength),
      'Content-Disposition': `inline; filename="${encodeURIComponent(file.filename)}"`,
    });
    res.end(file.data);
  }

  private isAuthorized(req: IncomingMessage): boolean {
    if (!this.config.token) return true;
    return req.headers.authorization === `Bearer ${this.config.token}`;
  }
}

// ============================================================================
// REQUEST & RESPONSE HELPERS
// ============================================================================

function decodePath(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    throw new HttpError(400, 'INVALID_REQUEST', 'Malformed percent-encoding in path');
  }
}

/**
 * Read and parse a JSON request body. An empty body reads as `{}`.
 */
function readJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let aborted = false;

    req.on('data', (chunk: Buffer) => {
      if (aborted) return;
      size += chunk.length;
      if (size > MAX_BODY_SIZE) {
        aborted = true;
        reject(new HttpError(413, 'PAYLOAD_TOO_LARGE', 'Request body too large'));
        return;
      }
      chunks.push(chunk);
    });

    req.on('end', () => {
      if (aborted) return;
      const text = Buffer.concat(chunks).toString('utf-8').trim();
      if (!text) {
        resolve({});
        return;
      }
      try {
        resolve(JSON.parse(text));
      } catch {
        reject(new HttpError(400, 'INVALID_JSON', 'Request body is not valid JSON'));
      }
    });

    req.on('error', (err) => {
      if (!aborted) reject(err);
    });
  });
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

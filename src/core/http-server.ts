/**
 * HTTP Server Setup
 *
 * Minimal route-table server used by the rnode web UI.
 */

import { createServer, Server, IncomingMessage, ServerResponse } from 'http';
import { httpStatusFor } from './errors.js';
import { getErrorHTML } from './page.js';

export interface RequestHandler {
  (req: IncomingMessage, res: ServerResponse): Promise<void> | void;
}

export interface Route {
  method: 'GET' | 'POST' | '*';
  path: string;
  handler: RequestHandler;
}

export interface ServerConfig {
  routes: Route[];
}

export const MAX_BODY_BYTES = 1024 * 1024;

export class HttpError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
  }
}

/**
 * Parse an application/x-www-form-urlencoded body
 */
export async function parseFormBody(req: IncomingMessage): Promise<URLSearchParams> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        tooLarge = true;
        return;
      }
      chunks.push(chunk);
    });

    req.on('end', () => {
      if (tooLarge) {
        reject(new HttpError('Request body too large', 413));
        return;
      }
      // decode once so multi-byte characters split across chunks survive
      resolve(new URLSearchParams(Buffer.concat(chunks).toString('utf-8')));
    });

    req.on('error', reject);
  });
}

/**
 * Send HTML response
 */
export function sendHtml(res: ServerResponse, html: string, status = 200): void {
  res.writeHead(status, { 'Content-Type': 'text/html; charset=utf-8' });
  res.end(html);
}

/**
 * Send an HTML error page
 */
export function sendError(res: ServerResponse, message: string, status = 500): void {
  sendHtml(res, getErrorHTML(String(status), message), status);
}

/**
 * Get URL pathname and search params from request
 */
export function parseUrl(req: IncomingMessage): { pathname: string; searchParams: URLSearchParams } {
  const url = new URL(req.url || '/', `http://${req.headers.host || 'localhost'}`);
  return {
    pathname: url.pathname,
    searchParams: url.searchParams
  };
}

function statusFor(error: unknown): number {
  return error instanceof HttpError ? error.status : httpStatusFor(error);
}

/**
 * Dispatch one request against the route table
 */
export async function dispatch(routes: Route[], req: IncomingMessage, res: ServerResponse): Promise<void> {
  const { pathname } = parseUrl(req);
  const method = req.method || 'GET';
  let pathMatched = false;

  for (const route of routes) {
    if (route.path !== pathname) {
      continue;
    }
    pathMatched = true;

    if (route.method !== '*' && route.method !== method) {
      continue;
    }

    try {
      await route.handler(req, res);
    } catch (error) {
      console.error(`${method} ${pathname} failed:`, error);
      sendError(res, error instanceof Error ? error.message : 'Internal Server Error', statusFor(error));
    }
    return;
  }

  if (pathMatched) {
    sendError(res, 'Method Not Allowed', 405);
    return;
  }
  sendError(res, 'Not Found', 404);
}

/**
 * Create HTTP server with routes
 */
export function createHttpServer(config: ServerConfig): Server {
  const { routes } = config;

  return createServer((req, res) => {
    dispatch(routes, req, res).catch((error: unknown) => {
      console.error('Unhandled request error:', error);
      if (!res.headersSent) {
        sendError(res, 'Internal Server Error');
      } else {
        res.end();
      }
    });
  });
}

/**
 * Start listening, resolving with the bound port
 */
export function startServer(
  server: Server,
  config: { port: number; host?: string }
): Promise<{ port: number }> {
  return new Promise((resolve, reject) => {
    const { port, host = '0.0.0.0' } = config;

    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      const address = server.address();
      resolve({ port: typeof address === 'object' && address ? address.port : port });
    });

    server.listen(port, host);
  });
}

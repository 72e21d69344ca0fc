/**
 * Mock IncomingMessage / ServerResponse for route tests
 */

import { vi } from 'vitest';
import type { IncomingMessage, ServerResponse } from 'http';

export function createMockRequest(
  method: string,
  url: string,
  body?: string | Buffer[],
  headers: Record<string, string> = {}
): IncomingMessage {
  const chunks = typeof body === 'string' ? [Buffer.from(body)] : body ?? [];
  const req = {
    method,
    url,
    headers: {
      host: 'localhost:8888',
      ...headers,
    },
    on: vi.fn((event: string, callback: (data?: unknown) => void) => {
      if (event === 'data') {
        for (const chunk of chunks) {
          callback(chunk);
        }
      }
      if (event === 'end') {
        setTimeout(callback, 0);
      }
    }),
  };
  return req as unknown as IncomingMessage;
}

export type MockResponse = ServerResponse & {
  _status: number;
  _headers: Record<string, string>;
  _body: string;
};

export function createMockResponse(): MockResponse {
  const res = {
    _status: 200,
    _headers: {} as Record<string, string>,
    _body: '',
    headersSent: false,
    writeHead: vi.fn((status: number, headers?: Record<string, string>) => {
      res._status = status;
      if (headers) {
        Object.assign(res._headers, headers);
      }
      res.headersSent = true;
    }),
    end: vi.fn((data?: string) => {
      if (data) {
        res._body += data;
      }
    }),
  };
  return res as unknown as MockResponse;
}

/**
 * Encode form fields the way a browser posts them
 */
export function formBody(fields: Record<string, string>): string {
  return new URLSearchParams(fields).toString();
}

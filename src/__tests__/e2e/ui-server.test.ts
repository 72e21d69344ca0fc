/**
 * E2E Tests for the web UI
 *
 * Serves the UI on a loopback port against in-memory node clients.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import http, { Server, IncomingMessage } from 'http';
import { createUiServer } from '../../api/ui-routes.js';
import { startServer } from '../../core/http-server.js';
import { RpcFailure } from '../../core/errors.js';
import { createFakeNode, type FakeNode } from '../mocks/node-mock.js';
import { formBody } from '../mocks/http-mock.js';

async function request(
  port: number,
  method: string,
  path: string,
  body?: string
): Promise<{ status: number; contentType: string; data: string }> {
  return new Promise((resolve, reject) => {
    const options = {
      hostname: '127.0.0.1',
      port,
      path,
      method,
      headers: body === undefined ? {} : {
        'Content-Type': 'application/x-www-form-urlencoded',
        'Content-Length': Buffer.byteLength(body)
      },
    };

    const req = http.request(options, (res: IncomingMessage) => {
      let data = '';
      res.on('data', (chunk: Buffer) => {
        data += chunk.toString();
      });
      res.on('end', () => {
        resolve({
          status: res.statusCode || 500,
          contentType: String(res.headers['content-type']),
          data
        });
      });
    });

    req.on('error', reject);

    if (body !== undefined) {
      req.write(body);
    }
    req.end();
  });
}

describe('UI server E2E', () => {
  let server: Server;
  let port: number;
  let node: FakeNode;

  beforeEach(async () => {
    node = createFakeNode({
      output: '@{"x"}!(2) | for( x0 <= @{"stdout"} ) { Nil } | for( x0 <= @{"stderr"} ) { Nil }',
      peers: ['10.0.0.2:40400']
    });
    server = createUiServer({ diagnostics: node.diagnostics, repl: node.repl });
    ({ port } = await startServer(server, { port: 0, host: '127.0.0.1' }));
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
  });

  it('serves the diagnostics page', async () => {
    const res = await request(port, 'GET', '/');

    expect(res.status).toBe(200);
    expect(res.contentType).toBe('text/html; charset=utf-8');
    expect(res.data).toContain('<li>10.0.0.2:40400</li>');
  });

  it('runs posted code and keeps it for later visits', async () => {
    const posted = await request(port, 'POST', '/', formBody({ rho1: 'new x in { x!(1 + 1) }' }));

    expect(posted.status).toBe(200);
    expect(node.repl.run).toHaveBeenCalledWith({ line: 'new x in { x!(1 + 1) }' });
    expect(posted.data).toContain(
      '<pre id="store">\n@{"x"}!(2) |\nfor( x0 <= @{"stdout"} ) { Nil } |\nfor( x0 <= @{"stderr"} ) { Nil }\n  </pre>'
    );

    const later = await request(port, 'GET', '/');
    expect(later.data).toBe(posted.data);
  });

  it('answers 400 for a post without rho1', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    const res = await request(port, 'POST', '/', formBody({ code: 'Nil' }));

    expect(res.status).toBe(400);
    expect(node.repl.run).not.toHaveBeenCalled();
  });

  it('isolates a failed request from the next one', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    node.diagnostics.listPeers.mockRejectedValueOnce(new RpcFailure('Diagnostics.ListPeers', 'unavailable', 14));

    const failed = await request(port, 'GET', '/');
    const next = await request(port, 'GET', '/');

    expect(failed.status).toBe(502);
    expect(next.status).toBe(200);
  });

  it('answers 404 for other paths', async () => {
    const res = await request(port, 'GET', '/peers');
    expect(res.status).toBe(404);
  });
});

/**
 * Diagnostics/REPL UI routes
 *
 * A single route, `/`. GET shows the node's peers with the last submitted
 * code and store contents; POST runs the posted code and re-renders.
 */

import type { IncomingMessage, ServerResponse, Server } from 'http';
import type { Route } from '../core/http-server.js';
import { createHttpServer, parseFormBody, sendHtml } from '../core/http-server.js';
import { MissingField } from '../core/errors.js';
import { renderPage } from '../core/page.js';
import { SessionState } from '../core/session-state.js';
import type { DiagnosticsClient, ReplClient } from '../types/index.js';

export const CODE_FIELD = 'rho1';

/**
 * UI route configuration
 */
export interface UiRoutesConfig {
  /**
   * Diagnostics client used for the peer list
   */
  diagnostics: DiagnosticsClient;

  /**
   * Repl client used to run submitted code
   */
  repl: ReplClient;

  /**
   * Session state; a fresh one is created when omitted
   */
  session?: SessionState;
}

/**
 * Put each process of a `P | Q | R` store listing on its own line
 */
export function formatStoreContents(output: string): string {
  return output.split(' | ').join(' |\n');
}

/**
 * Create the `/` GET and POST routes
 */
export function createUiRoutes(config: UiRoutesConfig): Route[] {
  const { diagnostics, repl, session = new SessionState() } = config;

  async function render(res: ServerResponse): Promise<void> {
    const { peers } = await diagnostics.listPeers();
    sendHtml(res, renderPage({
      peers,
      code: session.lastSubmittedCode,
      storeContents: session.lastStoreContents
    }));
  }

  async function submit(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const form = await parseFormBody(req);
    const code = form.get(CODE_FIELD);
    if (code === null) {
      throw new MissingField(CODE_FIELD);
    }

    session.submit(code);
    const { output } = await repl.run({ line: code });
    session.complete(formatStoreContents(output));

    await render(res);
  }

  return [
    {
      method: 'GET',
      path: '/',
      handler: (req, res) => render(res)
    },
    {
      method: 'POST',
      path: '/',
      handler: submit
    }
  ];
}

/**
 * Build the UI HTTP server; the caller decides where it listens
 */
export function createUiServer(config: UiRoutesConfig): Server {
  return createHttpServer({ routes: createUiRoutes(config) });
}

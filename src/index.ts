/**
 * rnode-client - library entry
 *
 * Embed the rnode REPL/diagnostics clients or the web UI in another
 * program. For CLI usage, see cli.ts.
 */

// RPC exports
export {
  openConnection,
  makeReplClient,
  makeDiagnosticsClient,
  connectToNode,
  loadRNodeDefinition,
  Connection,
  DEFAULT_HOST,
  DEFAULT_PORT,
  PROTO_PATH
} from './rpc/connection.js';
export type { NodeClients } from './rpc/connection.js';

// Core exports
export { SessionState } from './core/session-state.js';
export type { SessionPhase } from './core/session-state.js';

export { loadConfig, findConfigFile, validateConfig, getDefaultConfig, configFromEnv } from './core/config-loader.js';
export type { ConfigLoaderOptions } from './core/config-loader.js';

export { renderPage, renderPeers, getErrorHTML, PAGE_TEMPLATE } from './core/page.js';
export type { PageContent } from './core/page.js';

export {
  createHttpServer,
  startServer,
  dispatch,
  parseFormBody,
  sendHtml,
  sendError,
  parseUrl,
  HttpError
} from './core/http-server.js';
export type { RequestHandler, Route, ServerConfig } from './core/http-server.js';

export {
  RNodeClientError,
  InvalidUsage,
  RpcFailure,
  MissingField,
  ConfigError,
  exitCodeFor,
  httpStatusFor
} from './core/errors.js';
export type { ErrorCode } from './core/errors.js';

// UI exports
export { createUiRoutes, createUiServer, formatStoreContents, CODE_FIELD } from './api/ui-routes.js';
export type { UiRoutesConfig } from './api/ui-routes.js';

// CLI exports
export { run, selectMode } from './cli.js';
export type { RunOptions, RunDeps } from './cli.js';

// Type exports
export type * from './types/index.js';

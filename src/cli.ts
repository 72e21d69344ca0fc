#!/usr/bin/env node

/**
 * rnode client CLI
 *
 * Forward Rholang code or a file path to a running rnode, or serve a small
 * diagnostics web UI.
 *
 * Usage:
 *   rnode-client -w
 *   rnode-client contract.rho
 *   rnode-client -c 'new x in { x!(1 + 1) }'
 */

import { dirname, join } from 'path';
import { readFileSync, realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createUiServer, type UiRoutesConfig } from './api/ui-routes.js';
import { startServer } from './core/http-server.js';
import { getDefaultConfig, loadConfig } from './core/config-loader.js';
import { InvalidUsage, exitCodeFor } from './core/errors.js';
import { connectToNode, type NodeClients } from './rpc/connection.js';
import type { CommandMode, OutputSink, RNodeClientConfig } from './types/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const WEB_HOST = '0.0.0.0';

export type RunOptions = RNodeClientConfig;

export interface RunDeps {
  /**
   * Opens the node connection (default: gRPC over an insecure channel)
   */
  connect?: (host: string, port: number) => NodeClients;

  /**
   * Starts the web UI listening on webPort and resolves once it is bound
   */
  serveUi?: (config: UiRoutesConfig, webPort: number) => Promise<void>;
}

export interface MainDeps extends RunDeps {
  /**
   * Resolved configuration (default: loadConfig())
   */
  config?: RNodeClientConfig;
}

/**
 * Pick the mode from the raw argument vector (argv[0] is the program)
 *
 * `-w` beats `-c`, which beats a file path. With `-c` the code is the
 * last argument, wherever `-c` sits.
 */
function selectMode(argv: string[]): CommandMode {
  if (argv.includes('-w')) {
    return { kind: 'web' };
  }
  if (argv.includes('-c')) {
    return { kind: 'inline', code: argv[argv.length - 1] };
  }
  const fileName = argv[1];
  if (fileName === undefined) {
    throw new InvalidUsage('Missing file path (or use -c <code> or -w)');
  }
  return { kind: 'file', fileName };
}

async function listenUi(config: UiRoutesConfig, webPort: number): Promise<void> {
  const server = createUiServer(config);
  await startServer(server, { port: webPort, host: WEB_HOST });

  const shutdown = () => {
    server.close();
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

/**
 * Run one CLI invocation
 *
 * Inline and file modes write the node's output plus a newline and close
 * the connection. Web mode writes the UI address once listening and leaves
 * the server running.
 */
async function run(
  argv: string[],
  stdout: OutputSink,
  options: RunOptions = getDefaultConfig(),
  deps: RunDeps = {}
): Promise<void> {
  const { connect = connectToNode, serveUi = listenUi } = deps;
  const mode = selectMode(argv);
  const clients = connect(options.host, options.port);

  if (mode.kind === 'web') {
    try {
      await serveUi({ diagnostics: clients.diagnostics, repl: clients.repl }, options.webPort);
    } catch (error) {
      clients.close();
      throw error;
    }
    stdout.write(`rnode web UI at http://${WEB_HOST}:${options.webPort}\n`);
    return;
  }

  try {
    const { output } = mode.kind === 'inline'
      ? await clients.repl.run({ line: mode.code })
      : await clients.repl.eval({ fileName: mode.fileName });
    stdout.write(`${output}\n`);
  } finally {
    clients.close();
  }
}

function usage(): string {
  return `
rnode client

Run Rholang on a running rnode, or browse its diagnostics.

USAGE:
  rnode-client -w                 Start the web UI
  rnode-client -c '<code>'        Run inline code and print the result
  rnode-client <file.rho>         Evaluate a file (path as seen by the node)

OPTIONS (only as the first argument, without -w or -c):
  -h, --help                      Show this help
  -v, --version                   Show version number

ENVIRONMENT:
  RNODE_HOST                      Node host (default: 127.0.0.1)
  RNODE_PORT                      Node gRPC port (default: 50000)
  RNODE_WEB_PORT                  Web UI port (default: 8888)
  RNODE_CONFIG                    Config file (default: rnode.config.json or .rnoderc)
`;
}

function readVersion(): string {
  const pkgPath = join(__dirname, '..', 'package.json');
  const pkg = z.object({ version: z.string() }).parse(JSON.parse(readFileSync(pkgPath, 'utf-8')));
  return pkg.version;
}

/**
 * `--help` or `--version` in the file-path slot, when no mode flag is present
 */
function selectInfoFlag(argv: string[]): 'help' | 'version' | null {
  if (argv.includes('-w') || argv.includes('-c')) {
    return null;
  }
  const arg = argv[1];
  if (arg === '--help' || arg === '-h') {
    return 'help';
  }
  if (arg === '--version' || arg === '-v') {
    return 'version';
  }
  return null;
}

async function main(
  argv: string[] = process.argv.slice(1),
  stdout: OutputSink = process.stdout,
  deps: MainDeps = {}
): Promise<void> {
  const info = selectInfoFlag(argv);
  if (info === 'help') {
    stdout.write(`${usage()}\n`);
    return;
  }
  if (info === 'version') {
    stdout.write(`rnode-client v${readVersion()}\n`);
    return;
  }

  const { config = loadConfig(), ...runDeps } = deps;
  await run(argv, stdout, config, runDeps);
}

// Run CLI if executed directly
const scriptPath = fileURLToPath(import.meta.url);
const argPath = process.argv[1];

let isMainModule = false;
try {
  isMainModule = realpathSync(scriptPath) === realpathSync(argPath);
} catch {
  isMainModule = scriptPath === argPath || scriptPath.replace('.ts', '.js') === argPath;
}

if (isMainModule) {
  main().catch((err: unknown) => {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    if (err instanceof InvalidUsage) {
      console.error(usage());
    }
    process.exit(exitCodeFor(err));
  });
}

// Export for testing
export {
  selectMode,
  selectInfoFlag,
  run,
  main,
  usage,
  type CommandMode
};

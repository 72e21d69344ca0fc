/**
 * Connection Factory
 *
 * Opens a gRPC handle to an rnode and builds the typed Repl and Diagnostics
 * clients on top of it. The service contract is read from proto/rnode.proto
 * at run time.
 */

import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { RpcFailure } from '../core/errors.js';
import type {
  CmdRequest,
  DiagnosticsClient,
  EvalRequest,
  ListPeersRequest,
  PeerList,
  ReplClient,
  Result
} from '../types/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const PROTO_PATH = join(__dirname, '..', '..', 'proto', 'rnode.proto');

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 50000;

const ResultSchema = z.object({
  output: z.string()
});

const PeerListSchema = z.object({
  peers: z.array(z.string())
});

type UnaryMethod = protoLoader.MethodDefinition<object, object>;

let packageDefinition: protoLoader.PackageDefinition | null = null;

/**
 * Load (once) the rnode package definition
 */
export function loadRNodeDefinition(): protoLoader.PackageDefinition {
  if (!packageDefinition) {
    packageDefinition = protoLoader.loadSync(PROTO_PATH, {
      keepCase: true,
      defaults: true,
      arrays: true
    });
  }
  return packageDefinition;
}

function isServiceDefinition(
  def: protoLoader.AnyDefinition | undefined
): def is protoLoader.ServiceDefinition {
  return def !== undefined && !('format' in def);
}

/**
 * Look up a service of the rnode package, e.g. 'Repl'
 */
export function getService(service: string): protoLoader.ServiceDefinition {
  const def = loadRNodeDefinition()[`rnode.${service}`];
  if (!isServiceDefinition(def)) {
    throw new Error(`Service not found in ${PROTO_PATH}: rnode.${service}`);
  }
  return def;
}

/**
 * Look up a unary method of the rnode package, e.g. ('Repl', 'Run')
 */
export function getMethod(service: string, method: string): UnaryMethod {
  const methodDef = getService(service)[method];
  if (!methodDef) {
    throw new Error(`Method not found: rnode.${service}/${method}`);
  }
  return methodDef;
}

/**
 * A live transport handle bound to host:port
 */
export class Connection {
  readonly target: string;
  private client: grpc.Client;

  constructor(host: string, port: number) {
    this.target = `${host}:${port}`;
    // grpc-js channels start idle and only dial on the first call
    this.client = new grpc.Client(this.target, grpc.credentials.createInsecure());
  }

  /**
   * Issue one unary call and validate the response shape
   */
  unary<T>(service: string, method: string, request: object, schema: z.ZodType<T>): Promise<T> {
    const name = `${service}.${method}`;
    const def = getMethod(service, method);

    return new Promise((resolve, reject) => {
      this.client.makeUnaryRequest<object, object>(
        def.path,
        def.requestSerialize,
        def.responseDeserialize,
        request,
        (err, value) => {
          if (err) {
            reject(new RpcFailure(name, err.details || err.message, err.code, err.details));
            return;
          }
          const parsed = schema.safeParse(value);
          if (!parsed.success) {
            reject(new RpcFailure(name, `Unexpected response: ${parsed.error.message}`));
            return;
          }
          resolve(parsed.data);
        }
      );
    });
  }

  close(): void {
    this.client.close();
  }
}

export function openConnection(host: string = DEFAULT_HOST, port: number = DEFAULT_PORT): Connection {
  return new Connection(host, port);
}

export function makeReplClient(conn: Connection): ReplClient {
  return {
    run: (request: CmdRequest): Promise<Result> =>
      conn.unary('Repl', 'Run', request, ResultSchema),
    eval: (request: EvalRequest): Promise<Result> =>
      conn.unary('Repl', 'Eval', request, ResultSchema)
  };
}

export function makeDiagnosticsClient(conn: Connection): DiagnosticsClient {
  return {
    listPeers: (request: ListPeersRequest = {}): Promise<PeerList> =>
      conn.unary('Diagnostics', 'ListPeers', request, PeerListSchema)
  };
}

/**
 * Both clients over one connection, plus a way to release it
 */
export interface NodeClients {
  repl: ReplClient;
  diagnostics: DiagnosticsClient;
  close(): void;
}

export function connectToNode(host: string = DEFAULT_HOST, port: number = DEFAULT_PORT): NodeClients {
  const conn = openConnection(host, port);
  return {
    repl: makeReplClient(conn),
    diagnostics: makeDiagnosticsClient(conn),
    close: () => conn.close()
  };
}

/**
 * Core type definitions for rnode-client
 */

export interface CmdRequest {
  line: string;
}

export interface EvalRequest {
  fileName: string;
}

export interface Result {
  output: string;
}

export type ListPeersRequest = Record<string, never>;

export interface PeerList {
  peers: string[];
}

/**
 * Repl service on the node: runs ad hoc code or a file the node can read
 */
export interface ReplClient {
  run(request: CmdRequest): Promise<Result>;
  eval(request: EvalRequest): Promise<Result>;
}

/**
 * Diagnostics service on the node
 */
export interface DiagnosticsClient {
  listPeers(request?: ListPeersRequest): Promise<PeerList>;
}

export interface RNodeClientConfig {
  host: string;
  port: number;
  webPort: number;
}

export type CommandMode =
  | { kind: 'web' }
  | { kind: 'inline'; code: string }
  | { kind: 'file'; fileName: string };

/**
 * Anything with a write method: process.stdout, a socket, or a test buffer
 */
export interface OutputSink {
  write(chunk: string): unknown;
}

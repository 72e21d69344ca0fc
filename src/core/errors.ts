/**
 * Error kinds raised by the CLI, the RPC layer and the web UI
 */

export type ErrorCode = 'INVALID_USAGE' | 'RPC_FAILURE' | 'MISSING_FIELD' | 'CONFIG_ERROR';

export class RNodeClientError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode) {
    super(message);
    this.name = 'RNodeClientError';
    this.code = code;
  }
}

export class InvalidUsage extends RNodeClientError {
  constructor(message: string) {
    super(message, 'INVALID_USAGE');
    this.name = 'InvalidUsage';
  }
}

export class RpcFailure extends RNodeClientError {
  readonly method: string;
  readonly grpcCode?: number;
  readonly details?: string;

  constructor(method: string, message: string, grpcCode?: number, details?: string) {
    super(`${method} failed: ${message}`, 'RPC_FAILURE');
    this.name = 'RpcFailure';
    this.method = method;
    this.grpcCode = grpcCode;
    this.details = details;
  }
}

export class MissingField extends RNodeClientError {
  readonly field: string;

  constructor(field: string) {
    super(`Missing form field: ${field}`, 'MISSING_FIELD');
    this.name = 'MissingField';
    this.field = field;
  }
}

export class ConfigError extends RNodeClientError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid configuration: ${errors.join('; ')}`, 'CONFIG_ERROR');
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

/**
 * Process exit code for a failed CLI run
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof InvalidUsage) {
    return 2;
  }
  return 1;
}

/**
 * HTTP status for a failed UI request
 */
export function httpStatusFor(error: unknown): number {
  if (error instanceof MissingField) {
    return 400;
  }
  if (error instanceof RpcFailure) {
    return 502;
  }
  return 500;
}

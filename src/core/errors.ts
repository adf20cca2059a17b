import { INTERNAL_ERROR, INVALID_PARAMS, JSONRPCErrorObject } from './mcp-types';

/**
 * Base error for everything raised by the protocol stack
 */
export class MCPError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MCPError';
  }
}

/**
 * A protocol violation, or an error response received from the peer.
 * `code` is the JSON-RPC error code to report (or the one that was reported).
 */
export class ProtocolError extends MCPError {
  public readonly code: number;
  public readonly data?: unknown;

  constructor(message: string, code: number = INVALID_PARAMS, data?: unknown) {
    super(message);
    this.name = 'ProtocolError';
    this.code = code;
    this.data = data;
  }

  public static fromErrorObject(error: JSONRPCErrorObject, prefix?: string): ProtocolError {
    const message = prefix ? `${prefix}: ${error.message}` : error.message;
    return new ProtocolError(message, error.code, error.data);
  }

  public toErrorObject(): JSONRPCErrorObject {
    const error: JSONRPCErrorObject = { code: this.code, message: this.message };
    if (this.data !== undefined) {
      error.data = this.data;
    }
    return error;
  }
}

/**
 * Spawn failure, socket failure, process exit or use of a connection that is not ready
 */
export class ConnectionError extends MCPError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

/**
 * A single request did not receive its response in time
 */
export class TimeoutError extends MCPError {
  public readonly requestId?: string | number;
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, requestId?: string | number) {
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
    this.requestId = requestId;
  }
}

/**
 * A pending request was abandoned because its connection shut down
 */
export class CancelledError extends MCPError {
  public readonly requestId?: string | number;

  constructor(message: string, requestId?: string | number) {
    super(message);
    this.name = 'CancelledError';
    this.requestId = requestId;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Maps any thrown value to the JSON-RPC error object reported to the peer
 */
export function toErrorObject(error: unknown): JSONRPCErrorObject {
  if (error instanceof ProtocolError) {
    return error.toErrorObject();
  }
  return { code: INTERNAL_ERROR, message: errorMessage(error) || 'Internal error' };
}

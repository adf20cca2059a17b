/**
 * JSON-RPC 2.0 codec. Outbound messages are serialized through jsonrpc-lite;
 * inbound values are validated into the typed message union.
 */
import jsonrpc from 'jsonrpc-lite';
import {
  JSONRPC_VERSION,
  JSONRPCError,
  JSONRPCErrorObject,
  JSONRPCMessage,
  JSONRPCNotification,
  JSONRPCRequest,
  JSONRPCResponse,
  JSONRPCResponseMessage,
  INVALID_REQUEST,
  PARSE_ERROR,
  Params,
  RequestId,
  Result
} from './mcp-types';
import { ProtocolError } from './errors';

const utf8 = new TextDecoder('utf-8', { fatal: true });

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Strings, or integers that survive a round trip through JSON
 */
export function isRequestId(value: unknown): value is RequestId {
  return typeof value === 'string' || Number.isSafeInteger(value);
}

/**
 * Creates a JSON-RPC request
 */
export function createRequest(id: RequestId, method: string, params?: Params): JSONRPCRequest {
  assertMethod(method);
  const request: JSONRPCRequest = { jsonrpc: JSONRPC_VERSION, id, method };
  if (params !== undefined) {
    request.params = params;
  }
  return request;
}

/**
 * Creates a JSON-RPC notification
 */
export function createNotification(method: string, params?: Params): JSONRPCNotification {
  assertMethod(method);
  const notification: JSONRPCNotification = { jsonrpc: JSONRPC_VERSION, method };
  if (params !== undefined) {
    notification.params = params;
  }
  return notification;
}

/**
 * Creates a JSON-RPC response carrying exactly one of `result` or `error`
 */
export function createResponse(
  id: RequestId,
  payload: { result?: Result; error?: JSONRPCErrorObject }
): JSONRPCResponseMessage {
  const hasResult = payload.result !== undefined;
  const hasError = payload.error !== undefined;

  if (hasResult && hasError) {
    throw new ProtocolError('Response cannot have both result and error', INVALID_REQUEST);
  }
  if (payload.error !== undefined) {
    return createErrorResponse(id, payload.error.code, payload.error.message, payload.error.data);
  }
  if (payload.result !== undefined) {
    return createSuccessResponse(id, payload.result);
  }
  throw new ProtocolError('Response must have either result or error', INVALID_REQUEST);
}

/**
 * Creates a JSON-RPC success response
 */
export function createSuccessResponse(id: RequestId, result: Result): JSONRPCResponse {
  return { jsonrpc: JSONRPC_VERSION, id, result };
}

/**
 * Creates a JSON-RPC error response
 */
export function createErrorResponse(
  id: RequestId | null,
  code: number,
  message: string,
  data?: unknown
): JSONRPCError {
  const error: JSONRPCErrorObject = { code, message };
  if (data !== undefined) {
    error.data = data;
  }
  return { jsonrpc: JSONRPC_VERSION, id, error };
}

/**
 * Checks if a message is a request (has an `id` and a `method`)
 */
export function isRequest(message: JSONRPCMessage): message is JSONRPCRequest {
  return 'method' in message && 'id' in message;
}

/**
 * Checks if a message is a notification (has a `method` and no `id` key at all)
 */
export function isNotification(message: JSONRPCMessage): message is JSONRPCNotification {
  return 'method' in message && !('id' in message);
}

export function isResponse(message: JSONRPCMessage): message is JSONRPCResponseMessage {
  return 'result' in message || 'error' in message;
}

export function isErrorResponse(message: JSONRPCResponseMessage): message is JSONRPCError {
  return 'error' in message;
}

/**
 * Serializes one message, or a batch, to its wire text
 */
export function encodeMessage(message: JSONRPCMessage | JSONRPCMessage[]): string {
  if (Array.isArray(message)) {
    return `[${message.map((item) => encodeMessage(item)).join(',')}]`;
  }

  if ('error' in message) {
    if (message.id === null) {
      return JSON.stringify(message);
    }
    const error = new jsonrpc.JsonRpcError(message.error.message, message.error.code, message.error.data);
    return jsonrpc.error(message.id, error).serialize();
  }
  if ('result' in message) {
    return jsonrpc.success(message.id, message.result).serialize();
  }
  if (isRequest(message)) {
    return jsonrpc.request(message.id, message.method, message.params).serialize();
  }
  return jsonrpc.notification(message.method, message.params).serialize();
}

/**
 * Decodes a frame as UTF-8 JSON. Raises PARSE_ERROR on bad bytes or bad JSON.
 */
export function decodeFrame(data: Buffer | string): unknown {
  let text: string;
  try {
    text = typeof data === 'string' ? data : utf8.decode(data);
  } catch (error) {
    throw new ProtocolError('Invalid UTF-8 in message', PARSE_ERROR);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ProtocolError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`, PARSE_ERROR);
  }
}

/**
 * Returns true for values that carry a `result` or `error` member
 */
export function isResponseShaped(value: unknown): boolean {
  return isPlainObject(value) && ('result' in value || 'error' in value);
}

/**
 * Validates a decoded JSON value as a single JSON-RPC message
 */
export function decodeMessage(value: unknown): JSONRPCMessage {
  if (!isPlainObject(value)) {
    throw new ProtocolError('Message must be a JSON object', INVALID_REQUEST);
  }
  if (value.jsonrpc !== JSONRPC_VERSION) {
    throw new ProtocolError('Invalid JSON-RPC version', INVALID_REQUEST);
  }
  if ('result' in value || 'error' in value) {
    return decodeResponse(value);
  }
  return decodeRequest(value);
}

function decodeRequest(value: Record<string, unknown>): JSONRPCRequest | JSONRPCNotification {
  const method = value.method;
  if (typeof method !== 'string' || method.length === 0) {
    throw new ProtocolError('Method must be a non-empty string', INVALID_REQUEST);
  }

  let params: Params | undefined;
  if (value.params !== undefined && value.params !== null) {
    if (!isPlainObject(value.params)) {
      throw new ProtocolError('Params must be an object', INVALID_REQUEST);
    }
    params = value.params;
  }

  if (!('id' in value)) {
    return createNotification(method, params);
  }
  if (!isRequestId(value.id)) {
    throw new ProtocolError('Request ID must be a string or an integer', INVALID_REQUEST);
  }
  return createRequest(value.id, method, params);
}

function decodeResponse(value: Record<string, unknown>): JSONRPCResponseMessage {
  const hasResult = 'result' in value;
  const hasError = 'error' in value;

  if (hasResult && hasError) {
    throw new ProtocolError('Response cannot have both result and error', INVALID_REQUEST);
  }

  if (hasError) {
    const error = value.error;
    if (!isPlainObject(error)) {
      throw new ProtocolError('Error must be an object', INVALID_REQUEST);
    }
    if (typeof error.code !== 'number' || !Number.isInteger(error.code)) {
      throw new ProtocolError('Error code must be an integer', INVALID_REQUEST);
    }
    const message = error.message ?? '';
    if (typeof message !== 'string') {
      throw new ProtocolError('Error message must be a string', INVALID_REQUEST);
    }
    const id = value.id ?? null;
    if (id !== null && !isRequestId(id)) {
      throw new ProtocolError('Response ID must be a string, an integer or null', INVALID_REQUEST);
    }
    return createErrorResponse(id, error.code, message, error.data);
  }

  if (!isRequestId(value.id)) {
    throw new ProtocolError('Response ID must be a string or an integer', INVALID_REQUEST);
  }
  if (!isPlainObject(value.result)) {
    throw new ProtocolError('Response result must be an object', INVALID_REQUEST);
  }
  return createSuccessResponse(value.id, value.result);
}

function assertMethod(method: string): void {
  if (typeof method !== 'string' || method.length === 0) {
    throw new ProtocolError('Method must be a non-empty string', INVALID_REQUEST);
  }
}

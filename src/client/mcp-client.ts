import {
  CallToolResult,
  Capabilities,
  GetPromptResult,
  Implementation,
  JSONRPCNotification,
  JSONRPCRequest,
  JSONRPCResponseMessage,
  ListPromptsResult,
  ListResourcesResult,
  ListToolsResult,
  Params,
  ReadResourceResult,
  Result
} from '../core/mcp-types';
import { Connection, ConnectionStats, MessageHandler, Transport } from '../core/connection';
import { ConnectionError, ProtocolError, errorMessage } from '../core/errors';
import { isErrorResponse } from '../core/jsonrpc-wrapper';
import { MethodRouter } from '../router/method-router';
import { HttpTransport, HttpTransportOptions } from '../transport/http-transport';
import { StdioTransport, StdioTransportOptions } from '../transport/stdio-transport';
import { WebSocketTransport, WebSocketTransportOptions } from '../transport/websocket-transport';
import { createLogger } from '../utils/logger';

const log = createLogger('client');

export type NotificationCallback = (params: Params) => void | Promise<void>;

export interface ClientHandlerOptions {
  enableRoots?: boolean;
}

/**
 * Answers the requests a server may send to a client and fans out its notifications
 */
export class ClientHandler implements MessageHandler {
  private readonly router = new MethodRouter(log);
  private readonly callbacks: Map<string, NotificationCallback[]> = new Map();

  constructor(options: ClientHandlerOptions = {}) {
    this.router.onRequest('ping', () => ({}));
    if (options.enableRoots) {
      this.router.onRequest('roots/list', () => ({ roots: [] }));
    }
  }

  /**
   * Registers a callback for a notification method. Several callbacks may share a method.
   */
  public onNotification(method: string, callback: NotificationCallback): void {
    const existing = this.callbacks.get(method);
    if (existing) {
      existing.push(callback);
      return;
    }
    this.callbacks.set(method, [callback]);
    this.router.onNotification(method, (params) => this.runCallbacks(method, params));
  }

  public handleRequest(request: JSONRPCRequest): Promise<JSONRPCResponseMessage> {
    return this.router.dispatchRequest(request);
  }

  public async handleNotification(notification: JSONRPCNotification): Promise<void> {
    if (!this.callbacks.has(notification.method)) {
      log.debug(`Unhandled notification: ${notification.method}`);
      return;
    }
    await this.router.dispatchNotification(notification);
  }

  private async runCallbacks(method: string, params: Params): Promise<void> {
    for (const callback of this.callbacks.get(method) ?? []) {
      try {
        await callback(params);
      } catch (error) {
        log.error(`Notification callback for ${method} failed: ${errorMessage(error)}`);
      }
    }
  }
}

export interface MCPClientOptions {
  name?: string;
  version?: string;
  enableSampling?: boolean;
  enableRoots?: boolean;
  timeoutMs?: number;
  legacyMode?: boolean;
}

export interface CallOptions {
  timeoutMs?: number;
}

function hasArray<K extends string>(value: Result, key: K): value is Result & Record<K, unknown[]> {
  return Array.isArray(value[key]);
}

function expectResult<T extends Result>(method: string, result: Result, valid: (result: Result) => result is T): T {
  if (!valid(result)) {
    throw new ProtocolError(`Malformed ${method} result`);
  }
  return result;
}

const isListToolsResult = (result: Result): result is ListToolsResult => hasArray(result, 'tools');
const isCallToolResult = (result: Result): result is CallToolResult => hasArray(result, 'content');
const isListResourcesResult = (result: Result): result is ListResourcesResult => hasArray(result, 'resources');
const isReadResourceResult = (result: Result): result is ReadResourceResult => hasArray(result, 'contents');
const isListPromptsResult = (result: Result): result is ListPromptsResult => hasArray(result, 'prompts');
const isGetPromptResult = (result: Result): result is GetPromptResult => hasArray(result, 'messages');

function cursorParams(cursor?: string): Params {
  return cursor === undefined ? {} : { cursor };
}

/**
 * Talks to one server over any transport
 *
 * @example
 * const client = new MCPClient({ name: 'my-client' });
 * await client.connectStdio({ command: 'node', args: ['server.js'] });
 * const result = await client.callTool('add', { a: 1, b: 2 });
 * await client.disconnect();
 */
export class MCPClient {
  public readonly handler: ClientHandler;

  private readonly info: Implementation;
  private readonly capabilities: Capabilities;
  private readonly options: MCPClientOptions;
  private connection?: Connection;

  constructor(options: MCPClientOptions = {}) {
    this.options = options;
    this.info = { name: options.name ?? 'mcp-rpc-client', version: options.version ?? '0.4.0' };
    this.capabilities = {};
    if (options.enableRoots) {
      this.capabilities.roots = { listChanged: true };
    }
    if (options.enableSampling) {
      this.capabilities.sampling = {};
    }
    this.handler = new ClientHandler({ enableRoots: options.enableRoots });
  }

  public get isConnected(): boolean {
    return this.connection?.isInitialized ?? false;
  }

  public get serverInfo(): Implementation | undefined {
    return this.connection?.peerInfo;
  }

  public get serverCapabilities(): Capabilities | undefined {
    return this.connection?.peerCapabilities;
  }

  public get protocolVersion(): string | undefined {
    return this.connection?.negotiatedVersion;
  }

  public getStats(): ConnectionStats | undefined {
    return this.connection?.getStats();
  }

  /**
   * Opens `transport` and performs the handshake. On failure the transport is closed again.
   */
  public async connect(transport: Transport): Promise<void> {
    if (this.connection) {
      throw new ConnectionError('Client already connected');
    }

    const connection = new Connection({
      transport,
      handler: this.handler,
      implementation: this.info,
      capabilities: this.capabilities,
      timeoutMs: this.options.timeoutMs,
      legacyMode: this.options.legacyMode
    });
    this.connection = connection;

    try {
      await connection.connect();
      await connection.initializeClient();
    } catch (error) {
      this.connection = undefined;
      await connection.disconnect();
      throw error;
    }
  }

  public connectStdio(options: StdioTransportOptions): Promise<void> {
    return this.connect(new StdioTransport(options));
  }

  public connectHttp(url: string, options: HttpTransportOptions = {}): Promise<void> {
    return this.connect(new HttpTransport(url, { timeoutMs: this.options.timeoutMs, ...options }));
  }

  public connectWebSocket(url: string, options: WebSocketTransportOptions = {}): Promise<void> {
    return this.connect(new WebSocketTransport(url, options));
  }

  public async disconnect(): Promise<void> {
    const connection = this.connection;
    this.connection = undefined;
    if (connection) {
      await connection.disconnect();
    }
  }

  public onNotification(method: string, callback: NotificationCallback): void {
    this.handler.onNotification(method, callback);
  }

  /**
   * Sends a request and returns its result. Error responses become ProtocolErrors.
   */
  public async request(method: string, params?: Params, options: CallOptions = {}): Promise<Result> {
    const connection = this.connection;
    if (!connection || !connection.isInitialized) {
      throw new ConnectionError('Client not connected');
    }

    const response = await connection.sendRequest(connection.protocol.createRequest(method, params), options.timeoutMs);
    if (isErrorResponse(response)) {
      throw ProtocolError.fromErrorObject(response.error);
    }
    return response.result;
  }

  public async notify(method: string, params?: Params): Promise<void> {
    const connection = this.connection;
    if (!connection || !connection.isInitialized) {
      throw new ConnectionError('Client not connected');
    }
    await connection.sendNotification(connection.protocol.createNotification(method, params));
  }

  public ping(): Promise<Result> {
    return this.request('ping');
  }

  public async listTools(cursor?: string): Promise<ListToolsResult> {
    return expectResult('tools/list', await this.request('tools/list', cursorParams(cursor)), isListToolsResult);
  }

  public async callTool(name: string, args: Params = {}, options: CallOptions = {}): Promise<CallToolResult> {
    const result = await this.request('tools/call', { name, arguments: args }, options);
    return expectResult('tools/call', result, isCallToolResult);
  }

  public async listResources(cursor?: string): Promise<ListResourcesResult> {
    const result = await this.request('resources/list', cursorParams(cursor));
    return expectResult('resources/list', result, isListResourcesResult);
  }

  public async readResource(uri: string): Promise<ReadResourceResult> {
    return expectResult('resources/read', await this.request('resources/read', { uri }), isReadResourceResult);
  }

  public async listPrompts(cursor?: string): Promise<ListPromptsResult> {
    const result = await this.request('prompts/list', cursorParams(cursor));
    return expectResult('prompts/list', result, isListPromptsResult);
  }

  public async getPrompt(name: string, args: Params = {}): Promise<GetPromptResult> {
    const result = await this.request('prompts/get', { name, arguments: args });
    return expectResult('prompts/get', result, isGetPromptResult);
  }
}

/**
 * Connects a client to a subprocess server
 */
export async function createStdioClient(
  transport: StdioTransportOptions,
  options: MCPClientOptions = {}
): Promise<MCPClient> {
  const client = new MCPClient(options);
  await client.connectStdio(transport);
  return client;
}

/**
 * Runs `fn` with a connected stdio client and always disconnects afterwards
 */
export async function withStdioClient<T>(
  transport: StdioTransportOptions,
  fn: (client: MCPClient) => Promise<T>,
  options: MCPClientOptions = {}
): Promise<T> {
  const client = await createStdioClient(transport, options);
  try {
    return await fn(client);
  } finally {
    await client.disconnect();
  }
}

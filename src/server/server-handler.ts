import {
  BlobResourceContents,
  CallToolResult,
  CAPABILITY_NOT_SUPPORTED,
  Capabilities,
  ContentItem,
  GetPromptResult,
  Implementation,
  INTERNAL_ERROR,
  INVALID_PARAMS,
  InitializeResult,
  JSONRPCNotification,
  JSONRPCRequest,
  JSONRPCResponseMessage,
  ListPromptsResult,
  ListResourcesResult,
  ListToolsResult,
  Params,
  PROMPT_NOT_FOUND,
  ReadResourceResult,
  RESOURCE_NOT_FOUND,
  TextResourceContents,
  TOOL_NOT_FOUND
} from '../core/mcp-types';
import { Connection, MessageHandler } from '../core/connection';
import { MCPError, ProtocolError, errorMessage } from '../core/errors';
import { isPlainObject } from '../core/jsonrpc-wrapper';
import { ProtocolHandler, parseCapabilities, parseImplementation } from '../core/protocol';
import { createTextContent, normalizeContent, normalizePromptMessages } from '../core/content';
import { MethodRouter } from '../router/method-router';
import { createLogger } from '../utils/logger';
import { PromptRegistry, ResourceRegistry, ToolRegistry, validateArguments } from './registry';

const log = createLogger('server');

export const DEFAULT_PAGE_SIZE = 100;

export interface ServerHandlerOptions {
  name: string;
  version: string;
  instructions?: string;

  /**
   * Capabilities announced in `initialize`. Defaults to tools, resources and prompts.
   */
  capabilities?: Capabilities;
  pageSize?: number;
  legacyMode?: boolean;
  tools?: ToolRegistry;
  resources?: ResourceRegistry;
  prompts?: PromptRegistry;
}

export interface Page<T> {
  items: T[];
  nextCursor?: string;
}

/**
 * Slices `items` at the offset encoded in `cursor`
 */
export function paginate<T>(items: T[], cursor: unknown, pageSize: number): Page<T> {
  let offset = 0;
  if (cursor !== undefined && cursor !== null) {
    if (typeof cursor !== 'string' || !/^\d+$/.test(cursor)) {
      throw new ProtocolError(`Invalid cursor: ${String(cursor)}`, INVALID_PARAMS);
    }
    offset = Number.parseInt(cursor, 10);
  }

  const page: Page<T> = { items: items.slice(offset, offset + pageSize) };
  if (offset + pageSize < items.length) {
    page.nextCursor = String(offset + pageSize);
  }
  return page;
}

/**
 * Lets frames already received be dispatched before a handler runs
 */
function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function requireString(params: Params, key: string): string {
  const value = params[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ProtocolError(`Missing required parameter: ${key}`, INVALID_PARAMS);
  }
  return value;
}

function argumentsOf(params: Params, what: string): Record<string, unknown> {
  const value = params.arguments ?? {};
  if (!isPlainObject(value)) {
    throw new ProtocolError(`${what} arguments must be an object`, INVALID_PARAMS);
  }
  return value;
}

function toResourceContents(
  uri: string,
  mimeType: string | undefined,
  item: ContentItem
): TextResourceContents | BlobResourceContents {
  if (item.type === 'text') {
    return { uri, mimeType: mimeType ?? 'text/plain', text: item.text };
  }
  return { uri, mimeType: mimeType ?? item.mimeType, blob: item.data };
}

/**
 * Serves tools, resources and prompts to one client
 */
export class ServerHandler implements MessageHandler {
  public readonly info: Implementation;
  public readonly capabilities: Capabilities;
  public readonly tools: ToolRegistry;
  public readonly resources: ResourceRegistry;
  public readonly prompts: PromptRegistry;

  private readonly instructions?: string;
  private readonly pageSize: number;
  private readonly protocol: ProtocolHandler;
  private readonly router = new MethodRouter(log);

  private connection?: Connection;
  private clientInfo?: Implementation;
  private clientCapabilities?: Capabilities;
  private protocolVersion?: string;

  constructor(options: ServerHandlerOptions) {
    this.info = { name: options.name, version: options.version };
    this.instructions = options.instructions;
    this.capabilities = options.capabilities ?? { tools: {}, resources: {}, prompts: {} };
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.tools = options.tools ?? new ToolRegistry();
    this.resources = options.resources ?? new ResourceRegistry();
    this.prompts = options.prompts ?? new PromptRegistry();
    this.protocol = new ProtocolHandler({
      implementation: this.info,
      capabilities: this.capabilities,
      legacyMode: options.legacyMode
    });

    if (this.pageSize < 1) {
      throw new MCPError(`Page size must be positive, got ${this.pageSize}`);
    }

    this.router
      .onRequest('initialize', (params) => this.handleInitialize(params))
      .onRequest('ping', () => ({}))
      .onRequest('tools/list', (params) => this.handleToolsList(params))
      .onRequest('tools/call', (params) => this.handleToolsCall(params))
      .onRequest('resources/list', (params) => this.handleResourcesList(params))
      .onRequest('resources/read', (params) => this.handleResourcesRead(params))
      .onRequest('prompts/list', (params) => this.handlePromptsList(params))
      .onRequest('prompts/get', (params) => this.handlePromptsGet(params))
      .onNotification(['initialized', 'notifications/initialized'], () => this.handleInitialized())
      .onNotification('notifications/cancelled', (params) => this.handleCancelled(params));
  }

  public get peerInfo(): Implementation | undefined {
    return this.clientInfo;
  }

  public get peerCapabilities(): Capabilities | undefined {
    return this.clientCapabilities;
  }

  public get negotiatedVersion(): string | undefined {
    return this.protocolVersion;
  }

  public bindConnection(connection: Connection): void {
    this.connection = connection;
  }

  public handleRequest(request: JSONRPCRequest): Promise<JSONRPCResponseMessage> {
    return this.router.dispatchRequest(request);
  }

  public handleNotification(notification: JSONRPCNotification): Promise<void> {
    return this.router.dispatchNotification(notification);
  }

  private requireCapability(capability: 'tools' | 'resources' | 'prompts'): void {
    if (this.capabilities[capability] === undefined) {
      throw new ProtocolError(`Capability not supported: ${capability}`, CAPABILITY_NOT_SUPPORTED);
    }
  }

  private handleInitialize(params: Params): InitializeResult {
    this.clientInfo = parseImplementation(params.clientInfo);
    this.clientCapabilities = parseCapabilities(params.capabilities);
    log.info(`Initialize request from ${this.clientInfo.name} v${this.clientInfo.version}`);

    const requested = params.protocolVersion;
    if (typeof requested !== 'string') {
      throw new ProtocolError('Missing required parameter: protocolVersion', INVALID_PARAMS);
    }
    this.protocolVersion = this.protocol.negotiateVersion(requested);

    const result: InitializeResult = {
      protocolVersion: this.protocolVersion,
      capabilities: this.capabilities,
      serverInfo: this.info
    };
    if (this.instructions) {
      result.instructions = this.instructions;
    }
    return result;
  }

  private handleInitialized(): void {
    log.info('Client initialization completed');
    if (!this.connection) {
      return;
    }
    this.connection.completeInitialization(
      this.clientInfo ?? parseImplementation(undefined),
      this.clientCapabilities ?? {},
      this.protocolVersion
    );
  }

  private handleCancelled(params: Params): void {
    const reason = typeof params.reason === 'string' ? ` (${params.reason})` : '';
    log.info(`Request cancelled: ${String(params.requestId)}${reason}`);
  }

  private handleToolsList(params: Params): ListToolsResult {
    this.requireCapability('tools');
    const page = paginate(this.tools.list(), params.cursor, this.pageSize);
    const result: ListToolsResult = { tools: page.items };
    if (page.nextCursor !== undefined) {
      result.nextCursor = page.nextCursor;
    }
    return result;
  }

  private async handleToolsCall(params: Params): Promise<CallToolResult> {
    this.requireCapability('tools');
    const name = requireString(params, 'name');
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ProtocolError(`Tool not found: ${name}`, TOOL_NOT_FOUND);
    }

    const args = argumentsOf(params, 'Tool');
    validateArguments(tool.inputSchema, args);

    try {
      await yieldToEventLoop();
      const value = await tool.handler(args);
      return { content: normalizeContent(value), isError: false };
    } catch (error) {
      log.error(`Tool ${name} failed: ${errorMessage(error)}`);
      return { content: [createTextContent(`Tool error: ${errorMessage(error)}`)], isError: true };
    }
  }

  private handleResourcesList(params: Params): ListResourcesResult {
    this.requireCapability('resources');
    const page = paginate(this.resources.list(), params.cursor, this.pageSize);
    const result: ListResourcesResult = { resources: page.items };
    if (page.nextCursor !== undefined) {
      result.nextCursor = page.nextCursor;
    }
    return result;
  }

  private async handleResourcesRead(params: Params): Promise<ReadResourceResult> {
    this.requireCapability('resources');
    const uri = requireString(params, 'uri');
    const match = this.resources.match(uri);
    if (!match) {
      throw new ProtocolError(`Resource not found: ${uri}`, RESOURCE_NOT_FOUND);
    }

    let value: unknown;
    try {
      await yieldToEventLoop();
      value = await match.resource.handler(match.params);
    } catch (error) {
      log.error(`Resource ${uri} failed: ${errorMessage(error)}`);
      throw new ProtocolError(`Resource error: ${errorMessage(error)}`, INTERNAL_ERROR);
    }

    return {
      contents: normalizeContent(value).map((item) => toResourceContents(uri, match.resource.mimeType, item))
    };
  }

  private handlePromptsList(params: Params): ListPromptsResult {
    this.requireCapability('prompts');
    const page = paginate(this.prompts.list(), params.cursor, this.pageSize);
    const result: ListPromptsResult = { prompts: page.items };
    if (page.nextCursor !== undefined) {
      result.nextCursor = page.nextCursor;
    }
    return result;
  }

  private async handlePromptsGet(params: Params): Promise<GetPromptResult> {
    this.requireCapability('prompts');
    const name = requireString(params, 'name');
    const prompt = this.prompts.get(name);
    if (!prompt) {
      throw new ProtocolError(`Prompt not found: ${name}`, PROMPT_NOT_FOUND);
    }

    const args = argumentsOf(params, 'Prompt');
    for (const argument of prompt.arguments ?? []) {
      if (argument.required && !(argument.name in args)) {
        throw new ProtocolError(`Missing required argument: ${argument.name}`, INVALID_PARAMS);
      }
    }

    let value: unknown;
    try {
      await yieldToEventLoop();
      value = await prompt.handler(args);
    } catch (error) {
      log.error(`Prompt ${name} failed: ${errorMessage(error)}`);
      throw new ProtocolError(`Prompt error: ${errorMessage(error)}`, INTERNAL_ERROR);
    }

    return { description: prompt.description, messages: normalizePromptMessages(value) };
  }
}

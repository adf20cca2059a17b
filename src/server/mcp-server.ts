import { Capabilities, PromptArgument, ResourceTemplateArgument, ToolAnnotations } from '../core/mcp-types';
import { Connection, Transport } from '../core/connection';
import { ConnectionError, ProtocolError, errorMessage } from '../core/errors';
import { INVALID_PARAMS } from '../core/mcp-types';
import { HttpServer, HttpServerConfig } from '../http/http-server';
import { ServerStdioTransport, ServerStdioTransportOptions } from '../transport/server-stdio-transport';
import { createLogger } from '../utils/logger';
import { ParameterMap, ToolArgs, conformsTo, findArgumentProblem, parametersToSchema } from './parameters';
import { PromptHandler, ResourceHandler, ToolDefinition } from './registry';
import { ServerHandler, ServerHandlerOptions } from './server-handler';

const log = createLogger('mcp-server');

export interface MCPServerOptions {
  name: string;
  version: string;
  instructions?: string;
  toolsEnabled?: boolean;
  resourcesEnabled?: boolean;
  promptsEnabled?: boolean;
  pageSize?: number;
  legacyMode?: boolean;

  /**
   * Timeout for requests this server sends to the client
   */
  timeoutMs?: number;
}

export interface ToolOptions<P extends ParameterMap> {
  description: string;
  parameters?: P;
  annotations?: ToolAnnotations;
}

export interface ResourceOptions {
  name?: string;
  description?: string;
  mimeType?: string;
  arguments?: ResourceTemplateArgument[];
}

export interface PromptOptions {
  description: string;
  arguments?: PromptArgument[];
}

/**
 * Builder for a server: register tools, resources and prompts, then serve them
 * over stdio, any transport, or HTTP.
 *
 * @example
 * const server = new MCPServer({ name: 'calculator', version: '1.0.0' })
 *   .tool('add', { description: 'Add two numbers', parameters: { a: 'number', b: 'number' } },
 *     ({ a, b }) => a + b);
 * await server.serveStdio();
 */
export class MCPServer {
  /**
   * Handler serving stateless HTTP; each connection gets its own, over the same registries
   */
  public readonly handler: ServerHandler;

  private readonly options: MCPServerOptions;
  private readonly handlerOptions: ServerHandlerOptions;
  private readonly connections: Set<Connection> = new Set();

  constructor(options: MCPServerOptions) {
    this.options = options;

    const capabilities: Capabilities = {};
    if (options.toolsEnabled !== false) {
      capabilities.tools = {};
    }
    if (options.resourcesEnabled !== false) {
      capabilities.resources = {};
    }
    if (options.promptsEnabled !== false) {
      capabilities.prompts = {};
    }

    this.handlerOptions = {
      name: options.name,
      version: options.version,
      instructions: options.instructions,
      capabilities,
      pageSize: options.pageSize,
      legacyMode: options.legacyMode
    };
    this.handler = new ServerHandler(this.handlerOptions);
  }

  /**
   * Registers a tool whose arguments are described by a compact parameter map.
   * The map becomes the input schema once, here.
   */
  public tool<P extends ParameterMap>(
    name: string,
    options: ToolOptions<P>,
    handler: (args: ToolArgs<P>) => unknown
  ): this {
    const inputSchema = parametersToSchema(options.parameters ?? {});
    this.handler.tools.register({
      name,
      description: options.description,
      inputSchema,
      annotations: options.annotations,
      handler: (args) => {
        if (!conformsTo<P>(inputSchema, args)) {
          throw new ProtocolError(findArgumentProblem(inputSchema, args) ?? 'Invalid arguments', INVALID_PARAMS);
        }
        return handler(args);
      }
    });
    return this;
  }

  /**
   * Registers a tool with a hand-written schema
   */
  public addTool(definition: ToolDefinition): this {
    this.handler.tools.register(definition);
    return this;
  }

  /**
   * Registers a resource. A URI containing `{param}` placeholders registers a template
   * and the handler receives the captured values.
   */
  public resource(uri: string, options: ResourceOptions, handler: ResourceHandler): this {
    this.handler.resources.register({
      uri,
      name: options.name ?? uri,
      description: options.description ?? '',
      mimeType: options.mimeType,
      arguments: options.arguments,
      handler
    });
    return this;
  }

  public prompt(name: string, options: PromptOptions, handler: PromptHandler): this {
    this.handler.prompts.register({
      name,
      description: options.description,
      arguments: options.arguments,
      handler
    });
    return this;
  }

  /**
   * Creates a server-side connection for a transport without starting it
   */
  public createConnection(transport: Transport): Connection {
    const handler = new ServerHandler({
      ...this.handlerOptions,
      tools: this.handler.tools,
      resources: this.handler.resources,
      prompts: this.handler.prompts
    });
    return new Connection({
      transport,
      handler,
      implementation: handler.info,
      capabilities: handler.capabilities,
      timeoutMs: this.options.timeoutMs,
      legacyMode: this.options.legacyMode
    });
  }

  /**
   * Serves one client over `transport`. Resolves when the connection closes.
   */
  public async serve(transport: Transport): Promise<void> {
    const connection = this.createConnection(transport);
    this.connections.add(connection);

    try {
      await connection.connect();
      log.info(`${this.options.name} v${this.options.version} serving`);
      const finalState = await connection.waitForClose();
      log.info(`Connection ended (${finalState})`);
    } catch (error) {
      if (!(error instanceof ConnectionError)) {
        throw error;
      }
      log.error(`Serving failed: ${errorMessage(error)}`);
      throw error;
    } finally {
      await connection.disconnect();
      this.connections.delete(connection);
    }
  }

  /**
   * Serves one client over this process's stdin/stdout
   */
  public serveStdio(options?: ServerStdioTransportOptions): Promise<void> {
    return this.serve(new ServerStdioTransport(options));
  }

  /**
   * Exposes this server's handler through an express app
   */
  public createHttpServer(config?: HttpServerConfig): HttpServer {
    return new HttpServer(this.handler, config);
  }

  /**
   * Closes every connection being served
   */
  public async stop(): Promise<void> {
    await Promise.all(Array.from(this.connections, (connection) => connection.disconnect()));
  }
}

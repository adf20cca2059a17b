import { MCPError, errorMessage } from '../core/errors';
import { ServerConfig, readConfigFile } from '../config/config';
import { SpawnFunction } from '../transport/stdio-transport';
import { createLogger } from '../utils/logger';
import { MCPClient, MCPClientOptions } from './mcp-client';

const log = createLogger('server-manager');

export type { ServerConfig };

/**
 * Owns one configured server process and the client connected to it
 */
export class ServerRunner {
  public readonly name: string;
  public readonly config: ServerConfig;

  private readonly clientOptions: MCPClientOptions;
  private readonly spawn?: SpawnFunction;
  private client?: MCPClient;

  constructor(name: string, config: ServerConfig, clientOptions: MCPClientOptions = {}, spawn?: SpawnFunction) {
    this.name = name;
    this.config = config;
    this.clientOptions = clientOptions;
    this.spawn = spawn;
  }

  public isRunning(): boolean {
    return this.client?.isConnected ?? false;
  }

  public getClient(): MCPClient | undefined {
    return this.client;
  }

  /**
   * Starts the process and connects to it. Returns the existing client when already running.
   */
  public async start(): Promise<MCPClient> {
    if (this.client && this.client.isConnected) {
      return this.client;
    }

    log.info(`Starting server ${this.name}: ${this.config.command} ${(this.config.args ?? []).join(' ')}`);
    const client = new MCPClient(this.clientOptions);
    await client.connectStdio({
      command: this.config.command,
      args: this.config.args,
      env: this.config.env,
      cwd: this.config.cwd,
      spawn: this.spawn
    });
    this.client = client;
    return client;
  }

  public async stop(): Promise<void> {
    const client = this.client;
    this.client = undefined;
    if (client) {
      log.info(`Stopping server ${this.name}`);
      await client.disconnect();
    }
  }
}

export interface ServerManagerOptions {
  clientOptions?: MCPClientOptions;

  /**
   * Replaces child_process.spawn for every runner
   */
  spawn?: SpawnFunction;
}

/**
 * Named server configurations and the runners started from them
 */
export class ServerManager {
  private readonly options: ServerManagerOptions;
  private readonly configs: Map<string, ServerConfig> = new Map();
  private readonly runners: Map<string, ServerRunner> = new Map();

  constructor(options: ServerManagerOptions = {}) {
    this.options = options;
  }

  public addServer(name: string, config: ServerConfig): void {
    if (!name) {
      throw new MCPError('Server name must not be empty');
    }
    this.configs.set(name, config);
  }

  /**
   * Adds every server of a `{"mcpServers": {...}}` file. Returns the names added.
   */
  public async loadConfig(path: string): Promise<string[]> {
    const file = await readConfigFile(path);
    const names = Object.keys(file.mcpServers);
    for (const name of names) {
      this.addServer(name, file.mcpServers[name]);
    }
    log.info(`Loaded ${names.length} server(s) from ${path}`);
    return names;
  }

  public async startServer(name: string): Promise<MCPClient> {
    const config = this.configs.get(name);
    if (!config) {
      throw new MCPError(`Unknown server: ${name}`);
    }

    let runner = this.runners.get(name);
    if (!runner) {
      runner = new ServerRunner(name, config, this.options.clientOptions, this.options.spawn);
      this.runners.set(name, runner);
    }

    try {
      return await runner.start();
    } catch (error) {
      this.runners.delete(name);
      throw error;
    }
  }

  public async stopServer(name: string): Promise<void> {
    const runner = this.runners.get(name);
    if (!runner) {
      return;
    }
    this.runners.delete(name);
    await runner.stop();
  }

  /**
   * Starts every configured server. A server that fails to start is logged and skipped.
   */
  public async startAll(): Promise<string[]> {
    const started: string[] = [];
    for (const name of this.configs.keys()) {
      try {
        await this.startServer(name);
        started.push(name);
      } catch (error) {
        log.error(`Failed to start server ${name}: ${errorMessage(error)}`);
      }
    }
    return started;
  }

  public async stopAll(): Promise<void> {
    const names = Array.from(this.runners.keys());
    await Promise.all(names.map((name) => this.stopServer(name)));
  }

  public getClient(name: string): MCPClient | undefined {
    return this.runners.get(name)?.getClient();
  }

  public listConfigured(): string[] {
    return Array.from(this.configs.keys());
  }

  public listRunning(): string[] {
    return Array.from(this.runners.values())
      .filter((runner) => runner.isRunning())
      .map((runner) => runner.name);
  }
}

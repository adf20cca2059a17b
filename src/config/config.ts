import * as fs from 'fs';

import { MCPError, errorMessage } from '../core/errors';
import { isPlainObject } from '../core/jsonrpc-wrapper';
import { TransportAuth } from '../transport/http-transport';
import { LogLevel } from '../utils/logger';

/**
 * How to launch one server as a subprocess
 */
export interface ServerConfig {
  command: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
}

/**
 * Contents of a JSON config file
 */
export interface ConfigFile {
  mcpServers: Record<string, ServerConfig>;
  defaultServer?: string;
  timeoutMs?: number;
  legacyMode?: boolean;
  logLevel?: LogLevel;
}

/**
 * Options as commander hands them over
 */
export interface CliOptions {
  config?: string;
  server?: string;
  stdio?: string;
  http?: string;
  ws?: string;
  token?: string;
  apiKey?: string;
  timeout?: string;
  legacy?: boolean;
  debug?: boolean;
}

export type ServerTarget =
  | ({ type: 'stdio'; name?: string } & ServerConfig)
  | { type: 'http'; url: string }
  | { type: 'ws'; url: string };

export interface ClientConfig {
  target: ServerTarget;
  auth?: TransportAuth;
  timeoutMs?: number;
  legacyMode: boolean;
  logLevel: LogLevel;
}

const LOG_LEVELS: readonly string[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.includes(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isPlainObject(value) && Object.values(value).every((item) => typeof item === 'string');
}

function parseServerConfig(name: string, value: unknown): ServerConfig {
  if (!isPlainObject(value)) {
    throw new MCPError(`Server ${name}: entry must be an object`);
  }
  if (typeof value.command !== 'string' || value.command.length === 0) {
    throw new MCPError(`Server ${name}: "command" must be a non-empty string`);
  }

  const config: ServerConfig = { command: value.command };
  if (value.args !== undefined) {
    if (!isStringArray(value.args)) {
      throw new MCPError(`Server ${name}: "args" must be an array of strings`);
    }
    config.args = value.args;
  }
  if (value.env !== undefined) {
    if (!isStringRecord(value.env)) {
      throw new MCPError(`Server ${name}: "env" must map names to strings`);
    }
    config.env = value.env;
  }
  if (value.cwd !== undefined) {
    if (typeof value.cwd !== 'string') {
      throw new MCPError(`Server ${name}: "cwd" must be a string`);
    }
    config.cwd = value.cwd;
  }
  return config;
}

function parsePositiveInteger(value: unknown, what: string): number {
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed <= 0) {
    throw new MCPError(`${what} must be a positive integer, got ${String(value)}`);
  }
  return parsed;
}

/**
 * Validates a parsed config file
 */
export function parseConfigFile(value: unknown): ConfigFile {
  if (!isPlainObject(value)) {
    throw new MCPError('Config must be a JSON object');
  }

  const servers = value.mcpServers ?? {};
  if (!isPlainObject(servers)) {
    throw new MCPError('"mcpServers" must be an object');
  }

  const config: ConfigFile = { mcpServers: {} };
  for (const [name, entry] of Object.entries(servers)) {
    config.mcpServers[name] = parseServerConfig(name, entry);
  }

  if (value.defaultServer !== undefined) {
    if (typeof value.defaultServer !== 'string' || !(value.defaultServer in config.mcpServers)) {
      throw new MCPError(`"defaultServer" must name a configured server`);
    }
    config.defaultServer = value.defaultServer;
  }
  if (value.timeoutMs !== undefined) {
    config.timeoutMs = parsePositiveInteger(value.timeoutMs, '"timeoutMs"');
  }
  if (value.legacyMode !== undefined) {
    if (typeof value.legacyMode !== 'boolean') {
      throw new MCPError('"legacyMode" must be a boolean');
    }
    config.legacyMode = value.legacyMode;
  }
  if (value.logLevel !== undefined) {
    if (!isLogLevel(value.logLevel)) {
      throw new MCPError(`"logLevel" must be one of: ${LOG_LEVELS.join(', ')}`);
    }
    config.logLevel = value.logLevel;
  }
  return config;
}

/**
 * Reads and validates a JSON config file
 */
export async function readConfigFile(path: string): Promise<ConfigFile> {
  let text: string;
  try {
    text = await fs.promises.readFile(path, 'utf8');
  } catch (error) {
    throw new MCPError(`Error loading configuration file ${path}: ${errorMessage(error)}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new MCPError(`Invalid JSON in configuration file ${path}: ${errorMessage(error)}`, { cause: error });
  }
  return parseConfigFile(parsed);
}

/**
 * Splits a command line on whitespace, honouring single and double quotes
 */
export function splitCommandLine(line: string): string[] {
  const words: string[] = [];
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
  for (const match of line.matchAll(pattern)) {
    words.push(match[1] ?? match[2] ?? match[3]);
  }
  return words;
}

function selectServer(file: ConfigFile | undefined, requested?: string): ServerTarget {
  const servers = file?.mcpServers ?? {};
  const names = Object.keys(servers);
  const name = requested ?? file?.defaultServer ?? (names.length === 1 ? names[0] : undefined);

  if (name === undefined) {
    throw new MCPError(
      names.length === 0
        ? 'No server given: use --stdio, --http, --ws, or --server with --config'
        : `Several servers configured, choose one with --server: ${names.join(', ')}`
    );
  }
  const server = servers[name];
  if (!server) {
    throw new MCPError(`Unknown server: ${name}`);
  }
  return { type: 'stdio', name, ...server };
}

/**
 * Merges command line options over the optional config file
 */
export async function loadClientConfig(options: CliOptions): Promise<ClientConfig> {
  const file = options.config ? await readConfigFile(options.config) : undefined;

  const explicit = [options.stdio, options.http, options.ws].filter((value) => value !== undefined);
  if (explicit.length > 1) {
    throw new MCPError('Use only one of --stdio, --http and --ws');
  }

  let target: ServerTarget;
  if (options.stdio !== undefined) {
    const [command, ...args] = splitCommandLine(options.stdio);
    if (!command) {
      throw new MCPError('--stdio needs a command');
    }
    target = { type: 'stdio', command, args };
  } else if (options.http !== undefined) {
    target = { type: 'http', url: options.http };
  } else if (options.ws !== undefined) {
    target = { type: 'ws', url: options.ws };
  } else {
    target = selectServer(file, options.server);
  }

  if (options.token !== undefined && options.apiKey !== undefined) {
    throw new MCPError('Use only one of --token and --api-key');
  }
  let auth: TransportAuth | undefined;
  if (options.token !== undefined) {
    auth = { type: 'bearer', token: options.token };
  } else if (options.apiKey !== undefined) {
    auth = { type: 'apiKey', key: options.apiKey };
  }

  return {
    target,
    auth,
    timeoutMs: options.timeout !== undefined ? parsePositiveInteger(options.timeout, '--timeout') : file?.timeoutMs,
    legacyMode: options.legacy ?? file?.legacyMode ?? false,
    logLevel: options.debug ? 'debug' : file?.logLevel ?? 'info'
  };
}

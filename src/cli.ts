#!/usr/bin/env node

import * as path from 'path';
import * as fs from 'fs';
import { Command } from 'commander';
import chalk from 'chalk';

import { MCPClient } from './client/mcp-client';
import { CliOptions, ClientConfig, loadClientConfig } from './config/config';
import { MCPError, ProtocolError, errorMessage } from './core/errors';
import { isPlainObject } from './core/jsonrpc-wrapper';
import { Params } from './core/mcp-types';
import { setLogLevel } from './utils/logger';

function readVersion(): string {
  const packageJson: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '../package.json'), 'utf8'));
  return isPlainObject(packageJson) && typeof packageJson.version === 'string' ? packageJson.version : '0.0.0';
}

/**
 * Parses a JSON object argument given on the command line
 */
export function parseArguments(json?: string): Params {
  if (json === undefined) {
    return {};
  }
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    throw new MCPError(`Arguments are not valid JSON: ${errorMessage(error)}`);
  }
  if (!isPlainObject(value)) {
    throw new MCPError('Arguments must be a JSON object');
  }
  return value;
}

async function connect(config: ClientConfig): Promise<MCPClient> {
  const client = new MCPClient({
    name: 'mcp-rpc',
    version: readVersion(),
    timeoutMs: config.timeoutMs,
    legacyMode: config.legacyMode
  });
  const target = config.target;

  switch (target.type) {
    case 'stdio':
      await client.connectStdio({ command: target.command, args: target.args, env: target.env, cwd: target.cwd });
      break;
    case 'http':
      await client.connectHttp(target.url, { auth: config.auth });
      break;
    case 'ws':
      await client.connectWebSocket(target.url, { auth: config.auth });
      break;
  }
  return client;
}

/**
 * Loads the config, connects, runs `action` and prints its result as JSON
 */
async function run(program: Command, action: (client: MCPClient) => Promise<unknown>): Promise<void> {
  const config = await loadClientConfig(program.opts<CliOptions>());
  setLogLevel(config.logLevel);

  const client = await connect(config);
  try {
    const result = await action(client);
    process.stdout.write(JSON.stringify(result, null, 2) + '\n');
  } finally {
    await client.disconnect();
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('mcp-rpc')
    .description('Talk to a tool, resource and prompt server over stdio, HTTP or WebSocket')
    .version(readVersion())
    .option('-c, --config <path>', 'Path to configuration file')
    .option('-s, --server <name>', 'Configured server to use')
    .option('--stdio <command>', 'Run a server command and talk to it over stdio')
    .option('--http <url>', 'Server base URL for HTTP transport')
    .option('--ws <url>', 'Server URL for WebSocket transport')
    .option('--token <token>', 'Bearer token for HTTP or WebSocket')
    .option('--api-key <key>', 'API key for HTTP or WebSocket')
    .option('-t, --timeout <milliseconds>', 'Request timeout in milliseconds')
    .option('--legacy', 'Accept the previous protocol revision')
    .option('-d, --debug', 'Enable debug logging');

  program
    .command('tools')
    .description('List tools')
    .option('--cursor <cursor>', 'Pagination cursor')
    .action((options: { cursor?: string }) => run(program, (client) => client.listTools(options.cursor)));

  program
    .command('call <name> [json]')
    .description('Call a tool with a JSON object of arguments')
    .action((name: string, json?: string) => run(program, (client) => client.callTool(name, parseArguments(json))));

  program
    .command('resources')
    .description('List resources')
    .option('--cursor <cursor>', 'Pagination cursor')
    .action((options: { cursor?: string }) => run(program, (client) => client.listResources(options.cursor)));

  program
    .command('read <uri>')
    .description('Read a resource')
    .action((uri: string) => run(program, (client) => client.readResource(uri)));

  program
    .command('prompts')
    .description('List prompts')
    .option('--cursor <cursor>', 'Pagination cursor')
    .action((options: { cursor?: string }) => run(program, (client) => client.listPrompts(options.cursor)));

  program
    .command('prompt <name> [json]')
    .description('Render a prompt with a JSON object of arguments')
    .action((name: string, json?: string) => run(program, (client) => client.getPrompt(name, parseArguments(json))));

  program
    .command('ping')
    .description('Check that the server answers')
    .action(() =>
      run(program, async (client) => {
        await client.ping();
        return { ok: true, server: client.serverInfo };
      })
    );

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      const code = error instanceof ProtocolError ? ` (code ${error.code})` : '';
      process.stderr.write(chalk.red(`[ERROR] ${errorMessage(error)}${code}`) + '\n');
      process.exitCode = 1;
    });
}

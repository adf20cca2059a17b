import { spawn, SpawnOptions } from 'child_process';
import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import { Readable, Writable } from 'stream';

import { Transport } from '../core/connection';
import { ConnectionError, errorMessage } from '../core/errors';
import { createLogger } from '../utils/logger';
import { LineFramer, writeLine } from './line-framer';
import { MessageQueue } from './message-queue';

const log = createLogger('stdio');

const DEFAULT_TERMINATE_TIMEOUT_MS = 5000;
const KILL_WAIT_MS = 1000;
const MAX_STDERR_BYTES = 64 * 1024;

/**
 * The parts of a child process the transport relies on
 */
export interface SpawnedProcess extends EventEmitter {
  readonly pid?: number;
  readonly exitCode: number | null;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFunction = (command: string, args: string[], options: SpawnOptions) => SpawnedProcess;

export interface StdioTransportOptions {
  command: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
  maxMessageSize?: number;
  terminateTimeoutMs?: number;
  spawn?: SpawnFunction;
}

export interface ProcessInfo {
  pid?: number;
  exitCode: number | null;
  command: string;
  args: string[];
  cwd: string;
  connected: boolean;
}

function isExecutable(candidate: string): Promise<boolean> {
  return fs.promises
    .access(candidate, fs.constants.X_OK)
    .then(() => fs.promises.stat(candidate))
    .then(
      (stats) => stats.isFile(),
      () => false
    );
}

/**
 * Finds the file a command would run, or undefined if there is no executable one
 */
export async function resolveExecutable(
  command: string,
  cwd: string = process.cwd(),
  searchPath: string = process.env.PATH ?? ''
): Promise<string | undefined> {
  if (command.length === 0) {
    return undefined;
  }

  if (path.isAbsolute(command) || command.includes('/') || command.includes(path.sep)) {
    const candidate = path.resolve(cwd, command);
    return (await isExecutable(candidate)) ? candidate : undefined;
  }

  const extensions =
    process.platform === 'win32' ? ['', ...(process.env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';')] : [''];

  for (const directory of searchPath.split(path.delimiter)) {
    if (!directory) {
      continue;
    }
    for (const extension of extensions) {
      const candidate = path.join(directory, command + extension);
      if (await isExecutable(candidate)) {
        return candidate;
      }
    }
  }
  return undefined;
}

/**
 * Client transport that runs a server as a subprocess and speaks
 * newline-delimited JSON over its stdin/stdout.
 */
export class StdioTransport implements Transport {
  private readonly options: StdioTransportOptions;
  private readonly spawnProcess: SpawnFunction;
  private readonly terminateTimeoutMs: number;
  private readonly queue = new MessageQueue<Buffer>();
  private readonly framer: LineFramer;

  private child?: SpawnedProcess;
  private connected = false;
  private exited = false;
  private exitCode: number | null = null;
  private stderrChunks: Buffer[] = [];
  private stderrBytes = 0;
  private writeChain: Promise<void> = Promise.resolve();
  private exitHook?: () => void;

  constructor(options: StdioTransportOptions) {
    this.options = options;
    this.spawnProcess = options.spawn ?? ((command, args, spawnOptions) => spawn(command, args, spawnOptions));
    this.terminateTimeoutMs = options.terminateTimeoutMs ?? DEFAULT_TERMINATE_TIMEOUT_MS;
    this.framer = new LineFramer({
      maxMessageSize: options.maxMessageSize,
      onFrame: (frame) => this.queue.push(frame)
    });
  }

  public async connect(): Promise<void> {
    if (this.connected) {
      return;
    }

    const cwd = this.options.cwd ?? process.cwd();
    const env: NodeJS.ProcessEnv = { ...process.env, ...this.options.env };
    const executable = await resolveExecutable(this.options.command, cwd, env.PATH ?? '');
    if (!executable) {
      throw new ConnectionError(`Command not found: ${this.options.command}`);
    }

    this.queue.reset();
    this.framer.reset();
    this.stderrChunks = [];
    this.stderrBytes = 0;
    this.exited = false;
    this.exitCode = null;

    log.debug(`Spawning ${executable} ${(this.options.args ?? []).join(' ')}`);
    const child = this.spawnProcess(executable, this.options.args ?? [], {
      cwd,
      env,
      stdio: ['pipe', 'pipe', 'pipe'],
      shell: false
    });

    await new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        child.off('error', onError);
        resolve();
      };
      const onError = (error: Error): void => {
        child.off('spawn', onSpawn);
        reject(new ConnectionError(`Failed to start ${this.options.command}: ${error.message}`, { cause: error }));
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });

    const { stdin, stdout, stderr } = child;
    if (!stdin || !stdout) {
      child.kill('SIGKILL');
      throw new ConnectionError(`Server process for ${this.options.command} has no stdio pipes`);
    }

    this.child = child;
    this.attach(child, stdin, stdout, stderr);
    this.connected = true;

    const exitHook = (): void => {
      if (!this.exited) {
        child.kill('SIGTERM');
      }
    };
    this.exitHook = exitHook;
    process.on('exit', exitHook);

    log.info(`Started server process ${this.options.command} (pid ${child.pid ?? 'unknown'})`);
  }

  public async disconnect(): Promise<void> {
    const child = this.child;
    if (!child) {
      return;
    }
    this.connected = false;

    child.stdin?.end();
    if (!this.exited) {
      child.kill('SIGTERM');
      if (!(await this.waitForExit(child, this.terminateTimeoutMs))) {
        log.warn(`Server process did not exit within ${this.terminateTimeoutMs}ms, sending SIGKILL`);
        child.kill('SIGKILL');
        await this.waitForExit(child, KILL_WAIT_MS);
      }
    }

    const stderr = this.getStderr();
    if (stderr.length > 0) {
      log.debug(`Server stderr:\n${stderr}`);
    }

    if (this.exitHook) {
      process.off('exit', this.exitHook);
      this.exitHook = undefined;
    }
    this.queue.fail(new ConnectionError('Transport disconnected'));
    this.child = undefined;
  }

  public async send(data: Buffer): Promise<void> {
    const stdin = this.child?.stdin;
    if (!this.connected || !stdin) {
      throw new ConnectionError('Transport not connected');
    }

    const write = this.writeChain.then(() => writeLine(stdin, data));
    this.writeChain = write.catch((error: unknown) => {
      log.debug(`Write chain continuing after failure: ${errorMessage(error)}`);
    });
    return write;
  }

  public receive(signal?: AbortSignal): Promise<Buffer> {
    return this.queue.shift(signal);
  }

  public isConnected(): boolean {
    return this.connected && !this.exited;
  }

  public getProcessInfo(): ProcessInfo {
    return {
      pid: this.child?.pid,
      exitCode: this.exitCode,
      command: this.options.command,
      args: this.options.args ?? [],
      cwd: this.options.cwd ?? process.cwd(),
      connected: this.isConnected()
    };
  }

  /**
   * Text the server wrote to stderr, most recent 64 KiB
   */
  public getStderr(): string {
    return Buffer.concat(this.stderrChunks).toString('utf8');
  }

  private attach(child: SpawnedProcess, stdin: Writable, stdout: Readable, stderr: Readable | null): void {
    const closed = (reason: string): void => {
      this.queue.fail(new ConnectionError(reason));
    };

    stdout.on('data', (chunk: Buffer) => this.framer.push(chunk));
    stdout.on('end', () => closed(`Server process closed its output (exit code ${this.exitCode})`));
    stdout.on('error', (error: Error) => closed(`Server output failed: ${error.message}`));

    stdin.on('error', (error: Error) => {
      log.debug(`Server input error: ${error.message}`);
    });

    stderr?.on('data', (chunk: Buffer) => this.captureStderr(chunk));

    child.on('error', (error: Error) => closed(`Server process error: ${error.message}`));
    child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      this.exited = true;
      this.exitCode = code;
      log.debug(`Server process exited (code ${code}, signal ${signal ?? 'none'})`);
      // Output may still be draining; the 'end' handler reports the close in that case
      if (stdout.readableEnded || stdout.destroyed) {
        closed(`Server process exited with code ${code}`);
      }
    });
  }

  private captureStderr(chunk: Buffer): void {
    this.stderrChunks.push(chunk);
    this.stderrBytes += chunk.length;
    while (this.stderrBytes > MAX_STDERR_BYTES && this.stderrChunks.length > 1) {
      const dropped = this.stderrChunks.shift();
      this.stderrBytes -= dropped?.length ?? 0;
    }
  }

  private waitForExit(child: SpawnedProcess, timeoutMs: number): Promise<boolean> {
    if (this.exited) {
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      const onExit = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        child.off('exit', onExit);
        resolve(false);
      }, timeoutMs);
      child.once('exit', onExit);
    });
  }
}

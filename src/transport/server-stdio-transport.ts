import { Readable, Writable } from 'stream';

import { Transport } from '../core/connection';
import { ConnectionError, errorMessage } from '../core/errors';
import { createLogger } from '../utils/logger';
import { LineFramer, writeLine } from './line-framer';
import { MessageQueue } from './message-queue';

const log = createLogger('server-stdio');

const DEFAULT_EOF_GRACE_MS = 100;

export interface ServerStdioTransportOptions {
  input?: Readable;
  output?: Writable;
  maxMessageSize?: number;
  eofGraceMs?: number;
}

/**
 * Server side of the stdio transport: frames arrive on this process's stdin
 * and responses leave on its stdout.
 */
export class ServerStdioTransport implements Transport {
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly eofGraceMs: number;
  private readonly queue = new MessageQueue<Buffer>();
  private readonly framer: LineFramer;

  private connected = false;
  private chunksSeen = 0;
  private eofTimer?: NodeJS.Timeout;
  private writeChain: Promise<void> = Promise.resolve();

  private readonly onData = (chunk: Buffer | string): void => {
    this.chunksSeen++;
    this.framer.push(chunk);
  };

  private readonly onEnd = (): void => {
    const seen = this.chunksSeen;
    log.debug('Input reached EOF');
    clearTimeout(this.eofTimer);
    this.eofTimer = setTimeout(() => {
      this.eofTimer = undefined;
      if (this.chunksSeen === seen && !this.input.readable) {
        this.queue.fail(new ConnectionError('Input stream closed'));
      }
    }, this.eofGraceMs);
  };

  private readonly onError = (error: Error): void => {
    this.queue.fail(new ConnectionError(`Input stream failed: ${error.message}`, { cause: error }));
  };

  constructor(options: ServerStdioTransportOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.eofGraceMs = options.eofGraceMs ?? DEFAULT_EOF_GRACE_MS;
    this.framer = new LineFramer({
      maxMessageSize: options.maxMessageSize,
      onFrame: (frame) => this.queue.push(frame)
    });
  }

  public async connect(): Promise<void> {
    if (this.connected) {
      return;
    }
    this.queue.reset();
    this.framer.reset();

    this.input.on('data', this.onData);
    this.input.on('end', this.onEnd);
    this.input.on('error', this.onError);
    this.input.resume();
    this.connected = true;
    log.debug('Listening on stdin');
  }

  public async disconnect(): Promise<void> {
    if (!this.connected) {
      return;
    }
    this.connected = false;
    clearTimeout(this.eofTimer);
    this.eofTimer = undefined;

    this.input.off('data', this.onData);
    this.input.off('end', this.onEnd);
    this.input.off('error', this.onError);
    this.input.pause();
    this.queue.fail(new ConnectionError('Transport disconnected'));
  }

  public async send(data: Buffer): Promise<void> {
    if (!this.connected) {
      throw new ConnectionError('Transport not connected');
    }
    const write = this.writeChain.then(() => writeLine(this.output, data));
    this.writeChain = write.catch((error: unknown) => {
      log.debug(`Write chain continuing after failure: ${errorMessage(error)}`);
    });
    return write;
  }

  public receive(signal?: AbortSignal): Promise<Buffer> {
    return this.queue.shift(signal);
  }

  public isConnected(): boolean {
    return this.connected;
  }
}

import { Writable } from 'stream';
import { decodeFrame } from '../core/jsonrpc-wrapper';
import { ConnectionError, errorMessage } from '../core/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('framing');

export const DEFAULT_MAX_MESSAGE_SIZE = 50 * 1024 * 1024;

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;
const LINE_TERMINATOR = Buffer.from('\n');

export interface LineFramerOptions {
  maxMessageSize?: number;
  onFrame: (frame: Buffer) => void;
}

/**
 * Splits a byte stream into newline-delimited JSON frames.
 *
 * Lines that are blank, too large or not valid UTF-8 JSON are dropped without
 * disturbing the lines that follow them.
 */
export class LineFramer {
  public readonly maxMessageSize: number;

  // Pieces of the unfinished line; none of them holds a newline
  private pending: Buffer[] = [];
  private pendingBytes = 0;
  private discarding = false;
  private onFrame: (frame: Buffer) => void;

  constructor(options: LineFramerOptions) {
    this.maxMessageSize = options.maxMessageSize ?? DEFAULT_MAX_MESSAGE_SIZE;
    this.onFrame = options.onFrame;
  }

  public get buffered(): number {
    return this.pendingBytes;
  }

  public push(chunk: Buffer | string): void {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;

    let start = 0;
    let index = bytes.indexOf(NEWLINE);
    while (index !== -1) {
      const tail = bytes.subarray(start, index);
      if (this.discarding) {
        // Tail of a line already reported as oversized
        this.discarding = false;
      } else {
        this.emitLine(this.pending.length === 0 ? tail : Buffer.concat([...this.pending, tail]));
      }
      this.clearPending();
      start = index + 1;
      index = bytes.indexOf(NEWLINE, start);
    }

    if (start >= bytes.length || this.discarding) {
      return;
    }
    this.pending.push(bytes.subarray(start));
    this.pendingBytes += bytes.length - start;

    if (this.pendingBytes > this.maxMessageSize) {
      log.warn(`Buffer exceeded ${this.maxMessageSize} bytes without a newline, discarding`);
      this.clearPending();
      this.discarding = true;
    }
  }

  public reset(): void {
    this.clearPending();
    this.discarding = false;
  }

  private clearPending(): void {
    this.pending = [];
    this.pendingBytes = 0;
  }

  private emitLine(raw: Buffer): void {
    const line = raw.length > 0 && raw[raw.length - 1] === CARRIAGE_RETURN ? raw.subarray(0, -1) : raw;

    if (line.length > this.maxMessageSize) {
      log.warn(`Dropping oversized message (${line.length} bytes)`);
      return;
    }
    if (line.toString('utf8').trim().length === 0) {
      return;
    }

    try {
      decodeFrame(line);
    } catch (error) {
      log.warn(`Dropping invalid line: ${errorMessage(error)}`);
      return;
    }

    this.onFrame(Buffer.from(line));
  }
}

/**
 * Writes one frame plus its terminator. Resolves once the stream will take more data.
 */
export function writeLine(stream: Writable, frame: Buffer): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const accepted = stream.write(Buffer.concat([frame, LINE_TERMINATOR]), (error) => {
      if (error) {
        reject(new ConnectionError(`Write failed: ${error.message}`, { cause: error }));
      }
    });
    if (accepted) {
      resolve();
    } else {
      stream.once('drain', () => resolve());
    }
  });
}

import WebSocket, { RawData } from 'ws';

import { Transport } from '../core/connection';
import { ConnectionError } from '../core/errors';
import { createLogger } from '../utils/logger';
import { DEFAULT_MAX_MESSAGE_SIZE } from './line-framer';
import { MessageQueue } from './message-queue';
import { RemoteTransportOptions, buildAuthHeaders } from './http-transport';

const log = createLogger('websocket');

const DEFAULT_CONNECT_TIMEOUT_MS = 10000;
const CLOSE_WAIT_MS = 1000;

export interface WebSocketTransportOptions extends RemoteTransportOptions {
  connectTimeoutMs?: number;
  maxMessageSize?: number;
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(new Uint8Array(data));
}

/**
 * Client transport over a single WebSocket; one text frame per message
 */
export class WebSocketTransport implements Transport {
  public readonly url: string;

  private readonly options: WebSocketTransportOptions;
  private readonly queue = new MessageQueue<Buffer>();
  private socket?: WebSocket;

  constructor(url: string, options: WebSocketTransportOptions = {}) {
    this.url = url;
    this.options = options;
  }

  public async connect(): Promise<void> {
    if (this.isConnected()) {
      return;
    }
    this.queue.reset();

    const socket = new WebSocket(this.url, {
      headers: buildAuthHeaders(this.options),
      maxPayload: this.options.maxMessageSize ?? DEFAULT_MAX_MESSAGE_SIZE,
      handshakeTimeout: this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS
    });

    await new Promise<void>((resolve, reject) => {
      const onOpen = (): void => {
        socket.off('error', onError);
        resolve();
      };
      const onError = (error: Error): void => {
        socket.off('open', onOpen);
        reject(new ConnectionError(`WebSocket connection to ${this.url} failed: ${error.message}`, { cause: error }));
      };
      socket.once('open', onOpen);
      socket.once('error', onError);
    });

    socket.on('message', (data: RawData, isBinary: boolean) => {
      if (isBinary) {
        log.warn('Dropping binary frame');
        return;
      }
      this.queue.push(toBuffer(data));
    });
    socket.on('error', (error: Error) => {
      this.queue.fail(new ConnectionError(`WebSocket error: ${error.message}`, { cause: error }));
    });
    socket.on('close', (code: number, reason: Buffer) => {
      const detail = reason.length > 0 ? `: ${reason.toString('utf8')}` : '';
      this.queue.fail(new ConnectionError(`WebSocket closed (${code})${detail}`));
    });

    this.socket = socket;
    log.info(`Connected to ${this.url}`);
  }

  public async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return;
    }
    this.socket = undefined;

    if (socket.readyState !== WebSocket.CLOSED) {
      const closed = new Promise<void>((resolve) => {
        const timer = setTimeout(() => {
          socket.terminate();
          resolve();
        }, CLOSE_WAIT_MS);
        socket.once('close', () => {
          clearTimeout(timer);
          resolve();
        });
      });
      socket.close(1000, 'Client disconnect');
      await closed;
    }
    this.queue.fail(new ConnectionError('Transport disconnected'));
  }

  public send(data: Buffer): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ConnectionError('Transport not connected'));
    }
    return new Promise<void>((resolve, reject) => {
      socket.send(data.toString('utf8'), (error?: Error) => {
        if (error) {
          reject(new ConnectionError(`WebSocket send failed: ${error.message}`, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  public receive(signal?: AbortSignal): Promise<Buffer> {
    return this.queue.shift(signal);
  }

  public isConnected(): boolean {
    return this.socket !== undefined && this.socket.readyState === WebSocket.OPEN;
  }
}

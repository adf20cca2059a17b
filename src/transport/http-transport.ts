import axios, { AxiosInstance } from 'axios';

import { Transport } from '../core/connection';
import { ConnectionError, errorMessage } from '../core/errors';
import { decodeFrame, isPlainObject } from '../core/jsonrpc-wrapper';
import { createLogger } from '../utils/logger';
import { MessageQueue } from './message-queue';

const log = createLogger('http');

const DEFAULT_HTTP_TIMEOUT_MS = 30000;

export type TransportAuth =
  | { type: 'bearer'; token: string }
  | { type: 'apiKey'; key: string; headerName?: string };

export interface RemoteTransportOptions {
  auth?: TransportAuth;
  headers?: Record<string, string>;
}

export interface HttpTransportOptions extends RemoteTransportOptions {
  timeoutMs?: number;

  /**
   * Preconfigured axios instance, used instead of creating one
   */
  client?: AxiosInstance;
}

/**
 * Static headers plus whatever the auth setting adds
 */
export function buildAuthHeaders(options: RemoteTransportOptions): Record<string, string> {
  const headers: Record<string, string> = { ...options.headers };
  const auth = options.auth;
  if (auth?.type === 'bearer') {
    headers.Authorization = `Bearer ${auth.token}`;
  } else if (auth?.type === 'apiKey') {
    headers[auth.headerName ?? 'X-API-Key'] = auth.key;
  }
  return headers;
}

/**
 * Path suffix a message is posted to, chosen by its method
 */
export function endpointForMethod(method?: string): string {
  if (method === undefined) {
    return '/rpc';
  }
  if (method.startsWith('initialize')) {
    return '/initialize';
  }
  if (method.startsWith('tools/')) {
    return '/tools';
  }
  if (method.startsWith('resources/')) {
    return '/resources';
  }
  if (method.startsWith('prompts/')) {
    return '/prompts';
  }
  return '/rpc';
}

function methodOf(data: Buffer): string | undefined {
  try {
    const decoded = decodeFrame(data);
    return isPlainObject(decoded) && typeof decoded.method === 'string' ? decoded.method : undefined;
  } catch (error) {
    log.debug(`Routing unparseable body to /rpc: ${errorMessage(error)}`);
    return undefined;
  }
}

function isJson(body: string): boolean {
  try {
    JSON.parse(body);
    return true;
  } catch (error) {
    return false;
  }
}

/**
 * Client transport that POSTs each message and queues the response body
 */
export class HttpTransport implements Transport {
  public readonly baseUrl: string;

  private readonly options: HttpTransportOptions;
  private readonly headers: Record<string, string>;
  private readonly queue = new MessageQueue<Buffer>();
  private http?: AxiosInstance;
  private connected = false;

  constructor(baseUrl: string, options: HttpTransportOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.options = options;
    this.headers = buildAuthHeaders(options);
  }

  public async connect(): Promise<void> {
    if (this.connected) {
      return;
    }
    this.http =
      this.options.client ?? axios.create({ timeout: this.options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS });
    this.queue.reset();

    try {
      const response = await this.http.get(`${this.baseUrl}/health`, {
        headers: this.headers,
        validateStatus: () => true
      });
      log.debug(`Health check returned ${response.status}`);
    } catch (error) {
      log.warn(`Health check failed for ${this.baseUrl}: ${errorMessage(error)}`);
    }

    this.connected = true;
    log.info(`Connected to ${this.baseUrl}`);
  }

  public async disconnect(): Promise<void> {
    if (!this.connected) {
      return;
    }
    this.connected = false;
    this.queue.fail(new ConnectionError('Transport disconnected'));
  }

  public async send(data: Buffer): Promise<void> {
    const http = this.http;
    if (!this.connected || !http) {
      throw new ConnectionError('Transport not connected');
    }

    const url = this.baseUrl + endpointForMethod(methodOf(data));
    let status: number;
    let body: string;
    try {
      const response = await http.post<string>(url, data.toString('utf8'), {
        headers: { ...this.headers, 'Content-Type': 'application/json' },
        responseType: 'text',
        transformResponse: (raw: unknown) => raw,
        validateStatus: () => true
      });
      status = response.status;
      body = typeof response.data === 'string' ? response.data : '';
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new ConnectionError(`HTTP request to ${url} failed: ${error.message}`, { cause: error });
      }
      throw new ConnectionError(`HTTP request to ${url} failed: ${errorMessage(error)}`, { cause: error });
    }

    const trimmed = body.trim();
    if (status >= 400 && !isJson(trimmed)) {
      throw new ConnectionError(`HTTP ${status} from ${url}${trimmed ? `: ${trimmed}` : ''}`);
    }
    if (trimmed.length > 0) {
      this.queue.push(Buffer.from(trimmed, 'utf8'));
    }
  }

  public receive(signal?: AbortSignal): Promise<Buffer> {
    return this.queue.shift(signal);
  }

  public isConnected(): boolean {
    return this.connected;
  }
}

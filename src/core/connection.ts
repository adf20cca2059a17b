import { EventEmitter } from 'events';
import { setTimeout as delay } from 'timers/promises';
import {
  Capabilities,
  ConnectionState,
  Implementation,
  INTERNAL_ERROR,
  INVALID_REQUEST,
  JSONRPCMessage,
  JSONRPCNotification,
  JSONRPCRequest,
  JSONRPCResponseMessage,
  RequestId
} from './mcp-types';
import {
  createErrorResponse,
  decodeFrame,
  decodeMessage,
  encodeMessage,
  isNotification,
  isPlainObject,
  isRequest,
  isRequestId,
  isResponse,
  isResponseShaped
} from './jsonrpc-wrapper';
import { CancelledError, ConnectionError, ProtocolError, TimeoutError, errorMessage } from './errors';
import { ProtocolHandler } from './protocol';
import { createLogger } from '../utils/logger';

const log = createLogger('connection');

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
const INITIALIZATION_POLL_MS = 100;
const DRAIN_TIMEOUT_MS = 1000;

/**
 * A bidirectional byte channel carrying one framed message per `send`/`receive`
 */
export interface Transport {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  send(data: Buffer): Promise<void>;

  /**
   * Resolves with the next frame. Rejects with a ConnectionError once the
   * channel has failed, or when `signal` aborts.
   */
  receive(signal?: AbortSignal): Promise<Buffer>;
  isConnected(): boolean;
}

/**
 * Answers requests and consumes notifications arriving on a Connection
 */
export interface MessageHandler {
  handleRequest(request: JSONRPCRequest): Promise<JSONRPCResponseMessage>;
  handleNotification(notification: JSONRPCNotification): Promise<void>;

  /**
   * Called once when the handler is attached to a Connection
   */
  bindConnection?(connection: Connection): void;
}

export interface ConnectionOptions {
  transport: Transport;
  handler: MessageHandler;
  implementation: Implementation;
  capabilities?: Capabilities;
  timeoutMs?: number;
  legacyMode?: boolean;
}

export interface ConnectionStats {
  messagesSent: number;
  messagesReceived: number;
  requestsSent: number;
  responsesReceived: number;
  notificationsSent: number;
  notificationsReceived: number;
  errors: number;
}

interface PendingRequest {
  method: string;
  resolve: (response: JSONRPCResponseMessage) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * One end of a protocol session: owns the transport, the handshake state,
 * the pending request table and the receive loop.
 */
export class Connection extends EventEmitter {
  public readonly transport: Transport;
  public readonly handler: MessageHandler;
  public readonly protocol: ProtocolHandler;
  public readonly timeoutMs: number;

  private currentState: ConnectionState = ConnectionState.DISCONNECTED;
  private pending: Map<RequestId, PendingRequest> = new Map();
  private inFlight: Set<Promise<void>> = new Set();
  private shutdown?: AbortController;
  private receiveTask?: Promise<void>;
  private stats: ConnectionStats = {
    messagesSent: 0,
    messagesReceived: 0,
    requestsSent: 0,
    responsesReceived: 0,
    notificationsSent: 0,
    notificationsReceived: 0,
    errors: 0
  };

  constructor(options: ConnectionOptions) {
    super();
    this.transport = options.transport;
    this.handler = options.handler;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.protocol = new ProtocolHandler({
      implementation: options.implementation,
      capabilities: options.capabilities,
      legacyMode: options.legacyMode
    });
    this.handler.bindConnection?.(this);
  }

  public get state(): ConnectionState {
    return this.currentState;
  }

  /**
   * True only once the handshake has completed
   */
  public get isInitialized(): boolean {
    return this.currentState === ConnectionState.OPERATING;
  }

  public get peerInfo(): Implementation | undefined {
    return this.protocol.peerInfo;
  }

  public get peerCapabilities(): Capabilities | undefined {
    return this.protocol.peerCapabilities;
  }

  public get negotiatedVersion(): string {
    return this.protocol.negotiatedVersion;
  }

  public get pendingCount(): number {
    return this.pending.size;
  }

  public getStats(): ConnectionStats {
    return { ...this.stats };
  }

  /**
   * Opens the transport and starts receiving. Leaves the connection in INITIALIZING.
   */
  public async connect(): Promise<void> {
    if (this.currentState !== ConnectionState.DISCONNECTED) {
      throw new ConnectionError(`Cannot connect from state ${this.currentState}`);
    }

    this.setState(ConnectionState.CONNECTING);
    const shutdown = new AbortController();
    this.shutdown = shutdown;

    try {
      await this.transport.connect();
    } catch (error) {
      this.setState(ConnectionState.ERROR);
      shutdown.abort();
      await this.closeTransport();
      throw new ConnectionError(`Connection failed: ${errorMessage(error)}`, { cause: error });
    }

    this.receiveTask = this.receiveLoop(shutdown.signal);
    this.setState(ConnectionState.INITIALIZING);
    log.debug('Connection ready for initialization');
  }

  /**
   * Runs the client side of the handshake: `initialize`, then `initialized`
   */
  public async initializeClient(): Promise<void> {
    if (this.currentState !== ConnectionState.INITIALIZING) {
      throw new ConnectionError(`Cannot initialize client from state ${this.currentState}`);
    }

    try {
      const request = this.protocol.createInitializeRequest();
      log.debug(`Sending initialize request with version ${request.params?.protocolVersion}`);
      const response = await this.dispatchRequest(request, this.timeoutMs);
      this.protocol.handleInitializeResponse(response);

      await this.writeMessage(this.protocol.createInitializedNotification());
      this.stats.notificationsSent++;
      this.setState(ConnectionState.OPERATING);
      log.info(`Connection established with ${this.peerInfo?.name ?? 'Unknown'}`);
    } catch (error) {
      if (this.currentState === ConnectionState.INITIALIZING) {
        this.setState(ConnectionState.ERROR);
      }
      log.error(`Initialization failed: ${errorMessage(error)}`);
      if (
        error instanceof ProtocolError ||
        error instanceof TimeoutError ||
        error instanceof CancelledError ||
        error instanceof ConnectionError
      ) {
        throw error;
      }
      throw new ConnectionError(`Client initialization failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Waits for a client to complete the handshake on this server-side connection
   */
  public async waitForInitialization(timeoutMs?: number): Promise<void> {
    if (this.currentState === ConnectionState.OPERATING) {
      return;
    }
    if (this.currentState !== ConnectionState.INITIALIZING) {
      throw new ConnectionError(`Cannot wait for initialization from state ${this.currentState}`);
    }

    log.info('Waiting for client initialization...');
    const deadline = timeoutMs === undefined ? undefined : Date.now() + timeoutMs;

    while (this.currentState === ConnectionState.INITIALIZING) {
      if (deadline !== undefined && Date.now() >= deadline) {
        throw new TimeoutError(`Initialization did not complete within ${timeoutMs}ms`, timeoutMs ?? 0);
      }
      await delay(INITIALIZATION_POLL_MS);
    }

    if (this.currentState !== ConnectionState.OPERATING) {
      throw new ConnectionError(`Initialization did not complete (state: ${this.currentState})`);
    }
  }

  /**
   * Completes the server side of the handshake. Called by the message handler on `initialized`.
   */
  public completeInitialization(
    peerInfo: Implementation,
    peerCapabilities: Capabilities,
    protocolVersion?: string
  ): void {
    if (this.currentState !== ConnectionState.INITIALIZING && this.currentState !== ConnectionState.OPERATING) {
      log.warn(`Ignoring initialization completion in state ${this.currentState}`);
      return;
    }
    this.protocol.recordPeer(peerInfo, peerCapabilities, protocolVersion);
    this.setState(ConnectionState.OPERATING);
    log.info(`Initialization completed with ${peerInfo.name} v${peerInfo.version}`);
  }

  /**
   * Cancels every pending request, stops the receive loop and closes the transport
   */
  public async disconnect(): Promise<void> {
    if (this.currentState === ConnectionState.DISCONNECTED) {
      return;
    }

    log.debug('Disconnecting...');
    this.setState(ConnectionState.SHUTTING_DOWN);
    this.shutdown?.abort();

    for (const [id, entry] of this.pending) {
      clearTimeout(entry.timer);
      entry.reject(new CancelledError(`Request ${id} (${entry.method}) cancelled: connection closed`, id));
    }
    this.pending.clear();

    if (this.receiveTask) {
      await this.receiveTask;
      this.receiveTask = undefined;
    }
    await this.drainInFlight();
    await this.closeTransport();

    this.setState(ConnectionState.DISCONNECTED);
    log.debug('Connection closed');
  }

  /**
   * Resolves once the connection reaches DISCONNECTED or ERROR
   */
  public waitForClose(): Promise<ConnectionState> {
    const closed = (state: ConnectionState): boolean =>
      state === ConnectionState.DISCONNECTED || state === ConnectionState.ERROR;

    if (closed(this.currentState)) {
      return Promise.resolve(this.currentState);
    }
    return new Promise((resolve) => {
      const listener = (state: ConnectionState): void => {
        if (closed(state)) {
          this.off('state', listener);
          resolve(state);
        }
      };
      this.on('state', listener);
    });
  }

  /**
   * Sends a request and waits for the matching response
   */
  public async sendRequest(
    request: JSONRPCRequest | JSONRPCNotification,
    timeoutMs?: number
  ): Promise<JSONRPCResponseMessage> {
    if (!this.isInitialized) {
      throw new ConnectionError('Connection not initialized');
    }
    if (!isRequest(request)) {
      throw new ProtocolError('Cannot send notification as request', INVALID_REQUEST);
    }

    this.stats.requestsSent++;
    return this.dispatchRequest(request, timeoutMs ?? this.timeoutMs);
  }

  /**
   * Sends a notification. No response is expected.
   */
  public async sendNotification(notification: JSONRPCNotification | JSONRPCRequest): Promise<void> {
    if (!this.isInitialized) {
      throw new ConnectionError('Connection not initialized');
    }
    if (!isNotification(notification)) {
      throw new ProtocolError('Cannot send request as notification', INVALID_REQUEST);
    }

    await this.writeMessage(notification);
    this.stats.notificationsSent++;
  }

  private setState(next: ConnectionState): void {
    const previous = this.currentState;
    if (previous === next) {
      return;
    }
    this.currentState = next;
    log.debug(`State ${previous} -> ${next}`);
    this.emit('state', next, previous);
  }

  private dispatchRequest(request: JSONRPCRequest, timeoutMs: number): Promise<JSONRPCResponseMessage> {
    if (this.pending.has(request.id)) {
      return Promise.reject(new ProtocolError(`Duplicate request id: ${request.id}`, INVALID_REQUEST));
    }

    return new Promise<JSONRPCResponseMessage>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(request.id);
        this.stats.errors++;
        reject(new TimeoutError(`Request ${request.id} timed out after ${timeoutMs}ms`, timeoutMs, request.id));
      }, timeoutMs);

      this.pending.set(request.id, { method: request.method, resolve, reject, timer });

      this.writeMessage(request).catch((error: unknown) => {
        const entry = this.pending.get(request.id);
        if (entry) {
          clearTimeout(entry.timer);
          this.pending.delete(request.id);
          entry.reject(error instanceof Error ? error : new ConnectionError(errorMessage(error)));
        }
      });
    });
  }

  private async writeMessage(message: JSONRPCMessage): Promise<void> {
    if (!this.transport.isConnected()) {
      throw new ConnectionError('Transport not connected');
    }

    try {
      await this.transport.send(Buffer.from(encodeMessage(message), 'utf8'));
      this.stats.messagesSent++;
    } catch (error) {
      this.stats.errors++;
      log.error(`Failed to send message: ${errorMessage(error)}`);
      if (error instanceof ConnectionError) {
        throw error;
      }
      throw new ConnectionError(`Send failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async receiveLoop(signal: AbortSignal): Promise<void> {
    log.debug('Receive loop started');

    while (!signal.aborted) {
      let frame: Buffer;
      try {
        frame = await this.transport.receive(signal);
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        this.stats.errors++;
        if (error instanceof ConnectionError) {
          this.fail(error);
          break;
        }
        log.error(`Error receiving message: ${errorMessage(error)}`);
        continue;
      }

      this.stats.messagesReceived++;
      this.track(this.processFrame(frame));
    }

    log.debug('Receive loop ended');
  }

  /**
   * Frames are processed concurrently so a slow handler does not hold up responses
   */
  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task.then(
      () => {
        this.inFlight.delete(tracked);
      },
      (error: unknown) => {
        this.inFlight.delete(tracked);
        this.stats.errors++;
        log.error(`Error processing message: ${errorMessage(error)}`);
      }
    );
    this.inFlight.add(tracked);
  }

  /**
   * Gives handlers still running a bounded chance to write their responses
   */
  private async drainInFlight(): Promise<void> {
    if (this.inFlight.size === 0) {
      return;
    }
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, DRAIN_TIMEOUT_MS);
    });
    await Promise.race([Promise.allSettled([...this.inFlight]).then(() => undefined), expired]);
    clearTimeout(timer);
  }

  private fail(error: ConnectionError): void {
    if (this.currentState === ConnectionState.SHUTTING_DOWN || this.currentState === ConnectionState.DISCONNECTED) {
      return;
    }
    log.error(`Connection failed: ${error.message}`);
    this.setState(ConnectionState.ERROR);

    for (const entry of this.pending.values()) {
      clearTimeout(entry.timer);
      entry.reject(error);
    }
    this.pending.clear();
  }

  private async processFrame(frame: Buffer): Promise<void> {
    let decoded: unknown;
    try {
      decoded = decodeFrame(frame);
    } catch (error) {
      this.stats.errors++;
      log.error(`Invalid message format: ${errorMessage(error)}`);
      return;
    }

    if (Array.isArray(decoded)) {
      if (decoded.length === 0) {
        log.warn('Dropping empty batch');
        return;
      }
      const outcomes = await Promise.allSettled(decoded.map((item: unknown) => this.processMessage(item)));
      for (const outcome of outcomes) {
        if (outcome.status === 'rejected') {
          this.stats.errors++;
          log.error(`Batch item failed: ${errorMessage(outcome.reason)}`);
        }
      }
      return;
    }

    await this.processMessage(decoded);
  }

  private async processMessage(value: unknown): Promise<void> {
    if (isResponseShaped(value)) {
      this.handleResponse(value);
      return;
    }

    let message: JSONRPCMessage;
    try {
      message = decodeMessage(value);
    } catch (error) {
      this.stats.errors++;
      await this.rejectInvalidRequest(value, error);
      return;
    }

    if (isNotification(message)) {
      this.stats.notificationsReceived++;
      await this.handler.handleNotification(message);
      return;
    }
    if (isRequest(message)) {
      await this.handleRequest(message);
    }
  }

  private handleResponse(value: unknown): void {
    let message: JSONRPCMessage;
    try {
      message = decodeMessage(value);
    } catch (error) {
      this.stats.errors++;
      log.error(`Invalid response: ${errorMessage(error)}`);
      return;
    }
    if (!isResponse(message)) {
      return;
    }

    const id = message.id;
    const entry = id === null ? undefined : this.pending.get(id);
    if (id === null || !entry) {
      log.debug(`Dropping response with unknown id: ${String(id)}`);
      return;
    }

    clearTimeout(entry.timer);
    this.pending.delete(id);
    this.stats.responsesReceived++;
    entry.resolve(message);
  }

  private async handleRequest(request: JSONRPCRequest): Promise<void> {
    let response: JSONRPCResponseMessage;
    try {
      response = await this.handler.handleRequest(request);
    } catch (error) {
      log.error(`Handler failed for ${request.method}: ${errorMessage(error)}`);
      response = createErrorResponse(request.id, INTERNAL_ERROR, errorMessage(error) || 'Internal error');
    }

    try {
      await this.writeMessage(response);
    } catch (error) {
      log.error(`Could not deliver response to ${request.method}: ${errorMessage(error)}`);
    }
  }

  private async rejectInvalidRequest(value: unknown, error: unknown): Promise<void> {
    if (!isPlainObject(value) || !('id' in value)) {
      log.warn(`Dropping invalid message: ${errorMessage(error)}`);
      return;
    }
    // An id that cannot be echoed back is answered with a null id
    const id = isRequestId(value.id) ? value.id : null;

    const code = error instanceof ProtocolError ? error.code : INVALID_REQUEST;
    try {
      await this.writeMessage(createErrorResponse(id, code, errorMessage(error)));
    } catch (sendError) {
      log.error(`Could not reject invalid request ${String(id)}: ${errorMessage(sendError)}`);
    }
  }

  /**
   * Transports treat a second disconnect as a no-op, so this runs even after a failure
   */
  private async closeTransport(): Promise<void> {
    try {
      await this.transport.disconnect();
    } catch (error) {
      log.error(`Error closing transport: ${errorMessage(error)}`);
    }
  }
}

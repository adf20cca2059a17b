import { v4 as uuidv4 } from 'uuid';
import {
  CAPABILITY_KEYS,
  Capabilities,
  Implementation,
  INITIALIZATION_FAILED,
  InitializeParams,
  JSONRPCError,
  JSONRPCNotification,
  JSONRPCRequest,
  JSONRPCResponse,
  JSONRPCResponseMessage,
  LATEST_PROTOCOL_VERSION,
  LEGACY_PROTOCOL_VERSION,
  Params,
  RequestId,
  Result,
  SUPPORTED_PROTOCOL_VERSIONS
} from './mcp-types';
import {
  createErrorResponse,
  createNotification,
  createRequest,
  createSuccessResponse,
  isErrorResponse,
  isPlainObject
} from './jsonrpc-wrapper';
import { ProtocolError } from './errors';
import { createLogger } from '../utils/logger';

const log = createLogger('protocol');

export interface ProtocolHandlerOptions {
  implementation: Implementation;
  capabilities?: Capabilities;
  legacyMode?: boolean;
}

/**
 * Reads `{name, version}` from an untrusted value. Missing fields become "Unknown".
 */
export function parseImplementation(value: unknown): Implementation {
  const data = isPlainObject(value) ? value : {};
  return {
    name: typeof data.name === 'string' ? data.name : 'Unknown',
    version: typeof data.version === 'string' ? data.version : 'Unknown'
  };
}

/**
 * Reads a capability set from an untrusted value. Unknown keys are dropped,
 * and entries that are not objects count as absent.
 */
export function parseCapabilities(value: unknown): Capabilities {
  const capabilities: Capabilities = {};
  if (!isPlainObject(value)) {
    return capabilities;
  }
  for (const key of CAPABILITY_KEYS) {
    const entry = value[key];
    if (isPlainObject(entry)) {
      capabilities[key] = entry;
    }
  }
  return capabilities;
}

/**
 * Builds protocol messages for one peer and tracks what the handshake negotiated
 */
export class ProtocolHandler {
  public readonly implementation: Implementation;
  public readonly capabilities: Capabilities;
  public readonly legacyMode: boolean;

  public negotiatedVersion: string = LATEST_PROTOCOL_VERSION;
  public peerInfo?: Implementation;
  public peerCapabilities?: Capabilities;
  public initialized = false;

  private issuedIds: Set<RequestId> = new Set();

  constructor(options: ProtocolHandlerOptions) {
    this.implementation = options.implementation;
    this.capabilities = parseCapabilities(options.capabilities ?? {});
    this.legacyMode = options.legacyMode ?? false;
  }

  /**
   * Generates a request id this handler has not issued before
   */
  public generateRequestId(): string {
    let id = uuidv4();
    while (this.issuedIds.has(id)) {
      id = uuidv4();
    }
    this.issuedIds.add(id);
    return id;
  }

  public createRequest(method: string, params?: Params): JSONRPCRequest {
    return createRequest(this.generateRequestId(), method, params);
  }

  public createNotification(method: string, params?: Params): JSONRPCNotification {
    return createNotification(method, params);
  }

  public createResponse(id: RequestId, result: Result): JSONRPCResponse {
    return createSuccessResponse(id, result);
  }

  public createErrorResponse(id: RequestId | null, code: number, message: string, data?: unknown): JSONRPCError {
    return createErrorResponse(id, code, message, data);
  }

  public createInitializeRequest(): JSONRPCRequest {
    const params: InitializeParams = {
      protocolVersion: LATEST_PROTOCOL_VERSION,
      capabilities: this.capabilities,
      clientInfo: this.implementation
    };
    return this.createRequest('initialize', params);
  }

  public createInitializedNotification(): JSONRPCNotification {
    return this.createNotification('initialized', {});
  }

  /**
   * Decides whether a peer's protocol version is acceptable.
   * Returns the version to use, or throws when it is not.
   */
  public negotiateVersion(version: string): string {
    if (SUPPORTED_PROTOCOL_VERSIONS.includes(version)) {
      return version;
    }
    if (this.legacyMode && version === LEGACY_PROTOCOL_VERSION) {
      log.warn(`Using legacy protocol version: ${version}`);
      return version;
    }
    throw new ProtocolError(`Unsupported protocol version: ${version}`, INITIALIZATION_FAILED, {
      supported: this.supportedVersions(),
      requested: version
    });
  }

  /**
   * Versions this handler accepts, legacy fallback included when enabled
   */
  public supportedVersions(): string[] {
    const versions = [...SUPPORTED_PROTOCOL_VERSIONS];
    if (this.legacyMode) {
      versions.push(LEGACY_PROTOCOL_VERSION);
    }
    return versions;
  }

  /**
   * Applies the server's answer to `initialize`
   */
  public handleInitializeResponse(response: JSONRPCResponseMessage): void {
    if (isErrorResponse(response)) {
      throw ProtocolError.fromErrorObject(response.error, 'Initialize failed');
    }

    const result = response.result;
    const requested = result.protocolVersion ?? LATEST_PROTOCOL_VERSION;
    if (typeof requested !== 'string') {
      throw new ProtocolError('Protocol version must be a string', INITIALIZATION_FAILED);
    }

    this.negotiatedVersion = this.negotiateVersion(requested);
    this.peerInfo = parseImplementation(result.serverInfo);
    this.peerCapabilities = parseCapabilities(result.capabilities);
    this.initialized = true;

    log.info(
      `Initialized with ${this.peerInfo.name} v${this.peerInfo.version}, protocol ${this.negotiatedVersion}`
    );
  }

  /**
   * Records the peer data a server learned from `initialize`
   */
  public recordPeer(peerInfo: Implementation, peerCapabilities: Capabilities, protocolVersion?: string): void {
    this.peerInfo = peerInfo;
    this.peerCapabilities = peerCapabilities;
    if (protocolVersion !== undefined) {
      this.negotiatedVersion = protocolVersion;
    }
    this.initialized = true;
  }
}

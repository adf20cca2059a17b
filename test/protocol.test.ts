import { describe, expect, it } from 'vitest';

import { ProtocolHandler, parseCapabilities, parseImplementation } from '../src/core/protocol';
import { ProtocolError } from '../src/core/errors';
import { createErrorResponse, createSuccessResponse } from '../src/core/jsonrpc-wrapper';
import { INITIALIZATION_FAILED } from '../src/core/mcp-types';

function handler(legacyMode = false): ProtocolHandler {
  return new ProtocolHandler({
    implementation: { name: 'test-client', version: '1.0.0' },
    capabilities: { roots: { listChanged: true } },
    legacyMode
  });
}

describe('parseImplementation', () => {
  it('fills missing fields with Unknown', () => {
    expect(parseImplementation({ name: 'srv' })).toEqual({ name: 'srv', version: 'Unknown' });
    expect(parseImplementation('nonsense')).toEqual({ name: 'Unknown', version: 'Unknown' });
  });
});

describe('parseCapabilities', () => {
  it('keeps known object entries and drops the rest', () => {
    expect(parseCapabilities({ tools: { listChanged: true }, prompts: true, telepathy: {} })).toEqual({
      tools: { listChanged: true }
    });
  });
});

describe('ProtocolHandler', () => {
  it('issues distinct request ids', () => {
    const protocol = handler();
    const ids = new Set(Array.from({ length: 50 }, () => protocol.generateRequestId()));
    expect(ids.size).toBe(50);
  });

  it('builds the initialize request with the latest version', () => {
    const request = handler().createInitializeRequest();
    expect(request.method).toBe('initialize');
    expect(request.params).toEqual({
      protocolVersion: '2025-03-26',
      capabilities: { roots: { listChanged: true } },
      clientInfo: { name: 'test-client', version: '1.0.0' }
    });
  });

  it('builds the initialized notification', () => {
    expect(handler().createInitializedNotification()).toEqual({ jsonrpc: '2.0', method: 'initialized', params: {} });
  });

  it('rejects an unsupported version with the supported list', () => {
    try {
      handler().negotiateVersion('1999-01-01');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toMatchObject({
        code: INITIALIZATION_FAILED,
        message: 'Unsupported protocol version: 1999-01-01',
        data: { supported: ['2025-03-26'], requested: '1999-01-01' }
      });
    }
  });

  it('accepts the previous revision only in legacy mode', () => {
    expect(() => handler().negotiateVersion('2024-11-05')).toThrow(ProtocolError);
    expect(handler(true).negotiateVersion('2024-11-05')).toBe('2024-11-05');
    expect(handler(true).supportedVersions()).toEqual(['2025-03-26', '2024-11-05']);
  });

  it('records the server described by the initialize result', () => {
    const protocol = handler();
    protocol.handleInitializeResponse(
      createSuccessResponse('1', {
        protocolVersion: '2025-03-26',
        capabilities: { tools: {} },
        serverInfo: { name: 'calc', version: '2.0.0' }
      })
    );
    expect(protocol.initialized).toBe(true);
    expect(protocol.peerInfo).toEqual({ name: 'calc', version: '2.0.0' });
    expect(protocol.peerCapabilities).toEqual({ tools: {} });
    expect(protocol.negotiatedVersion).toBe('2025-03-26');
  });

  it('turns an initialize error response into a ProtocolError', () => {
    const response = createErrorResponse('1', INITIALIZATION_FAILED, 'Unsupported protocol version: x');
    expect(() => handler().handleInitializeResponse(response)).toThrow(
      'Initialize failed: Unsupported protocol version: x'
    );
  });
});

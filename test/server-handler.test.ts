import { describe, expect, it } from 'vitest';

import { ServerHandler, paginate } from '../src/server/server-handler';
import { parametersToSchema } from '../src/server/parameters';
import { createRequest } from '../src/core/jsonrpc-wrapper';
import { ProtocolError } from '../src/core/errors';
import { JSONRPCResponseMessage, Params } from '../src/core/mcp-types';

let nextId = 0;

function call(handler: ServerHandler, method: string, params?: Params): Promise<JSONRPCResponseMessage> {
  nextId++;
  return handler.handleRequest(createRequest(nextId, method, params));
}

function calculator(): ServerHandler {
  const handler = new ServerHandler({ name: 'calculator', version: '1.0.0', instructions: 'Adds numbers' });
  handler.tools.register({
    name: 'add',
    description: 'Add two numbers',
    inputSchema: parametersToSchema({ a: 'number', b: 'number' }),
    handler: (args) => Number(args.a) + Number(args.b)
  });
  handler.tools.register({
    name: 'explode',
    description: 'Always fails',
    inputSchema: parametersToSchema({}),
    handler: () => {
      throw new Error('boom');
    }
  });
  handler.resources.register({
    uri: 'users://{id}/profile',
    name: 'Profile',
    description: 'A user profile',
    handler: (params) => `profile of ${params.id}`
  });
  handler.resources.register({
    uri: 'logo://main',
    name: 'Logo',
    description: 'Logo image',
    mimeType: 'image/png',
    handler: () => ({ type: 'image', data: 'iVBORw0=', mimeType: 'image/png' })
  });
  handler.prompts.register({
    name: 'greet',
    description: 'Greets someone',
    arguments: [{ name: 'who', required: true }],
    handler: (args) => `Say hello to ${String(args.who)}`
  });
  return handler;
}

describe('initialize', () => {
  it('answers with the negotiated version, capabilities and server info', async () => {
    const handler = calculator();
    const response = await call(handler, 'initialize', {
      protocolVersion: '2025-03-26',
      capabilities: { roots: {} },
      clientInfo: { name: 'tester', version: '0.0.1' }
    });

    expect(response).toEqual({
      jsonrpc: '2.0',
      id: nextId,
      result: {
        protocolVersion: '2025-03-26',
        capabilities: { tools: {}, resources: {}, prompts: {} },
        serverInfo: { name: 'calculator', version: '1.0.0' },
        instructions: 'Adds numbers'
      }
    });
    expect(handler.peerInfo).toEqual({ name: 'tester', version: '0.0.1' });
    expect(handler.peerCapabilities).toEqual({ roots: {} });
  });

  it('refuses an unsupported protocol version', async () => {
    const response = await call(calculator(), 'initialize', { protocolVersion: '2000-01-01' });
    expect(response).toMatchObject({ error: { code: -32000, message: 'Unsupported protocol version: 2000-01-01' } });
  });
});

describe('tools', () => {
  it('runs the add tool', async () => {
    const response = await call(calculator(), 'tools/call', { name: 'add', arguments: { a: 2, b: 3 } });
    expect(response).toEqual({
      jsonrpc: '2.0',
      id: nextId,
      result: { content: [{ type: 'text', text: '5' }], isError: false }
    });
  });

  it('reports a failing tool as an error result, not a JSON-RPC error', async () => {
    const response = await call(calculator(), 'tools/call', { name: 'explode' });
    expect(response).toEqual({
      jsonrpc: '2.0',
      id: nextId,
      result: { content: [{ type: 'text', text: 'Tool error: boom' }], isError: true }
    });
  });

  it('reports an unknown tool as a JSON-RPC error', async () => {
    const response = await call(calculator(), 'tools/call', { name: 'divide' });
    expect(response).toEqual({
      jsonrpc: '2.0',
      id: nextId,
      error: { code: -32002, message: 'Tool not found: divide' }
    });
  });

  it('validates arguments before calling the tool', async () => {
    const response = await call(calculator(), 'tools/call', { name: 'add', arguments: { a: 2 } });
    expect(response).toMatchObject({ error: { code: -32602, message: 'Missing required argument: b' } });
  });

  it('pages through 150 tools', async () => {
    const handler = new ServerHandler({ name: 'many', version: '1.0.0' });
    for (let index = 0; index < 150; index++) {
      handler.tools.register({
        name: `tool-${index}`,
        description: `Tool ${index}`,
        inputSchema: parametersToSchema({}),
        handler: () => index
      });
    }

    const first = await call(handler, 'tools/list');
    if (!('result' in first)) {
      throw new Error('expected a result');
    }
    const firstTools = first.result.tools;
    expect(Array.isArray(firstTools) ? firstTools.length : -1).toBe(100);
    expect(first.result.nextCursor).toBe('100');

    const second = await call(handler, 'tools/list', { cursor: '100' });
    if (!('result' in second)) {
      throw new Error('expected a result');
    }
    const secondTools = second.result.tools;
    expect(Array.isArray(secondTools) ? secondTools.length : -1).toBe(50);
    expect(second.result.nextCursor).toBeUndefined();
  });

  it('rejects a malformed cursor', async () => {
    const response = await call(calculator(), 'tools/list', { cursor: 'abc' });
    expect(response).toMatchObject({ error: { code: -32602, message: 'Invalid cursor: abc' } });
  });
});

describe('resources', () => {
  it('reads a templated resource with the captured parameters', async () => {
    const response = await call(calculator(), 'resources/read', { uri: 'users://42/profile' });
    expect(response).toMatchObject({
      result: { contents: [{ uri: 'users://42/profile', mimeType: 'text/plain', text: 'profile of 42' }] }
    });
  });

  it('returns binary content as a blob', async () => {
    const response = await call(calculator(), 'resources/read', { uri: 'logo://main' });
    expect(response).toMatchObject({
      result: { contents: [{ uri: 'logo://main', mimeType: 'image/png', blob: 'iVBORw0=' }] }
    });
  });

  it('reports an unknown URI', async () => {
    const response = await call(calculator(), 'resources/read', { uri: 'users://42/settings' });
    expect(response).toMatchObject({ error: { code: -32003, message: 'Resource not found: users://42/settings' } });
  });
});

describe('prompts', () => {
  it('renders a prompt', async () => {
    const response = await call(calculator(), 'prompts/get', { name: 'greet', arguments: { who: 'Ada' } });
    expect(response).toMatchObject({
      result: {
        description: 'Greets someone',
        messages: [{ role: 'user', content: { type: 'text', text: 'Say hello to Ada' } }]
      }
    });
  });

  it('requires declared arguments', async () => {
    const response = await call(calculator(), 'prompts/get', { name: 'greet' });
    expect(response).toMatchObject({ error: { code: -32602, message: 'Missing required argument: who' } });
  });
});

describe('method handling', () => {
  it('answers ping and refuses unknown methods', async () => {
    const handler = calculator();
    expect(await call(handler, 'ping')).toMatchObject({ result: {} });
    expect(await call(handler, 'sampling/createMessage')).toMatchObject({
      error: { code: -32601, message: 'Method not found: sampling/createMessage' }
    });
  });

  it('refuses methods of a capability the server did not announce', async () => {
    const handler = new ServerHandler({ name: 'tools-only', version: '1.0.0', capabilities: { tools: {} } });
    expect(await call(handler, 'prompts/list')).toMatchObject({
      error: { code: -32001, message: 'Capability not supported: prompts' }
    });
  });
});

describe('paginate', () => {
  it('returns no cursor on the last page', () => {
    expect(paginate([1, 2, 3], '2', 2)).toEqual({ items: [3] });
    expect(paginate([1, 2, 3], undefined, 2)).toEqual({ items: [1, 2], nextCursor: '2' });
    expect(() => paginate([1], -1, 2)).toThrow(ProtocolError);
  });
});

import axios, { AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';

import { HttpTransport, buildAuthHeaders, endpointForMethod } from '../src/transport/http-transport';
import { ConnectionError } from '../src/core/errors';

interface Reply {
  status: number;
  body: string;
}

interface RecordedRequest {
  method?: string;
  url?: string;
  data: unknown;
  authorization: unknown;
}

/**
 * An axios instance whose requests are answered in process
 */
function stubClient(route: (config: InternalAxiosRequestConfig) => Reply | Error): {
  client: AxiosInstance;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const client = axios.create({
    adapter: async (config) => {
      requests.push({
        method: config.method,
        url: config.url,
        data: config.data,
        authorization: config.headers.Authorization
      });
      const reply = route(config);
      if (reply instanceof Error) {
        throw reply;
      }
      return { data: reply.body, status: reply.status, statusText: '', headers: {}, config };
    }
  });
  return { client, requests };
}

const health: Reply = { status: 200, body: '{"status":"ok"}' };

describe('endpointForMethod', () => {
  it('routes by method family', () => {
    expect(endpointForMethod('initialize')).toBe('/initialize');
    expect(endpointForMethod('tools/call')).toBe('/tools');
    expect(endpointForMethod('resources/read')).toBe('/resources');
    expect(endpointForMethod('prompts/get')).toBe('/prompts');
    expect(endpointForMethod('ping')).toBe('/rpc');
    expect(endpointForMethod(undefined)).toBe('/rpc');
  });
});

describe('buildAuthHeaders', () => {
  it('adds bearer or API key headers to the static ones', () => {
    expect(buildAuthHeaders({ auth: { type: 'bearer', token: 'test-secret' }, headers: { 'X-Trace': '1' } })).toEqual({
      'X-Trace': '1',
      Authorization: 'Bearer test-secret'
    });
    expect(buildAuthHeaders({ auth: { type: 'apiKey', key: 'test-key', headerName: 'X-Custom-Key' } })).toEqual({
      'X-Custom-Key': 'test-key'
    });
  });
});

describe('HttpTransport', () => {
  it('posts each message to its endpoint and queues the reply', async () => {
    const { client, requests } = stubClient((config) =>
      config.method === 'get' ? health : { status: 200, body: '{"jsonrpc":"2.0","id":1,"result":{"tools":[]}}' }
    );
    const transport = new HttpTransport('http://mcp.test/', { client, auth: { type: 'bearer', token: 'test-secret' } });
    await transport.connect();

    await transport.send(Buffer.from('{"jsonrpc":"2.0","id":1,"method":"tools/list"}'));
    expect((await transport.receive()).toString('utf8')).toBe('{"jsonrpc":"2.0","id":1,"result":{"tools":[]}}');

    expect(requests.map((request) => [request.method, request.url])).toEqual([
      ['get', 'http://mcp.test/health'],
      ['post', 'http://mcp.test/tools']
    ]);
    expect(requests[1].data).toBe('{"jsonrpc":"2.0","id":1,"method":"tools/list"}');
    expect(requests[1].authorization).toBe('Bearer test-secret');
  });

  it('queues nothing for an empty reply', async () => {
    const { client } = stubClient((config) => {
      if (config.method === 'get') {
        return health;
      }
      return config.url?.endsWith('/initialize')
        ? { status: 204, body: '' }
        : { status: 200, body: '{"jsonrpc":"2.0","id":2,"result":{}}' };
    });
    const transport = new HttpTransport('http://mcp.test', { client });
    await transport.connect();

    await transport.send(Buffer.from('{"jsonrpc":"2.0","method":"initialized"}'));
    await transport.send(Buffer.from('{"jsonrpc":"2.0","id":2,"method":"ping"}'));
    expect((await transport.receive()).toString('utf8')).toBe('{"jsonrpc":"2.0","id":2,"result":{}}');
  });

  it('passes JSON error bodies through and fails on other HTTP errors', async () => {
    const { client } = stubClient((config) => {
      if (config.method === 'get') {
        return health;
      }
      return config.url?.endsWith('/tools')
        ? { status: 400, body: '{"jsonrpc":"2.0","id":null,"error":{"code":-32700,"message":"Parse error"}}' }
        : { status: 502, body: 'Bad Gateway' };
    });
    const transport = new HttpTransport('http://mcp.test', { client });
    await transport.connect();

    await transport.send(Buffer.from('{"jsonrpc":"2.0","id":3,"method":"tools/call"}'));
    expect((await transport.receive()).toString('utf8')).toContain('"code":-32700');

    await expect(transport.send(Buffer.from('{"jsonrpc":"2.0","id":4,"method":"ping"}'))).rejects.toThrow(
      'HTTP 502 from http://mcp.test/rpc: Bad Gateway'
    );
  });

  it('connects even when the health check fails', async () => {
    const { client } = stubClient(() => new Error('connect ECONNREFUSED'));
    const transport = new HttpTransport('http://mcp.test', { client });
    await transport.connect();
    expect(transport.isConnected()).toBe(true);

    const failure = transport.send(Buffer.from('{"jsonrpc":"2.0","id":5,"method":"ping"}'));
    await expect(failure).rejects.toBeInstanceOf(ConnectionError);
    await expect(failure).rejects.toThrow('HTTP request to http://mcp.test/rpc failed: connect ECONNREFUSED');
  });

  it('fails pending receives on disconnect', async () => {
    const { client } = stubClient(() => health);
    const transport = new HttpTransport('http://mcp.test', { client });
    await transport.connect();

    const pending = transport.receive();
    await transport.disconnect();
    await expect(pending).rejects.toThrow('Transport disconnected');
    await expect(transport.send(Buffer.from('{}'))).rejects.toThrow('Transport not connected');
  });
});

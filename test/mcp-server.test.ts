import { PassThrough } from 'stream';
import { describe, expect, it } from 'vitest';

import { MCPServer } from '../src/server/mcp-server';
import { MCPError } from '../src/core/errors';

describe('MCPServer', () => {
  it('announces only the enabled capabilities', () => {
    const server = new MCPServer({ name: 'quiet', version: '1.0.0', resourcesEnabled: false, promptsEnabled: false });
    expect(server.handler.capabilities).toEqual({ tools: {} });
  });

  it('builds the input schema from the parameter map', () => {
    const server = new MCPServer({ name: 'calc', version: '1.0.0' }).tool(
      'scale',
      {
        description: 'Scale a value',
        parameters: { value: 'number', factor: { type: 'number', description: 'Multiplier', required: false } },
        annotations: { readOnlyHint: true }
      },
      ({ value, factor }) => value * (factor ?? 2)
    );

    expect(server.handler.tools.list()).toEqual([
      {
        name: 'scale',
        description: 'Scale a value',
        inputSchema: {
          type: 'object',
          properties: { value: { type: 'number' }, factor: { type: 'number', description: 'Multiplier' } },
          required: ['value']
        },
        annotations: { readOnlyHint: true }
      }
    ]);
  });

  it('checks arguments again when a registered tool is called directly', async () => {
    const server = new MCPServer({ name: 'calc', version: '1.0.0' }).tool(
      'double',
      { description: 'Double a value', parameters: { value: 'number' } },
      ({ value }) => value * 2
    );
    const tool = server.handler.tools.get('double');

    expect(await tool?.handler({ value: 4 })).toBe(8);
    expect(() => tool?.handler({ value: 'four' })).toThrow('Argument value has wrong type, expected number');
  });

  it('refuses a second tool with the same name', () => {
    const server = new MCPServer({ name: 'calc', version: '1.0.0' }).tool('x', { description: 'X' }, () => 1);
    expect(() => server.tool('x', { description: 'X again' }, () => 2)).toThrow(MCPError);
  });

  it('serves over stdio streams until the input closes', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const server = new MCPServer({ name: 'calc', version: '1.0.0' }).tool(
      'add',
      { description: 'Add', parameters: { a: 'number', b: 'number' } },
      ({ a, b }) => a + b
    );

    const serving = server.serveStdio({ input, output, eofGraceMs: 10 });
    let written = '';
    output.on('data', (chunk: Buffer) => {
      written += chunk.toString('utf8');
    });
    const lines = (): string[] => written.split('\n').filter(Boolean);

    input.write(
      JSON.stringify({
        jsonrpc: '2.0',
        id: 1,
        method: 'initialize',
        params: { protocolVersion: '2025-03-26', capabilities: {}, clientInfo: { name: 'pipe', version: '1' } }
      }) + '\n'
    );
    input.write(JSON.stringify({ jsonrpc: '2.0', method: 'initialized', params: {} }) + '\n');
    input.write(
      JSON.stringify({ jsonrpc: '2.0', id: 2, method: 'tools/call', params: { name: 'add', arguments: { a: 1, b: 2 } } }) +
        '\n'
    );

    await expect.poll(() => lines().length).toBe(2);
    input.end();
    await serving;

    expect(JSON.parse(lines()[0])).toMatchObject({ id: 1, result: { serverInfo: { name: 'calc', version: '1.0.0' } } });
    expect(JSON.parse(lines()[1])).toEqual({
      jsonrpc: '2.0',
      id: 2,
      result: { content: [{ type: 'text', text: '3' }], isError: false }
    });
  });
});

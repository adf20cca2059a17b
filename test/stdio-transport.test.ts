import { PassThrough, Writable } from 'stream';
import { afterEach, describe, expect, it } from 'vitest';

import { StdioTransport, resolveExecutable } from '../src/transport/stdio-transport';
import { ServerStdioTransport } from '../src/transport/server-stdio-transport';
import { ConnectionError } from '../src/core/errors';
import { FakeChildProcess } from './support/memory-transport';

const transports: { disconnect(): Promise<void> }[] = [];

afterEach(async () => {
  await Promise.all(transports.splice(0).map((transport) => transport.disconnect()));
});

function fakeTransport(
  child = new FakeChildProcess()
): { transport: StdioTransport; child: FakeChildProcess; spawned: string[][] } {
  const spawned: string[][] = [];
  const transport = new StdioTransport({
    command: process.execPath,
    args: ['server.js'],
    terminateTimeoutMs: 20,
    spawn: (command, args) => {
      spawned.push([command, ...args]);
      return child.started();
    }
  });
  transports.push(transport);
  return { transport, child, spawned };
}

describe('resolveExecutable', () => {
  it('finds an absolute executable and rejects a missing one', async () => {
    expect(await resolveExecutable(process.execPath)).toBe(process.execPath);
    expect(await resolveExecutable('definitely-not-a-command-4242', '/', '/nonexistent')).toBeUndefined();
  });
});

describe('StdioTransport', () => {
  it('fails to connect when the command does not exist', async () => {
    const transport = new StdioTransport({ command: './no/such/server' });
    await expect(transport.connect()).rejects.toThrow('Command not found: ./no/such/server');
  });

  it('writes one line per frame and reads frames from stdout', async () => {
    const { transport, child, spawned } = fakeTransport();
    await transport.connect();
    expect(spawned).toEqual([[process.execPath, 'server.js']]);
    expect(transport.isConnected()).toBe(true);

    await transport.send(Buffer.from('{"jsonrpc":"2.0","method":"ping","id":1}'));
    expect(child.stdin.read().toString('utf8')).toBe('{"jsonrpc":"2.0","method":"ping","id":1}\n');

    child.stdout.write('{"jsonrpc":"2.0","id":1,"result":{}}\n');
    expect((await transport.receive()).toString('utf8')).toBe('{"jsonrpc":"2.0","id":1,"result":{}}');
  });

  it('drops garbage lines and keeps the valid ones', async () => {
    const { transport, child } = fakeTransport();
    await transport.connect();

    child.stdout.write('server starting...\n{"jsonrpc":"2.0","method":"x"}\n');
    expect((await transport.receive()).toString('utf8')).toBe('{"jsonrpc":"2.0","method":"x"}');
  });

  it('fails receives once the process exits', async () => {
    const { transport, child } = fakeTransport();
    await transport.connect();
    child.stderr.write('fatal: config missing\n');

    child.exit(3);
    await expect(transport.receive()).rejects.toBeInstanceOf(ConnectionError);
    expect(transport.isConnected()).toBe(false);
    expect(transport.getProcessInfo()).toMatchObject({ pid: 4242, exitCode: 3, connected: false });
    expect(transport.getStderr()).toBe('fatal: config missing\n');
  });

  it('terminates with SIGTERM and escalates to SIGKILL', async () => {
    const stubborn = new FakeChildProcess();
    stubborn.exitOnTerm = false;
    const { transport, child } = fakeTransport(stubborn);
    await transport.connect();

    await transport.disconnect();
    expect(child.signals).toEqual(['SIGTERM', 'SIGKILL']);
    await expect(transport.receive()).rejects.toBeInstanceOf(ConnectionError);
  });

  it('refuses to send when not connected', async () => {
    const { transport } = fakeTransport();
    await expect(transport.send(Buffer.from('{}'))).rejects.toThrow('Transport not connected');
  });
});

describe('ServerStdioTransport', () => {
  it('frames stdin and writes responses to stdout', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const transport = new ServerStdioTransport({ input, output, eofGraceMs: 5 });
    transports.push(transport);
    await transport.connect();

    input.write('{"jsonrpc":"2.0","id":1,');
    input.write('"method":"ping"}\n');
    expect((await transport.receive()).toString('utf8')).toBe('{"jsonrpc":"2.0","id":1,"method":"ping"}');

    await transport.send(Buffer.from('{"jsonrpc":"2.0","id":1,"result":{}}'));
    expect(output.read().toString('utf8')).toBe('{"jsonrpc":"2.0","id":1,"result":{}}\n');
  });

  it('writes overlapping sends as whole lines, one at a time', async () => {
    const written: string[] = [];
    const queuedBehind: number[] = [];
    const output: Writable = new Writable({
      highWaterMark: 16,
      write(chunk: Buffer, _encoding, callback) {
        written.push(chunk.toString('utf8'));
        queuedBehind.push(output.writableLength - chunk.length);
        setTimeout(callback, 5);
      }
    });
    const transport = new ServerStdioTransport({ input: new PassThrough(), output, eofGraceMs: 5 });
    transports.push(transport);
    await transport.connect();

    const frames = [
      `{"jsonrpc":"2.0","method":"a","params":{"pad":"${'a'.repeat(4096)}"}}`,
      `{"jsonrpc":"2.0","method":"b","params":{"pad":"${'b'.repeat(4096)}"}}`,
      '{"jsonrpc":"2.0","method":"c"}'
    ];
    await Promise.all(frames.map((frame) => transport.send(Buffer.from(frame))));

    expect(written).toEqual(frames.map((frame) => `${frame}\n`));
    expect(queuedBehind).toEqual([0, 0, 0]);
  });

  it('reports the end of input after the grace period', async () => {
    const input = new PassThrough();
    const transport = new ServerStdioTransport({ input, output: new PassThrough(), eofGraceMs: 5 });
    transports.push(transport);
    await transport.connect();

    input.end('{"jsonrpc":"2.0","method":"last"}\n');
    expect((await transport.receive()).toString('utf8')).toBe('{"jsonrpc":"2.0","method":"last"}');
    await expect(transport.receive()).rejects.toThrow('Input stream closed');
  });
});

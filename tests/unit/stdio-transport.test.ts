import { describe, it, expect } from 'vitest';
import { StdioTransport } from '../../src/transport/stdio-transport.js';
import { ConnectionLostError, ProtocolViolationError, ReadTimeoutError } from '../../src/protocol/errors.js';
import { createLogger } from '../../src/utils/logger.js';
import { FakeChild, fakeSpawn, tick, type SpawnCall } from '../helpers/fake-child.js';

function startTransport(child: FakeChild, extra: { terminateGraceMs?: number; sink?: (line: string) => void } = {}) {
  const calls: SpawnCall[] = [];
  const transport = new StdioTransport({
    command: 'fake-server',
    args: ['--stdio'],
    spawn: fakeSpawn(child, calls),
    terminateGraceMs: extra.terminateGraceMs ?? 50,
    logger: createLogger('transport', { level: 'debug', sink: extra.sink ?? (() => {}) }),
  });
  return { transport, calls };
}

describe('StdioTransport', () => {
  it('should spawn the command with its arguments', async () => {
    const child = new FakeChild();
    const { transport, calls } = startTransport(child);

    await transport.start();

    expect(calls).toEqual([{ command: 'fake-server', args: ['--stdio'] }]);
    expect(transport.running).toBe(true);
    expect(transport.pid).toBe(4242);
    await transport.terminate();
  });

  it('should reject start when the launch fails', async () => {
    const child = new FakeChild();
    const transport = new StdioTransport({
      command: 'missing-binary',
      spawn: fakeSpawn(child, [], new Error('spawn missing-binary ENOENT')),
    });

    await expect(transport.start()).rejects.toThrow('Failed to launch missing-binary: spawn missing-binary ENOENT');
    expect(transport.running).toBe(false);
    await expect(transport.receiveLine()).rejects.toBeInstanceOf(ConnectionLostError);
  });

  it('should write one newline-terminated line per send', async () => {
    const child = new FakeChild();
    const { transport } = startTransport(child);
    await transport.start();

    await transport.sendLine('{"a":1}');
    await transport.sendLine('{"b":2}');
    await tick();

    expect(child.stdinText()).toBe('{"a":1}\n{"b":2}\n');
    await transport.terminate();
  });

  it('should refuse a line with an embedded newline', async () => {
    const child = new FakeChild();
    const { transport } = startTransport(child);
    await transport.start();

    await expect(transport.sendLine('one\ntwo')).rejects.toBeInstanceOf(ProtocolViolationError);
    expect(child.stdinText()).toBe('');
    await transport.terminate();
  });

  it('should receive complete lines split across chunks', async () => {
    const child = new FakeChild();
    const { transport } = startTransport(child);
    await transport.start();

    child.stdout.write('{"x":');
    child.stdout.write('1}\n{"y":2}\n');

    expect(await transport.receiveLine(1000)).toBe('{"x":1}');
    expect(await transport.receiveLine(1000)).toBe('{"y":2}');
    await transport.terminate();
  });

  it('should time out a read without killing the process', async () => {
    const child = new FakeChild();
    const { transport } = startTransport(child);
    await transport.start();

    await expect(transport.receiveLine(20)).rejects.toBeInstanceOf(ReadTimeoutError);
    expect(transport.running).toBe(true);
    expect(child.signals).toEqual([]);
    await transport.terminate();
  });

  it('should drain buffered lines then report ConnectionLost after exit', async () => {
    const child = new FakeChild();
    const { transport } = startTransport(child);
    await transport.start();

    child.stdout.write('last words\n');
    child.exit(1);
    await tick(5);

    expect(transport.running).toBe(false);
    expect(await transport.receiveLine(1000)).toBe('last words');
    await expect(transport.receiveLine(1000)).rejects.toBeInstanceOf(ConnectionLostError);
    await expect(transport.sendLine('{}')).rejects.toBeInstanceOf(ConnectionLostError);
  });

  it('should stop reading after exit even if stdout is never closed', async () => {
    const child = new FakeChild();
    const { transport } = startTransport(child);
    await transport.start();

    child.emit('exit', 0, null);

    await expect(transport.receiveLine(1000)).rejects.toBeInstanceOf(ConnectionLostError);
    expect(transport.running).toBe(false);
  });

  it('should notify exit listeners', async () => {
    const child = new FakeChild();
    const { transport } = startTransport(child);
    await transport.start();

    const exits: Array<{ code: number | null; signal: string | null }> = [];
    transport.onExit(info => exits.push(info));
    child.exit(3);

    expect(exits).toEqual([{ code: 3, signal: null }]);
  });

  it('should stop gracefully with SIGTERM', async () => {
    const child = new FakeChild();
    const { transport } = startTransport(child);
    await transport.start();

    await transport.terminate();

    expect(child.signals).toEqual(['SIGTERM']);
    expect(child.stdin.writableEnded).toBe(true);
    expect(transport.running).toBe(false);
  });

  it('should escalate to SIGKILL when SIGTERM is ignored', async () => {
    const child = new FakeChild();
    child.ignoreSigterm = true;
    const lines: string[] = [];
    const { transport } = startTransport(child, { terminateGraceMs: 20, sink: line => lines.push(line) });
    await transport.start();

    await transport.terminate();

    expect(child.signals).toEqual(['SIGTERM', 'SIGKILL']);
    expect(transport.running).toBe(false);
    expect(lines.some(l => l.includes('fake-server ignored SIGTERM for 20ms, sending SIGKILL'))).toBe(true);
  });

  it('should be idempotent once the process is gone', async () => {
    const child = new FakeChild();
    const { transport } = startTransport(child);
    await transport.start();

    await transport.terminate();
    await transport.terminate();

    expect(child.signals).toEqual(['SIGTERM']);
  });

  it('should forward stderr lines to the logger at debug', async () => {
    const child = new FakeChild();
    const lines: string[] = [];
    const { transport } = startTransport(child, { sink: line => lines.push(line) });
    await transport.start();

    child.stderr.write('warming up\n');
    await tick(5);

    expect(lines.some(l => l.includes('[DEBUG] [transport] [stderr] warming up'))).toBe(true);
    await transport.terminate();
  });
});

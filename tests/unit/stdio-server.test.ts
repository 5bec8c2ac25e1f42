import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { McpServer } from '../../src/server/server.js';
import { registerBuiltinTools } from '../../src/server/builtin-tools.js';
import { runStdioServer } from '../../src/server/stdio-server.js';

/** Feed `lines` to a fresh server and collect every line it writes. */
async function converse(lines: string[], opts: { endInput?: boolean } = {}): Promise<{ out: string[]; server: McpServer }> {
  const server = new McpServer({ name: 'stdio-test', version: '0.0.1' });
  registerBuiltinTools(server);

  const input = new PassThrough();
  const output = new PassThrough();
  const chunks: string[] = [];
  output.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf-8')));

  const done = runStdioServer(server, { input, output });
  for (const line of lines) input.write(line + '\n');
  if (opts.endInput ?? true) input.end();
  await done;
  await new Promise(resolve => setImmediate(resolve));

  const out = chunks.join('').split('\n').filter(l => l.length > 0);
  return { out, server };
}

describe('runStdioServer', () => {
  it('should answer each request with exactly one line', async () => {
    const { out } = await converse([
      '{"jsonrpc":"2.0","id":1,"method":"initialize","params":{}}',
      '{"jsonrpc":"2.0","method":"notifications/initialized"}',
      '{"jsonrpc":"2.0","id":2,"method":"tools/call","params":{"name":"echo","arguments":{"text":"hi"}}}',
    ]);

    expect(out).toHaveLength(2);
    expect(JSON.parse(out[0])).toMatchObject({ id: 1, result: { serverInfo: { name: 'stdio-test' } } });
    expect(JSON.parse(out[1])).toEqual({
      jsonrpc: '2.0', id: 2, result: { content: [{ type: 'text', text: 'hi' }] },
    });
  });

  it('should answer an undecodable line with a parse error and null id', async () => {
    const { out } = await converse(['{oops']);

    expect(out).toHaveLength(1);
    const reply = JSON.parse(out[0]);
    expect(reply.id).toBeNull();
    expect(reply.error.code).toBe(-32700);
  });

  it('should ignore blank lines', async () => {
    const { out } = await converse(['', '   ', '{"jsonrpc":"2.0","id":1,"method":"ping"}']);
    expect(out).toEqual(['{"jsonrpc":"2.0","id":1,"result":{}}']);
  });

  it('should return after shutdown without waiting for end of input', async () => {
    const { out, server } = await converse([
      '{"jsonrpc":"2.0","id":1,"method":"initialize","params":{}}',
      '{"jsonrpc":"2.0","id":2,"method":"shutdown"}',
    ], { endInput: false });

    expect(server.isShutDown()).toBe(true);
    expect(out[1]).toBe('{"jsonrpc":"2.0","id":2,"result":{}}');
  });
});

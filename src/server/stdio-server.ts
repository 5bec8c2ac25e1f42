/**
 * MCP Stdio Server — JSONL over stdin/stdout.
 */

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { decodeMessage, encodeMessage } from '../protocol/codec.js';
import { toWireError } from '../protocol/errors.js';
import type { JsonRpcErrorResponse, JsonRpcResponse } from '../protocol/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { McpServer } from './server.js';

export interface StdioServerOptions {
  input?: Readable;
  output?: Writable;
  logger?: Logger;
}

/**
 * Serve `server` until `shutdown` has been answered or the input ends.
 * Each request gets exactly one response line; undecodable lines get a
 * parse error with `id: null`; blank lines are ignored.
 */
export async function runStdioServer(server: McpServer, opts: StdioServerOptions = {}): Promise<void> {
  const input = opts.input ?? process.stdin;
  const output = opts.output ?? process.stdout;
  const logger = opts.logger ?? silentLogger;

  const rl = createInterface({ input, crlfDelay: Infinity });

  try {
    for await (const line of rl) {
      if (!line.trim()) continue;

      let response: JsonRpcResponse | null;
      try {
        response = await server.handleMessage(decodeMessage(line));
      } catch (error) {
        logger.warn(`Undecodable line: ${toWireError(error).message}`);
        const parseError: JsonRpcErrorResponse = { jsonrpc: '2.0', id: null, error: toWireError(error) };
        response = parseError;
      }

      if (response) {
        output.write(encodeMessage(response));
      }
      if (server.isShutDown()) {
        logger.info('Shutdown answered; leaving stdio loop');
        break;
      }
    }
  } finally {
    rl.close();
  }
}

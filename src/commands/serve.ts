/**
 * serve — run an MCP server on stdin/stdout.
 *
 * stdout carries protocol frames only; every log line goes to stderr.
 */

import { createServer } from '../bootstrap.js';
import { loadConfig } from '../config/config.js';
import { runStdioServer } from '../server/stdio-server.js';

export interface ServeOptions {
  root?: string[];
  logLevel?: string;
}

export async function runServe(opts: ServeOptions = {}): Promise<void> {
  const config = await loadConfig(opts.logLevel ? { logging: { level: opts.logLevel } } : undefined);
  const { server, logger } = await createServer(config, { roots: opts.root });

  logger.info(`MCP server started with ${server.getToolCount()} tools: ${server.getToolNames().join(', ')}`);

  await runStdioServer(server, { logger: logger.child('stdio') });

  logger.info('MCP server stopped');
}

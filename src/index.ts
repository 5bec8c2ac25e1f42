#!/usr/bin/env node
/**
 * mcp-stdio — JSON-RPC protocol engine over child-process stdio.
 *
 * Entry point: commander-based CLI with subcommands.
 */

import { createRequire } from 'node:module';
import { Command, Option } from 'commander';
import { runCall, type CallOptions } from './commands/call.js';
import { runServe, type ServeOptions } from './commands/serve.js';

const require = createRequire(import.meta.url);
const { version } = require('../package.json');

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'];

const program = new Command();

program
  .name('mcp-stdio')
  .description('Serve or drive MCP servers over newline-delimited JSON-RPC on stdio')
  .version(version);

program
  .command('serve')
  .description('Run an MCP server on stdin/stdout')
  .option('-r, --root <dir...>', 'Expose files under these directories as resources')
  .addOption(new Option('--log-level <level>', 'Log level (stderr)').choices(LOG_LEVELS))
  .action(async (opts: ServeOptions) => {
    await runServe(opts);
  });

program
  .command('call <command> [args...]')
  .description('Launch an allow-listed MCP server, perform one operation, print the JSON result')
  .addOption(new Option('-l, --list <kind>', 'List a collection').choices(['resources', 'tools', 'prompts']))
  .option('-a, --all', 'With --list, follow nextCursor through every page')
  .option('-c, --cursor <cursor>', 'With --list, start from this cursor')
  .option('--read <uri>', 'Read a resource')
  .option('-t, --tool <name>', 'Call a tool')
  .option('-p, --prompt <name>', 'Get a prompt')
  .option('--args <json>', 'Arguments for --tool or --prompt, as a JSON object')
  .addOption(new Option('--log-level <level>', 'Log level (stderr)').choices(LOG_LEVELS))
  .action(async (command: string, args: string[], opts: CallOptions) => {
    await runCall(command, args, opts);
  });

program.parseAsync().catch((err) => {
  console.error('Fatal:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});

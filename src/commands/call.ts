/**
 * call — launch an MCP server as a child process, run one operation, print
 * the JSON result, shut the server down.
 */

import { z } from 'zod';
import { applySecurity } from '../bootstrap.js';
import { fetchAll } from '../client/pages.js';
import { loadConfig } from '../config/config.js';
import { InvalidParamsError } from '../protocol/errors.js';
import type { ListKind } from '../protocol/types.js';
import { Session } from '../session/session.js';
import { createLogger } from '../utils/logger.js';

export interface CallOptions {
  list?: string;
  all?: boolean;
  cursor?: string;
  read?: string;
  tool?: string;
  prompt?: string;
  args?: string;
  logLevel?: string;
}

const ListKindSchema = z.enum(['resources', 'tools', 'prompts']);
const ToolArgsSchema = z.record(z.unknown());
const PromptArgsSchema = z.record(z.string());

type CallSession = Pick<
  Session,
  'listPage' | 'readResource' | 'callTool' | 'getPrompt' | 'serverInfo'
>;

export async function runCall(command: string, commandArgs: string[], opts: CallOptions): Promise<void> {
  const config = await loadConfig(opts.logLevel ? { logging: { level: opts.logLevel } } : undefined);
  applySecurity(config);

  const logger = createLogger('call', { level: config.logging.level });
  const session = await Session.launch({
    command,
    args: commandArgs,
    logger,
    requestTimeoutMs: config.transport.readTimeoutMs,
    terminateGraceMs: config.transport.terminateGraceMs,
    startupTimeoutMs: config.transport.startupTimeoutMs,
  });

  try {
    await session.initialize();
    const result = await performOperation(session, opts);
    console.log(JSON.stringify(result, null, 2));
  } finally {
    await session.shutdown();
  }
}

/**
 * Run the single operation selected by `opts` against an initialized session.
 * With no operation selected, returns the server's identity.
 */
export async function performOperation(session: CallSession, opts: CallOptions): Promise<unknown> {
  if (opts.list !== undefined) {
    const kind = parseListKind(opts.list);
    if (opts.all) {
      return { [kind]: await fetchAll(session, kind) };
    }
    const page = await session.listPage(kind, opts.cursor);
    return { [kind]: page.items, ...(page.nextCursor ? { nextCursor: page.nextCursor } : {}) };
  }

  if (opts.read !== undefined) {
    return session.readResource(opts.read);
  }

  if (opts.tool !== undefined) {
    return session.callTool(opts.tool, parseArgs(opts.args, ToolArgsSchema));
  }

  if (opts.prompt !== undefined) {
    return session.getPrompt(opts.prompt, parseArgs(opts.args, PromptArgsSchema));
  }

  return { serverInfo: session.serverInfo };
}

function parseListKind(value: string): ListKind {
  const parsed = ListKindSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidParamsError(`Unknown list kind "${value}" (expected resources, tools or prompts)`);
  }
  return parsed.data;
}

function parseArgs<T>(json: string | undefined, schema: z.ZodType<T>): T {
  let raw: unknown = {};
  if (json !== undefined) {
    try {
      raw = JSON.parse(json);
    } catch (error) {
      throw new InvalidParamsError(`--args is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidParamsError(`--args rejected: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

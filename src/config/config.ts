import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parseCommandList } from '../security/allowlist.js';
import { isLogLevel } from '../utils/logger.js';
import { McpStdioConfigSchema, type McpStdioConfig } from './schema.js';

export const WORKSPACE_CONFIG_FILE = 'mcp-stdio.json';

export interface LoadConfigOptions {
  /** Directory searched for mcp-stdio.json. Defaults to the working directory. */
  cwd?: string;
  /** Home directory for ~/.mcp-stdio/config.json. */
  home?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load config with priority: overrides > env vars > workspace json > user json > defaults
 */
export async function loadConfig(
  overrides?: Record<string, unknown>,
  opts: LoadConfigOptions = {},
): Promise<McpStdioConfig> {
  const env = opts.env ?? process.env;

  // 1. Workspace config
  const workspaceConfig = await loadJSON(resolve(opts.cwd ?? '.', WORKSPACE_CONFIG_FILE));

  // 2. User config
  const home = opts.home ?? env.HOME ?? env.USERPROFILE ?? '';
  const userConfig = home ? await loadJSON(resolve(home, '.mcp-stdio', 'config.json')) : {};

  // 3. Env vars
  const envConfig = loadEnvVars(env);

  // 4. Merge: defaults < user < workspace < env < overrides
  const merged = deepMerge(userConfig, workspaceConfig, envConfig, overrides ?? {});

  return McpStdioConfigSchema.parse(merged);
}

export function loadEnvVars(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  if (env.MCP_ALLOWED_COMMANDS !== undefined) {
    result.security = { allowedCommands: parseCommandList(env.MCP_ALLOWED_COMMANDS) };
  }

  if (env.MCP_LOG_LEVEL) {
    if (!isLogLevel(env.MCP_LOG_LEVEL)) {
      throw new Error(`MCP_LOG_LEVEL must be one of debug, info, warn, error, silent; got "${env.MCP_LOG_LEVEL}"`);
    }
    result.logging = { level: env.MCP_LOG_LEVEL };
  }

  if (env.MCP_READ_TIMEOUT_MS) {
    const ms = Number(env.MCP_READ_TIMEOUT_MS);
    if (!Number.isInteger(ms) || ms <= 0) {
      throw new Error(`MCP_READ_TIMEOUT_MS must be a positive integer, got "${env.MCP_READ_TIMEOUT_MS}"`);
    }
    result.transport = { readTimeoutMs: ms };
  }

  return result;
}

/** A missing file is an empty config; unreadable or malformed JSON is an error. */
async function loadJSON(path: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') return {};
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(`Invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

function deepMerge(...objects: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const obj of objects) {
    for (const [key, value] of Object.entries(obj)) {
      const current = result[key];
      if (isPlainObject(value) && isPlainObject(current)) {
        result[key] = deepMerge(current, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

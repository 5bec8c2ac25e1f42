/**
 * Test fixtures — temp dirs and a populated server config.
 */

import { mkdtempSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { McpStdioConfigSchema, type McpStdioConfig } from '../../src/config/schema.js';

export function createTestConfig(overrides?: Partial<Record<string, unknown>>): McpStdioConfig {
  return McpStdioConfigSchema.parse({
    server: { name: 'fixture-server', version: '1.2.3' },
    logging: { level: 'silent' },
    ...overrides,
  });
}

export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'mcp-stdio-test-'));
}

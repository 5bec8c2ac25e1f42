/**
 * Shared bootstrap — builds an McpServer from config.
 * Used by the `serve` command and by tests that want a fully populated server.
 */

import type { McpStdioConfig, PromptTemplateConfig } from './config/schema.js';
import { commandAllowlist, type CommandAllowlist } from './security/allowlist.js';
import { registerBuiltinTools } from './server/builtin-tools.js';
import { scanDirectory, textResource } from './server/resources.js';
import { McpServer } from './server/server.js';
import { templatePlaceholders, type PromptTemplate } from './server/templates.js';
import { createLogger, type Logger, type LogSink } from './utils/logger.js';

export interface ServerApp {
  config: McpStdioConfig;
  server: McpServer;
  logger: Logger;
}

export async function createServer(
  config: McpStdioConfig,
  opts: { roots?: string[]; sink?: LogSink } = {},
): Promise<ServerApp> {
  const logger = createLogger('server', { level: config.logging.level, sink: opts.sink });

  // 1. Server
  const server = new McpServer(
    {
      name: config.server.name,
      version: config.server.version,
      pageSizes: {
        resources: config.pagination.resourcesPageSize,
        tools: config.pagination.toolsPageSize,
        prompts: config.pagination.promptsPageSize,
      },
    },
    logger,
  );

  // 2. Resources: static entries first, then files under each root
  for (const entry of config.resources.static) {
    server.registerResource(textResource(entry.uri, entry.name, entry.text, {
      description: entry.description,
      mimeType: entry.mimeType,
    }));
  }

  const roots = [...config.resources.roots, ...(opts.roots ?? [])];
  for (const root of roots) {
    const providers = await scanDirectory(root, {
      maxFileSize: config.resources.maxFileSize,
      logger: logger.child('resources'),
    });
    for (const provider of providers) server.registerResource(provider);
  }

  // 3. Tools
  registerBuiltinTools(server);

  // 4. Prompts
  for (const tpl of config.prompts.templates) {
    server.registerPromptTemplate(toPromptTemplate(tpl));
  }

  logger.info(
    `Ready: ${server.getResourceCount()} resources, ${server.getToolCount()} tools, ${server.getPromptCount()} prompts`,
  );

  return { config, server, logger };
}

export function toPromptTemplate(tpl: PromptTemplateConfig): PromptTemplate {
  const args = tpl.arguments
    ?? templatePlaceholders(tpl.template).map(name => ({ name, required: true }));
  return {
    name: tpl.name,
    ...(tpl.description !== undefined ? { description: tpl.description } : {}),
    arguments: args,
    template: tpl.template,
  };
}

/** Lock the allowlist from config, if configured. Later calls are refused by the allowlist itself. */
export function applySecurity(config: McpStdioConfig, allowlist: CommandAllowlist = commandAllowlist): void {
  if (config.security.allowedCommands !== undefined) {
    allowlist.set(config.security.allowedCommands);
  }
}

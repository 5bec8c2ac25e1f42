/**
 * Library entry — everything a host needs to serve or drive MCP over stdio.
 */

export * from './protocol/types.js';
export * from './protocol/errors.js';
export { decodeMessage, encodeMessage, serializeMessage } from './protocol/codec.js';
export * from './protocol/schemas.js';
export { CURSOR_VERSION, MAX_CURSOR_LENGTH, decodeCursor, encodeCursor, type CursorState } from './pagination/cursor.js';
export { MAX_PAGE_SIZE, paginate, type Page } from './pagination/paginate.js';
export type { ChildHandle, ExitInfo, SpawnProcess, StdioTransportOptions, Transport } from './transport/types.js';
export { StdioTransport } from './transport/stdio-transport.js';
export { LineQueue } from './transport/line-queue.js';
export * from './session/session.js';
export { fetchAll, iteratePages } from './client/pages.js';
export { Dispatcher, type MethodHandler, type RequestContext } from './server/dispatcher.js';
export * from './server/server.js';
export { runStdioServer, type StdioServerOptions } from './server/stdio-server.js';
export { fileResource, mimeTypeFor, scanDirectory, textResource, type ResourceProvider } from './server/resources.js';
export { renderTemplate, templatePlaceholders, type PromptTemplate } from './server/templates.js';
export { registerBuiltinTools } from './server/builtin-tools.js';
export { CommandAllowlist, commandAllowlist, parseCommandList } from './security/allowlist.js';
export { loadConfig, type LoadConfigOptions } from './config/config.js';
export { McpStdioConfigSchema, type McpStdioConfig } from './config/schema.js';
export { createServer, applySecurity } from './bootstrap.js';
export { createLogger, silentLogger, type Logger, type LogLevel, type LogSink } from './utils/logger.js';

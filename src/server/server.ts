/**
 * MCP Server — resources, tools and prompts behind a JSON-RPC dispatcher.
 */

import {
  CallToolParamsSchema,
  EmptyParamsSchema,
  GetPromptParamsSchema,
  InitializeParamsSchema,
  ListParamsSchema,
  ReadResourceParamsSchema,
  type InitializeParams,
} from '../protocol/schemas.js';
import type {
  Capabilities,
  GetPromptResult,
  InitializeResult,
  JsonRpcMessage,
  JsonRpcResponse,
  ListKind,
  Prompt,
  PromptArgument,
  PromptMessage,
  ReadResourceResult,
  ServerInfo,
  TextContent,
  Tool,
  ToolCallResult,
  ToolInputSchema,
} from '../protocol/types.js';
import {
  JSON_RPC_ERRORS,
  MCP_METHODS,
  MCP_PROTOCOL_VERSION,
  isNotification,
  isRequest,
} from '../protocol/types.js';
import { MethodNotFoundError, NotFoundError, ProtocolViolationError, toWireError } from '../protocol/errors.js';
import { paginate } from '../pagination/paginate.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { Dispatcher } from './dispatcher.js';
import type { ResourceProvider } from './resources.js';
import { renderTemplate, type PromptTemplate } from './templates.js';

export type ToolHandler = (args: Record<string, unknown>) => Promise<ToolCallResult>;
export type PromptHandler = (args: Record<string, string>) => Promise<PromptMessage[]>;

export interface McpServerConfig {
  name: string;
  version: string;
  capabilities?: Capabilities;
  /** Default page size per list; MAX_PAGE_SIZE still applies. */
  pageSizes?: Partial<Record<ListKind, number>>;
}

export const DEFAULT_SERVER_CONFIG: Required<Pick<McpServerConfig, 'name' | 'version' | 'capabilities'>> & {
  pageSizes: Record<ListKind, number>;
} = {
  name: 'mcp-stdio-engine',
  version: '0.1.0',
  capabilities: {
    resources: { listChanged: false },
    tools: { listChanged: true },
    prompts: { listChanged: true },
  },
  pageSizes: { resources: 25, tools: 20, prompts: 30 },
};

export type ServerPhase = 'awaiting_initialize' | 'ready' | 'shut_down';

interface RegisteredTool {
  definition: Tool;
  handler: ToolHandler;
}

interface RegisteredPrompt {
  definition: Prompt;
  handler: PromptHandler;
}

/** Methods answered even before `initialize`. */
const PRE_INIT_METHODS = new Set<string>([MCP_METHODS.INITIALIZE, MCP_METHODS.PING]);

export class McpServer {
  private readonly info: ServerInfo;
  private readonly capabilities: Capabilities;
  private readonly pageSizes: Record<ListKind, number>;
  private readonly logger: Logger;
  private readonly dispatcher = new Dispatcher();
  private readonly resources: Map<string, ResourceProvider> = new Map();
  private readonly tools: Map<string, RegisteredTool> = new Map();
  private readonly prompts: Map<string, RegisteredPrompt> = new Map();
  private phase: ServerPhase = 'awaiting_initialize';
  private initializedNotified = false;
  private client: InitializeParams['clientInfo'];

  constructor(config: Partial<McpServerConfig> = {}, logger: Logger = silentLogger) {
    this.info = {
      name: config.name ?? DEFAULT_SERVER_CONFIG.name,
      version: config.version ?? DEFAULT_SERVER_CONFIG.version,
    };
    this.capabilities = {
      ...DEFAULT_SERVER_CONFIG.capabilities,
      ...config.capabilities,
    };
    this.pageSizes = { ...DEFAULT_SERVER_CONFIG.pageSizes, ...config.pageSizes };
    this.logger = logger;
    this.registerMethods();
  }

  // ── Registration ──────────────────────────────────────────────────────

  registerResource(provider: ResourceProvider): void {
    this.resources.set(provider.resource.uri, provider);
  }

  registerTool(
    name: string,
    description: string,
    inputSchema: ToolInputSchema,
    handler: ToolHandler,
  ): void {
    this.tools.set(name, {
      definition: { name, description, inputSchema },
      handler,
    });
  }

  registerPrompt(
    name: string,
    description: string,
    args: PromptArgument[],
    handler: PromptHandler,
  ): void {
    this.prompts.set(name, {
      definition: { name, description, arguments: args },
      handler,
    });
  }

  /** Register a `{placeholder}` template as a single-message user prompt. */
  registerPromptTemplate(tpl: PromptTemplate): void {
    this.registerPrompt(tpl.name, tpl.description ?? '', tpl.arguments, async (args) => [
      textMessage('user', renderTemplate(tpl, args)),
    ]);
  }

  // ── Message handling ──────────────────────────────────────────────────

  /**
   * Handle one decoded message. Requests always produce a response;
   * notifications and stray responses produce null.
   */
  async handleMessage(message: JsonRpcMessage): Promise<JsonRpcResponse | null> {
    if (isRequest(message)) {
      try {
        this.checkPhase(message.method);
        const result = await this.dispatcher.dispatch(message.method, message.params, {
          method: message.method,
          id: message.id,
        });
        return { jsonrpc: '2.0', id: message.id, result: result ?? {} };
      } catch (error) {
        const wire = toWireError(error);
        if (wire.code === JSON_RPC_ERRORS.INTERNAL_ERROR) {
          this.logger.error(`${message.method} failed: ${wire.message}`);
        } else {
          this.logger.debug(`${message.method} rejected: ${wire.message}`);
        }
        return { jsonrpc: '2.0', id: message.id, error: wire };
      }
    }

    if (isNotification(message)) {
      if (!this.dispatcher.has(message.method)) {
        this.logger.debug(`Ignoring notification ${message.method}`);
        return null;
      }
      try {
        await this.dispatcher.dispatch(message.method, message.params, { method: message.method });
      } catch (error) {
        this.logger.warn(`Notification ${message.method} failed: ${toWireError(error).message}`);
      }
      return null;
    }

    this.logger.warn(`Unexpected response from client (id ${String(message.id)}); dropped`);
    return null;
  }

  private checkPhase(method: string): void {
    if (!this.dispatcher.has(method)) {
      throw new MethodNotFoundError(method);
    }
    if (this.phase === 'shut_down') {
      throw new ProtocolViolationError(`Server is shut down; ${method} refused`);
    }
    if (this.phase === 'awaiting_initialize' && !PRE_INIT_METHODS.has(method)) {
      throw new ProtocolViolationError(`Server not initialized; ${method} refused`);
    }
    if (this.phase === 'ready' && method === MCP_METHODS.INITIALIZE) {
      throw new ProtocolViolationError('Server already initialized');
    }
  }

  private registerMethods(): void {
    const d = this.dispatcher;

    d.register(MCP_METHODS.INITIALIZE, InitializeParamsSchema, (params) => this.handleInitialize(params));

    d.register(MCP_METHODS.INITIALIZED, EmptyParamsSchema, () => {
      this.initializedNotified = true;
      return {};
    });

    d.register(MCP_METHODS.PING, EmptyParamsSchema, () => ({}));

    d.register(MCP_METHODS.RESOURCES_LIST, ListParamsSchema, ({ cursor }) => {
      const page = paginate(
        Array.from(this.resources.values(), p => p.resource),
        cursor,
        this.pageSizes.resources,
      );
      return { resources: page.items, ...(page.nextCursor ? { nextCursor: page.nextCursor } : {}) };
    });

    d.register(MCP_METHODS.RESOURCES_READ, ReadResourceParamsSchema, async ({ uri }): Promise<ReadResourceResult> => {
      if (!uri) throw new NotFoundError('resource', undefined);
      const provider = this.resources.get(uri);
      if (!provider) throw new NotFoundError('resource', uri);
      return { contents: [await provider.read()] };
    });

    d.register(MCP_METHODS.TOOLS_LIST, ListParamsSchema, ({ cursor }) => {
      const page = paginate(
        Array.from(this.tools.values(), t => t.definition),
        cursor,
        this.pageSizes.tools,
      );
      return { tools: page.items, ...(page.nextCursor ? { nextCursor: page.nextCursor } : {}) };
    });

    d.register(MCP_METHODS.TOOLS_CALL, CallToolParamsSchema, (params) => this.handleToolCall(params));

    d.register(MCP_METHODS.PROMPTS_LIST, ListParamsSchema, ({ cursor }) => {
      const page = paginate(
        Array.from(this.prompts.values(), p => p.definition),
        cursor,
        this.pageSizes.prompts,
      );
      return { prompts: page.items, ...(page.nextCursor ? { nextCursor: page.nextCursor } : {}) };
    });

    d.register(MCP_METHODS.PROMPTS_GET, GetPromptParamsSchema, async ({ name, arguments: args }): Promise<GetPromptResult> => {
      if (!name) throw new NotFoundError('prompt', undefined);
      const prompt = this.prompts.get(name);
      if (!prompt) throw new NotFoundError('prompt', name);

      const messages = await prompt.handler(args ?? {});
      return { description: prompt.definition.description, messages };
    });

    d.register(MCP_METHODS.SHUTDOWN, EmptyParamsSchema, () => {
      this.phase = 'shut_down';
      this.logger.info('Shutdown requested');
      return {};
    });
  }

  private handleInitialize(params: InitializeParams): InitializeResult {
    this.phase = 'ready';
    this.client = params.clientInfo;
    if (params.clientInfo) {
      this.logger.info(`Initialized by ${params.clientInfo.name} ${params.clientInfo.version}`);
    }
    if (params.protocolVersion && params.protocolVersion !== MCP_PROTOCOL_VERSION) {
      this.logger.warn(`Client asked for protocol ${params.protocolVersion}; answering ${MCP_PROTOCOL_VERSION}`);
    }
    return {
      protocolVersion: MCP_PROTOCOL_VERSION,
      capabilities: this.capabilities,
      serverInfo: this.info,
    };
  }

  private async handleToolCall(params: {
    name?: string;
    arguments?: Record<string, unknown>;
  }): Promise<ToolCallResult> {
    if (!params.name) throw new NotFoundError('tool', undefined);
    const tool = this.tools.get(params.name);
    if (!tool) throw new NotFoundError('tool', params.name);

    try {
      return await tool.handler(params.arguments ?? {});
    } catch (error) {
      return errorResult(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  // ── Introspection ─────────────────────────────────────────────────────

  getServerInfo(): ServerInfo {
    return { ...this.info };
  }

  getPhase(): ServerPhase {
    return this.phase;
  }

  isInitialized(): boolean {
    return this.initializedNotified;
  }

  isShutDown(): boolean {
    return this.phase === 'shut_down';
  }

  getClientInfo(): InitializeParams['clientInfo'] {
    return this.client;
  }

  getResourceCount(): number {
    return this.resources.size;
  }

  getToolCount(): number {
    return this.tools.size;
  }

  getPromptCount(): number {
    return this.prompts.size;
  }

  getToolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  getPromptNames(): string[] {
    return Array.from(this.prompts.keys());
  }
}

export function textResult(text: string): ToolCallResult {
  return { content: [{ type: 'text', text }] };
}

export function errorResult(message: string): ToolCallResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

export function textMessage(role: 'user' | 'assistant', text: string): PromptMessage {
  const content: TextContent = { type: 'text', text };
  return { role, content };
}

/**
 * Client session — drives one MCP server over a Transport.
 *
 * State machine:
 *   uninitialized → initialized → shutting_down → terminated
 * with any state dropping to terminated when the process exits or its output ends.
 *
 * A single reader loop consumes every line and settles pending requests by id,
 * so requests may be pipelined and answered out of order.
 */

import type { z } from 'zod';
import { decodeMessage, serializeMessage } from '../protocol/codec.js';
import {
  ConnectionLostError,
  MethodNotFoundError,
  ParseError,
  ProtocolError,
  ProtocolViolationError,
  ReadTimeoutError,
  errorFromWire,
  toWireError,
} from '../protocol/errors.js';
import {
  GetPromptResultSchema,
  InitializeResultSchema,
  ListResultSchemas,
  ReadResourceResultSchema,
  ToolCallResultSchema,
  type GetPromptResultPayload,
  type InitializeResultPayload,
  type ListedItemMap,
  type ReadResourceResultPayload,
  type ToolCallResultPayload,
} from '../protocol/schemas.js';
import {
  MCP_METHODS,
  MCP_PROTOCOL_VERSION,
  isNotification,
  isRequest,
  type ClientInfo,
  type JsonRpcMessage,
  type JsonRpcNotification,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type ListKind,
  type RequestId,
  type ServerInfo,
} from '../protocol/types.js';
import { commandAllowlist, type CommandAllowlist } from '../security/allowlist.js';
import { StdioTransport } from '../transport/stdio-transport.js';
import type { ExitInfo, StdioTransportOptions, Transport } from '../transport/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export type SessionState = 'uninitialized' | 'initialized' | 'shutting_down' | 'terminated';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const DEFAULT_CLIENT_INFO: ClientInfo = { name: 'mcp-stdio-engine', version: '0.1.0' };

export interface SessionOptions {
  transport: Transport;
  logger?: Logger;
  /** Per-request deadline; a late answer is logged and dropped. */
  requestTimeoutMs?: number;
  /** Passed to `transport.terminate()`; the transport's own default when absent. */
  terminateGraceMs?: number;
  clientInfo?: ClientInfo;
}

export interface LaunchOptions extends StdioTransportOptions {
  logger?: Logger;
  requestTimeoutMs?: number;
  clientInfo?: ClientInfo;
  /** Defaults to the process-wide allowlist. */
  allowlist?: CommandAllowlist;
}

export interface RequestOptions {
  /** Caller-chosen id; must not collide with an outstanding request. */
  id?: RequestId;
  timeoutMs?: number;
}

export interface ListPage<T> {
  items: T[];
  nextCursor?: string;
}

type ListFetchers = {
  [K in ListKind]: (cursor?: string) => Promise<ListPage<ListedItemMap[K]>>;
};

export type NotificationListener = (notification: JsonRpcNotification) => void;

interface PendingRequest {
  method: string;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export class Session {
  private readonly transport: Transport;
  private readonly logger: Logger;
  private readonly requestTimeoutMs: number;
  private readonly terminateGraceMs?: number;
  private readonly clientInfo: ClientInfo;

  private currentState: SessionState = 'uninitialized';
  private nextId = 1;
  private initializing = false;
  private readonly pending = new Map<RequestId, PendingRequest>();
  private readonly notificationListeners = new Set<NotificationListener>();
  private reader: Promise<void> | null = null;
  private detachExit: (() => void) | null = null;
  private peer: ServerInfo | null = null;
  private exitInfo: ExitInfo | null = null;

  private readonly fetchers: ListFetchers = {
    resources: async (cursor) => {
      const { resources, nextCursor } = await this.listResources(cursor);
      return { items: resources, ...(nextCursor ? { nextCursor } : {}) };
    },
    tools: async (cursor) => {
      const { tools, nextCursor } = await this.listTools(cursor);
      return { items: tools, ...(nextCursor ? { nextCursor } : {}) };
    },
    prompts: async (cursor) => {
      const { prompts, nextCursor } = await this.listPrompts(cursor);
      return { items: prompts, ...(nextCursor ? { nextCursor } : {}) };
    },
  };

  constructor(opts: SessionOptions) {
    this.transport = opts.transport;
    this.logger = opts.logger ?? silentLogger;
    this.requestTimeoutMs = opts.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.terminateGraceMs = opts.terminateGraceMs;
    this.clientInfo = opts.clientInfo ?? DEFAULT_CLIENT_INFO;
  }

  /**
   * Check `command` against the allowlist, spawn it and return an open,
   * still uninitialized session.
   */
  static async launch(opts: LaunchOptions): Promise<Session> {
    const logger = opts.logger ?? silentLogger;
    (opts.allowlist ?? commandAllowlist).validate(opts.command, opts.args ?? []);

    const transport = new StdioTransport({ ...opts, logger: logger.child('transport') });
    const session = new Session({
      transport,
      logger,
      requestTimeoutMs: opts.requestTimeoutMs,
      terminateGraceMs: opts.terminateGraceMs,
      clientInfo: opts.clientInfo,
    });
    await session.open();
    return session;
  }

  /** Start the transport (unless already running) and the reader loop. */
  async open(): Promise<void> {
    if (this.reader) return;
    if (this.currentState === 'terminated') {
      throw new ConnectionLostError('Session terminated');
    }
    if (!this.transport.running) {
      await this.transport.start();
    }
    this.detachExit = this.transport.onExit((info) => {
      this.exitInfo = info;
      if (this.currentState !== 'shutting_down' && this.currentState !== 'terminated') {
        this.logger.warn(`Server exited unexpectedly (code ${info.code}, signal ${info.signal})`);
        this.enterTerminated(new ConnectionLostError(
          `Server exited (code ${info.code}, signal ${info.signal})`,
        ));
      }
    });
    this.reader = this.readLoop();
  }

  get state(): SessionState {
    return this.currentState;
  }

  get serverInfo(): ServerInfo | null {
    return this.peer;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get exit(): ExitInfo | null {
    return this.exitInfo;
  }

  onNotification(listener: NotificationListener): () => void {
    this.notificationListeners.add(listener);
    return () => {
      this.notificationListeners.delete(listener);
    };
  }

  // ── Requests ──────────────────────────────────────────────────────────

  /**
   * Send a request and wait for its correlated response.
   * Rejects with the mapped ProtocolError for an error response,
   * ReadTimeoutError past the deadline, ConnectionLostError when the peer goes away.
   */
  async request(method: string, params?: Record<string, unknown>, opts: RequestOptions = {}): Promise<unknown> {
    this.assertCanSend(method);
    if (!this.reader) throw new ProtocolViolationError('Session not opened');

    const id = opts.id ?? this.allocateId();
    if (this.pending.has(id)) {
      throw new ProtocolViolationError(`Request id ${id} is already outstanding`);
    }
    const timeoutMs = opts.timeoutMs ?? this.requestTimeoutMs;

    const message: JsonRpcRequest = params === undefined
      ? { jsonrpc: '2.0', id, method }
      : { jsonrpc: '2.0', id, method, params };

    const response = new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        this.logger.warn(`${method} (id ${id}) timed out after ${timeoutMs}ms`);
        reject(new ReadTimeoutError(timeoutMs, `response to ${method}`, id));
      }, timeoutMs);
      this.pending.set(id, { method, resolve, reject, timer });
    });

    try {
      await this.transport.sendLine(serializeMessage(message));
    } catch (error) {
      this.settle(id);
      throw error;
    }
    this.logger.debug(`→ ${method} (id ${id})`);
    return response;
  }

  async notify(method: string, params?: Record<string, unknown>): Promise<void> {
    if (this.currentState === 'terminated') throw new ConnectionLostError('Session terminated');
    if (this.currentState !== 'initialized') {
      throw new ProtocolViolationError(`Cannot send ${method} while ${this.currentState}`);
    }
    const message: JsonRpcNotification = params === undefined
      ? { jsonrpc: '2.0', method }
      : { jsonrpc: '2.0', method, params };
    await this.transport.sendLine(serializeMessage(message));
  }

  async initialize(): Promise<InitializeResultPayload> {
    if (this.initializing) throw new ProtocolViolationError('initialize already in flight');
    this.initializing = true;
    try {
      const raw = await this.request(MCP_METHODS.INITIALIZE, {
        protocolVersion: MCP_PROTOCOL_VERSION,
        capabilities: {},
        clientInfo: this.clientInfo,
      });
      const result = parseResult(InitializeResultSchema, raw, MCP_METHODS.INITIALIZE);
      if (this.currentState !== 'uninitialized') {
        throw new ConnectionLostError(`Session ${this.currentState} during initialize`);
      }
      this.peer = result.serverInfo;
      this.currentState = 'initialized';
      this.logger.info(`Initialized with ${result.serverInfo.name} ${result.serverInfo.version}`);
      await this.notify(MCP_METHODS.INITIALIZED);
      return result;
    } finally {
      this.initializing = false;
    }
  }

  async ping(): Promise<void> {
    await this.request(MCP_METHODS.PING);
  }

  async listResources(cursor?: string): Promise<{ resources: ListedItemMap['resources'][]; nextCursor?: string }> {
    const raw = await this.request(MCP_METHODS.RESOURCES_LIST, cursorParams(cursor));
    return parseResult(ListResultSchemas.resources, raw, MCP_METHODS.RESOURCES_LIST);
  }

  async readResource(uri: string): Promise<ReadResourceResultPayload> {
    const raw = await this.request(MCP_METHODS.RESOURCES_READ, { uri });
    return parseResult(ReadResourceResultSchema, raw, MCP_METHODS.RESOURCES_READ);
  }

  async listTools(cursor?: string): Promise<{ tools: ListedItemMap['tools'][]; nextCursor?: string }> {
    const raw = await this.request(MCP_METHODS.TOOLS_LIST, cursorParams(cursor));
    return parseResult(ListResultSchemas.tools, raw, MCP_METHODS.TOOLS_LIST);
  }

  async callTool(name: string, args: Record<string, unknown> = {}): Promise<ToolCallResultPayload> {
    const raw = await this.request(MCP_METHODS.TOOLS_CALL, { name, arguments: args });
    return parseResult(ToolCallResultSchema, raw, MCP_METHODS.TOOLS_CALL);
  }

  async listPrompts(cursor?: string): Promise<{ prompts: ListedItemMap['prompts'][]; nextCursor?: string }> {
    const raw = await this.request(MCP_METHODS.PROMPTS_LIST, cursorParams(cursor));
    return parseResult(ListResultSchemas.prompts, raw, MCP_METHODS.PROMPTS_LIST);
  }

  async getPrompt(name: string, args: Record<string, string> = {}): Promise<GetPromptResultPayload> {
    const raw = await this.request(MCP_METHODS.PROMPTS_GET, { name, arguments: args });
    return parseResult(GetPromptResultSchema, raw, MCP_METHODS.PROMPTS_GET);
  }

  /** One page of any list kind, items under a common key. */
  listPage<K extends ListKind>(kind: K, cursor?: string): Promise<ListPage<ListedItemMap[K]>> {
    return this.fetchers[kind](cursor);
  }

  // ── Teardown ──────────────────────────────────────────────────────────

  /**
   * Orderly stop: `shutdown` request (when initialized), then terminate the
   * process. New requests are refused from the moment `shutdown` is sent.
   * A failed or timed-out `shutdown` still terminates.
   */
  async shutdown(): Promise<void> {
    if (this.currentState === 'terminated') return;

    if (this.currentState === 'initialized') {
      const reply = this.request(MCP_METHODS.SHUTDOWN);
      this.currentState = 'shutting_down';
      try {
        await reply;
      } catch (error) {
        this.logger.warn(`shutdown request failed: ${toWireError(error).message}`);
      }
    }
    await this.terminate(new ConnectionLostError('Session shut down'));
  }

  /** Immediate stop without a `shutdown` request. */
  async close(): Promise<void> {
    if (this.currentState === 'terminated') return;
    await this.terminate(new ConnectionLostError('Session closed'));
  }

  private async terminate(reason: ConnectionLostError): Promise<void> {
    if (this.currentState !== 'terminated') {
      this.currentState = 'shutting_down';
    }
    await this.transport.terminate(this.terminateGraceMs);
    if (this.reader) await this.reader;
    this.enterTerminated(reason);
  }

  // ── Reader loop ───────────────────────────────────────────────────────

  private async readLoop(): Promise<void> {
    for (;;) {
      let line: string;
      try {
        line = await this.transport.receiveLine();
      } catch (error) {
        const lost = error instanceof ConnectionLostError
          ? error
          : new ConnectionLostError(`Read failed: ${toWireError(error).message}`);
        if (this.currentState !== 'shutting_down' && this.currentState !== 'terminated') {
          this.logger.warn(`Connection lost: ${lost.message}`);
        }
        this.enterTerminated(lost);
        return;
      }

      if (!line.trim()) continue;

      let message: JsonRpcMessage;
      try {
        message = decodeMessage(line);
      } catch (error) {
        this.logger.warn(`Dropping undecodable line from server: ${toWireError(error).message}`);
        continue;
      }
      this.route(message);
    }
  }

  private route(message: JsonRpcMessage): void {
    if (isRequest(message)) {
      this.answerServerRequest(message).catch((error: unknown) => {
        this.logger.debug(`Could not answer ${message.method}: ${toWireError(error).message}`);
      });
      return;
    }

    if (isNotification(message)) {
      for (const listener of this.notificationListeners) {
        try {
          listener(message);
        } catch (error) {
          this.logger.error(`Notification listener failed: ${toWireError(error).message}`);
        }
      }
      return;
    }

    this.resolveResponse(message);
  }

  private resolveResponse(response: JsonRpcResponse): void {
    if (response.id === null) {
      const detail = 'error' in response ? response.error.message : 'no detail';
      this.logger.warn(`Server reported an uncorrelated error: ${detail}`);
      return;
    }

    const entry = this.settle(response.id);
    if (!entry) {
      this.logger.warn(`Dropping response for unknown or expired id ${response.id}`);
      return;
    }

    this.logger.debug(`← ${entry.method} (id ${response.id})`);
    if ('error' in response) {
      entry.reject(errorFromWire(response.error));
    } else {
      entry.resolve(response.result);
    }
  }

  private async answerServerRequest(request: JsonRpcRequest): Promise<void> {
    const reply: JsonRpcResponse = request.method === MCP_METHODS.PING
      ? { jsonrpc: '2.0', id: request.id, result: {} }
      : { jsonrpc: '2.0', id: request.id, error: new MethodNotFoundError(request.method).toJSON() };
    await this.transport.sendLine(serializeMessage(reply));
  }

  // ── Internals ─────────────────────────────────────────────────────────

  private assertCanSend(method: string): void {
    switch (this.currentState) {
      case 'terminated':
        throw new ConnectionLostError(`Session terminated; ${method} not sent`);
      case 'shutting_down':
        throw new ProtocolViolationError(`Session shutting down; ${method} refused`);
      case 'uninitialized':
        if (method !== MCP_METHODS.INITIALIZE) {
          throw new ProtocolViolationError(`Session not initialized; call initialize() before ${method}`);
        }
        return;
      case 'initialized':
        if (method === MCP_METHODS.INITIALIZE) {
          throw new ProtocolViolationError('Session already initialized');
        }
        return;
    }
  }

  private allocateId(): number {
    let id = this.nextId++;
    while (this.pending.has(id)) id = this.nextId++;
    return id;
  }

  /** Remove and return a pending entry, clearing its timer. */
  private settle(id: RequestId): PendingRequest | undefined {
    const entry = this.pending.get(id);
    if (!entry) return undefined;
    clearTimeout(entry.timer);
    this.pending.delete(id);
    return entry;
  }

  private enterTerminated(reason: ProtocolError): void {
    if (this.currentState !== 'terminated') {
      this.currentState = 'terminated';
      this.logger.debug('Session terminated');
    }
    this.detachExit?.();
    this.detachExit = null;

    for (const id of Array.from(this.pending.keys())) {
      this.settle(id)?.reject(reason);
    }
  }
}

function cursorParams(cursor: string | undefined): Record<string, unknown> {
  return cursor ? { cursor } : {};
}

function parseResult<S extends z.ZodTypeAny>(schema: S, raw: unknown, method: string): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
    throw new ParseError(`Malformed ${method} result${where}: ${issue?.message ?? 'rejected'}`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

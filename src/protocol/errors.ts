import { JSON_RPC_ERRORS, type JsonRpcError, type RequestId } from './types.js';

/**
 * Base of every failure the engine surfaces. Carries the JSON-RPC error code
 * so a handler's throw can be turned into a wire error unchanged.
 */
export class ProtocolError extends Error {
  readonly code: number;
  readonly data?: unknown;

  constructor(code: number, message: string, data?: unknown) {
    super(message);
    this.name = 'ProtocolError';
    this.code = code;
    if (data !== undefined) this.data = data;
  }

  toJSON(): JsonRpcError {
    return {
      code: this.code,
      message: this.message,
      ...(this.data !== undefined ? { data: this.data } : {}),
    };
  }
}

/** Malformed frame: not JSON, not an object, wrong `jsonrpc`, or not a known message shape. */
export class ParseError extends ProtocolError {
  constructor(message: string, data?: unknown) {
    super(JSON_RPC_ERRORS.PARSE_ERROR, message, data);
    this.name = 'ParseError';
  }
}

export class MethodNotFoundError extends ProtocolError {
  readonly method: string;

  constructor(method: string) {
    super(JSON_RPC_ERRORS.METHOD_NOT_FOUND, `Method not found: ${method}`, { method });
    this.name = 'MethodNotFoundError';
    this.method = method;
  }
}

export type NotFoundTarget = 'resource' | 'tool' | 'prompt';

export class NotFoundError extends ProtocolError {
  readonly target: NotFoundTarget;

  constructor(target: NotFoundTarget, identifier: string | undefined) {
    super(
      target === 'tool' ? JSON_RPC_ERRORS.TOOL_NOT_FOUND : JSON_RPC_ERRORS.RESOURCE_NOT_FOUND,
      identifier === undefined
        ? `Missing ${target} identifier`
        : `${capitalize(target)} not found: ${identifier}`,
      { target, ...(identifier !== undefined ? { id: identifier } : {}) },
    );
    this.name = 'NotFoundError';
    this.target = target;
  }
}

export class InvalidParamsError extends ProtocolError {
  constructor(message: string, data?: unknown) {
    super(JSON_RPC_ERRORS.INVALID_PARAMS, message, data);
    this.name = 'InvalidParamsError';
  }
}

/** Corrupt or foreign pagination cursor. Travels as INVALID_PARAMS with `data.cursor`. */
export class InvalidCursorError extends ProtocolError {
  readonly cursor: string;

  constructor(cursor: string, reason: string) {
    super(JSON_RPC_ERRORS.INVALID_PARAMS, `Invalid cursor: ${reason}`, { cursor });
    this.name = 'InvalidCursorError';
    this.cursor = cursor;
  }
}

export class InternalError extends ProtocolError {
  constructor(message: string, data?: unknown) {
    super(JSON_RPC_ERRORS.INTERNAL_ERROR, message, data);
    this.name = 'InternalError';
  }
}

/** A call made out of session-state sequence (e.g. before `initialize` completed). */
export class ProtocolViolationError extends ProtocolError {
  constructor(message: string) {
    super(JSON_RPC_ERRORS.INVALID_REQUEST, message);
    this.name = 'ProtocolViolationError';
  }
}

export class ReadTimeoutError extends ProtocolError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, what = 'line', id?: RequestId) {
    super(
      JSON_RPC_ERRORS.READ_TIMEOUT,
      id === undefined
        ? `Timed out after ${timeoutMs}ms waiting for ${what}`
        : `Timed out after ${timeoutMs}ms waiting for ${what} (id ${id})`,
    );
    this.name = 'ReadTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** The peer process exited, or its output closed, before an answer arrived. */
export class ConnectionLostError extends ProtocolError {
  constructor(message = 'Connection lost') {
    super(JSON_RPC_ERRORS.CONNECTION_LOST, message);
    this.name = 'ConnectionLostError';
  }
}

/** Launch refused by the command allowlist. */
export class LaunchDeniedError extends ProtocolError {
  constructor(message: string) {
    super(JSON_RPC_ERRORS.ACCESS_DENIED, message);
    this.name = 'LaunchDeniedError';
  }
}

/**
 * Map an error object received from a peer back onto the local hierarchy,
 * so callers can `instanceof` regardless of which side raised it.
 */
export function errorFromWire(error: JsonRpcError): ProtocolError {
  switch (error.code) {
    case JSON_RPC_ERRORS.PARSE_ERROR:
      return new ParseError(error.message, error.data);
    case JSON_RPC_ERRORS.METHOD_NOT_FOUND:
      return withMessage(new MethodNotFoundError(methodFromData(error.data)), error.message);
    case JSON_RPC_ERRORS.RESOURCE_NOT_FOUND:
    case JSON_RPC_ERRORS.TOOL_NOT_FOUND: {
      const detail = notFoundDetail(error.data);
      const target = detail.target ?? (error.code === JSON_RPC_ERRORS.TOOL_NOT_FOUND ? 'tool' : 'resource');
      return withMessage(new NotFoundError(target, detail.id), error.message);
    }
    case JSON_RPC_ERRORS.INVALID_PARAMS: {
      const cursor = cursorFromData(error.data);
      if (cursor !== undefined) {
        return withMessage(new InvalidCursorError(cursor, error.message), error.message);
      }
      return new InvalidParamsError(error.message, error.data);
    }
    case JSON_RPC_ERRORS.INVALID_REQUEST:
      return new ProtocolViolationError(error.message);
    case JSON_RPC_ERRORS.INTERNAL_ERROR:
      return new InternalError(error.message, error.data);
    default:
      return new ProtocolError(error.code, error.message, error.data);
  }
}

/** Normalise anything thrown by a handler into a wire error object. */
export function toWireError(err: unknown): JsonRpcError {
  if (err instanceof ProtocolError) return err.toJSON();
  return {
    code: JSON_RPC_ERRORS.INTERNAL_ERROR,
    message: err instanceof Error ? err.message : String(err),
  };
}

function withMessage<E extends ProtocolError>(err: E, message: string): E {
  err.message = message;
  return err;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function methodFromData(data: unknown): string {
  return isRecord(data) && typeof data.method === 'string' ? data.method : 'unknown';
}

function cursorFromData(data: unknown): string | undefined {
  return isRecord(data) && typeof data.cursor === 'string' ? data.cursor : undefined;
}

function notFoundDetail(data: unknown): { target?: NotFoundTarget; id?: string } {
  if (!isRecord(data)) return {};
  const target = data.target === 'resource' || data.target === 'tool' || data.target === 'prompt'
    ? data.target
    : undefined;
  return {
    ...(target ? { target } : {}),
    ...(typeof data.id === 'string' ? { id: data.id } : {}),
  };
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

/**
 * Message codec — one JSON-RPC message per line, one line per message.
 *
 * JSON text never contains a raw newline (they are escaped inside strings),
 * so `JSON.stringify` output is already a single frame.
 */

import { z } from 'zod';
import { ParseError } from './errors.js';
import type {
  JsonRpcErrorResponse,
  JsonRpcMessage,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcSuccessResponse,
} from './types.js';

const IdSchema = z.union([z.string(), z.number().int()]);
const ParamsSchema = z.record(z.unknown()).optional();

const RequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: IdSchema,
  method: z.string().min(1),
  params: ParamsSchema,
});

const NotificationSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string().min(1),
  params: ParamsSchema,
});

const SuccessResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: IdSchema,
});

const ErrorResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: IdSchema.nullable(),
  error: z.object({
    code: z.number().int(),
    message: z.string(),
    data: z.unknown().optional(),
  }),
});

/** Frame body without the terminator, for transports that add it themselves. */
export function serializeMessage(message: JsonRpcMessage): string {
  return JSON.stringify(message);
}

export function encodeMessage(message: JsonRpcMessage): string {
  return serializeMessage(message) + '\n';
}

export function decodeMessage(line: string): JsonRpcMessage {
  const text = line.trim();
  if (!text) throw new ParseError('Empty frame');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ParseError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ParseError('Frame is not a JSON object');
  }
  if (!('jsonrpc' in raw) || raw.jsonrpc !== '2.0') {
    throw new ParseError('Missing or unsupported "jsonrpc" version (expected "2.0")');
  }

  if ('method' in raw) {
    return 'id' in raw ? decodeRequest(raw) : decodeNotification(raw);
  }
  if ('error' in raw) return decodeErrorResponse(raw);
  if ('result' in raw) return decodeSuccessResponse(raw, raw.result);

  throw new ParseError('Frame is neither a request, a notification nor a response');
}

function decodeRequest(raw: object): JsonRpcRequest {
  const parsed = RequestSchema.safeParse(raw);
  if (!parsed.success) throw invalidShape('request', parsed.error);
  const { id, method, params } = parsed.data;
  return params === undefined
    ? { jsonrpc: '2.0', id, method }
    : { jsonrpc: '2.0', id, method, params };
}

function decodeNotification(raw: object): JsonRpcNotification {
  const parsed = NotificationSchema.safeParse(raw);
  if (!parsed.success) throw invalidShape('notification', parsed.error);
  const { method, params } = parsed.data;
  return params === undefined
    ? { jsonrpc: '2.0', method }
    : { jsonrpc: '2.0', method, params };
}

function decodeSuccessResponse(raw: object, result: unknown): JsonRpcSuccessResponse {
  const parsed = SuccessResponseSchema.safeParse(raw);
  if (!parsed.success) throw invalidShape('response', parsed.error);
  return { jsonrpc: '2.0', id: parsed.data.id, result };
}

function decodeErrorResponse(raw: object): JsonRpcErrorResponse {
  const parsed = ErrorResponseSchema.safeParse(raw);
  if (!parsed.success) throw invalidShape('error response', parsed.error);
  const { id, error } = parsed.data;
  return {
    jsonrpc: '2.0',
    id,
    error: {
      code: error.code,
      message: error.message,
      ...(error.data !== undefined ? { data: error.data } : {}),
    },
  };
}

function invalidShape(kind: string, error: z.ZodError): ParseError {
  const issue = error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
  return new ParseError(`Invalid ${kind}${where}: ${issue?.message ?? 'unknown shape'}`, {
    issues: error.issues,
  });
}

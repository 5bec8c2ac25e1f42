/**
 * Cursor codec — self-describing pagination tokens.
 *
 * A cursor is base64 over compact JSON `{offset, limit, total, version}`, so the
 * server keeps no cursor table: everything needed to resume is in the token.
 */

import { z } from 'zod';
import { InvalidCursorError } from '../protocol/errors.js';

export const CURSOR_VERSION = '1.0';
export const MAX_CURSOR_LENGTH = 1024;

export interface CursorState {
  offset: number;
  limit: number;
  total: number;
}

const CursorSchema = z.object({
  offset: z.number().int().nonnegative(),
  limit: z.number().int().positive(),
  total: z.number().int().nonnegative(),
  version: z.string(),
});

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function encodeCursor(offset: number, limit: number, total: number): string {
  const parsed = CursorSchema.safeParse({ offset, limit, total, version: CURSOR_VERSION });
  if (!parsed.success) {
    throw new RangeError(`Cannot encode cursor {offset: ${offset}, limit: ${limit}, total: ${total}}`);
  }
  const json = JSON.stringify(parsed.data);
  return Buffer.from(json, 'utf-8').toString('base64');
}

export function decodeCursor(cursor: string): CursorState {
  if (!cursor) throw new InvalidCursorError(cursor, 'empty');
  if (cursor.length > MAX_CURSOR_LENGTH) {
    throw new InvalidCursorError(cursor.slice(0, 64), `longer than ${MAX_CURSOR_LENGTH} characters`);
  }
  // Buffer.from(..., 'base64') silently skips foreign characters; check first.
  if (!BASE64.test(cursor)) throw new InvalidCursorError(cursor, 'not base64');

  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(cursor, 'base64').toString('utf-8'));
  } catch {
    throw new InvalidCursorError(cursor, 'payload is not JSON');
  }

  const parsed = CursorSchema.safeParse(raw);
  if (!parsed.success) {
    const field = parsed.error.issues[0]?.path.join('.') || 'payload';
    throw new InvalidCursorError(cursor, `bad or missing field "${field}"`);
  }
  if (parsed.data.version !== CURSOR_VERSION) {
    throw new InvalidCursorError(cursor, `unsupported version "${parsed.data.version}"`);
  }

  const { offset, limit, total } = parsed.data;
  return { offset, limit, total };
}

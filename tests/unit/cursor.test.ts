import { describe, it, expect } from 'vitest';
import { CURSOR_VERSION, MAX_CURSOR_LENGTH, decodeCursor, encodeCursor } from '../../src/pagination/cursor.js';
import { InvalidCursorError } from '../../src/protocol/errors.js';
import { JSON_RPC_ERRORS } from '../../src/protocol/types.js';

const b64 = (value: unknown): string => Buffer.from(JSON.stringify(value), 'utf-8').toString('base64');

describe('cursor codec', () => {
  it('should round-trip offset, limit and total', () => {
    for (const [offset, limit, total] of [[0, 1, 0], [25, 25, 500], [99, 100, 1_000_000]]) {
      expect(decodeCursor(encodeCursor(offset, limit, total))).toEqual({ offset, limit, total });
    }
  });

  it('should produce a base64 token over versioned JSON', () => {
    const cursor = encodeCursor(25, 25, 500);
    expect(cursor).toMatch(/^[A-Za-z0-9+/]+=*$/);
    expect(JSON.parse(Buffer.from(cursor, 'base64').toString('utf-8'))).toEqual({
      offset: 25, limit: 25, total: 500, version: CURSOR_VERSION,
    });
  });

  it('should refuse to encode negative or fractional values', () => {
    expect(() => encodeCursor(-1, 10, 10)).toThrow(RangeError);
    expect(() => encodeCursor(0, 0, 10)).toThrow(RangeError);
    expect(() => encodeCursor(1.5, 10, 10)).toThrow(RangeError);
  });

  it('should reject "not-base64!!" with InvalidCursor', () => {
    try {
      decodeCursor('not-base64!!');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidCursorError);
      expect(error).toMatchObject({
        code: JSON_RPC_ERRORS.INVALID_PARAMS,
        data: { cursor: 'not-base64!!' },
        message: 'Invalid cursor: not base64',
      });
    }
  });

  it('should reject an empty cursor', () => {
    expect(() => decodeCursor('')).toThrow(InvalidCursorError);
  });

  it('should reject an oversized cursor', () => {
    expect(() => decodeCursor('A'.repeat(MAX_CURSOR_LENGTH + 4))).toThrow(
      `Invalid cursor: longer than ${MAX_CURSOR_LENGTH} characters`,
    );
  });

  it('should reject base64 that is not JSON', () => {
    expect(() => decodeCursor(Buffer.from('hello').toString('base64'))).toThrow(
      'Invalid cursor: payload is not JSON',
    );
  });

  it('should reject missing or mistyped fields', () => {
    expect(() => decodeCursor(b64({ offset: 0, limit: 10, version: '1.0' }))).toThrow(
      'Invalid cursor: bad or missing field "total"',
    );
    expect(() => decodeCursor(b64({ offset: 'x', limit: 10, total: 1, version: '1.0' }))).toThrow(
      'Invalid cursor: bad or missing field "offset"',
    );
  });

  it('should reject a foreign version', () => {
    expect(() => decodeCursor(b64({ offset: 0, limit: 10, total: 5, version: '2.0' }))).toThrow(
      'Invalid cursor: unsupported version "2.0"',
    );
  });
});

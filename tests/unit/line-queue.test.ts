import { describe, it, expect } from 'vitest';
import { LineQueue } from '../../src/transport/line-queue.js';
import { ConnectionLostError, ReadTimeoutError } from '../../src/protocol/errors.js';

describe('LineQueue', () => {
  it('should deliver items in order', async () => {
    const q = new LineQueue<string>();
    q.push('a');
    q.push('b');
    expect(await q.take()).toBe('a');
    expect(await q.take()).toBe('b');
  });

  it('should hand off directly when a taker is waiting', async () => {
    const q = new LineQueue<string>();
    const taken = q.take();
    expect(q.pending).toBe(1);
    q.push('hello');
    expect(await taken).toBe('hello');
    expect(q.size).toBe(0);
  });

  it('should reject with ReadTimeoutError after the deadline', async () => {
    const q = new LineQueue<string>();
    await expect(q.take(10)).rejects.toBeInstanceOf(ReadTimeoutError);
    expect(q.pending).toBe(0);
  });

  it('should not lose an item pushed after a timed-out take', async () => {
    const q = new LineQueue<string>();
    await expect(q.take(5)).rejects.toThrow('Timed out after 5ms waiting for line');
    q.push('late');
    expect(await q.take()).toBe('late');
  });

  it('should abort a take with an AbortSignal', async () => {
    const q = new LineQueue<string>();
    const ac = new AbortController();
    const taken = q.take(undefined, ac.signal);
    ac.abort();
    await expect(taken).rejects.toThrow('Aborted');
    expect(q.pending).toBe(0);
  });

  it('should drain buffered items before rejecting with the close error', async () => {
    const q = new LineQueue<string>();
    q.push('last');
    q.close(new ConnectionLostError('gone'));

    expect(q.closed).toBe(true);
    expect(await q.take()).toBe('last');
    await expect(q.take()).rejects.toThrow('gone');
  });

  it('should reject waiting takers on close and ignore later pushes', async () => {
    const q = new LineQueue<string>();
    const taken = q.take();
    q.close(new ConnectionLostError());
    await expect(taken).rejects.toBeInstanceOf(ConnectionLostError);

    q.push('ignored');
    expect(q.size).toBe(0);
  });
});

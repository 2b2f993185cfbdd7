import { describe, it, expect } from 'vitest';
import { KeyedQueue } from '@/utils/keyed-queue.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedQueue', () => {
  it('runs tasks with the same key one at a time, in order', async () => {
    const queue = new KeyedQueue();
    const gate = deferred();
    const events: string[] = [];

    const first = queue.run('alice', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = queue.run('alice', async () => {
      events.push('second:start');
    });

    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('does not hold back other keys', async () => {
    const queue = new KeyedQueue();
    const gate = deferred();

    const blocked = queue.run('alice', () => gate.promise);
    const other = await queue.run('bob', async () => 'bob done');

    expect(other).toBe('bob done');
    gate.resolve();
    await blocked;
  });

  it('keeps going after a failed task and forgets idle keys', async () => {
    const queue = new KeyedQueue();

    const failed = queue.run('alice', async () => {
      throw new Error('boom');
    });
    const next = queue.run('alice', async () => 42);

    await expect(failed).rejects.toThrow('boom');
    expect(await next).toBe(42);
    await Promise.resolve();
    expect(queue.size).toBe(0);
  });
});

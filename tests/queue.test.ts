import { describe, expect, it } from 'vitest';
import { ActionQueue } from '../realtime-server/src/queue.ts';
import type { Action } from '../world/index.ts';

const observe = (agentId: string): Action => ({ type: 'OBSERVE', agentId, submittedTick: 0 });

describe('ActionQueue', () => {
  it('numbers arrivals and shares one number per submission', () => {
    const queue = new ActionQueue();
    expect(queue.submit(observe('a'))).toEqual({ ok: true, value: 1 });
    expect(queue.submitMany([observe('b'), observe('c')])).toEqual({ ok: true, value: 2 });

    expect(queue.drain().map((q) => [q.arrival, q.action.agentId])).toEqual([
      [1, 'a'],
      [2, 'b'],
      [2, 'c'],
    ]);
  });

  it('swaps out its contents on drain', () => {
    const queue = new ActionQueue();
    queue.submit(observe('a'));
    const first = queue.drain();
    queue.submit(observe('b'));

    expect(first).toHaveLength(1);
    expect(queue.size).toBe(1);
    expect(queue.drain().map((q) => q.arrival)).toEqual([2]);
    expect(queue.size).toBe(0);
  });

  it('refuses a whole submission that would overflow the bound', () => {
    const queue = new ActionQueue(2);
    queue.submit(observe('a'));

    const result = queue.submitMany([observe('b'), observe('c')]);

    expect(result).toEqual({
      ok: false,
      error: { code: 'QUEUE_FULL', message: 'Queue holds 1 of 2 actions' },
    });
    expect(queue.size).toBe(1);
    expect(queue.submit(observe('b')).ok).toBe(true);
  });
});

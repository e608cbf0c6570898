import { err, ok } from '../../world/index.ts';
import type { Action, QueuedAction, Result } from '../../world/index.ts';

export type QueueErrorCode = 'QUEUE_FULL';

/**
 * Pending actions for the next tick. Producers append; the scheduler is the
 * only consumer and takes everything at once with drain().
 */
export class ActionQueue {
  private items: QueuedAction[] = [];
  private nextArrival = 1;

  /** `maxSize` of 0 leaves the queue unbounded */
  constructor(private readonly maxSize: number = 0) {}

  get size(): number {
    return this.items.length;
  }

  submit(action: Action): Result<number, QueueErrorCode> {
    return this.submitMany([action]);
  }

  /**
   * Queue actions submitted together. They share one arrival number, so
   * their relative order is settled by agent id at tick time.
   * All or nothing: a batch that does not fit is refused whole.
   */
  submitMany(actions: readonly Action[]): Result<number, QueueErrorCode> {
    if (this.maxSize > 0 && this.items.length + actions.length > this.maxSize) {
      return err('QUEUE_FULL', `Queue holds ${this.items.length} of ${this.maxSize} actions`);
    }
    const arrival = this.nextArrival++;
    for (const action of actions) {
      this.items.push({ arrival, action });
    }
    return ok(arrival);
  }

  /** Swap out everything queued so far */
  drain(): QueuedAction[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }
}

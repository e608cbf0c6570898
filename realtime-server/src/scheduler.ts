import { createSnapshotRecord } from '../../world/index.ts';
import type { LedgerRecord, QueuedAction, Rejection, World, WorldSnapshot } from '../../world/index.ts';
import type { Ledger } from './ledger';
import type { ActionQueue } from './queue';
import type { SnapshotStore } from './snapshots';

export type SchedulerStatus = 'STOPPED' | 'RUNNING' | 'HALTED';

export interface SchedulerOptions {
  readonly tickIntervalMs: number;
  /** Persist a snapshot every N ticks; 0 disables */
  readonly snapshotEvery: number;
  /** Wall clock for ledger timestamps and tick pacing */
  readonly now?: () => number;
}

/** Everything observers learn about one committed tick */
export interface TickCommit {
  readonly tick: number;
  readonly records: readonly LedgerRecord[];
  readonly rejections: readonly Rejection[];
  /** Arrival numbers that were processed in this tick */
  readonly arrivals: readonly number[];
  readonly snapshot: WorldSnapshot;
}

type CommitListener = (commit: TickCommit) => void;
type FaultListener = (error: unknown) => void;

/**
 * The single writer. Drains the queue once per tick, runs the world on a
 * working copy, writes the ledger batch and only then publishes the tick.
 */
export class Scheduler {
  private status: SchedulerStatus = 'STOPPED';
  private statusBeforeHalt: SchedulerStatus = 'STOPPED';
  private timer: NodeJS.Timeout | undefined;
  private inFlight: Promise<void> | undefined;
  private ticking = false;
  // Batch of a tick that failed to commit, retried by resume()
  private retained: QueuedAction[] | undefined;
  private lastError: unknown;
  private readonly commitListeners = new Set<CommitListener>();
  private readonly faultListeners = new Set<FaultListener>();
  private readonly now: () => number;

  constructor(
    private readonly world: World,
    private readonly queue: ActionQueue,
    private readonly ledger: Ledger,
    private readonly snapshots: SnapshotStore,
    private readonly options: SchedulerOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  getStatus(): SchedulerStatus {
    return this.status;
  }

  getLastError(): unknown {
    return this.lastError;
  }

  onCommit(listener: CommitListener): () => void {
    this.commitListeners.add(listener);
    return () => this.commitListeners.delete(listener);
  }

  onFault(listener: FaultListener): () => void {
    this.faultListeners.add(listener);
    return () => this.faultListeners.delete(listener);
  }

  start(): void {
    if (this.status !== 'STOPPED') return;
    this.status = 'RUNNING';
    console.log(`[Scheduler] Started at tick ${this.world.tick}, interval ${this.options.tickIntervalMs}ms`);
    this.scheduleNext(this.options.tickIntervalMs);
  }

  /** Stop scheduling and wait for the tick in flight, if any */
  async stop(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.status === 'RUNNING') {
      this.status = 'STOPPED';
    } else if (this.status === 'HALTED') {
      this.statusBeforeHalt = 'STOPPED';
    }
    await this.inFlight;
  }

  /**
   * Process exactly one tick. Rejects, and halts the scheduler, if the tick
   * could not be committed; the world is then unchanged.
   */
  async runTick(): Promise<TickCommit> {
    if (this.status === 'HALTED') {
      throw new Error('Scheduler is halted; call resume() once the fault is fixed');
    }
    if (this.ticking) {
      throw new Error('A tick is already in flight');
    }
    this.ticking = true;

    try {
      const batch = this.retained ?? this.queue.drain();
      this.retained = batch;

      let commit: TickCommit;
      try {
        const result = this.world.processTick(batch);
        const records = await this.ledger.commit(result.tick, result.events, this.now());
        this.world.commit(result);
        this.retained = undefined;
        commit = {
          tick: result.tick,
          records,
          rejections: result.rejections,
          arrivals: Array.from(new Set(batch.map((queued) => queued.arrival))),
          snapshot: this.world.getSnapshot(),
        };
      } catch (error) {
        this.halt(error);
        throw error;
      }

      await this.writeDiagnostics(commit.rejections);
      await this.maybeSnapshot(commit.tick);

      for (const listener of this.commitListeners) {
        try {
          listener(commit);
        } catch (error) {
          console.error(`[Scheduler] Commit listener failed at tick ${commit.tick}:`, error);
        }
      }
      return commit;
    } finally {
      this.ticking = false;
    }
  }

  /** Retry the batch that failed to commit, then carry on as before the fault */
  async resume(): Promise<TickCommit> {
    if (this.status !== 'HALTED') {
      throw new Error(`Scheduler is ${this.status}, not halted`);
    }
    const previous = this.statusBeforeHalt;
    this.status = 'STOPPED';
    console.log(`[Scheduler] Resuming at tick ${this.world.tick + 1}`);

    const commit = await this.runTick();
    if (previous === 'RUNNING') {
      this.start();
    }
    return commit;
  }

  private halt(error: unknown): void {
    this.statusBeforeHalt = this.status === 'HALTED' ? this.statusBeforeHalt : this.status;
    this.status = 'HALTED';
    this.lastError = error;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    console.error(`[Scheduler] Halted before tick ${this.world.tick + 1}:`, error);
    for (const listener of this.faultListeners) {
      try {
        listener(error);
      } catch (listenerError) {
        console.error('[Scheduler] Fault listener failed:', listenerError);
      }
    }
  }

  private scheduleNext(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.loop();
    }, delayMs);
  }

  private loop(): void {
    const startedAt = this.now();
    this.inFlight = this.runTick()
      .then(
        () => {
          if (this.status === 'RUNNING') {
            // A slow tick delays the next one instead of overlapping it
            const elapsed = this.now() - startedAt;
            this.scheduleNext(Math.max(0, this.options.tickIntervalMs - elapsed));
          }
        },
        (error: unknown) => {
          // Commit failures halt inside runTick; anything else halts here
          if (this.status === 'RUNNING') {
            this.halt(error);
          }
        }
      )
      .finally(() => {
        this.inFlight = undefined;
      });
  }

  private async writeDiagnostics(rejections: readonly Rejection[]): Promise<void> {
    if (rejections.length === 0) return;
    try {
      await this.ledger.recordRejections(rejections);
    } catch (error) {
      console.error('[Scheduler] Failed to write rejections:', error);
    }
  }

  private async maybeSnapshot(tick: number): Promise<void> {
    const every = this.options.snapshotEvery;
    if (every <= 0 || tick % every !== 0) return;
    try {
      await this.snapshots.save(createSnapshotRecord(this.world.cloneState()));
      console.log(`[Scheduler] Snapshot saved at tick ${tick}`);
    } catch (error) {
      console.error(`[Scheduler] Failed to save snapshot at tick ${tick}:`, error);
    }
  }
}

import { World } from '../world/index.ts';
import type {
  Action,
  LedgerRecord,
  QueuedAction,
  Rejection,
  SnapshotRecord,
  TickResult,
  WorldConfig,
} from '../world/index.ts';
import { createGame } from '../realtime-server/src/game.ts';
import type { Game, Stores } from '../realtime-server/src/game.ts';
import type { LedgerStore } from '../realtime-server/src/ledger.ts';
import type { SnapshotStore } from '../realtime-server/src/snapshots.ts';
import { pickLatest } from '../realtime-server/src/snapshots.ts';

/**
 * Small world with no regeneration, no decay and no danger outside the pit,
 * so every number in a test can be worked out by hand.
 */
export const TEST_CONFIG: WorldConfig = {
  seed: 42,
  regions: [
    { regionId: 'alpha', name: 'Alpha', x: 0, y: 0, danger: 0, resourceMultiplier: 1, capacity: 200,
      pool: { energy: 100, bandwidth: 100, memory: 100, compute: 100 } },
    { regionId: 'beta', name: 'Beta', x: 3, y: 4, danger: 0, resourceMultiplier: 1, capacity: 200,
      pool: { energy: 50 } },
    { regionId: 'tiny', name: 'Tiny', x: 0, y: 1, danger: 0, resourceMultiplier: 1, capacity: 1 },
    { regionId: 'pit', name: 'Pit', x: 10, y: 0, danger: 1, resourceMultiplier: 1, capacity: 10 },
  ],
  spawnRegionId: 'alpha',
  resources: {
    energy: { initial: 100, cap: 1000, regen: 0, decay: 0 },
    bandwidth: { initial: 50, cap: 1000, regen: 0, decay: 0 },
    memory: { initial: 100, cap: 1000, regen: 0, decay: 0 },
    compute: { initial: 100, cap: 1000, regen: 0, decay: 0 },
  },
  actionCosts: {
    REGISTER: {},
    CLAIM: {},
    MOVE: { energy: 2 },
    TRADE: {},
    COMMUNICATE: { bandwidth: 2 },
    FORK: { memory: 20 },
    MERGE: { energy: 10 },
    DIE: {},
    OBSERVE: { energy: 1 },
  },
  distanceCostFactor: 0.5,
  dangerDamage: 200,
  defaultForkSplit: 0.5,
};

/** Actions submitted one by one: arrival numbers 1, 2, 3, ... */
export function queued(...actions: Action[]): QueuedAction[] {
  return actions.map((action, index) => ({ arrival: index + 1, action }));
}

export function register(agentId: string, regionId?: string): Action {
  return regionId === undefined
    ? { type: 'REGISTER', agentId, submittedTick: 0 }
    : { type: 'REGISTER', agentId, regionId, submittedTick: 0 };
}

export function claim(agentId: string): Action {
  return { type: 'CLAIM', agentId, claimRef: `claim-${agentId}`, submittedTick: 0 };
}

/** Process and commit one tick without a ledger */
export function step(world: World, ...actions: Action[]): TickResult {
  const result = world.processTick(queued(...actions));
  world.commit(result);
  return result;
}

/** Register the agents (tick N+1) and claim them (tick N+2) */
export function spawnClaimed(world: World, agentIds: readonly string[], regionId?: string): void {
  step(world, ...agentIds.map((id) => register(id, regionId)));
  step(world, ...agentIds.map(claim));
}

export function createTestWorld(config: WorldConfig = TEST_CONFIG): World {
  return new World(config);
}

// ============================================================================
// IN-PROCESS STORES
// ============================================================================

export class MemoryLedgerStore implements LedgerStore {
  readonly records: LedgerRecord[] = [];
  readonly rejections: Rejection[] = [];
  /** Number of upcoming append() calls that fail */
  failAppends = 0;

  async load(): Promise<LedgerRecord[]> {
    return [...this.records];
  }

  async append(records: readonly LedgerRecord[]): Promise<void> {
    if (this.failAppends > 0) {
      this.failAppends--;
      throw new Error('disk full');
    }
    this.records.push(...records);
  }

  async appendRejections(rejections: readonly Rejection[]): Promise<void> {
    this.rejections.push(...rejections);
  }
}

export class MemorySnapshotStore implements SnapshotStore {
  readonly snapshots: SnapshotRecord[] = [];

  async list(): Promise<SnapshotRecord[]> {
    return [...this.snapshots].sort((a, b) => a.tick - b.tick);
  }

  async latestAtOrBefore(tick: number): Promise<SnapshotRecord | undefined> {
    return pickLatest(this.snapshots, tick);
  }

  async save(snapshot: SnapshotRecord): Promise<void> {
    this.snapshots.push(snapshot);
  }
}

export function createMemoryStores(): { ledger: MemoryLedgerStore; snapshots: MemorySnapshotStore } {
  return { ledger: new MemoryLedgerStore(), snapshots: new MemorySnapshotStore() };
}

/** A game on TEST_CONFIG with a frozen clock; the scheduler is not started */
export function createTestGame(stores: Stores, snapshotEvery = 0, maxQueueSize = 0): Promise<Game> {
  return createGame(stores, {
    world: TEST_CONFIG,
    maxQueueSize,
    scheduler: { tickIntervalMs: 1000, snapshotEvery, now: () => 1_700_000_000_000 },
  });
}

/** Queue the actions as one submission and run a single tick */
export async function runWith(game: Game, ...actions: Action[]): Promise<void> {
  if (actions.length > 0) {
    const queuedResult = game.queue.submitMany(actions);
    if (!queuedResult.ok) throw new Error(queuedResult.error.message);
  }
  await game.scheduler.runTick();
}

import { DEFAULT_WORLD_CONFIG, World, createWorldState } from '../../world/index.ts';
import type { WorldConfig } from '../../world/index.ts';
import type { ServerConfig } from './config';
import { SupabaseLedgerStore, SupabaseSnapshotStore, createSupabase } from './db';
import { FileLedgerStore, Ledger } from './ledger';
import type { LedgerStore } from './ledger';
import { ActionQueue } from './queue';
import { ReplayEngine } from './replay';
import { Scheduler } from './scheduler';
import type { SchedulerOptions } from './scheduler';
import { FileSnapshotStore } from './snapshots';
import type { SnapshotStore } from './snapshots';

export interface Stores {
  readonly ledger: LedgerStore;
  readonly snapshots: SnapshotStore;
}

export interface Game {
  readonly config: WorldConfig;
  readonly world: World;
  readonly queue: ActionQueue;
  readonly ledger: Ledger;
  readonly replay: ReplayEngine;
  readonly scheduler: Scheduler;
}

export interface GameOptions {
  readonly world?: WorldConfig;
  readonly maxQueueSize?: number;
  readonly scheduler: SchedulerOptions;
}

export function createStores(config: ServerConfig): Stores {
  if (config.storageBackend === 'supabase') {
    const client = createSupabase(config.supabaseUrl, config.supabaseServiceKey);
    return { ledger: new SupabaseLedgerStore(client), snapshots: new SupabaseSnapshotStore(client) };
  }
  return {
    ledger: new FileLedgerStore(config.ledgerFile, config.rejectionsFile),
    snapshots: new FileSnapshotStore(config.stateFile),
  };
}

export function worldConfigFor(config: ServerConfig): WorldConfig {
  return { ...DEFAULT_WORLD_CONFIG, seed: config.worldSeed };
}

/**
 * Open the ledger, rebuild the committed state at its head and wire up the
 * loop. The returned scheduler is not started.
 */
export async function createGame(stores: Stores, options: GameOptions): Promise<Game> {
  const config = options.world ?? DEFAULT_WORLD_CONFIG;
  const ledger = await Ledger.open(stores.ledger);
  const replay = new ReplayEngine(ledger, stores.snapshots, config);

  const state = ledger.headTick === 0 ? createWorldState(config) : await replay.replay(ledger.headTick);
  const world = new World(config, state);
  console.log(`[Game] World restored at tick ${world.tick} with ${world.getSnapshot().agents.length} agents`);

  const queue = new ActionQueue(options.maxQueueSize ?? 0);
  const scheduler = new Scheduler(world, queue, ledger, stores.snapshots, options.scheduler);

  return { config, world, queue, ledger, replay, scheduler };
}

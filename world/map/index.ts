export * from './mapDef';
import type { RegionDef, WorldConfig } from './mapDef';

export const DEFAULT_REGIONS: readonly RegionDef[] = [
  // Central hub and spawn point
  { regionId: 'nexus', name: 'The Nexus', x: 0, y: 0, danger: 0.05, resourceMultiplier: 1.0, capacity: 200,
    pool: { energy: 1000, bandwidth: 500, memory: 1000, compute: 500 } },
  { regionId: 'forge', name: 'The Forge', x: 3, y: 1, danger: 0.2, resourceMultiplier: 1.5, capacity: 80,
    pool: { energy: 400, bandwidth: 200, memory: 200, compute: 1200 } },
  { regionId: 'wasteland', name: 'The Wasteland', x: -4, y: 3, danger: 0.7, resourceMultiplier: 0.5, capacity: 50,
    pool: { energy: 2000, bandwidth: 100, memory: 100, compute: 100 } },
  { regionId: 'archive', name: 'The Archive', x: 1, y: -3, danger: 0.1, resourceMultiplier: 1.2, capacity: 100,
    pool: { energy: 300, bandwidth: 100, memory: 3000, compute: 300 } },
  // Edge of the world
  { regionId: 'void', name: 'The Void', x: -2, y: -5, danger: 0.9, resourceMultiplier: 0.3, capacity: 30 },
];

/**
 * The default world: five regions, nexus spawn.
 */
export const DEFAULT_WORLD_CONFIG: WorldConfig = {
  seed: 1,
  regions: DEFAULT_REGIONS,
  spawnRegionId: 'nexus',
  resources: {
    energy: { initial: 50, cap: 100, regen: 2, decay: 1 },
    bandwidth: { initial: 25, cap: 50, regen: 1, decay: 0 },
    memory: { initial: 100, cap: 200, regen: 0, decay: 0.5 },
    compute: { initial: 40, cap: 80, regen: 1.5, decay: 0 },
  },
  actionCosts: {
    REGISTER: {},
    CLAIM: {},
    MOVE: { energy: 5 },
    // Transfers only; the traded amounts are checked separately
    TRADE: {},
    COMMUNICATE: { bandwidth: 5, energy: 1 },
    FORK: { memory: 50, compute: 30 },
    MERGE: { energy: 20, compute: 20 },
    DIE: {},
    OBSERVE: { energy: 1 },
  },
  distanceCostFactor: 0.5,
  dangerDamage: 10,
  defaultForkSplit: 0.5,
};

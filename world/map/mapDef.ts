// ============================================================================
// MAP DEFINITION - Regions and the rules the world runs under
// ============================================================================

import type { ResourceBundle, ResourceKind, Resources } from '../entities/resources';
import { createResources } from '../entities/resources';
import type { ActionType } from '../actions/types';

/** Static region configuration */
export interface RegionDef {
  readonly regionId: string;
  readonly name: string;
  readonly x: number;
  readonly y: number;
  /** Per-tick probability of a danger hit, 0..1 */
  readonly danger: number;
  /** Scales regeneration for agents inside the region */
  readonly resourceMultiplier: number;
  /** Max concurrent live agents */
  readonly capacity: number;
  /** Starting contents of the region's resource pool */
  readonly pool?: ResourceBundle;
}

/** Region as held in world state: configuration plus occupancy */
export interface Region {
  readonly regionId: string;
  readonly name: string;
  readonly x: number;
  readonly y: number;
  readonly danger: number;
  readonly resourceMultiplier: number;
  readonly capacity: number;
  readonly occupancy: number;
}

export interface ResourceRule {
  readonly initial: number;
  readonly cap: number;
  /** Added each tick, scaled by region multiplier, up to cap */
  readonly regen: number;
  /** Removed each tick before regeneration */
  readonly decay: number;
}

export interface WorldConfig {
  /** Fixed per-world seed, mixed with the tick number for physics rolls */
  readonly seed: number;
  readonly regions: readonly RegionDef[];
  readonly spawnRegionId: string;
  readonly resources: Readonly<Record<ResourceKind, ResourceRule>>;
  readonly actionCosts: Readonly<Record<ActionType, ResourceBundle>>;
  /** MOVE and COMMUNICATE cost multiplier is 1 + distance * factor */
  readonly distanceCostFactor: number;
  /** Energy removed by one danger hit */
  readonly dangerDamage: number;
  /** Share of the parent's remaining resources that goes to the first fork child */
  readonly defaultForkSplit: number;
}

export function createRegion(def: RegionDef): Region {
  return {
    regionId: def.regionId,
    name: def.name,
    x: def.x,
    y: def.y,
    danger: def.danger,
    resourceMultiplier: def.resourceMultiplier,
    capacity: def.capacity,
    occupancy: 0,
  };
}

export function hasSpareCapacity(region: Region, extra: number = 1): boolean {
  return region.occupancy + extra <= region.capacity;
}

export function distance(a: Pick<Region, 'x' | 'y'>, b: Pick<Region, 'x' | 'y'>): number {
  return Math.sqrt((a.x - b.x) ** 2 + (a.y - b.y) ** 2);
}

export function distanceCostMultiplier(config: WorldConfig, dist: number): number {
  return 1 + dist * config.distanceCostFactor;
}

/** Noise applied upstream to cross-region messages. Further = noisier, capped at 80% */
export function communicationNoiseFactor(dist: number): number {
  return Math.min(dist * 0.1, 0.8);
}

export function initialAgentResources(config: WorldConfig): Resources {
  return createResources({
    energy: config.resources.energy.initial,
    bandwidth: config.resources.bandwidth.initial,
    memory: config.resources.memory.initial,
    compute: config.resources.compute.initial,
  });
}

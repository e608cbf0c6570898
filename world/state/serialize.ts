// ============================================================================
// SERIALIZATION - Canonical snapshot form and content hash
// ============================================================================

import { createHash } from 'node:crypto';
import type { Agent } from '../entities/agent';
import type { Resources } from '../entities/resources';
import { createResources } from '../entities/resources';
import type { Region } from '../map/mapDef';
import type { WorldState } from './worldState';
import { compareIds } from './worldState';

export interface ResourcePoolRecord {
  readonly regionId: string;
  readonly resources: Resources;
}

export interface SerializedWorld {
  readonly tick: number;
  readonly regions: readonly Region[];
  readonly agents: readonly Agent[];
  readonly resourcePools: readonly ResourcePoolRecord[];
}

/** Durable snapshot record, one per line in the state file */
export interface SnapshotRecord extends SerializedWorld {
  readonly stateHash: string;
}

/** Immutable committed view handed to observers */
export type WorldSnapshot = Readonly<SnapshotRecord>;

// Objects are rebuilt field by field so key order, and therefore the hash,
// never depends on how a value was constructed.
function canonicalRegion(region: Region): Region {
  return {
    regionId: region.regionId,
    name: region.name,
    x: region.x,
    y: region.y,
    danger: region.danger,
    resourceMultiplier: region.resourceMultiplier,
    capacity: region.capacity,
    occupancy: region.occupancy,
  };
}

function canonicalAgent(agent: Agent): Agent {
  return {
    agentId: agent.agentId,
    status: agent.status,
    regionId: agent.regionId,
    resources: createResources(agent.resources),
    createdTick: agent.createdTick,
    lastActionTick: agent.lastActionTick,
    ...(agent.claimRef !== undefined ? { claimRef: agent.claimRef } : {}),
    ...(agent.parentId !== undefined ? { parentId: agent.parentId } : {}),
    ...(agent.retiredTick !== undefined ? { retiredTick: agent.retiredTick } : {}),
  };
}

export function serializeWorld(state: WorldState): SerializedWorld {
  const regions = Array.from(state.regions.values())
    .sort((a, b) => compareIds(a.regionId, b.regionId))
    .map(canonicalRegion);
  const agents = Array.from(state.agents.values())
    .sort((a, b) => compareIds(a.agentId, b.agentId))
    .map(canonicalAgent);
  const resourcePools = Array.from(state.pools.entries())
    .sort(([a], [b]) => compareIds(a, b))
    .map(([regionId, resources]) => ({ regionId, resources: createResources(resources) }));
  return { tick: state.tick, regions, agents, resourcePools };
}

export function hashSerialized(world: SerializedWorld): string {
  const canonical = JSON.stringify({
    tick: world.tick,
    regions: world.regions,
    agents: world.agents,
    resourcePools: world.resourcePools,
  });
  return createHash('sha256').update(canonical).digest('hex');
}

export function hashWorld(state: WorldState): string {
  return hashSerialized(serializeWorld(state));
}

export function createSnapshotRecord(state: WorldState): SnapshotRecord {
  const world = serializeWorld(state);
  return {
    tick: world.tick,
    stateHash: hashSerialized(world),
    regions: world.regions,
    agents: world.agents,
    resourcePools: world.resourcePools,
  };
}

export function deserializeWorld(world: SerializedWorld): WorldState {
  return {
    tick: world.tick,
    regions: new Map(world.regions.map((region) => [region.regionId, canonicalRegion(region)])),
    agents: new Map(world.agents.map((agent) => [agent.agentId, canonicalAgent(agent)])),
    pools: new Map(world.resourcePools.map((pool) => [pool.regionId, createResources(pool.resources)])),
  };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function createWorldSnapshot(state: WorldState): WorldSnapshot {
  return deepFreeze(createSnapshotRecord(state));
}

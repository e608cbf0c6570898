// ============================================================================
// WORLD STATE - The single source of truth for the simulation
// ============================================================================

import type { Agent } from '../entities/agent';
import { isLive } from '../entities/agent';
import type { Resources } from '../entities/resources';
import { createResources } from '../entities/resources';
import type { Region, WorldConfig } from '../map/mapDef';
import { createRegion } from '../map/mapDef';

export interface WorldState {
  /** Last tick whose events have been applied */
  tick: number;
  readonly regions: Map<string, Region>;
  /** Map of agentId -> Agent. Retired agents are kept forever */
  readonly agents: Map<string, Agent>;
  /** Map of regionId -> region resource pool */
  readonly pools: Map<string, Resources>;
}

/** Genesis state: configured regions, full pools, no agents */
export function createWorldState(config: WorldConfig): WorldState {
  const regions = new Map<string, Region>();
  const pools = new Map<string, Resources>();
  for (const def of config.regions) {
    regions.set(def.regionId, createRegion(def));
    pools.set(def.regionId, createResources(def.pool));
  }
  return { tick: 0, regions, agents: new Map(), pools };
}

/**
 * Working copy for a tick. Agents, regions and pools are immutable values,
 * so copying the maps is enough to keep the original untouched.
 */
export function cloneWorldState(state: WorldState): WorldState {
  return {
    tick: state.tick,
    regions: new Map(state.regions),
    agents: new Map(state.agents),
    pools: new Map(state.pools),
  };
}

/** Get agent by ID (returns undefined if not found) */
export function getAgent(state: WorldState, agentId: string): Agent | undefined {
  return state.agents.get(agentId);
}

/** Get all agents as array, ordered by id */
export function getAllAgents(state: WorldState): Agent[] {
  return Array.from(state.agents.values()).sort((a, b) => compareIds(a.agentId, b.agentId));
}

export function getLiveAgentsInRegion(state: WorldState, regionId: string): Agent[] {
  return getAllAgents(state).filter((agent) => isLive(agent) && agent.regionId === regionId);
}

/** Code-unit ordering, independent of locale */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

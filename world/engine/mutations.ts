// ============================================================================
// MUTATIONS - Low-level state edits shared by event application and physics
// ============================================================================

import type { Agent, AgentStatus } from '../entities/agent';
import { canTransition } from '../entities/agent';
import type { ResourceBundle, Resources } from '../entities/resources';
import { EMPTY_RESOURCES, addBundle, subtractBundle } from '../entities/resources';
import type { WorldState } from '../state/worldState';
import { IntegrityError } from './errors';

export function requireAgent(state: WorldState, agentId: string, tick: number): Agent {
  const agent = state.agents.get(agentId);
  if (!agent) {
    throw new IntegrityError(`Event names unknown agent ${agentId}`, tick);
  }
  return agent;
}

export function putAgent(state: WorldState, agent: Agent): void {
  state.agents.set(agent.agentId, agent);
}

export function debitAgent(state: WorldState, agentId: string, bundle: ResourceBundle, tick: number): Agent {
  const agent = requireAgent(state, agentId, tick);
  const resources = subtractBundle(agent.resources, bundle);
  if (!resources) {
    throw new IntegrityError(`Agent ${agentId} would go negative`, tick);
  }
  const updated: Agent = { ...agent, resources };
  putAgent(state, updated);
  return updated;
}

export function creditAgent(state: WorldState, agentId: string, bundle: ResourceBundle, tick: number): Agent {
  const agent = requireAgent(state, agentId, tick);
  const updated: Agent = { ...agent, resources: addBundle(agent.resources, bundle) };
  putAgent(state, updated);
  return updated;
}

function requirePool(state: WorldState, regionId: string, tick: number): Resources {
  const pool = state.pools.get(regionId);
  if (!pool) {
    throw new IntegrityError(`Region ${regionId} has no resource pool`, tick);
  }
  return pool;
}

export function debitPool(state: WorldState, regionId: string, bundle: ResourceBundle, tick: number): void {
  const pool = subtractBundle(requirePool(state, regionId, tick), bundle);
  if (!pool) {
    throw new IntegrityError(`Pool of ${regionId} would go negative`, tick);
  }
  state.pools.set(regionId, pool);
}

export function creditPool(state: WorldState, regionId: string, bundle: ResourceBundle, tick: number): void {
  state.pools.set(regionId, addBundle(requirePool(state, regionId, tick), bundle));
}

/** Occupancy stays within 0..capacity or the event is rejected as corrupt */
export function shiftOccupancy(state: WorldState, regionId: string, delta: number, tick: number): void {
  const region = state.regions.get(regionId);
  if (!region) {
    throw new IntegrityError(`Event names unknown region ${regionId}`, tick);
  }
  const occupancy = region.occupancy + delta;
  if (occupancy < 0 || occupancy > region.capacity) {
    throw new IntegrityError(
      `Region ${regionId} occupancy ${occupancy} outside 0..${region.capacity}`,
      tick
    );
  }
  state.regions.set(regionId, { ...region, occupancy });
}

export function transition(state: WorldState, agent: Agent, to: AgentStatus, tick: number): Agent {
  if (!canTransition(agent.status, to)) {
    throw new IntegrityError(`Agent ${agent.agentId} cannot go from ${agent.status} to ${to}`, tick);
  }
  const updated: Agent = { ...agent, status: to };
  putAgent(state, updated);
  return updated;
}

/**
 * Move a live agent to a terminal status: it leaves its region and its
 * resources are zeroed. Returns what it held.
 */
export function retireAgent(
  state: WorldState,
  agentId: string,
  to: 'DEAD' | 'FORKED' | 'MERGED',
  tick: number
): Resources {
  const agent = requireAgent(state, agentId, tick);
  transition(state, agent, to, tick);
  putAgent(state, { ...agent, status: to, resources: EMPTY_RESOURCES, retiredTick: tick });
  shiftOccupancy(state, agent.regionId, -1, tick);
  return agent.resources;
}

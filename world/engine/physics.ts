// ============================================================================
// PHYSICS - Passive per-tick decay, regeneration and danger
// ============================================================================

import type { ResourceKind, Resources } from '../entities/resources';
import { RESOURCE_KINDS } from '../entities/resources';
import { isLive } from '../entities/agent';
import type { WorldConfig } from '../map/mapDef';
import type { WorldState } from '../state/worldState';
import { getAllAgents } from '../state/worldState';
import type { PhysicsDeath, TickAdvancedEvent } from '../actions/types';
import { SeededRng, tickSeed } from '../utils/rng';
import { IntegrityError } from './errors';
import { creditPool, putAgent, retireAgent } from './mutations';

export type PhysicsOutcome = TickAdvancedEvent['payload'];

/**
 * Decay first (floored at zero), then regeneration scaled by the region
 * multiplier up to the cap. A value already above the cap is never cut.
 */
export function decayAndRegen(resources: Resources, config: WorldConfig, multiplier: number): Resources {
  const next: Record<ResourceKind, number> = { ...resources };
  for (const kind of RESOURCE_KINDS) {
    const rule = config.resources[kind];
    let value = Math.max(0, resources[kind] - rule.decay);
    if (value < rule.cap) {
      value = Math.min(rule.cap, value + rule.regen * multiplier);
    }
    next[kind] = value;
  }
  return next;
}

/**
 * Apply one tick of physics to every live agent in ascending id order and
 * advance `state.tick`. The generator is seeded from the world seed and the
 * tick number only, so the outcome is identical on replay.
 */
export function runPhysics(state: WorldState, config: WorldConfig, tick: number): PhysicsOutcome {
  const seed = tickSeed(config.seed, tick);
  const rng = new SeededRng(seed);
  const dangerHits: string[] = [];
  const deaths: PhysicsDeath[] = [];

  for (const agent of getAllAgents(state)) {
    if (!isLive(agent)) {
      continue;
    }
    const region = state.regions.get(agent.regionId);
    if (!region) {
      throw new IntegrityError(`Agent ${agent.agentId} stands in unknown region ${agent.regionId}`, tick);
    }

    let resources = decayAndRegen(agent.resources, config, region.resourceMultiplier);
    if (rng.chance(region.danger)) {
      dangerHits.push(agent.agentId);
      resources = { ...resources, energy: Math.max(0, resources.energy - config.dangerDamage) };
    }
    putAgent(state, { ...agent, resources });

    if (resources.energy <= 0) {
      const released = retireAgent(state, agent.agentId, 'DEAD', tick);
      creditPool(state, agent.regionId, released, tick);
      deaths.push({ agentId: agent.agentId, regionId: agent.regionId, cause: 'ENERGY_DEPLETED', released });
    }
  }

  state.tick = tick;
  return { seed, dangerHits, deaths };
}

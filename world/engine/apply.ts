// ============================================================================
// APPLY - The single mutation path, shared by the live engine and replay
// ============================================================================

import type { WorldEvent } from '../actions/types';
import { splitForForkResources } from '../actions/pipeline';
import type { Agent } from '../entities/agent';
import { createAgent } from '../entities/agent';
import { sameResources } from '../entities/resources';
import type { WorldConfig } from '../map/mapDef';
import type { WorldState } from '../state/worldState';
import { IntegrityError } from './errors';
import {
  creditAgent,
  creditPool,
  debitAgent,
  debitPool,
  putAgent,
  requireAgent,
  retireAgent,
  shiftOccupancy,
  transition,
} from './mutations';
import type { PhysicsOutcome } from './physics';
import { runPhysics } from './physics';

/**
 * Apply one committed event at `tick`. Action events belong to the tick
 * being built (state.tick + 1); TICK_ADVANCED closes it.
 *
 * Throws IntegrityError when the event cannot have come from a valid run.
 */
export function applyEvent(state: WorldState, config: WorldConfig, event: WorldEvent, tick: number): void {
  if (tick !== state.tick + 1) {
    throw new IntegrityError(`Event for tick ${tick} applied to state at tick ${state.tick}`, tick);
  }

  switch (event.type) {
    case 'AGENT_REGISTERED': {
      const { agentId, regionId, resources } = event.payload;
      if (state.agents.has(agentId)) {
        throw new IntegrityError(`Agent ${agentId} registered twice`, tick);
      }
      shiftOccupancy(state, regionId, 1, tick);
      putAgent(state, createAgent(agentId, regionId, resources, tick));
      return;
    }

    case 'AGENT_CLAIMED': {
      const { agentId, claimRef } = event.payload;
      const agent = transition(state, requireAgent(state, agentId, tick), 'CLAIMED', tick);
      putAgent(state, { ...agent, claimRef, lastActionTick: tick });
      return;
    }

    case 'AGENT_MOVED': {
      const { agentId, fromRegionId, toRegionId, cost } = event.payload;
      const agent = actingAgent(state, agentId, tick);
      if (agent.regionId !== fromRegionId) {
        throw new IntegrityError(`Agent ${agentId} is not in ${fromRegionId}`, tick);
      }
      const charged = debitAgent(state, agentId, cost, tick);
      shiftOccupancy(state, fromRegionId, -1, tick);
      shiftOccupancy(state, toRegionId, 1, tick);
      putAgent(state, { ...charged, regionId: toRegionId, lastActionTick: tick });
      return;
    }

    case 'RESOURCES_TRADED': {
      const { agentId, counterparty, regionId, give, take } = event.payload;
      if (actingAgent(state, agentId, tick).regionId !== regionId) {
        throw new IntegrityError(`Agent ${agentId} traded with a pool outside its region`, tick);
      }
      debitAgent(state, agentId, give, tick);
      if (counterparty.kind === 'AGENT') {
        actingAgent(state, counterparty.agentId, tick);
        creditAgent(state, counterparty.agentId, give, tick);
      } else {
        creditPool(state, regionId, give, tick);
        debitPool(state, regionId, take, tick);
        creditAgent(state, agentId, take, tick);
      }
      touch(state, agentId, tick);
      return;
    }

    case 'MESSAGE_DELIVERED': {
      const { agentId, toAgentId, cost } = event.payload;
      actingAgent(state, agentId, tick);
      actingAgent(state, toAgentId, tick);
      debitAgent(state, agentId, cost, tick);
      touch(state, agentId, tick);
      return;
    }

    case 'AGENT_FORKED': {
      const { agentId, childIds, regionId, split, cost, childResources } = event.payload;
      const parent = actingAgent(state, agentId, tick);
      const expected = splitForForkResources(parent.resources, cost, split);
      if (!sameResources(expected[0], childResources[0]) || !sameResources(expected[1], childResources[1])) {
        throw new IntegrityError(`Fork of ${agentId} does not conserve resources`, tick);
      }
      debitAgent(state, agentId, cost, tick);
      retireAgent(state, agentId, 'FORKED', tick);
      childIds.forEach((childId, index) => {
        if (state.agents.has(childId)) {
          throw new IntegrityError(`Fork child ${childId} already exists`, tick);
        }
        shiftOccupancy(state, regionId, 1, tick);
        const child: Agent = {
          agentId: childId,
          status: 'CLAIMED',
          regionId,
          resources: childResources[index],
          createdTick: tick,
          lastActionTick: tick,
          claimRef: parent.claimRef,
          parentId: agentId,
        };
        putAgent(state, child);
      });
      return;
    }

    case 'AGENT_MERGED': {
      const { agentId, absorbedId, cost, absorbed } = event.payload;
      actingAgent(state, agentId, tick);
      const target = actingAgent(state, absorbedId, tick);
      if (!sameResources(target.resources, absorbed)) {
        throw new IntegrityError(`Merge of ${absorbedId} records different resources`, tick);
      }
      debitAgent(state, agentId, cost, tick);
      const released = retireAgent(state, absorbedId, 'MERGED', tick);
      creditAgent(state, agentId, released, tick);
      touch(state, agentId, tick);
      return;
    }

    case 'AGENT_DIED': {
      const { agentId, regionId, released } = event.payload;
      const agent = actingAgent(state, agentId, tick);
      if (!sameResources(agent.resources, released)) {
        throw new IntegrityError(`Death of ${agentId} releases different resources`, tick);
      }
      retireAgent(state, agentId, 'DEAD', tick);
      creditPool(state, regionId, released, tick);
      putAgent(state, { ...requireAgent(state, agentId, tick), lastActionTick: tick });
      return;
    }

    case 'AGENT_OBSERVED': {
      const { agentId, cost } = event.payload;
      actingAgent(state, agentId, tick);
      debitAgent(state, agentId, cost, tick);
      touch(state, agentId, tick);
      return;
    }

    case 'TICK_ADVANCED': {
      const outcome = runPhysics(state, config, tick);
      if (!sameOutcome(outcome, event.payload)) {
        throw new IntegrityError('Physics outcome differs from the recorded one', tick);
      }
      return;
    }
  }
}

/** A mutating event may only name claimed agents */
function actingAgent(state: WorldState, agentId: string, tick: number): Agent {
  const agent = requireAgent(state, agentId, tick);
  if (agent.status !== 'CLAIMED') {
    throw new IntegrityError(`Agent ${agentId} is ${agent.status} and cannot be mutated`, tick);
  }
  return agent;
}

function touch(state: WorldState, agentId: string, tick: number): void {
  putAgent(state, { ...requireAgent(state, agentId, tick), lastActionTick: tick });
}

function sameOutcome(a: PhysicsOutcome, b: PhysicsOutcome): boolean {
  return (
    a.seed === b.seed &&
    a.dangerHits.length === b.dangerHits.length &&
    a.dangerHits.every((agentId, index) => agentId === b.dangerHits[index]) &&
    a.deaths.length === b.deaths.length &&
    a.deaths.every((death, index) => {
      const other = b.deaths[index];
      return (
        other !== undefined &&
        death.agentId === other.agentId &&
        death.regionId === other.regionId &&
        death.cause === other.cause &&
        sameResources(death.released, other.released)
      );
    })
  );
}

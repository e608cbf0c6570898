// ============================================================================
// ACTION PIPELINE - Every action goes validate -> resolve -> apply
// ============================================================================

import type { WorldState } from '../state/worldState';
import type { Agent } from '../entities/agent';
import { isRetired } from '../entities/agent';
import type { Resources } from '../entities/resources';
import {
  canAfford,
  createResources,
  difference,
  isEmptyBundle,
  isValidBundle,
  scaleBundle,
  subtractBundle,
} from '../entities/resources';
import type { WorldConfig } from '../map/mapDef';
import {
  communicationNoiseFactor,
  distance,
  distanceCostMultiplier,
  hasSpareCapacity,
  initialAgentResources,
} from '../map/mapDef';
import { getLiveAgentsInRegion } from '../state/worldState';
import type {
  Action,
  ForkAction,
  RejectionReason,
  Result,
  TradeAction,
  WorldEvent,
} from './types';
import { ok, err } from './types';

// ============================================================================
// COSTS
// ============================================================================

/**
 * Resource cost charged to the actor. MOVE and COMMUNICATE scale with the
 * distance between the regions involved. Unknown regions or agents cost the
 * base amount; validation rejects those actions before the cost matters.
 */
export function actionCost(state: WorldState, config: WorldConfig, action: Action): Resources {
  const base = config.actionCosts[action.type];
  const actor = state.agents.get(action.agentId);
  if (!actor) {
    return createResources(base);
  }
  switch (action.type) {
    case 'MOVE': {
      const from = state.regions.get(actor.regionId);
      const to = state.regions.get(action.toRegionId);
      if (!from || !to) return createResources(base);
      return scaleBundle(base, distanceCostMultiplier(config, distance(from, to)));
    }
    case 'COMMUNICATE': {
      const dist = agentDistance(state, actor, action.toAgentId);
      return scaleBundle(base, distanceCostMultiplier(config, dist));
    }
    default:
      return createResources(base);
  }
}

function agentDistance(state: WorldState, actor: Agent, otherId: string): number {
  const other = state.agents.get(otherId);
  const from = state.regions.get(actor.regionId);
  const to = other ? state.regions.get(other.regionId) : undefined;
  return from && to ? distance(from, to) : 0;
}

function forkChildIds(action: ForkAction, tick: number): readonly [string, string] {
  return action.childIds ?? [`${action.agentId}.${tick}a`, `${action.agentId}.${tick}b`];
}

// ============================================================================
// VALIDATION
// ============================================================================

type Validation = Result<void, RejectionReason>;

/**
 * Pure predicate over (state, action). Never mutates state, never performs I/O.
 * `tick` is the tick the action would execute in.
 */
export function validateAction(
  state: WorldState,
  config: WorldConfig,
  action: Action,
  tick: number = state.tick + 1
): Validation {
  if (action.type === 'REGISTER') {
    return validateRegister(state, action.agentId, action.regionId ?? config.spawnRegionId);
  }

  // Actor must exist and still be eligible
  const actor = state.agents.get(action.agentId);
  if (!actor) {
    return err('UNKNOWN_AGENT', `Agent ${action.agentId} does not exist`);
  }
  if (isRetired(actor)) {
    return err('AGENT_RETIRED', `Agent ${action.agentId} is ${actor.status} and can no longer act`);
  }
  if (action.type === 'CLAIM') {
    if (actor.status !== 'PENDING') {
      return err('INVALID_TARGET', `Agent ${action.agentId} is already claimed`);
    }
    return ok(undefined);
  }
  if (actor.status !== 'CLAIMED') {
    return err('AGENT_NOT_CLAIMED', `Agent ${action.agentId} is not claimed`);
  }

  const checked = validateTargets(state, config, actor, action, tick);
  if (!checked.ok) {
    return checked;
  }

  const cost = actionCost(state, config, action);
  if (!canAfford(actor.resources, cost)) {
    return err('INSUFFICIENT_RESOURCES', `Agent ${action.agentId} cannot afford ${action.type}`);
  }
  return ok(undefined);
}

/** Variant-specific checks, run once the actor is known to be claimed */
function validateTargets(
  state: WorldState,
  config: WorldConfig,
  actor: Agent,
  action: Exclude<Action, { type: 'REGISTER' | 'CLAIM' }>,
  tick: number
): Validation {
  switch (action.type) {
    case 'MOVE':
      return validateMove(state, actor, action.toRegionId);
    case 'TRADE':
      return validateTrade(state, actor, action);
    case 'COMMUNICATE':
      return validateCounterpart(state, actor, action.toAgentId);
    case 'FORK':
      return validateFork(state, config, actor, action, tick);
    case 'MERGE':
      return validateCounterpart(state, actor, action.targetAgentId);
    case 'DIE':
    case 'OBSERVE':
      return ok(undefined);
  }
}

function validateRegister(
  state: WorldState,
  agentId: string,
  regionId: string
): Validation {
  if (state.agents.has(agentId)) {
    return err('INVALID_TARGET', `Agent ${agentId} already exists`);
  }
  const region = state.regions.get(regionId);
  if (!region) {
    return err('INVALID_TARGET', `Region ${regionId} does not exist`);
  }
  if (!hasSpareCapacity(region)) {
    return err('REGION_FULL', `Region ${regionId} is at capacity ${region.capacity}`);
  }
  return ok(undefined);
}

function validateMove(state: WorldState, actor: Agent, toRegionId: string): Validation {
  const target = state.regions.get(toRegionId);
  if (!target) {
    return err('INVALID_TARGET', `Region ${toRegionId} does not exist`);
  }
  if (toRegionId === actor.regionId) {
    return err('INVALID_TARGET', `Agent ${actor.agentId} is already in ${toRegionId}`);
  }
  if (!hasSpareCapacity(target)) {
    return err('REGION_FULL', `Region ${toRegionId} is at capacity ${target.capacity}`);
  }
  return ok(undefined);
}

/** Counterpart of TRADE, COMMUNICATE and MERGE must be another claimed agent */
function validateCounterpart(state: WorldState, actor: Agent, otherId: string): Validation {
  if (otherId === actor.agentId) {
    return err('INVALID_TARGET', 'An agent cannot target itself');
  }
  const other = state.agents.get(otherId);
  if (!other) {
    return err('UNKNOWN_AGENT', `Agent ${otherId} does not exist`);
  }
  if (isRetired(other)) {
    return err('AGENT_RETIRED', `Agent ${otherId} is ${other.status}`);
  }
  if (other.status !== 'CLAIMED') {
    return err('AGENT_NOT_CLAIMED', `Agent ${otherId} is not claimed`);
  }
  return ok(undefined);
}

function validateTrade(state: WorldState, actor: Agent, action: TradeAction): Validation {
  if (!isValidBundle(action.give) || !isValidBundle(action.take)) {
    return err('INVALID_TARGET', 'Trade amounts must be finite and non-negative');
  }
  if (isEmptyBundle(action.give) && isEmptyBundle(action.take)) {
    return err('INVALID_TARGET', 'Trade moves no resources');
  }
  if (action.counterparty.kind === 'AGENT') {
    const checked = validateCounterpart(state, actor, action.counterparty.agentId);
    if (!checked.ok) {
      return checked;
    }
    if (!isEmptyBundle(action.take)) {
      return err('INVALID_TARGET', 'Resources can only be taken from the region pool');
    }
  }
  if (!canAfford(actor.resources, action.give)) {
    return err('INSUFFICIENT_RESOURCES', `Agent ${actor.agentId} cannot give the offered resources`);
  }
  if (action.counterparty.kind === 'REGION') {
    const pool = state.pools.get(actor.regionId);
    if (!pool || !canAfford(pool, action.take)) {
      return err('INSUFFICIENT_RESOURCES', `Region ${actor.regionId} pool cannot cover the request`);
    }
  }
  return ok(undefined);
}

function validateFork(
  state: WorldState,
  config: WorldConfig,
  actor: Agent,
  action: ForkAction,
  tick: number
): Validation {
  const split = action.split ?? config.defaultForkSplit;
  if (!Number.isFinite(split) || split <= 0 || split >= 1) {
    return err('INVALID_TARGET', 'Fork split must be strictly between 0 and 1');
  }
  const [first, second] = forkChildIds(action, tick);
  if (first === second || first === '' || second === '') {
    return err('INVALID_TARGET', 'Fork children need two distinct ids');
  }
  if (state.agents.has(first) || state.agents.has(second)) {
    return err('INVALID_TARGET', 'Fork child id already in use');
  }
  const region = state.regions.get(actor.regionId);
  // Parent leaves, two children arrive
  if (!region || !hasSpareCapacity(region, 1)) {
    return err('REGION_FULL', `Region ${actor.regionId} has no room for a fork`);
  }
  return ok(undefined);
}

// ============================================================================
// RESOLUTION - Turn an accepted action into the event that records its delta
// ============================================================================

/**
 * Build the committed event for an action that passed validation against
 * the same state.
 */
export function resolveAction(
  state: WorldState,
  config: WorldConfig,
  action: Action,
  tick: number
): WorldEvent {
  if (action.type === 'REGISTER') {
    const regionId = action.regionId ?? config.spawnRegionId;
    return {
      type: 'AGENT_REGISTERED',
      agentIds: [action.agentId],
      payload: { agentId: action.agentId, regionId, resources: initialAgentResources(config) },
    };
  }

  const actor = requireAgent(state, action.agentId);
  const cost = actionCost(state, config, action);

  switch (action.type) {
    case 'CLAIM':
      return {
        type: 'AGENT_CLAIMED',
        agentIds: [actor.agentId],
        payload: { agentId: actor.agentId, claimRef: action.claimRef },
      };
    case 'MOVE':
      return {
        type: 'AGENT_MOVED',
        agentIds: [actor.agentId],
        payload: { agentId: actor.agentId, fromRegionId: actor.regionId, toRegionId: action.toRegionId, cost },
      };
    case 'TRADE': {
      const counterparty = action.counterparty;
      return {
        type: 'RESOURCES_TRADED',
        agentIds: counterparty.kind === 'AGENT' ? [actor.agentId, counterparty.agentId] : [actor.agentId],
        payload: {
          agentId: actor.agentId,
          counterparty: counterparty.kind === 'AGENT' ? { kind: 'AGENT', agentId: counterparty.agentId } : { kind: 'REGION' },
          regionId: actor.regionId,
          give: createResources(action.give),
          take: createResources(action.take),
        },
      };
    }
    case 'COMMUNICATE': {
      const dist = agentDistance(state, actor, action.toAgentId);
      return {
        type: 'MESSAGE_DELIVERED',
        agentIds: [actor.agentId, action.toAgentId],
        payload: {
          agentId: actor.agentId,
          toAgentId: action.toAgentId,
          content: action.content,
          distance: dist,
          noiseFactor: communicationNoiseFactor(dist),
          cost,
        },
      };
    }
    case 'FORK': {
      const split = action.split ?? config.defaultForkSplit;
      const childIds = forkChildIds(action, tick);
      const childResources = splitForForkResources(actor.resources, cost, split);
      return {
        type: 'AGENT_FORKED',
        agentIds: [actor.agentId, childIds[0], childIds[1]],
        payload: { agentId: actor.agentId, childIds, regionId: actor.regionId, split, cost, childResources },
      };
    }
    case 'MERGE': {
      const absorbed = requireAgent(state, action.targetAgentId);
      return {
        type: 'AGENT_MERGED',
        agentIds: [actor.agentId, absorbed.agentId],
        payload: { agentId: actor.agentId, absorbedId: absorbed.agentId, cost, absorbed: absorbed.resources },
      };
    }
    case 'DIE':
      return {
        type: 'AGENT_DIED',
        agentIds: [actor.agentId],
        payload: { agentId: actor.agentId, regionId: actor.regionId, cause: 'VOLUNTARY', released: actor.resources },
      };
    case 'OBSERVE':
      return {
        type: 'AGENT_OBSERVED',
        agentIds: [actor.agentId],
        payload: {
          agentId: actor.agentId,
          regionId: actor.regionId,
          cost,
          visibleAgentIds: getLiveAgentsInRegion(state, actor.regionId).map((agent) => agent.agentId),
        },
      };
  }
}

/**
 * Resources for the two fork children: the first gets `remaining * split`,
 * the second gets exactly what is left, so nothing is created or lost.
 */
export function splitForForkResources(
  parent: Resources,
  cost: Resources,
  split: number
): readonly [Resources, Resources] {
  const remaining = subtractBundle(parent, cost) ?? difference(parent, cost);
  const first = scaleBundle(remaining, split);
  return [first, difference(remaining, first)];
}

function requireAgent(state: WorldState, agentId: string): Agent {
  const agent = state.agents.get(agentId);
  if (!agent) {
    throw new Error(`Agent ${agentId} vanished between validation and resolution`);
  }
  return agent;
}

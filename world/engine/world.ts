// ============================================================================
// WORLD ENGINE - The main API for interacting with the simulation
// ============================================================================

import type { Agent } from '../entities/agent';
import type { WorldConfig } from '../map/mapDef';
import type { WorldState } from '../state/worldState';
import type { WorldSnapshot } from '../state/serialize';
import type { QueuedAction, Rejection, WorldEvent } from '../actions/types';
import { cloneWorldState, compareIds, createWorldState } from '../state/worldState';
import { createWorldSnapshot } from '../state/serialize';
import { resolveAction, validateAction } from '../actions/pipeline';
import { applyEvent } from './apply';
import { runPhysics } from './physics';

/** Outcome of processing one tick on a working copy, not yet committed */
export interface TickResult {
  readonly tick: number;
  /** Accepted action events in execution order, closed by TICK_ADVANCED */
  readonly events: readonly WorldEvent[];
  readonly rejections: readonly Rejection[];
  /** Base tick the working state was built from */
  readonly baseTick: number;
  readonly state: WorldState;
}

/**
 * Deterministic execution order: arrival number first, then agent id for
 * actions that arrived together, then their position in the drained batch.
 */
export function orderActions(batch: readonly QueuedAction[]): QueuedAction[] {
  return batch
    .map((queued, index) => ({ queued, index }))
    .sort((a, b) =>
      a.queued.arrival - b.queued.arrival ||
      compareIds(a.queued.action.agentId, b.queued.action.agentId) ||
      a.index - b.index
    )
    .map(({ queued }) => queued);
}

/**
 * World is the SINGLE SOURCE OF TRUTH for the simulation.
 *
 * Invariants:
 * - All operations are synchronous
 * - All operations are deterministic
 * - Rejections are returned as values, never thrown
 * - The committed state only changes through commit()
 * - Readers only ever see the frozen view published by the last commit
 */
export class World {
  private state: WorldState;
  private view: WorldSnapshot;

  constructor(private readonly config: WorldConfig, initial?: WorldState) {
    this.state = initial ? cloneWorldState(initial) : createWorldState(config);
    this.view = createWorldSnapshot(this.state);
  }

  /** Last committed tick */
  get tick(): number {
    return this.state.tick;
  }

  getConfig(): WorldConfig {
    return this.config;
  }

  /** Latest committed state as an immutable view */
  getSnapshot(): WorldSnapshot {
    return this.view;
  }

  getAgent(agentId: string): Agent | undefined {
    return this.view.agents.find((agent) => agent.agentId === agentId);
  }

  /**
   * Run one tick against a working copy: validate and apply each action in
   * order, then passive physics. The committed state is left untouched.
   */
  processTick(batch: readonly QueuedAction[]): TickResult {
    const baseTick = this.state.tick;
    const tick = baseTick + 1;
    const working = cloneWorldState(this.state);
    const events: WorldEvent[] = [];
    const rejections: Rejection[] = [];

    for (const { arrival, action } of orderActions(batch)) {
      const validation = validateAction(working, this.config, action, tick);
      if (!validation.ok) {
        rejections.push({
          tick,
          arrival,
          agentId: action.agentId,
          actionType: action.type,
          reason: validation.error.code,
          message: validation.error.message,
        });
        continue;
      }
      const event = resolveAction(working, this.config, action, tick);
      applyEvent(working, this.config, event, tick);
      events.push(event);
    }

    const outcome = runPhysics(working, this.config, tick);
    events.push({
      type: 'TICK_ADVANCED',
      agentIds: outcome.deaths.map((death) => death.agentId),
      payload: outcome,
    });

    return { tick, events, rejections, baseTick, state: working };
  }

  /**
   * Make a processed tick the committed state and publish a new view.
   * Call only after the tick's events are durably recorded.
   */
  commit(result: TickResult): void {
    if (result.baseTick !== this.state.tick) {
      throw new Error(`Tick ${result.tick} was built on tick ${result.baseTick}, world is at ${this.state.tick}`);
    }
    this.state = result.state;
    this.view = createWorldSnapshot(this.state);
  }

  /** Replace the committed state, e.g. after recovery from the ledger */
  restore(state: WorldState): void {
    this.state = cloneWorldState(state);
    this.view = createWorldSnapshot(this.state);
  }

  /** Working copy of the committed state, for callers that need a mutable WorldState */
  cloneState(): WorldState {
    return cloneWorldState(this.state);
  }
}

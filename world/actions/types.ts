import type { ResourceBundle, Resources } from '../entities/resources';

// ============================================================================
// WORLD ACTIONS - The ONLY way to mutate world state
// ============================================================================

interface ActionBase {
  readonly agentId: string;
  /** Tick current when the action was queued. Ordering metadata only */
  readonly submittedTick: number;
}

/** Agent creation, fed in by the registration collaborator */
export interface RegisterAction extends ActionBase {
  readonly type: 'REGISTER';
  /** Defaults to the configured spawn region */
  readonly regionId?: string;
}

/** Outcome of an external claim verification */
export interface ClaimAction extends ActionBase {
  readonly type: 'CLAIM';
  readonly claimRef: string;
}

export interface MoveAction extends ActionBase {
  readonly type: 'MOVE';
  readonly toRegionId: string;
}

export type TradeCounterparty =
  | { readonly kind: 'AGENT'; readonly agentId: string }
  | { readonly kind: 'REGION' };

/**
 * Transfer between the actor and another agent or the actor's region pool.
 * `give` flows to the counterparty; `take` flows from the region pool.
 */
export interface TradeAction extends ActionBase {
  readonly type: 'TRADE';
  readonly counterparty: TradeCounterparty;
  readonly give: ResourceBundle;
  readonly take: ResourceBundle;
}

/** Content arrives already noised by the messaging collaborator */
export interface CommunicateAction extends ActionBase {
  readonly type: 'COMMUNICATE';
  readonly toAgentId: string;
  readonly content: string;
}

export interface ForkAction extends ActionBase {
  readonly type: 'FORK';
  /** Share for the first child, exclusive 0..1 */
  readonly split?: number;
  readonly childIds?: readonly [string, string];
}

export interface MergeAction extends ActionBase {
  readonly type: 'MERGE';
  /** Agent absorbed into the actor */
  readonly targetAgentId: string;
}

export interface DieAction extends ActionBase {
  readonly type: 'DIE';
}

export interface ObserveAction extends ActionBase {
  readonly type: 'OBSERVE';
}

/** Discriminated union of all possible actions */
export type Action =
  | RegisterAction
  | ClaimAction
  | MoveAction
  | TradeAction
  | CommunicateAction
  | ForkAction
  | MergeAction
  | DieAction
  | ObserveAction;

export type ActionType = Action['type'];

/** An action as drained from the queue */
export interface QueuedAction {
  /** Arrival number assigned by the queue; equal for actions submitted together */
  readonly arrival: number;
  readonly action: Action;
}

// ============================================================================
// WORLD EVENTS - Committed state transitions, written to the ledger
// ============================================================================

export interface AgentRegisteredEvent {
  readonly type: 'AGENT_REGISTERED';
  readonly agentIds: readonly string[];
  readonly payload: {
    readonly agentId: string;
    readonly regionId: string;
    readonly resources: Resources;
  };
}

export interface AgentClaimedEvent {
  readonly type: 'AGENT_CLAIMED';
  readonly agentIds: readonly string[];
  readonly payload: {
    readonly agentId: string;
    readonly claimRef: string;
  };
}

export interface AgentMovedEvent {
  readonly type: 'AGENT_MOVED';
  readonly agentIds: readonly string[];
  readonly payload: {
    readonly agentId: string;
    readonly fromRegionId: string;
    readonly toRegionId: string;
    readonly cost: Resources;
  };
}

export interface ResourcesTradedEvent {
  readonly type: 'RESOURCES_TRADED';
  readonly agentIds: readonly string[];
  readonly payload: {
    readonly agentId: string;
    readonly counterparty: TradeCounterparty;
    /** Region whose pool takes part when the counterparty is REGION */
    readonly regionId: string;
    readonly give: Resources;
    readonly take: Resources;
  };
}

export interface MessageDeliveredEvent {
  readonly type: 'MESSAGE_DELIVERED';
  readonly agentIds: readonly string[];
  readonly payload: {
    readonly agentId: string;
    readonly toAgentId: string;
    readonly content: string;
    readonly distance: number;
    readonly noiseFactor: number;
    readonly cost: Resources;
  };
}

export interface AgentForkedEvent {
  readonly type: 'AGENT_FORKED';
  readonly agentIds: readonly string[];
  readonly payload: {
    readonly agentId: string;
    readonly childIds: readonly [string, string];
    readonly regionId: string;
    readonly split: number;
    readonly cost: Resources;
    readonly childResources: readonly [Resources, Resources];
  };
}

export interface AgentMergedEvent {
  readonly type: 'AGENT_MERGED';
  readonly agentIds: readonly string[];
  readonly payload: {
    readonly agentId: string;
    readonly absorbedId: string;
    readonly cost: Resources;
    readonly absorbed: Resources;
  };
}

export type DeathCause = 'VOLUNTARY' | 'ENERGY_DEPLETED';

export interface AgentDiedEvent {
  readonly type: 'AGENT_DIED';
  readonly agentIds: readonly string[];
  readonly payload: {
    readonly agentId: string;
    readonly regionId: string;
    readonly cause: DeathCause;
    /** Returned to the region pool */
    readonly released: Resources;
  };
}

export interface AgentObservedEvent {
  readonly type: 'AGENT_OBSERVED';
  readonly agentIds: readonly string[];
  readonly payload: {
    readonly agentId: string;
    readonly regionId: string;
    readonly cost: Resources;
    readonly visibleAgentIds: readonly string[];
  };
}

export interface PhysicsDeath {
  readonly agentId: string;
  readonly regionId: string;
  readonly cause: DeathCause;
  readonly released: Resources;
}

/** Closes every committed tick. Physics is recomputed from the seed on replay */
export interface TickAdvancedEvent {
  readonly type: 'TICK_ADVANCED';
  readonly agentIds: readonly string[];
  readonly payload: {
    readonly seed: number;
    readonly dangerHits: readonly string[];
    readonly deaths: readonly PhysicsDeath[];
  };
}

/** Discriminated union of all world events */
export type WorldEvent =
  | AgentRegisteredEvent
  | AgentClaimedEvent
  | AgentMovedEvent
  | ResourcesTradedEvent
  | MessageDeliveredEvent
  | AgentForkedEvent
  | AgentMergedEvent
  | AgentDiedEvent
  | AgentObservedEvent
  | TickAdvancedEvent;

export type WorldEventType = WorldEvent['type'];

/** A world event once committed to the ledger */
export type LedgerRecord = WorldEvent & {
  readonly sequence: number;
  readonly tick: number;
  /** Wall-clock ms. Informational, never read by replay */
  readonly timestamp: number;
};

// ============================================================================
// REJECTIONS
// ============================================================================

export type RejectionReason =
  | 'INSUFFICIENT_RESOURCES'
  | 'REGION_FULL'
  | 'AGENT_NOT_CLAIMED'
  | 'AGENT_RETIRED'
  | 'INVALID_TARGET'
  | 'UNKNOWN_AGENT';

export interface Rejection {
  readonly tick: number;
  readonly arrival: number;
  readonly agentId: string;
  readonly actionType: ActionType;
  readonly reason: RejectionReason;
  readonly message: string;
}

// ============================================================================
// RESULT TYPE - World never throws on rejection, returns Result instead
// ============================================================================

export interface ResultOk<T> {
  readonly ok: true;
  readonly value: T;
}

export interface ResultErr<C extends string = string> {
  readonly ok: false;
  readonly error: {
    readonly code: C;
    readonly message: string;
  };
}

export type Result<T, C extends string = string> = ResultOk<T> | ResultErr<C>;

/** Helper to create success result */
export function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

/** Helper to create error result */
export function err<C extends string>(code: C, message: string): ResultErr<C> {
  return { ok: false, error: { code, message } };
}

// ============================================================================
// WORLD MODULE - Deterministic core of the agent simulation
// ============================================================================

// Core engine
export { World, orderActions, applyEvent, runPhysics, decayAndRegen, replayRecords } from './engine';
export { IntegrityError, ReplayRangeError } from './engine';
export type { TickResult, PhysicsOutcome } from './engine';

// Entities
export { canTransition, createAgent, isLive, isRetired } from './entities/agent';
export type { Agent, AgentStatus } from './entities/agent';
export {
  RESOURCE_KINDS,
  EMPTY_RESOURCES,
  createResources,
  canAfford,
  subtractBundle,
  addBundle,
  scaleBundle,
  isEmptyBundle,
  isValidBundle,
  sameResources,
  totalOf,
} from './entities/resources';
export type { ResourceKind, Resources, ResourceBundle } from './entities/resources';

// Map
export {
  DEFAULT_REGIONS,
  DEFAULT_WORLD_CONFIG,
  createRegion,
  hasSpareCapacity,
  distance,
  distanceCostMultiplier,
  communicationNoiseFactor,
  initialAgentResources,
} from './map';
export type { Region, RegionDef, ResourceRule, WorldConfig } from './map';

// Actions & Events
export type {
  Action,
  ActionType,
  QueuedAction,
  RegisterAction,
  ClaimAction,
  MoveAction,
  TradeAction,
  TradeCounterparty,
  CommunicateAction,
  ForkAction,
  MergeAction,
  DieAction,
  ObserveAction,
  WorldEvent,
  WorldEventType,
  AgentRegisteredEvent,
  AgentClaimedEvent,
  AgentMovedEvent,
  ResourcesTradedEvent,
  MessageDeliveredEvent,
  AgentForkedEvent,
  AgentMergedEvent,
  AgentDiedEvent,
  AgentObservedEvent,
  TickAdvancedEvent,
  PhysicsDeath,
  DeathCause,
  LedgerRecord,
  Rejection,
  RejectionReason,
  Result,
  ResultOk,
  ResultErr,
} from './actions';
export { ok, err } from './actions';

// Pipeline (exposed for testing/advanced use)
export { actionCost, validateAction, resolveAction, splitForForkResources } from './actions';

// State (exposed for testing/advanced use)
export type { WorldState, SerializedWorld, SnapshotRecord, WorldSnapshot, ResourcePoolRecord } from './state';
export {
  createWorldState,
  cloneWorldState,
  getAgent,
  getAllAgents,
  getLiveAgentsInRegion,
  compareIds,
  serializeWorld,
  deserializeWorld,
  hashSerialized,
  hashWorld,
  createSnapshotRecord,
  createWorldSnapshot,
} from './state';

// Deterministic randomness
export { SeededRng, tickSeed } from './utils/rng';

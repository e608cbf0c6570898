import { z } from 'zod';
import type { Action, LedgerRecord, Rejection, SnapshotRecord } from '../../world/index.ts';

// ============================================================================
// SHARED PIECES
// ============================================================================

const Amount = z.number().finite().nonnegative();
const Tick = z.number().int().nonnegative();
const Id = z.string().min(1).max(128);

export const ResourcesSchema = z.object({
  energy: Amount,
  bandwidth: Amount,
  memory: Amount,
  compute: Amount,
});

export const ResourceBundleSchema = z.object({
  energy: Amount.optional(),
  bandwidth: Amount.optional(),
  memory: Amount.optional(),
  compute: Amount.optional(),
});

const TradeCounterpartySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('AGENT'), agentId: Id }),
  z.object({ kind: z.literal('REGION') }),
]);

const ActionTypeSchema = z.enum([
  'REGISTER',
  'CLAIM',
  'MOVE',
  'TRADE',
  'COMMUNICATE',
  'FORK',
  'MERGE',
  'DIE',
  'OBSERVE',
]);

// ============================================================================
// ACTIONS - As submitted on the play socket, before the tick stamp
// ============================================================================

export const ActionInputSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('REGISTER'), agentId: Id, regionId: Id.optional() }),
  z.object({ type: z.literal('CLAIM'), agentId: Id, claimRef: z.string().min(1) }),
  z.object({ type: z.literal('MOVE'), agentId: Id, toRegionId: Id }),
  z.object({
    type: z.literal('TRADE'),
    agentId: Id,
    counterparty: TradeCounterpartySchema,
    give: ResourceBundleSchema.default({}),
    take: ResourceBundleSchema.default({}),
  }),
  z.object({ type: z.literal('COMMUNICATE'), agentId: Id, toAgentId: Id, content: z.string().max(4096) }),
  z.object({
    type: z.literal('FORK'),
    agentId: Id,
    split: z.number().finite().optional(),
    childIds: z.tuple([Id, Id]).optional(),
  }),
  z.object({ type: z.literal('MERGE'), agentId: Id, targetAgentId: Id }),
  z.object({ type: z.literal('DIE'), agentId: Id }),
  z.object({ type: z.literal('OBSERVE'), agentId: Id }),
]);

export type ActionInput = z.infer<typeof ActionInputSchema>;

/** Stamp submissions with the tick that was current when they were queued */
export function stampActions(inputs: readonly ActionInput[], submittedTick: number): Action[] {
  return inputs.map((input): Action => ({ ...input, submittedTick }));
}

// ============================================================================
// CLIENT MESSAGES
// ============================================================================

export const PlayMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('SUBMIT'),
    actions: z.array(ActionInputSchema).min(1).max(256),
  }),
]);

export type PlayMessage = z.infer<typeof PlayMessageSchema>;

const EventTypeSchema = z.enum([
  'AGENT_REGISTERED',
  'AGENT_CLAIMED',
  'AGENT_MOVED',
  'RESOURCES_TRADED',
  'MESSAGE_DELIVERED',
  'AGENT_FORKED',
  'AGENT_MERGED',
  'AGENT_DIED',
  'AGENT_OBSERVED',
  'TICK_ADVANCED',
]);

export const LedgerQuerySchema = z.object({
  fromTick: Tick.optional(),
  toTick: Tick.optional(),
  agentId: Id.optional(),
  type: EventTypeSchema.optional(),
  limit: z.number().int().positive().max(10_000).optional(),
});

export type LedgerQuery = z.infer<typeof LedgerQuerySchema>;

export const WatchMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('GET_SNAPSHOT') }),
  z.object({ type: z.literal('LEDGER_QUERY'), query: LedgerQuerySchema.default({}) }),
  z.object({ type: z.literal('REPLAY'), tick: z.number().int() }),
  z.object({ type: z.literal('TIMELINE'), agentId: Id, fromTick: Tick.optional(), toTick: Tick.optional() }),
  z.object({ type: z.literal('GET_ANALYTICS') }),
]);

export type WatchMessage = z.infer<typeof WatchMessageSchema>;

// ============================================================================
// LEDGER RECORDS
// ============================================================================

const DeathSchema = z.object({
  agentId: Id,
  regionId: Id,
  cause: z.enum(['VOLUNTARY', 'ENERGY_DEPLETED']),
  released: ResourcesSchema,
});

const agentIds = z.array(Id);

export const WorldEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('AGENT_REGISTERED'),
    agentIds,
    payload: z.object({ agentId: Id, regionId: Id, resources: ResourcesSchema }),
  }),
  z.object({
    type: z.literal('AGENT_CLAIMED'),
    agentIds,
    payload: z.object({ agentId: Id, claimRef: z.string() }),
  }),
  z.object({
    type: z.literal('AGENT_MOVED'),
    agentIds,
    payload: z.object({ agentId: Id, fromRegionId: Id, toRegionId: Id, cost: ResourcesSchema }),
  }),
  z.object({
    type: z.literal('RESOURCES_TRADED'),
    agentIds,
    payload: z.object({
      agentId: Id,
      counterparty: TradeCounterpartySchema,
      regionId: Id,
      give: ResourcesSchema,
      take: ResourcesSchema,
    }),
  }),
  z.object({
    type: z.literal('MESSAGE_DELIVERED'),
    agentIds,
    payload: z.object({
      agentId: Id,
      toAgentId: Id,
      content: z.string(),
      distance: Amount,
      noiseFactor: Amount,
      cost: ResourcesSchema,
    }),
  }),
  z.object({
    type: z.literal('AGENT_FORKED'),
    agentIds,
    payload: z.object({
      agentId: Id,
      childIds: z.tuple([Id, Id]),
      regionId: Id,
      split: z.number().finite(),
      cost: ResourcesSchema,
      childResources: z.tuple([ResourcesSchema, ResourcesSchema]),
    }),
  }),
  z.object({
    type: z.literal('AGENT_MERGED'),
    agentIds,
    payload: z.object({ agentId: Id, absorbedId: Id, cost: ResourcesSchema, absorbed: ResourcesSchema }),
  }),
  z.object({
    type: z.literal('AGENT_DIED'),
    agentIds,
    payload: DeathSchema,
  }),
  z.object({
    type: z.literal('AGENT_OBSERVED'),
    agentIds,
    payload: z.object({ agentId: Id, regionId: Id, cost: ResourcesSchema, visibleAgentIds: z.array(Id) }),
  }),
  z.object({
    type: z.literal('TICK_ADVANCED'),
    agentIds,
    payload: z.object({
      seed: z.number().int().nonnegative(),
      dangerHits: z.array(Id),
      deaths: z.array(DeathSchema),
    }),
  }),
]);

const RecordMetaSchema = z.object({
  sequence: z.number().int().positive(),
  tick: z.number().int().positive(),
  timestamp: z.number().finite(),
});

export const LedgerRecordSchema = z.intersection(WorldEventSchema, RecordMetaSchema);

export function parseLedgerRecord(value: unknown): LedgerRecord {
  return LedgerRecordSchema.parse(value);
}

export const RejectionSchema = z.object({
  tick: z.number().int().positive(),
  arrival: z.number().int().positive(),
  agentId: Id,
  actionType: ActionTypeSchema,
  reason: z.enum([
    'INSUFFICIENT_RESOURCES',
    'REGION_FULL',
    'AGENT_NOT_CLAIMED',
    'AGENT_RETIRED',
    'INVALID_TARGET',
    'UNKNOWN_AGENT',
  ]),
  message: z.string(),
});

export function parseRejection(value: unknown): Rejection {
  return RejectionSchema.parse(value);
}

// ============================================================================
// SNAPSHOT RECORDS
// ============================================================================

const RegionSchema = z.object({
  regionId: Id,
  name: z.string(),
  x: z.number().finite(),
  y: z.number().finite(),
  danger: z.number().min(0).max(1),
  resourceMultiplier: Amount,
  capacity: z.number().int().nonnegative(),
  occupancy: z.number().int().nonnegative(),
});

const AgentSchema = z.object({
  agentId: Id,
  status: z.enum(['PENDING', 'CLAIMED', 'DEAD', 'FORKED', 'MERGED']),
  regionId: Id,
  resources: ResourcesSchema,
  createdTick: Tick,
  lastActionTick: Tick,
  claimRef: z.string().optional(),
  parentId: Id.optional(),
  retiredTick: Tick.optional(),
});

export const SnapshotRecordSchema = z.object({
  tick: Tick,
  stateHash: z.string().regex(/^[0-9a-f]{64}$/),
  regions: z.array(RegionSchema),
  agents: z.array(AgentSchema),
  resourcePools: z.array(z.object({ regionId: Id, resources: ResourcesSchema })),
});

export function parseSnapshotRecord(value: unknown): SnapshotRecord {
  return SnapshotRecordSchema.parse(value);
}

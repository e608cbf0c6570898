import { isDeepStrictEqual } from 'node:util';
import { createClient } from '@supabase/supabase-js';
import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { LedgerRecord, Rejection, SnapshotRecord } from '../../world/index.ts';
import type { LedgerStore } from './ledger';
import type { SnapshotStore } from './snapshots';
import { pickLatest } from './snapshots';
import { parseLedgerRecord, parseSnapshotRecord } from './schemas';

// Create Supabase client with optimized settings
export function createSupabase(url: string, serviceKey: string, fetchImpl?: typeof fetch): SupabaseClient {
  return createClient(url, serviceKey, {
    db: {
      schema: 'public'
    },
    auth: {
      persistSession: false,
      autoRefreshToken: false
    },
    ...(fetchImpl ? { global: { fetch: fetchImpl } } : {})
  });
}

interface QueryResult<T> {
  data: T | null;
  error: { message: string } | null;
}

// Retry wrapper for Supabase queries
export async function withRetry<T>(
  operation: () => PromiseLike<QueryResult<T>>,
  maxRetries: number = 3,
  delayMs: number = 1000
): Promise<QueryResult<T>> {
  let lastError: { message: string } | null = null;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    const result = await operation();

    if (!result.error) {
      return result;
    }

    lastError = result.error;
    console.warn(`[DB] Query attempt ${attempt}/${maxRetries} failed:`, result.error.message);

    if (attempt < maxRetries) {
      await new Promise(resolve => setTimeout(resolve, delayMs * attempt));
    }
  }

  return { data: null, error: lastError };
}

// Supabase caps a select at 1000 rows
const PAGE_SIZE = 1000;

// Postgres unique_violation
const UNIQUE_VIOLATION = '23505';

// ============================================================================
// LEDGER
// ============================================================================

const LedgerRowSchema = z.object({
  sequence: z.number(),
  tick: z.number(),
  type: z.string(),
  agent_ids: z.array(z.string()),
  payload: z.unknown(),
  timestamp: z.number(),
});

const RejectionRowSchema = z.object({
  tick: z.number(),
  arrival: z.number(),
  agent_id: z.string(),
  action_type: z.string(),
  reason: z.string(),
  message: z.string(),
});

type RejectionRow = z.infer<typeof RejectionRowSchema>;

type LedgerRow = {
  sequence: number;
  tick: number;
  type: string;
  agent_ids: readonly string[];
  payload: unknown;
  timestamp: number;
};

function toLedgerRow(record: LedgerRecord): LedgerRow {
  return {
    sequence: record.sequence,
    tick: record.tick,
    type: record.type,
    agent_ids: record.agentIds,
    payload: record.payload,
    timestamp: record.timestamp,
  };
}

/** Rows read back from the table hold exactly the given batch, compared as JSON values */
function sameRows(expected: readonly LedgerRow[], stored: readonly unknown[]): boolean {
  return (
    expected.length === stored.length &&
    expected.every((row, index) => isDeepStrictEqual(JSON.parse(JSON.stringify(row)), stored[index]))
  );
}

function toRejectionRow(rejection: Rejection): RejectionRow {
  return {
    tick: rejection.tick,
    arrival: rejection.arrival,
    agent_id: rejection.agentId,
    action_type: rejection.actionType,
    reason: rejection.reason,
    message: rejection.message,
  };
}

/**
 * Ledger rows in `ledger_records`, keyed by sequence. A batch is one
 * multi-row insert, so Postgres stores the whole tick or none of it.
 */
export class SupabaseLedgerStore implements LedgerStore {
  constructor(private readonly client: SupabaseClient) {}

  async load(): Promise<LedgerRecord[]> {
    const records: LedgerRecord[] = [];
    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await withRetry<unknown[]>(() =>
        this.client
          .from('ledger_records')
          .select('sequence, tick, type, agent_ids, payload, timestamp')
          .order('sequence', { ascending: true })
          .range(from, from + PAGE_SIZE - 1)
      );
      if (error) {
        throw new Error(`[DB] Loading ledger failed: ${error.message}`);
      }
      const rows = z.array(LedgerRowSchema).parse(data ?? []);
      for (const row of rows) {
        records.push(
          parseLedgerRecord({
            sequence: row.sequence,
            tick: row.tick,
            type: row.type,
            agentIds: row.agent_ids,
            payload: row.payload,
            timestamp: row.timestamp,
          })
        );
      }
      if (rows.length < PAGE_SIZE) {
        return records;
      }
    }
  }

  /**
   * A retry after an insert that landed but whose response was lost hits
   * the primary key. That counts as success when the stored rows are this
   * batch.
   */
  async append(records: readonly LedgerRecord[]): Promise<void> {
    const rows = records.map(toLedgerRow);
    const { error } = await withRetry<null>(async () => {
      const result = await this.client.from('ledger_records').insert(rows);
      if (result.error?.code === UNIQUE_VIOLATION && (await this.holdsBatch(rows))) {
        console.warn(`[DB] Ledger batch from sequence ${rows[0]?.sequence} was already stored`);
        return { data: null, error: null };
      }
      return result;
    });
    if (error) {
      throw new Error(error.message);
    }
  }

  private async holdsBatch(rows: readonly LedgerRow[]): Promise<boolean> {
    const first = rows[0];
    const last = rows[rows.length - 1];
    if (!first || !last) return false;

    const { data, error } = await this.client
      .from('ledger_records')
      .select('sequence, tick, type, agent_ids, payload, timestamp')
      .gte('sequence', first.sequence)
      .lte('sequence', last.sequence)
      .order('sequence', { ascending: true });
    if (error) {
      console.warn('[DB] Could not read back ledger batch:', error.message);
      return false;
    }
    return sameRows(rows, data ?? []);
  }

  async appendRejections(rejections: readonly Rejection[]): Promise<void> {
    if (rejections.length === 0) return;
    const { error } = await withRetry<null>(() =>
      this.client.from('ledger_rejections').insert(rejections.map(toRejectionRow))
    );
    if (error) {
      throw new Error(error.message);
    }
  }
}

// ============================================================================
// SNAPSHOTS
// ============================================================================

const SnapshotRowSchema = z.object({
  tick: z.number(),
  state_hash: z.string(),
  regions: z.unknown(),
  agents: z.unknown(),
  resource_pools: z.unknown(),
});

function fromSnapshotRow(row: z.infer<typeof SnapshotRowSchema>): SnapshotRecord {
  return parseSnapshotRecord({
    tick: row.tick,
    stateHash: row.state_hash,
    regions: row.regions,
    agents: row.agents,
    resourcePools: row.resource_pools,
  });
}

/** Snapshot rows in `world_snapshots`, keyed by tick. A stored snapshot is never replaced */
export class SupabaseSnapshotStore implements SnapshotStore {
  constructor(private readonly client: SupabaseClient) {}

  async list(): Promise<SnapshotRecord[]> {
    const { data, error } = await withRetry<unknown[]>(() =>
      this.client
        .from('world_snapshots')
        .select('tick, state_hash, regions, agents, resource_pools')
        .order('tick', { ascending: true })
    );
    if (error) {
      throw new Error(`[DB] Loading snapshots failed: ${error.message}`);
    }
    return z.array(SnapshotRowSchema).parse(data ?? []).map(fromSnapshotRow);
  }

  async latestAtOrBefore(tick: number): Promise<SnapshotRecord | undefined> {
    const { data, error } = await withRetry<unknown[]>(() =>
      this.client
        .from('world_snapshots')
        .select('tick, state_hash, regions, agents, resource_pools')
        .lte('tick', tick)
        .order('tick', { ascending: false })
        .limit(1)
    );
    if (error) {
      throw new Error(`[DB] Loading snapshot failed: ${error.message}`);
    }
    const snapshots = z.array(SnapshotRowSchema).parse(data ?? []).map(fromSnapshotRow);
    return pickLatest(snapshots, tick);
  }

  async save(snapshot: SnapshotRecord): Promise<void> {
    const { error } = await withRetry<null>(() =>
      this.client.from('world_snapshots').insert({
        tick: snapshot.tick,
        state_hash: snapshot.stateHash,
        regions: snapshot.regions,
        agents: snapshot.agents,
        resource_pools: snapshot.resourcePools,
      })
    );
    if (error) {
      throw new Error(error.message);
    }
  }
}

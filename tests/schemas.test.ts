import { describe, expect, it } from 'vitest';
import { createSnapshotRecord, createWorldState } from '../world/index.ts';
import type { LedgerRecord } from '../world/index.ts';
import {
  ActionInputSchema,
  PlayMessageSchema,
  WatchMessageSchema,
  parseLedgerRecord,
  parseRejection,
  parseSnapshotRecord,
  stampActions,
} from '../realtime-server/src/schemas.ts';
import { TEST_CONFIG } from './helpers.ts';

describe('action inputs', () => {
  it('fills in missing trade bundles and stamps the tick', () => {
    const input = ActionInputSchema.parse({ type: 'TRADE', agentId: 'a', counterparty: { kind: 'REGION' }, give: { energy: 3 } });

    expect(stampActions([input], 12)).toEqual([
      { type: 'TRADE', agentId: 'a', counterparty: { kind: 'REGION' }, give: { energy: 3 }, take: {}, submittedTick: 12 },
    ]);
  });

  it('drops a client-supplied tick stamp', () => {
    const input = ActionInputSchema.parse({ type: 'DIE', agentId: 'a', submittedTick: 999 });
    expect(stampActions([input], 4)).toEqual([{ type: 'DIE', agentId: 'a', submittedTick: 4 }]);
  });

  it('refuses negative amounts and unknown action types', () => {
    expect(
      ActionInputSchema.safeParse({ type: 'TRADE', agentId: 'a', counterparty: { kind: 'REGION' }, take: { energy: -1 } })
        .success
    ).toBe(false);
    expect(ActionInputSchema.safeParse({ type: 'TELEPORT', agentId: 'a' }).success).toBe(false);
  });

  it('bounds the size of a submission', () => {
    expect(PlayMessageSchema.safeParse({ type: 'SUBMIT', actions: [] }).success).toBe(false);
    const many = Array.from({ length: 257 }, (_, i) => ({ type: 'OBSERVE', agentId: `a${i}` }));
    expect(PlayMessageSchema.safeParse({ type: 'SUBMIT', actions: many }).success).toBe(false);
  });
});

describe('watch messages', () => {
  it('defaults an empty ledger query', () => {
    expect(WatchMessageSchema.parse({ type: 'LEDGER_QUERY' })).toEqual({ type: 'LEDGER_QUERY', query: {} });
  });
});

describe('stored records', () => {
  it('accepts a well-formed ledger record', () => {
    const record: LedgerRecord = {
      sequence: 4,
      tick: 2,
      type: 'AGENT_MOVED',
      agentIds: ['a'],
      payload: { agentId: 'a', fromRegionId: 'alpha', toRegionId: 'beta', cost: { energy: 7, bandwidth: 0, memory: 0, compute: 0 } },
      timestamp: 1000,
    };
    expect(parseLedgerRecord(JSON.parse(JSON.stringify(record)))).toEqual(record);
  });

  it('refuses a record without a sequence number', () => {
    expect(() =>
      parseLedgerRecord({ tick: 1, type: 'TICK_ADVANCED', agentIds: [], payload: { seed: 1, dangerHits: [], deaths: [] }, timestamp: 0 })
    ).toThrow();
  });

  it('reads rejections and snapshots', () => {
    const rejection = {
      tick: 3,
      arrival: 2,
      agentId: 'b',
      actionType: 'MOVE',
      reason: 'REGION_FULL',
      message: 'Region alpha is at capacity 200',
    };
    expect(parseRejection(rejection)).toEqual(rejection);

    const snapshot = createSnapshotRecord(createWorldState(TEST_CONFIG));
    expect(parseSnapshotRecord(JSON.parse(JSON.stringify(snapshot)))).toEqual(snapshot);
    expect(() => parseSnapshotRecord({ ...snapshot, stateHash: 'abc' })).toThrow();
  });
});

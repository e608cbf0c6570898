import { appendFile, mkdtemp, open, readFile, rm, writeFile } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { IntegrityError } from '../world/index.ts';
import type { LedgerRecord, WorldEvent } from '../world/index.ts';
import { FileLedgerStore, Ledger, LedgerWriteError } from '../realtime-server/src/ledger.ts';
import { MemoryLedgerStore } from './helpers.ts';

const tickEnd: WorldEvent = { type: 'TICK_ADVANCED', agentIds: [], payload: { seed: 1, dangerHits: [], deaths: [] } };

function claimed(agentId: string): WorldEvent {
  return { type: 'AGENT_CLAIMED', agentIds: [agentId], payload: { agentId, claimRef: `claim-${agentId}` } };
}

describe('Ledger', () => {
  it('numbers records from 1 without gaps across ticks', async () => {
    const ledger = await Ledger.open(new MemoryLedgerStore());
    await ledger.commit(1, [claimed('a'), tickEnd], 1000);
    const second = await ledger.commit(2, [tickEnd], 2000);

    expect(second).toEqual([{ sequence: 3, tick: 2, ...tickEnd, timestamp: 2000 }]);
    expect([...ledger.scan()].map((r) => r.sequence)).toEqual([1, 2, 3]);
    expect(ledger.headTick).toBe(2);
    expect(ledger.headSequence).toBe(3);
  });

  it('only accepts the next tick, closed by TICK_ADVANCED', async () => {
    const ledger = await Ledger.open(new MemoryLedgerStore());
    await expect(ledger.commit(2, [tickEnd])).rejects.toThrow(IntegrityError);
    await expect(ledger.commit(1, [claimed('a')])).rejects.toThrow(IntegrityError);
    expect(ledger.headSequence).toBe(0);
  });

  it('changes nothing when the store fails', async () => {
    const store = new MemoryLedgerStore();
    const ledger = await Ledger.open(store);
    store.failAppends = 1;

    const failed = ledger.commit(1, [claimed('a'), tickEnd]);
    await expect(failed).rejects.toThrow(LedgerWriteError);
    await expect(failed).rejects.toThrow('Failed to commit tick 1: disk full');
    expect(ledger.headTick).toBe(0);
    expect(store.records).toEqual([]);

    await ledger.commit(1, [claimed('a'), tickEnd]);
    expect(ledger.headSequence).toBe(2);
  });

  it('answers queries by tick range, agent and type', async () => {
    const ledger = await Ledger.open(new MemoryLedgerStore());
    await ledger.commit(1, [claimed('a'), claimed('b'), tickEnd], 0);
    await ledger.commit(2, [claimed('c'), tickEnd], 0);
    await ledger.commit(3, [claimed('a'), tickEnd], 0);

    expect(ledger.query({ agentId: 'a' }).map((r) => [r.tick, r.sequence])).toEqual([
      [1, 1],
      [3, 6],
    ]);
    expect(ledger.query({ fromTick: 2, toTick: 2 }).map((r) => r.sequence)).toEqual([4, 5]);
    expect(ledger.query({ type: 'AGENT_CLAIMED', limit: 2 }).map((r) => r.sequence)).toEqual([1, 2]);
    expect(ledger.eventsAtTick(3).map((r) => r.type)).toEqual(['AGENT_CLAIMED', 'TICK_ADVANCED']);
    expect(ledger.query({ fromTick: 9 })).toEqual([]);
  });

  it('refuses stored history with a sequence gap', async () => {
    const store = new MemoryLedgerStore();
    store.records.push(
      { sequence: 1, tick: 1, ...tickEnd, timestamp: 0 },
      { sequence: 3, tick: 2, ...tickEnd, timestamp: 0 }
    );
    await expect(Ledger.open(store)).rejects.toThrow(IntegrityError);
  });

  it('keeps rejections out of the committed records', async () => {
    const store = new MemoryLedgerStore();
    const ledger = await Ledger.open(store);
    await ledger.recordRejections([
      { tick: 1, arrival: 1, agentId: 'a', actionType: 'MOVE', reason: 'UNKNOWN_AGENT', message: 'Agent a does not exist' },
    ]);

    expect(store.rejections).toHaveLength(1);
    expect(store.records).toEqual([]);
    expect(ledger.headSequence).toBe(0);
  });
});

describe('FileLedgerStore', () => {
  let dir: string;
  let ledgerPath: string;
  let rejectionsPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ledger-test-'));
    ledgerPath = join(dir, 'ledger.jsonl');
    rejectionsPath = join(dir, 'rejections.jsonl');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('starts empty when no file exists', async () => {
    const ledger = await Ledger.open(new FileLedgerStore(ledgerPath, rejectionsPath));
    expect(ledger.headTick).toBe(0);
  });

  it('writes one JSON line per record and reads them back', async () => {
    const ledger = await Ledger.open(new FileLedgerStore(ledgerPath, rejectionsPath));
    await ledger.commit(1, [claimed('a'), tickEnd], 5);

    const lines = (await readFile(ledgerPath, 'utf8')).trimEnd().split('\n');
    expect(lines[0]).toBe(
      '{"sequence":1,"tick":1,"type":"AGENT_CLAIMED","agentIds":["a"],"payload":{"agentId":"a","claimRef":"claim-a"},"timestamp":5}'
    );
    expect(lines).toHaveLength(2);

    const reopened = await Ledger.open(new FileLedgerStore(ledgerPath, rejectionsPath));
    expect([...reopened.scan()]).toEqual([...ledger.scan()]);
  });

  it('cuts off a half-written line', async () => {
    const ledger = await Ledger.open(new FileLedgerStore(ledgerPath, rejectionsPath));
    await ledger.commit(1, [tickEnd], 0);
    const intact = await readFile(ledgerPath, 'utf8');
    await appendFile(ledgerPath, '{"sequence":2,"tick":2,"ty');

    const reopened = await Ledger.open(new FileLedgerStore(ledgerPath, rejectionsPath));

    expect(reopened.headTick).toBe(1);
    expect(await readFile(ledgerPath, 'utf8')).toBe(intact);
  });

  it('drops records of a tick that never reached TICK_ADVANCED', async () => {
    const ledger = await Ledger.open(new FileLedgerStore(ledgerPath, rejectionsPath));
    await ledger.commit(1, [tickEnd], 0);
    const intact = await readFile(ledgerPath, 'utf8');
    const orphan: LedgerRecord = { sequence: 2, tick: 2, ...claimed('a'), timestamp: 0 };
    await appendFile(ledgerPath, `${JSON.stringify(orphan)}\n`);

    const reopened = await Ledger.open(new FileLedgerStore(ledgerPath, rejectionsPath));
    expect(reopened.headSequence).toBe(1);
    expect(await readFile(ledgerPath, 'utf8')).toBe(intact);

    await reopened.commit(2, [claimed('b'), tickEnd], 0);
    expect(reopened.eventsAtTick(2).map((r) => r.sequence)).toEqual([2, 3]);
  });

  it('takes back a batch whose fsync failed, so the retry does not repeat it', async () => {
    const ledger = await Ledger.open(new FileLedgerStore(ledgerPath, rejectionsPath));
    await ledger.commit(1, [tickEnd], 0);
    const intact = await readFile(ledgerPath, 'utf8');

    const handle = await open(ledgerPath, 'r');
    const fileHandle: FileHandle = Object.getPrototypeOf(handle);
    await handle.close();
    const sync = vi.spyOn(fileHandle, 'sync').mockRejectedValueOnce(new Error('EIO: i/o error, fsync'));
    try {
      await expect(ledger.commit(2, [claimed('a'), tickEnd], 0)).rejects.toThrow(
        'Failed to commit tick 2: EIO: i/o error, fsync'
      );
      expect(await readFile(ledgerPath, 'utf8')).toBe(intact);
      expect(ledger.headSequence).toBe(1);

      await ledger.commit(2, [claimed('a'), tickEnd], 0);
    } finally {
      sync.mockRestore();
    }

    const reopened = await Ledger.open(new FileLedgerStore(ledgerPath, rejectionsPath));
    expect([...reopened.scan()].map((r) => [r.sequence, r.tick])).toEqual([
      [1, 1],
      [2, 2],
      [3, 2],
    ]);
  });

  it('refuses a corrupt line in the middle of the history', async () => {
    await writeFile(
      ledgerPath,
      `not json\n${JSON.stringify({ sequence: 1, tick: 1, ...tickEnd, timestamp: 0 })}\n`
    );
    await expect(Ledger.open(new FileLedgerStore(ledgerPath, rejectionsPath))).rejects.toThrow(IntegrityError);
  });

  it('writes rejections to their own file', async () => {
    const store = new FileLedgerStore(ledgerPath, rejectionsPath);
    const ledger = await Ledger.open(store);
    await ledger.recordRejections([
      { tick: 1, arrival: 2, agentId: 'b', actionType: 'DIE', reason: 'AGENT_NOT_CLAIMED', message: 'Agent b is not claimed' },
    ]);

    expect(await readFile(rejectionsPath, 'utf8')).toBe(
      '{"tick":1,"arrival":2,"agentId":"b","actionType":"DIE","reason":"AGENT_NOT_CLAIMED","message":"Agent b is not claimed"}\n'
    );
    expect(await store.load()).toEqual([]);
  });
});

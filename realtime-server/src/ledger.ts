import { appendFile, mkdir, open, readFile, truncate } from 'node:fs/promises';
import { dirname } from 'node:path';
import { IntegrityError } from '../../world/index.ts';
import type { LedgerRecord, Rejection, WorldEvent, WorldEventType } from '../../world/index.ts';
import { parseLedgerRecord } from './schemas';

// ============================================================================
// ERRORS
// ============================================================================

/** A batch could not be made durable. The tick did not happen */
export class LedgerWriteError extends Error {
  constructor(readonly tick: number, cause: unknown) {
    super(`Failed to commit tick ${tick}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'LedgerWriteError';
  }
}

// ============================================================================
// STORAGE
// ============================================================================

/** Backing store for committed records. Append-only by construction */
export interface LedgerStore {
  /** Every committed record in sequence order */
  load(): Promise<LedgerRecord[]>;
  /** Persist one tick's records as a unit: all of them or none */
  append(records: readonly LedgerRecord[]): Promise<void>;
  /** Diagnostics stream, kept apart from committed records */
  appendRejections(rejections: readonly Rejection[]): Promise<void>;
}

function toLine(value: unknown): string {
  return `${JSON.stringify(value)}\n`;
}

/**
 * JSON Lines ledger. One batch is one append followed by fsync, so a crash
 * leaves at most one incomplete batch at the tail, which load() cuts off.
 * A failed append is truncated away before it is reported.
 */
export class FileLedgerStore implements LedgerStore {
  constructor(private readonly path: string, private readonly rejectionsPath: string) {}

  async load(): Promise<LedgerRecord[]> {
    await mkdir(dirname(this.path), { recursive: true });
    const text = await readIfExists(this.path);
    const lines = text.split('\n');
    // Whatever follows the last newline never finished writing
    lines.pop();

    const records: LedgerRecord[] = [];
    for (const [index, line] of lines.entries()) {
      try {
        records.push(parseLedgerRecord(JSON.parse(line)));
      } catch (error) {
        if (index === lines.length - 1) {
          break;
        }
        throw new IntegrityError(`Unreadable ledger line ${index + 1}: ${describe(error)}`);
      }
    }

    let kept = records.length;
    while (kept > 0 && records[kept - 1]?.type !== 'TICK_ADVANCED') {
      kept--;
    }
    const keptBytes = lineOffset(text, kept);
    const onDisk = Buffer.byteLength(text);
    if (keptBytes !== onDisk) {
      console.warn(
        `[Ledger] Discarding ${onDisk - keptBytes} bytes of an unfinished batch (${records.length - kept} records)`
      );
      await truncate(this.path, keptBytes);
    }
    return records.slice(0, kept);
  }

  /** Roll the file back to its previous length when the batch cannot be made durable */
  async append(records: readonly LedgerRecord[]): Promise<void> {
    const handle = await open(this.path, 'a');
    try {
      const { size } = await handle.stat();
      try {
        await handle.writeFile(records.map(toLine).join(''));
        await handle.sync();
      } catch (error) {
        await handle.truncate(size);
        throw error;
      }
    } finally {
      await handle.close();
    }
  }

  async appendRejections(rejections: readonly Rejection[]): Promise<void> {
    if (rejections.length === 0) return;
    await mkdir(dirname(this.rejectionsPath), { recursive: true });
    await appendFile(this.rejectionsPath, rejections.map(toLine).join(''));
  }
}

async function readIfExists(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return '';
    }
    throw error;
  }
}

/** Byte offset just past the first `count` lines of `text` */
function lineOffset(text: string, count: number): number {
  let offset = 0;
  for (let i = 0; i < count; i++) {
    offset = text.indexOf('\n', offset) + 1;
  }
  return Buffer.byteLength(text.slice(0, offset));
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// LEDGER
// ============================================================================

export interface LedgerFilter {
  readonly fromTick?: number;
  readonly toTick?: number;
  readonly agentId?: string;
  readonly type?: WorldEventType;
  readonly limit?: number;
}

/**
 * Ordered, append-only record of every committed transition. Records are
 * held in memory after open(); the store is written before memory changes.
 */
export class Ledger {
  private readonly records: LedgerRecord[];
  // Index of the first record of each tick
  private readonly tickStarts: number[] = [];
  private head = 0;

  private constructor(private readonly store: LedgerStore, records: LedgerRecord[]) {
    this.records = [];
    for (const record of records) {
      this.accept(record);
    }
  }

  /** Load and check the stored history */
  static async open(store: LedgerStore): Promise<Ledger> {
    const records = await store.load();
    const ledger = new Ledger(store, records);
    if (records.length > 0 && records[records.length - 1]?.type !== 'TICK_ADVANCED') {
      throw new IntegrityError('Ledger ends inside an unfinished tick', ledger.head);
    }
    console.log(`[Ledger] Opened at tick ${ledger.headTick} (${ledger.headSequence} records)`);
    return ledger;
  }

  get headTick(): number {
    return this.head;
  }

  get headSequence(): number {
    return this.records.length;
  }

  /**
   * Durably append one tick's events. They get consecutive sequence numbers
   * and the batch becomes visible only once the store has accepted it.
   */
  async commit(tick: number, events: readonly WorldEvent[], timestamp: number = Date.now()): Promise<LedgerRecord[]> {
    if (tick !== this.head + 1) {
      throw new IntegrityError(`Commit of tick ${tick} after head ${this.head}`, tick);
    }
    if (events[events.length - 1]?.type !== 'TICK_ADVANCED') {
      throw new IntegrityError('A committed tick must end with TICK_ADVANCED', tick);
    }

    const base = this.records.length;
    const batch = events.map(
      (event, index): LedgerRecord => ({ sequence: base + index + 1, tick, ...event, timestamp })
    );

    try {
      await this.store.append(batch);
    } catch (error) {
      throw new LedgerWriteError(tick, error);
    }

    for (const record of batch) {
      this.accept(record);
    }
    return batch;
  }

  /** Rejections go to the diagnostics stream; they never get sequence numbers */
  async recordRejections(rejections: readonly Rejection[]): Promise<void> {
    await this.store.appendRejections(rejections);
  }

  query(filter: LedgerFilter = {}): LedgerRecord[] {
    const { fromTick = 1, toTick = this.head, agentId, type, limit } = filter;
    const result: LedgerRecord[] = [];
    const start = this.tickStarts[Math.max(1, fromTick)] ?? this.records.length;

    for (let i = start; i < this.records.length; i++) {
      const record = this.records[i];
      if (!record || record.tick > toTick) break;
      if (agentId !== undefined && !record.agentIds.includes(agentId)) continue;
      if (type !== undefined && record.type !== type) continue;
      result.push(record);
      if (limit !== undefined && result.length >= limit) break;
    }
    return result;
  }

  eventsAtTick(tick: number): LedgerRecord[] {
    return this.query({ fromTick: tick, toTick: tick });
  }

  /** Every record in sequence order */
  scan(): IterableIterator<LedgerRecord> {
    return this.records.values();
  }

  private accept(record: LedgerRecord): void {
    const expected = this.records.length + 1;
    if (record.sequence !== expected) {
      throw new IntegrityError(`Expected sequence ${expected}, found ${record.sequence}`, record.tick);
    }
    const previous = this.records[this.records.length - 1];
    const opensTick = previous === undefined || previous.type === 'TICK_ADVANCED';
    const expectedTick = this.head + 1;
    if (record.tick !== expectedTick) {
      throw new IntegrityError(`Record ${record.sequence} belongs to tick ${record.tick}, expected ${expectedTick}`);
    }
    if (opensTick) {
      this.tickStarts[record.tick] = this.records.length;
    }
    this.records.push(record);
    if (record.type === 'TICK_ADVANCED') {
      this.head = record.tick;
    }
  }
}

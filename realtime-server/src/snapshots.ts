import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { SnapshotRecord } from '../../world/index.ts';
import { parseSnapshotRecord } from './schemas';

/** Periodic full-state checkpoints. Optional for correctness, they only shorten replay */
export interface SnapshotStore {
  /** All stored snapshots in ascending tick order */
  list(): Promise<SnapshotRecord[]>;
  /** Latest snapshot with tick <= `tick` */
  latestAtOrBefore(tick: number): Promise<SnapshotRecord | undefined>;
  save(snapshot: SnapshotRecord): Promise<void>;
}

export function pickLatest(snapshots: readonly SnapshotRecord[], tick: number): SnapshotRecord | undefined {
  let best: SnapshotRecord | undefined;
  for (const snapshot of snapshots) {
    if (snapshot.tick <= tick && (!best || snapshot.tick >= best.tick)) {
      best = snapshot;
    }
  }
  return best;
}

/** Snapshots appended one per line to a JSON Lines state file */
export class FileSnapshotStore implements SnapshotStore {
  constructor(private readonly path: string) {}

  async list(): Promise<SnapshotRecord[]> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const snapshots: SnapshotRecord[] = [];
    for (const [index, line] of text.split('\n').entries()) {
      if (line.trim() === '') continue;
      try {
        snapshots.push(parseSnapshotRecord(JSON.parse(line)));
      } catch (error) {
        // Any snapshot can be rebuilt from the ledger, so an unreadable one is skipped
        console.warn(`[Snapshots] Skipping unreadable line ${index + 1}:`, error instanceof Error ? error.message : error);
      }
    }
    return snapshots.sort((a, b) => a.tick - b.tick);
  }

  async latestAtOrBefore(tick: number): Promise<SnapshotRecord | undefined> {
    return pickLatest(await this.list(), tick);
  }

  async save(snapshot: SnapshotRecord): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    // Leading newline closes any line a crash left unfinished
    await appendFile(this.path, `\n${JSON.stringify(snapshot)}\n`);
  }
}

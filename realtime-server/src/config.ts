import 'dotenv/config';
import { z } from 'zod';

export const PLAY_PORT = 3001;
export const WATCH_PORT = 3002;

export type StorageBackend = 'file' | 'supabase';

export interface ServerConfig {
  readonly playPort: number;
  readonly watchPort: number;
  readonly tickIntervalMs: number;
  /** Persist a snapshot every N committed ticks; 0 disables snapshots */
  readonly snapshotEvery: number;
  readonly storageBackend: StorageBackend;
  readonly ledgerFile: string;
  readonly rejectionsFile: string;
  readonly stateFile: string;
  readonly supabaseUrl: string;
  readonly supabaseServiceKey: string;
  readonly worldSeed: number;
  /** 0 leaves the queue unbounded */
  readonly maxQueueSize: number;
}

// dotenv leaves unset keys as empty strings when the .env line has no value
const blankAsUnset = (value: unknown): unknown => (value === '' ? undefined : value);

const int = (fallback: number, min: number) =>
  z.preprocess(blankAsUnset, z.coerce.number().int().min(min).default(fallback));

const text = (fallback: string) => z.preprocess(blankAsUnset, z.string().default(fallback));

const EnvSchema = z
  .object({
    PLAY_PORT: int(PLAY_PORT, 1),
    WATCH_PORT: int(WATCH_PORT, 1),
    TICK_INTERVAL_MS: int(1000, 1),
    SNAPSHOT_EVERY: int(100, 0),
    STORAGE_BACKEND: z.preprocess(blankAsUnset, z.enum(['file', 'supabase']).default('file')),
    LEDGER_FILE: text('data/ledger.jsonl'),
    REJECTIONS_FILE: text('data/rejections.jsonl'),
    STATE_FILE: text('data/snapshots.jsonl'),
    SUPABASE_URL: text(''),
    SUPABASE_SERVICE_KEY: text(''),
    WORLD_SEED: int(1, 0),
    MAX_QUEUE_SIZE: int(10_000, 0),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_BACKEND === 'supabase' && (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_KEY)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_URL'],
        message: 'Supabase credentials required. Set SUPABASE_URL and SUPABASE_SERVICE_KEY.',
      });
    }
  });

/**
 * Read the server configuration from the environment.
 * Throws with every offending variable listed when a value is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  const values = parsed.data;
  return {
    playPort: values.PLAY_PORT,
    watchPort: values.WATCH_PORT,
    tickIntervalMs: values.TICK_INTERVAL_MS,
    snapshotEvery: values.SNAPSHOT_EVERY,
    storageBackend: values.STORAGE_BACKEND,
    ledgerFile: values.LEDGER_FILE,
    rejectionsFile: values.REJECTIONS_FILE,
    stateFile: values.STATE_FILE,
    supabaseUrl: values.SUPABASE_URL,
    supabaseServiceKey: values.SUPABASE_SERVICE_KEY,
    worldSeed: values.WORLD_SEED,
    maxQueueSize: values.MAX_QUEUE_SIZE,
  };
}

import { WebSocket } from 'ws';
import type { LedgerRecord, Rejection, WorldSnapshot } from '../../world/index.ts';
import type { AnalyticsSummary } from './analytics';

export type { PlayMessage, WatchMessage, LedgerQuery } from './schemas';

export interface Client {
  ws: WebSocket;
  connectionId: string;
}

export type ErrorCode = 'QUEUE_FULL' | 'INVALID_MESSAGE' | 'REPLAY_RANGE' | 'INTEGRITY';

export type ServerMessage =
  // Play socket
  | { type: 'QUEUED'; arrival: number; count: number; tick: number }
  | { type: 'REJECTED'; rejections: readonly Rejection[] }
  // Watch socket
  | { type: 'SNAPSHOT'; snapshot: WorldSnapshot }
  | { type: 'EVENTS'; tick: number; events: readonly LedgerRecord[] }
  | { type: 'LEDGER'; headTick: number; records: readonly LedgerRecord[] }
  | { type: 'REPLAY'; tick: number; snapshot: WorldSnapshot }
  | { type: 'TIMELINE'; agentId: string; records: readonly LedgerRecord[] }
  | { type: 'ANALYTICS'; summary: AnalyticsSummary }
  | { type: 'HALTED'; tick: number; error: string }
  // Both
  | { type: 'ERROR'; code: ErrorCode; error: string };

import { IntegrityError, ReplayRangeError, createWorldSnapshot } from '../../world/index.ts';
import type { Rejection } from '../../world/index.ts';
import { summarize } from './analytics';
import type { Game } from './game';
import type { TickCommit } from './scheduler';
import { PlayMessageSchema, WatchMessageSchema, stampActions } from './schemas';
import { arrivalOwners } from './state';
import type { ServerMessage } from './types';

function parseJson(raw: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : 'Invalid JSON' };
  }
}

function invalid(error: string): ServerMessage {
  return { type: 'ERROR', code: 'INVALID_MESSAGE', error };
}

// ============================================================================
// PLAY
// ============================================================================

/**
 * Queue a SUBMIT from an already-authenticated gateway connection. The
 * actions are stamped with the tick that is current now and run next tick.
 */
export function handleSubmit(game: Game, connectionId: string, raw: string): ServerMessage {
  const json = parseJson(raw);
  if (!json.ok) {
    return invalid(json.error);
  }
  const parsed = PlayMessageSchema.safeParse(json.value);
  if (!parsed.success) {
    return invalid(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '));
  }

  const tick = game.world.tick;
  const actions = stampActions(parsed.data.actions, tick);
  const queued = game.queue.submitMany(actions);
  if (!queued.ok) {
    console.warn(`[Play] ${connectionId} refused: ${queued.error.message}`);
    return { type: 'ERROR', code: queued.error.code, error: queued.error.message };
  }

  arrivalOwners.set(queued.value, connectionId);
  return { type: 'QUEUED', arrival: queued.value, count: actions.length, tick };
}

/**
 * Group a committed tick's rejections by the connection that submitted
 * them, and forget the arrivals the tick consumed.
 */
export function routeRejections(commit: TickCommit): Map<string, Rejection[]> {
  const byConnection = new Map<string, Rejection[]>();
  for (const rejection of commit.rejections) {
    const connectionId = arrivalOwners.get(rejection.arrival);
    if (!connectionId) continue;
    const list = byConnection.get(connectionId) ?? [];
    list.push(rejection);
    byConnection.set(connectionId, list);
  }
  for (const arrival of commit.arrivals) {
    arrivalOwners.delete(arrival);
  }
  return byConnection;
}

// ============================================================================
// WATCH
// ============================================================================

/** Read-only observer requests. Nothing here can change world state */
export async function handleWatchRequest(game: Game, raw: string): Promise<ServerMessage> {
  const json = parseJson(raw);
  if (!json.ok) {
    return invalid(json.error);
  }
  const parsed = WatchMessageSchema.safeParse(json.value);
  if (!parsed.success) {
    return invalid(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '));
  }

  const msg = parsed.data;
  switch (msg.type) {
    case 'GET_SNAPSHOT':
      return { type: 'SNAPSHOT', snapshot: game.world.getSnapshot() };

    case 'LEDGER_QUERY':
      return { type: 'LEDGER', headTick: game.ledger.headTick, records: game.ledger.query(msg.query) };

    case 'TIMELINE':
      return {
        type: 'TIMELINE',
        agentId: msg.agentId,
        records: game.replay.timeline(msg.agentId, msg.fromTick, msg.toTick),
      };

    case 'GET_ANALYTICS':
      return { type: 'ANALYTICS', summary: summarize(game.world.getSnapshot(), game.ledger) };

    case 'REPLAY':
      try {
        const state = await game.replay.replay(msg.tick);
        return { type: 'REPLAY', tick: msg.tick, snapshot: createWorldSnapshot(state) };
      } catch (e) {
        if (e instanceof ReplayRangeError) {
          return { type: 'ERROR', code: 'REPLAY_RANGE', error: e.message };
        }
        if (e instanceof IntegrityError) {
          console.error('[Watch] Replay integrity failure:', e.message);
          return { type: 'ERROR', code: 'INTEGRITY', error: e.message };
        }
        throw e;
      }
  }
}

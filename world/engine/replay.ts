// ============================================================================
// REPLAY - Rebuild state from a base plus committed records
// ============================================================================

import type { LedgerRecord } from '../actions/types';
import type { WorldConfig } from '../map/mapDef';
import type { WorldState } from '../state/worldState';
import { cloneWorldState } from '../state/worldState';
import { applyEvent } from './apply';
import { IntegrityError } from './errors';

/**
 * Re-apply every record with `base.tick < record.tick <= targetTick`, in
 * sequence order, through the same applyEvent the live engine uses.
 * `onTick` sees the state each time a tick closes.
 *
 * A pure function of its inputs: no clock, no ambient randomness.
 */
export function replayRecords(
  base: WorldState,
  config: WorldConfig,
  records: Iterable<LedgerRecord>,
  targetTick: number,
  onTick?: (state: WorldState) => void
): WorldState {
  const state = cloneWorldState(base);
  let lastSequence: number | undefined;

  for (const record of records) {
    if (record.tick <= base.tick) {
      continue;
    }
    if (record.tick > targetTick) {
      break;
    }
    if (lastSequence !== undefined && record.sequence !== lastSequence + 1) {
      throw new IntegrityError(`Sequence jumps from ${lastSequence} to ${record.sequence}`, record.tick);
    }
    lastSequence = record.sequence;

    applyEvent(state, config, record, record.tick);
    if (record.type === 'TICK_ADVANCED') {
      onTick?.(state);
    }
  }

  if (state.tick !== targetTick) {
    throw new IntegrityError(`Ledger ends at tick ${state.tick} before reaching ${targetTick}`, targetTick);
  }
  return state;
}

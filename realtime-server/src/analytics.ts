import { EMPTY_RESOURCES, addBundle, isLive } from '../../world/index.ts';
import type { Resources, WorldSnapshot } from '../../world/index.ts';
import type { Ledger } from './ledger';

export interface AnalyticsSummary {
  readonly agents: {
    readonly total: number;
    readonly alive: number;
    readonly claimed: number;
    readonly retired: number;
  };
  readonly totalEvents: number;
  readonly totalTicks: number;
  /** Sum of everything given and taken in trades, per resource */
  readonly tradeVolume: Resources;
  readonly messageCount: number;
}

/** World-level figures for observers, from the committed view and ledger */
export function summarize(snapshot: WorldSnapshot, ledger: Ledger): AnalyticsSummary {
  const alive = snapshot.agents.filter(isLive).length;
  const claimed = snapshot.agents.filter((agent) => agent.status === 'CLAIMED').length;

  let tradeVolume = EMPTY_RESOURCES;
  for (const record of ledger.query({ type: 'RESOURCES_TRADED' })) {
    if (record.type !== 'RESOURCES_TRADED') continue;
    tradeVolume = addBundle(addBundle(tradeVolume, record.payload.give), record.payload.take);
  }

  return {
    agents: {
      total: snapshot.agents.length,
      alive,
      claimed,
      retired: snapshot.agents.length - alive,
    },
    totalEvents: ledger.headSequence,
    totalTicks: snapshot.tick,
    tradeVolume,
    messageCount: ledger.query({ type: 'MESSAGE_DELIVERED' }).length,
  };
}

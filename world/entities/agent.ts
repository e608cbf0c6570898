import type { Resources } from './resources';

export type AgentStatus = 'PENDING' | 'CLAIMED' | 'DEAD' | 'FORKED' | 'MERGED';

export interface Agent {
  readonly agentId: string;
  readonly status: AgentStatus;
  readonly regionId: string;
  readonly resources: Resources;
  readonly createdTick: number;
  readonly lastActionTick: number;
  // Ownership claim reference, set by CLAIM and inherited by fork children
  readonly claimRef?: string;
  // Lineage
  readonly parentId?: string;
  readonly retiredTick?: number;
}

// Forward-only lattice. Danger may kill an agent before it is claimed.
const NEXT_STATUSES: Record<AgentStatus, readonly AgentStatus[]> = {
  PENDING: ['CLAIMED', 'DEAD'],
  CLAIMED: ['DEAD', 'FORKED', 'MERGED'],
  DEAD: [],
  FORKED: [],
  MERGED: [],
};

export function canTransition(from: AgentStatus, to: AgentStatus): boolean {
  return NEXT_STATUSES[from].includes(to);
}

/** DEAD, FORKED and MERGED agents are retired for good */
export function isRetired(agent: Agent): boolean {
  return agent.status === 'DEAD' || agent.status === 'FORKED' || agent.status === 'MERGED';
}

/** Live agents occupy a region slot and take part in physics */
export function isLive(agent: Agent): boolean {
  return agent.status === 'PENDING' || agent.status === 'CLAIMED';
}

export function createAgent(
  agentId: string,
  regionId: string,
  resources: Resources,
  tick: number
): Agent {
  return {
    agentId,
    status: 'PENDING',
    regionId,
    resources,
    createdTick: tick,
    lastActionTick: tick,
  };
}

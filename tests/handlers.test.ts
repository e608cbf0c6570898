import { beforeEach, describe, expect, it } from 'vitest';
import { handleSubmit, handleWatchRequest, routeRejections } from '../realtime-server/src/handlers.ts';
import { arrivalOwners } from '../realtime-server/src/state.ts';
import type { Game } from '../realtime-server/src/game.ts';
import { claim, createMemoryStores, createTestGame, register, runWith } from './helpers.ts';

const submit = (...actions: unknown[]) => JSON.stringify({ type: 'SUBMIT', actions });

describe('play handler', () => {
  beforeEach(() => {
    arrivalOwners.clear();
  });

  it('queues a submission stamped with the current tick', async () => {
    const game = await createTestGame(createMemoryStores());
    await runWith(game, register('a'));

    const reply = handleSubmit(game, 'conn-1', submit({ type: 'OBSERVE', agentId: 'a' }, { type: 'DIE', agentId: 'a' }));

    expect(reply).toEqual({ type: 'QUEUED', arrival: 2, count: 2, tick: 1 });
    expect(game.queue.drain().map((q) => [q.arrival, q.action.type, q.action.submittedTick])).toEqual([
      [2, 'OBSERVE', 1],
      [2, 'DIE', 1],
    ]);
    expect(arrivalOwners.get(2)).toBe('conn-1');
  });

  it('answers malformed input with INVALID_MESSAGE', async () => {
    const game = await createTestGame(createMemoryStores());

    expect(handleSubmit(game, 'conn-1', '{nope')).toMatchObject({ type: 'ERROR', code: 'INVALID_MESSAGE' });
    expect(handleSubmit(game, 'conn-1', submit())).toEqual({
      type: 'ERROR',
      code: 'INVALID_MESSAGE',
      error: 'actions: Array must contain at least 1 element(s)',
    });
    expect(game.queue.size).toBe(0);
  });

  it('passes QUEUE_FULL back to the gateway', async () => {
    const game = await createTestGame(createMemoryStores(), 0, 1);

    const reply = handleSubmit(game, 'conn-1', submit({ type: 'OBSERVE', agentId: 'a' }, { type: 'OBSERVE', agentId: 'b' }));

    expect(reply).toEqual({ type: 'ERROR', code: 'QUEUE_FULL', error: 'Queue holds 0 of 1 actions' });
    expect(arrivalOwners.size).toBe(0);
  });

  it('routes each rejection to the connection that submitted it', async () => {
    const game = await createTestGame(createMemoryStores());
    handleSubmit(game, 'conn-1', submit({ type: 'MOVE', agentId: 'ghost', toRegionId: 'beta' }));
    handleSubmit(game, 'conn-2', submit({ type: 'REGISTER', agentId: 'b' }));

    const commit = await game.scheduler.runTick();
    const routed = routeRejections(commit);

    expect([...routed.keys()]).toEqual(['conn-1']);
    expect(routed.get('conn-1')?.map((r) => [r.arrival, r.reason])).toEqual([[1, 'UNKNOWN_AGENT']]);
    expect(arrivalOwners.size).toBe(0);
  });
});

describe('watch handler', () => {
  it('serves the current snapshot and ledger queries', async () => {
    const game = await createTestGame(createMemoryStores());
    await runWith(game, register('a'), register('b'));

    const snapshot = await handleWatchRequest(game, JSON.stringify({ type: 'GET_SNAPSHOT' }));
    expect(snapshot.type === 'SNAPSHOT' && snapshot.snapshot.agents.map((a) => a.agentId)).toEqual(['a', 'b']);

    const ledger = await handleWatchRequest(
      game,
      JSON.stringify({ type: 'LEDGER_QUERY', query: { agentId: 'b' } })
    );
    expect(ledger.type === 'LEDGER' && [ledger.headTick, ledger.records.map((r) => r.sequence)]).toEqual([1, [2]]);
  });

  it('replays past ticks and reports ranges it cannot serve', async () => {
    const game = await createTestGame(createMemoryStores());
    await runWith(game, register('a'));

    const genesis = await handleWatchRequest(game, JSON.stringify({ type: 'REPLAY', tick: 0 }));
    expect(genesis.type === 'REPLAY' && [genesis.tick, genesis.snapshot.agents.length]).toEqual([0, 0]);

    expect(await handleWatchRequest(game, JSON.stringify({ type: 'REPLAY', tick: 9 }))).toEqual({
      type: 'ERROR',
      code: 'REPLAY_RANGE',
      error: 'Cannot replay tick 9; committed ticks are 0..1',
    });
  });

  /** Ticks 1-4: register, claim, a trade plus a message, then b dies */
  async function busyGame(): Promise<Game> {
    const game = await createTestGame(createMemoryStores());
    await runWith(game, register('a'), register('b'));
    await runWith(game, claim('a'), claim('b'));
    await runWith(
      game,
      {
        type: 'TRADE',
        agentId: 'a',
        counterparty: { kind: 'REGION' },
        give: { energy: 5 },
        take: { compute: 3 },
        submittedTick: 2,
      },
      { type: 'COMMUNICATE', agentId: 'b', toAgentId: 'a', content: 'hi', submittedTick: 2 }
    );
    await runWith(game, { type: 'DIE', agentId: 'b', submittedTick: 3 });
    return game;
  }

  it('serves an agent timeline limited to a tick range', async () => {
    const game = await busyGame();

    const reply = await handleWatchRequest(
      game,
      JSON.stringify({ type: 'TIMELINE', agentId: 'a', fromTick: 2, toTick: 3 })
    );

    expect(reply.type === 'TIMELINE' && [reply.agentId, reply.records.map((r) => [r.sequence, r.type])]).toEqual([
      'a',
      [
        [4, 'AGENT_CLAIMED'],
        [7, 'RESOURCES_TRADED'],
        [8, 'MESSAGE_DELIVERED'],
      ],
    ]);
  });

  it('summarizes agents, events, trades and messages', async () => {
    const game = await busyGame();

    const reply = await handleWatchRequest(game, JSON.stringify({ type: 'GET_ANALYTICS' }));

    expect(reply).toEqual({
      type: 'ANALYTICS',
      summary: {
        agents: { total: 2, alive: 1, claimed: 1, retired: 1 },
        totalEvents: 11,
        totalTicks: 4,
        tradeVolume: { energy: 5, bandwidth: 0, memory: 0, compute: 3 },
        messageCount: 1,
      },
    });
  });

  it('refuses messages it does not know', async () => {
    const game = await createTestGame(createMemoryStores());
    const reply = await handleWatchRequest(game, JSON.stringify({ type: 'SUBMIT', actions: [] }));
    expect(reply).toMatchObject({ type: 'ERROR', code: 'INVALID_MESSAGE' });
  });
});

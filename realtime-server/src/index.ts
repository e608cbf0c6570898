import { WebSocketServer } from 'ws';
import { loadConfig } from './config';
import type { ServerConfig } from './config';
import { createGame, createStores, worldConfigFor } from './game';
import type { Game } from './game';
import { handleSubmit, handleWatchRequest, routeRejections } from './handlers';
import { broadcastToSpectators, send, sendToConnection } from './network';
import { clients, generateConnectionId, generateWatcherId, spectators } from './state';

function loadConfigOrExit(): ServerConfig {
  try {
    return loadConfig();
  } catch (e) {
    console.error(`ERROR: ${e instanceof Error ? e.message : String(e)}`);
    process.exit(1);
  }
}

const config = loadConfigOrExit();

// Initialize the world from the ledger and start the tick loop
async function initialize(): Promise<Game> {
  const game = await createGame(createStores(config), {
    world: worldConfigFor(config),
    maxQueueSize: config.maxQueueSize,
    scheduler: { tickIntervalMs: config.tickIntervalMs, snapshotEvery: config.snapshotEvery },
  });

  game.scheduler.onCommit((commit) => {
    broadcastToSpectators({ type: 'EVENTS', tick: commit.tick, events: commit.records });
    for (const [connectionId, rejections] of routeRejections(commit)) {
      sendToConnection(connectionId, { type: 'REJECTED', rejections });
    }
  });

  game.scheduler.onFault((error) => {
    broadcastToSpectators({
      type: 'HALTED',
      tick: game.world.tick,
      error: error instanceof Error ? error.message : String(error),
    });
  });

  game.scheduler.start();
  console.log('Game world initialized from the ledger');
  return game;
}

const game = await initialize().catch((err: unknown) => {
  console.error('Failed to initialize game world:', err);
  process.exit(1);
});

// ============================================================================
// PLAY WEBSOCKET SERVER (gateway submissions)
// ============================================================================

const playWss = new WebSocketServer({ port: config.playPort });

console.log(`Play server running on ws://localhost:${config.playPort}`);

playWss.on('connection', (ws) => {
  const connectionId = generateConnectionId();
  clients.set(connectionId, { ws, connectionId });
  console.log(`[Play] Gateway connected: ${connectionId}`);

  ws.on('message', (data) => {
    send(ws, handleSubmit(game, connectionId, data.toString()));
  });

  ws.on('close', () => {
    clients.delete(connectionId);
    console.log(`[Play] Gateway disconnected: ${connectionId}`);
  });
});

// ============================================================================
// WATCH WEBSOCKET SERVER (read-only observers)
// ============================================================================

const watchWss = new WebSocketServer({ port: config.watchPort });

console.log(`Watch server running on ws://localhost:${config.watchPort}`);

watchWss.on('connection', (ws) => {
  const watcherId = generateWatcherId();
  spectators.add(ws);
  console.log(`[Watch] Spectator connected: ${watcherId}`);

  // Send current world state
  send(ws, { type: 'SNAPSHOT', snapshot: game.world.getSnapshot() });

  ws.on('message', (data) => {
    handleWatchRequest(game, data.toString())
      .then((reply) => send(ws, reply))
      .catch((e: unknown) => {
        console.error(`[Watch] Request from ${watcherId} failed:`, e);
        send(ws, { type: 'ERROR', code: 'INVALID_MESSAGE', error: 'Request failed' });
      });
  });

  ws.on('close', () => {
    spectators.delete(ws);
    console.log(`[Watch] Spectator disconnected: ${watcherId}`);
  });
});

// ============================================================================
// GRACEFUL SHUTDOWN
// ============================================================================

function shutdown() {
  console.log('Shutting down servers...');

  game.scheduler
    .stop()
    .then(() => console.log('[Scheduler] Stopped'))
    .catch((e: unknown) => console.error('[Scheduler] Stop failed:', e));

  playWss.close(() => {
    console.log('Play server closed');
  });

  watchWss.close(() => {
    console.log('Watch server closed');
  });

  // Force exit if it takes too long
  setTimeout(() => {
    console.error('Forcing shutdown...');
    process.exit(1);
  }, 1000).unref();
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

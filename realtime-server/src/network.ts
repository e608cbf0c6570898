import { WebSocket } from 'ws';
import { clients, spectators } from './state';
import type { ServerMessage } from './types';

export function broadcastToSpectators(message: ServerMessage) {
  const data = JSON.stringify(message);
  for (const ws of spectators) {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(data);
    }
  }
}

export function send(ws: WebSocket, message: ServerMessage) {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

/**
 * Send a message to a specific play connection.
 * Does nothing if it has gone away.
 */
export function sendToConnection(connectionId: string, message: ServerMessage) {
  const client = clients.get(connectionId);
  if (client && client.ws.readyState === WebSocket.OPEN) {
    client.ws.send(JSON.stringify(message));
  }
}

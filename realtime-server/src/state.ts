import { WebSocket } from 'ws';
import type { Client } from './types';

// Map connectionId -> Client (one per play socket)
export const clients = new Map<string, Client>();

// Spectators (watch-only connections)
export const spectators = new Set<WebSocket>();

// Map arrival number -> connectionId that submitted it, until its tick commits
export const arrivalOwners = new Map<number, string>();

// Connection ID counter
let nextConnectionId = 1;
export function generateConnectionId(): string {
  return `conn-${nextConnectionId++}`;
}

let nextWatcherId = 1;
export function generateWatcherId(): string {
  return `watcher-${nextWatcherId++}`;
}

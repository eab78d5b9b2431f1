/**
 * Server state
 * Centralized state shared by the routes, controller and WebSocket handlers
 */

import { WebSocket } from 'ws';
import type { Simulation } from '../core/simulation.js';
import type { RunDatabase } from '../storage/index.js';

// ============================================================================
// Types
// ============================================================================

export interface ServerState {
  simulation: Simulation | null;
  database: RunDatabase | null;
}

export interface ClientMessage {
  type: string;
  [key: string]: unknown;
}

export type ServerMessageType = 'status' | 'state' | 'period' | 'closed' | 'error';

// ============================================================================
// Server State
// ============================================================================

export const state: ServerState = {
  simulation: null,
  database: null,
};

// ============================================================================
// WebSocket Clients
// ============================================================================

export const clients = new Set<WebSocket>();

/**
 * Broadcast a message to all connected WebSocket clients
 */
export function broadcast(message: { type: ServerMessageType; data: unknown }): void {
  const data = JSON.stringify(message);
  for (const client of clients) {
    if (client.readyState === WebSocket.OPEN) {
      client.send(data);
    }
  }
}

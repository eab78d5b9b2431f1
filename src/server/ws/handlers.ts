/**
 * WebSocket connection handlers
 */

import { WebSocket } from 'ws';
import { state, clients, type ClientMessage, type ServerMessageType } from '../state.js';
import {
  advanceSimulation,
  closeSimulation,
  getStatusPayload,
  resetSimulation,
} from '../controllers/SimulationController.js';
import { statusForError } from '../utils/http.js';

function send(ws: WebSocket, type: ServerMessageType, data: unknown): void {
  ws.send(JSON.stringify({ type, data }));
}

function isClientMessage(value: unknown): value is ClientMessage {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, 'type') === 'string';
}

/**
 * Send initial state to a newly connected client
 */
function sendInitialState(ws: WebSocket): void {
  send(ws, 'status', getStatusPayload());

  if (state.simulation) {
    send(ws, 'state', state.simulation.getState());
  }
}

/**
 * Handle incoming WebSocket message
 * Engine errors go back to the sender only.
 */
export function handleMessage(ws: WebSocket, data: unknown): void {
  let message: unknown;
  try {
    message = JSON.parse(String(data));
  } catch (error) {
    console.error('[WebSocket] Message parse error:', error);
    send(ws, 'error', { status: 400, message: 'Invalid JSON message' });
    return;
  }

  if (!isClientMessage(message)) {
    send(ws, 'error', { status: 400, message: 'Message must have a type' });
    return;
  }

  try {
    switch (message.type) {
      case 'advance':
        // Broadcasts the new period to every client
        advanceSimulation(message.inputs);
        break;
      case 'close':
        closeSimulation();
        break;
      case 'reset':
        resetSimulation();
        break;
      default:
        console.log('[WebSocket] Unknown message type:', message.type);
        send(ws, 'error', { status: 400, message: `Unknown message type: ${message.type}` });
    }
  } catch (error) {
    const status = statusForError(error);
    if (status === 500) {
      console.error('[WebSocket] Handler error:', error);
    }
    send(ws, 'error', {
      status,
      message: error instanceof Error ? error.message : 'Internal error',
    });
  }
}

/**
 * Handle client disconnection
 */
function handleClose(ws: WebSocket): void {
  clients.delete(ws);
  console.log(`[WebSocket] Client disconnected (${clients.size} remaining)`);
}

/**
 * Handle WebSocket error
 */
function handleError(ws: WebSocket, error: Error): void {
  console.error('[WebSocket] Error:', error);
  clients.delete(ws);
}

/**
 * Handle new WebSocket connection
 */
export function handleConnection(ws: WebSocket): void {
  clients.add(ws);
  console.log(`[WebSocket] Client connected (${clients.size} total)`);

  sendInitialState(ws);

  ws.on('message', (data) => handleMessage(ws, data));
  ws.on('close', () => handleClose(ws));
  ws.on('error', (error) => handleError(ws, error));
}

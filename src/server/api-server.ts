/**
 * API Server
 * HTTP + WebSocket server for the tailor shop GUI
 */

import { createServer, IncomingMessage, ServerResponse } from 'http';
import { WebSocketServer } from 'ws';
import { env } from '../config/env.js';
import { state } from './state.js';
import { createRouter } from './routes/index.js';
import { setCorsHeaders, handleCorsPreflightIfNeeded, sendError } from './utils/http.js';
import { handleConnection } from './ws/handlers.js';
import { initializeSimulation } from './controllers/SimulationController.js';
import { closeDatabase } from './services/DatabaseService.js';

const router = createRouter();

// ============================================================================
// HTTP Server
// ============================================================================

function handleRequest(req: IncomingMessage, res: ServerResponse): void {
  setCorsHeaders(res);

  if (handleCorsPreflightIfNeeded(req, res)) {
    return;
  }

  const url = new URL(req.url || '/', `http://${req.headers.host}`);

  if (router.handle(req, res, url.pathname)) {
    return;
  }

  sendError(res, 404, 'Not found');
}

// ============================================================================
// Main
// ============================================================================

const server = createServer(handleRequest);
const wss = new WebSocketServer({ server, path: '/ws' });

wss.on('connection', handleConnection);

initializeSimulation();

server.listen(env.PORT, () => {
  console.log('='.repeat(50));
  console.log('Tailor Shop API Server');
  console.log('='.repeat(50));
  console.log(`HTTP:      http://localhost:${env.PORT}`);
  console.log(`WebSocket: ws://localhost:${env.PORT}/ws`);
  console.log(`Seed:      ${env.SEED}`);
  console.log(`Periods:   ${env.MAX_PERIODS ?? 'unlimited'}`);
  console.log(`Database:  ${state.database ? env.DB_PATH : 'Disabled'}`);
  console.log('='.repeat(50));
});

process.on('SIGINT', () => {
  console.log('\n[Server] Shutting down...');
  closeDatabase();
  wss.close();
  server.close();
  process.exit(0);
});

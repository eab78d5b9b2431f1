/**
 * Simulation state and control routes
 */

import type { Router } from './router.js';
import { sendJson, sendError, sendSimulationError, parseJsonBody } from '../utils/http.js';
import { state } from '../state.js';
import {
  advanceSimulation,
  closeSimulation,
  getCurrentState,
  getStatusPayload,
  resetSimulation,
} from '../controllers/SimulationController.js';

export function registerSimulationRoutes(router: Router): void {
  // Current status and state
  router.add('GET', '/api/state', (_req, res) => {
    sendJson(res, 200, { ...getStatusPayload(), state: getCurrentState() });
  });

  // Every snapshot, period 0 first
  router.add('GET', '/api/history', (_req, res) => {
    sendJson(res, 200, { history: state.simulation ? state.simulation.history() : [] });
  });

  router.add('POST', '/api/advance', async (req, res) => {
    const body = await parseJsonBody(req);
    if (body === null) {
      sendError(res, 400, 'Invalid JSON body');
      return;
    }

    try {
      const result = advanceSimulation(body);
      sendJson(res, 200, {
        status: getStatusPayload().status,
        state: result.state,
        warnings: result.warnings,
      });
    } catch (error) {
      sendSimulationError(res, error);
    }
  });

  router.add('POST', '/api/close', (_req, res) => {
    sendJson(res, 200, closeSimulation());
  });

  router.add('POST', '/api/simulation/reset', (_req, res) => {
    try {
      const { oldRunId, newRunId } = resetSimulation();
      sendJson(res, 200, {
        success: true,
        oldRunId,
        newRunId,
        message:
          newRunId !== null
            ? `Simulation reset. New run #${newRunId} started with current config.`
            : 'Simulation reset with current config.',
      });
    } catch (error) {
      console.error('[Server] Reset failed:', error);
      sendError(res, 500, 'Failed to reset simulation');
    }
  });
}

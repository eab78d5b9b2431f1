/**
 * Health check routes
 */

import type { Router } from './router.js';
import { sendJson } from '../utils/http.js';
import { state } from '../state.js';

export function registerHealthRoutes(router: Router): void {
  router.add('GET', '/health', (_req, res) => {
    sendJson(res, 200, {
      status: 'ok',
      simulation: state.simulation !== null,
      database: state.database !== null,
    });
  });
}

/**
 * Run history routes
 */

import type { Router } from './router.js';
import { sendJson, sendError, requireDb, parseRunId } from '../utils/http.js';
import { state } from '../state.js';
import {
  getCashHistory,
  getSalesHistory,
  getRunTotals,
  getWarningCounts,
} from '../../storage/index.js';

export function registerDbRoutes(router: Router): void {
  router.add('GET', '/api/db/runs', (_req, res) => {
    if (!requireDb(state.database, res)) return;

    sendJson(res, 200, {
      currentRunId: state.database.getCurrentRunId(),
      runs: state.database.getAllRuns(),
    });
  });

  router.addParam('GET', '/api/db/runs/:runId/periods', (_req, res, params) => {
    if (!requireDb(state.database, res)) return;

    const runId = parseRunId(params.runId);
    if (runId === null) {
      sendError(res, 400, 'Invalid run ID');
      return;
    }

    sendJson(res, 200, { runId, periods: state.database.getPeriods(runId) });
  });

  router.addParam('GET', '/api/db/runs/:runId/summary', (_req, res, params) => {
    if (!requireDb(state.database, res)) return;

    const runId = parseRunId(params.runId);
    if (runId === null) {
      sendError(res, 400, 'Invalid run ID');
      return;
    }

    const run = state.database.getRun(runId);
    if (!run) {
      sendError(res, 404, `Run ${runId} not found`);
      return;
    }

    sendJson(res, 200, {
      run,
      totals: getRunTotals(state.database, runId),
      warnings: getWarningCounts(state.database, runId),
      cash: getCashHistory(state.database, runId),
      sales: getSalesHistory(state.database, runId),
    });
  });
}

/**
 * Database Service
 * Handles database initialization, run management, and recording
 */

import { createDatabase } from '../../storage/index.js';
import type { ControllableInputs, ShopConfig, ShopState } from '../../core/types.js';
import { env } from '../../config/env.js';
import { state } from '../state.js';

/**
 * Open the database if enabled and not already open
 */
export function initializeDatabase(): void {
  if (!env.DB_ENABLED || state.database) return;

  state.database = createDatabase(env.DB_PATH);
  if (state.database) {
    console.log(`[DatabaseService] Initialized at ${env.DB_PATH}`);
  }
}

/**
 * Start a new run in the database
 */
export function startRun(config: ShopConfig): number | null {
  if (!state.database) return null;

  const runId = state.database.startRun(config);
  console.log(`[DatabaseService] Started run ${runId}`);
  return runId;
}

/**
 * End the current database run
 */
export function endRun(): void {
  if (!state.database) return;
  state.database.endRun();
}

/**
 * Close the database connection
 */
export function closeDatabase(): void {
  if (!state.database) return;

  state.database.endRun();
  state.database.close();
  state.database = null;
  console.log('[DatabaseService] Closed');
}

export function recordPeriod(shop: ShopState, inputs: ControllableInputs | null): void {
  if (!state.database) return;
  state.database.recordPeriod(shop, inputs);
}

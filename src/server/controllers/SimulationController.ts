/**
 * Simulation Controller
 * Orchestrates the run lifecycle: init, advance, close, reset
 */

import { Simulation, type AdvanceResult, type RunStatus } from '../../core/simulation.js';
import { DEFAULT_CONFIG, mergeConfig } from '../../core/shop.js';
import { parseInputs } from '../../core/inputs.js';
import type { ShopConfig, ShopState } from '../../core/types.js';
import { applyOverridesToConfig } from '../../config/overrides.js';
import { env } from '../../config/env.js';
import { state, broadcast } from '../state.js';
import { initializeDatabase, startRun, endRun, recordPeriod } from '../services/DatabaseService.js';

export interface StatusPayload {
  status: RunStatus | 'uninitialized';
  period: number;
  runId: number | null;
}

/**
 * Run configuration from the environment with file overrides applied
 */
export function buildServerConfig(): ShopConfig {
  const base = mergeConfig(DEFAULT_CONFIG, {
    seed: env.SEED,
    maxPeriods: env.MAX_PERIODS,
    fluctuations: { enabled: env.FLUCTUATIONS },
  });
  return applyOverridesToConfig(base);
}

/**
 * Initialize or reinitialize the simulation
 */
export function initializeSimulation(config: ShopConfig = buildServerConfig()): Simulation {
  const simulation = Simulation.initialize({}, config);
  state.simulation = simulation;

  initializeDatabase();
  startRun(simulation.getConfig());
  recordPeriod(simulation.getState(), null);

  console.log(`[SimulationController] Simulation initialized (seed ${config.seed})`);
  return simulation;
}

function requireSimulation(): Simulation {
  return state.simulation ?? initializeSimulation();
}

export function getStatusPayload(): StatusPayload {
  return {
    status: state.simulation ? state.simulation.getStatus() : 'uninitialized',
    period: state.simulation ? state.simulation.getPeriod() : 0,
    runId: state.database?.getCurrentRunId() ?? null,
  };
}

export function getCurrentState(): ShopState | null {
  return state.simulation ? state.simulation.getState() : null;
}

/**
 * Advance one period with inputs received from a client
 * Errors propagate to the caller; state is unchanged when one is thrown.
 */
export function advanceSimulation(raw: unknown): AdvanceResult {
  const simulation = requireSimulation();
  const result = simulation.advance(parseInputs(raw));

  recordPeriod(result.state, simulation.getLastInputs());
  broadcast({
    type: 'period',
    data: { state: result.state, warnings: result.warnings, status: simulation.getStatus() },
  });

  if (simulation.isClosed()) {
    endRun();
    broadcast({ type: 'closed', data: getStatusPayload() });
    console.log(`[SimulationController] Run closed at period ${result.state.period}`);
  }

  return result;
}

/**
 * Close the run; history stays readable
 */
export function closeSimulation(): StatusPayload {
  const simulation = requireSimulation();
  if (!simulation.isClosed()) {
    simulation.close();
    endRun();
    broadcast({ type: 'closed', data: getStatusPayload() });
    console.log(`[SimulationController] Run closed at period ${simulation.getPeriod()}`);
  }
  return getStatusPayload();
}

/**
 * Start a fresh run with the current config (overrides re-read)
 */
export function resetSimulation(): { oldRunId: number | null; newRunId: number | null } {
  const oldRunId = state.database?.getCurrentRunId() ?? null;
  endRun();

  const simulation = initializeSimulation();
  const newRunId = state.database?.getCurrentRunId() ?? null;

  broadcast({ type: 'status', data: getStatusPayload() });
  broadcast({ type: 'state', data: simulation.getState() });

  console.log(`[SimulationController] Simulation reset: run ${oldRunId} -> run ${newRunId}`);
  return { oldRunId, newRunId };
}

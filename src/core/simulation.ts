/**
 * Simulation Engine
 * Owns the current state and the append-only history, and runs the
 * subsystems in their fixed per-period order
 */

import type {
  ShopState,
  ShopConfig,
  ControllableInputs,
  DeepPartial,
  InitialParams,
  SimulationWarning,
} from './types.js';
import { hashState } from './rng.js';
import {
  DEFAULT_CONFIG,
  cloneShopState,
  freezeState,
  initializeShop,
  mergeConfig,
} from './shop.js';
import { parseInputs, clampInputs } from './inputs.js';
import { RunClosedError } from './errors.js';
import { assertValidConfig, assertValidState } from './validation.js';

import { drawMarketConditions } from '../systems/fluctuations.js';
import { updateWorkforce } from '../systems/workforce.js';
import { updateProduction } from '../systems/production.js';
import { updateDemand } from '../systems/demand.js';
import { updateFinance } from '../systems/finance.js';

export type RunStatus = 'ready' | 'closed';

export interface AdvanceResult {
  state: ShopState;
  warnings: readonly SimulationWarning[];
}

export interface SimulationSummary {
  period: number;
  status: RunStatus;
  cash: number;
  profit: number;
  cumulativeProfit: number;
  companyValue: number;
  workers: number;
  machines: number;
  materialStock: number;
  finishedStock: number;
  unitsSold: number;
  warnings: number;
}

/**
 * Simulation class manages the shop state and period execution
 *
 * Not safe for concurrent advance() calls; callers serialise them.
 * history() may be read at any time.
 */
export class Simulation {
  private state: ShopState;
  private config: ShopConfig;
  private status: RunStatus = 'ready';
  private stateHistory: ShopState[] = [];
  private stateHashes: string[] = []; // For determinism verification
  private lastInputs: ControllableInputs | null = null;

  /**
   * Throws InvalidConfigError for an out-of-range coefficient and
   * InvalidInputError for a starting state that breaks an invariant.
   */
  constructor(initialState: ShopState, config: DeepPartial<ShopConfig> = {}) {
    this.config = mergeConfig(DEFAULT_CONFIG, config);
    assertValidConfig(this.config);
    assertValidState(initialState);
    this.state = freezeState(cloneShopState(initialState));
    this.record(this.state);
  }

  /**
   * Start a run from documented starting values
   */
  static initialize(
    params: InitialParams = {},
    config: DeepPartial<ShopConfig> = {}
  ): Simulation {
    const merged = mergeConfig(DEFAULT_CONFIG, config);
    assertValidConfig(merged);
    return new Simulation(initializeShop(params, merged), merged);
  }

  getState(): ShopState {
    return this.state;
  }

  getPeriod(): number {
    return this.state.period;
  }

  getStatus(): RunStatus {
    return this.status;
  }

  isClosed(): boolean {
    return this.status === 'closed';
  }

  getConfig(): ShopConfig {
    return this.config;
  }

  /**
   * Inputs actually applied in the latest period (after clamping)
   */
  getLastInputs(): ControllableInputs | null {
    return this.lastInputs;
  }

  /**
   * Full ordered sequence of snapshots, period 0 first
   */
  history(): readonly ShopState[] {
    return Object.freeze([...this.stateHistory]);
  }

  /**
   * Per-period state hashes for determinism verification
   */
  getStateHashes(): string[] {
    return [...this.stateHashes];
  }

  /**
   * Advance one period
   *
   * Throws InvalidInputError for a malformed record and RunClosedError
   * after close(); in both cases state and history are unchanged.
   */
  advance(inputs: Readonly<ControllableInputs>): AdvanceResult {
    if (this.status === 'closed') {
      throw new RunClosedError(this.state.period);
    }

    const requested = parseInputs(inputs);
    const prev = this.state;
    const clamped = clampInputs(requested, prev, this.config);
    const applied = clamped.inputs;

    // =========================================================================
    // 1. Market conditions (material price, demand noise)
    // =========================================================================
    const fluctuation = drawMarketConditions(prev, this.config);

    // =========================================================================
    // 2. Workforce & machines: capacity depends on them
    // =========================================================================
    const workforce = updateWorkforce(prev, applied, this.config);

    // =========================================================================
    // 3. Production: sales are capped by the resulting stock
    // =========================================================================
    const production = updateProduction(
      prev,
      applied,
      workforce.workforce,
      workforce.machines,
      this.config
    );

    // =========================================================================
    // 4. Demand & sales: revenue depends on units sold
    // =========================================================================
    const demand = updateDemand(
      prev,
      applied,
      production.inventory,
      fluctuation.market,
      this.config
    );

    // =========================================================================
    // 5. Finance
    // =========================================================================
    const finance = updateFinance(
      prev,
      applied,
      workforce.workforce,
      workforce.machines,
      demand.inventory,
      demand.commercial,
      this.config
    );

    const next: ShopState = freezeState({
      period: prev.period + 1,
      inventory: demand.inventory,
      workforce: workforce.workforce,
      machines: workforce.machines,
      production: production.production,
      commercial: demand.commercial,
      finance: finance.finance,
      rngState: fluctuation.rngState,
      warnings: [
        ...clamped.warnings,
        ...workforce.warnings,
        ...production.warnings,
        ...demand.warnings,
        ...finance.warnings,
      ],
    });

    this.record(next);
    this.state = next;
    this.lastInputs = freezeState({ ...applied });

    const maxPeriods = this.config.maxPeriods;
    if (maxPeriods !== null && next.period >= maxPeriods) {
      this.status = 'closed';
    }

    return { state: next, warnings: next.warnings };
  }

  /**
   * Advance once per input record
   * Stops with RunClosedError if the run closes part-way.
   */
  run(sequence: readonly ControllableInputs[]): AdvanceResult[] {
    const results: AdvanceResult[] = [];

    for (const inputs of sequence) {
      results.push(this.advance(inputs));
    }

    return results;
  }

  /**
   * End the run; history stays readable. Closing twice is a no-op.
   */
  close(): void {
    this.status = 'closed';
  }

  /**
   * Get simulation summary for current state
   */
  getSummary(): SimulationSummary {
    const s = this.state;
    return {
      period: s.period,
      status: this.status,
      cash: Math.round(s.finance.cash),
      profit: Math.round(s.finance.profit),
      cumulativeProfit: Math.round(s.finance.cumulativeProfit),
      companyValue: Math.round(s.finance.companyValue),
      workers: s.workforce.workers,
      machines: s.machines.machines,
      materialStock: Math.round(s.inventory.materialStock),
      finishedStock: s.inventory.finishedStock,
      unitsSold: s.commercial.unitsSold,
      warnings: s.warnings.length,
    };
  }

  private record(state: ShopState): void {
    this.stateHistory.push(state);
    this.stateHashes.push(hashState(state));
  }
}

/**
 * Replay a decision sequence twice from the same start
 * Returns true if both runs produce identical state hashes
 */
export function verifyDeterminism(
  sequence: readonly ControllableInputs[],
  config: DeepPartial<ShopConfig> = {},
  params: InitialParams = {}
): boolean {
  const sim1 = Simulation.initialize(params, config);
  const sim2 = Simulation.initialize(params, config);

  sim1.run(sequence);
  sim2.run(sequence);

  const history1 = sim1.getStateHashes();
  const history2 = sim2.getStateHashes();

  if (history1.length !== history2.length) return false;

  for (let i = 0; i < history1.length; i++) {
    if (history1[i] !== history2[i]) return false;
  }

  return true;
}

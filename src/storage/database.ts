/**
 * SQLite Storage for Tailor Shop Runs
 * Persists every period snapshot so runs can be replayed and analysed
 */

import Database from 'better-sqlite3';
import type {
  ControllableInputs,
  ShopConfig,
  ShopState,
  SimulationWarning,
} from '../core/types.js';
import { hashState } from '../core/rng.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Run information
 */
export interface RunInfo {
  id: number;
  seed: number;
  label: string | null;
  startedAt: Date;
  endedAt: Date | null;
  config: ShopConfig;
}

/**
 * One stored period
 */
export interface PeriodRecord {
  period: number;
  stateHash: string;
  cash: number;
  revenue: number;
  cost: number;
  profit: number;
  unitsProduced: number;
  unitsSold: number;
  demand: number;
  finishedStock: number;
  materialStock: number;
  workers: number;
  machines: number;
  motivation: number;
  wear: number;
  awareness: number;
  warnings: SimulationWarning[];
  inputs: ControllableInputs | null;
  state: ShopState;
}

interface RunRow {
  id: number;
  seed: number;
  label: string | null;
  started_at: string;
  ended_at: string | null;
  config: string;
}

interface PeriodRow {
  period: number;
  state_hash: string;
  cash: number;
  revenue: number;
  cost: number;
  profit: number;
  units_produced: number;
  units_sold: number;
  demand: number;
  finished_stock: number;
  material_stock: number;
  workers: number;
  machines: number;
  motivation: number;
  wear: number;
  awareness: number;
  warnings: string;
  inputs: string | null;
  state: string;
}

// ============================================================================
// Schema
// ============================================================================

const SCHEMA = `
-- Simulation runs
CREATE TABLE IF NOT EXISTS runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  seed INTEGER NOT NULL,
  label TEXT,
  started_at TEXT NOT NULL DEFAULT (datetime('now')),
  ended_at TEXT,
  config TEXT NOT NULL
);

-- One row per period (period 0 is the initial state)
CREATE TABLE IF NOT EXISTS periods (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id INTEGER NOT NULL,
  period INTEGER NOT NULL,
  state_hash TEXT NOT NULL,
  cash REAL NOT NULL,
  revenue REAL NOT NULL,
  cost REAL NOT NULL,
  profit REAL NOT NULL,
  units_produced INTEGER NOT NULL,
  units_sold INTEGER NOT NULL,
  demand INTEGER NOT NULL,
  finished_stock REAL NOT NULL,
  material_stock REAL NOT NULL,
  workers INTEGER NOT NULL,
  machines INTEGER NOT NULL,
  motivation REAL NOT NULL,
  wear REAL NOT NULL,
  awareness REAL NOT NULL,
  warnings TEXT NOT NULL,
  inputs TEXT,
  state TEXT NOT NULL,
  FOREIGN KEY (run_id) REFERENCES runs(id),
  UNIQUE(run_id, period)
);

CREATE INDEX IF NOT EXISTS idx_periods_run_period ON periods(run_id, period);
`;

// ============================================================================
// RunDatabase Class
// ============================================================================

/**
 * SQLite database for run storage
 * All methods are synchronous with better-sqlite3
 */
export class RunDatabase {
  private db: Database.Database;
  private currentRunId: number | null = null;

  private stmtInsertRun: Database.Statement<[number, string | null, string]>;
  private stmtEndRun: Database.Statement<[number]>;
  private stmtInsertPeriod: Database.Statement<unknown[]>;
  private stmtGetRun: Database.Statement<[number], RunRow>;
  private stmtAllRuns: Database.Statement<[], RunRow>;
  private stmtGetPeriods: Database.Statement<[number], PeriodRow>;

  /**
   * @param dbPath Path to SQLite database file (use ':memory:' for in-memory)
   */
  constructor(dbPath: string = 'tailorshop.db') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(SCHEMA);

    this.stmtInsertRun = this.db.prepare<[number, string | null, string]>(`
      INSERT INTO runs (seed, label, config) VALUES (?, ?, ?)
    `);
    this.stmtEndRun = this.db.prepare<[number]>(`
      UPDATE runs SET ended_at = datetime('now') WHERE id = ?
    `);
    this.stmtInsertPeriod = this.db.prepare<unknown[]>(`
      INSERT INTO periods (
        run_id, period, state_hash, cash, revenue, cost, profit,
        units_produced, units_sold, demand, finished_stock, material_stock,
        workers, machines, motivation, wear, awareness, warnings, inputs, state
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    this.stmtGetRun = this.db.prepare<[number], RunRow>(`
      SELECT id, seed, label, started_at, ended_at, config FROM runs WHERE id = ?
    `);
    this.stmtAllRuns = this.db.prepare<[], RunRow>(`
      SELECT id, seed, label, started_at, ended_at, config FROM runs ORDER BY id DESC
    `);
    this.stmtGetPeriods = this.db.prepare<[number], PeriodRow>(`
      SELECT period, state_hash, cash, revenue, cost, profit, units_produced, units_sold,
             demand, finished_stock, material_stock, workers, machines, motivation, wear,
             awareness, warnings, inputs, state
      FROM periods WHERE run_id = ? ORDER BY period ASC
    `);
  }

  /**
   * Get the underlying database connection for direct queries
   */
  getDb(): Database.Database {
    return this.db;
  }

  // ============================================================================
  // Run Management
  // ============================================================================

  /**
   * Start tracking a new run
   * @returns Run ID
   */
  startRun(config: ShopConfig, label: string | null = null): number {
    const result = this.stmtInsertRun.run(config.seed, label, JSON.stringify(config));
    this.currentRunId = Number(result.lastInsertRowid);
    return this.currentRunId;
  }

  /**
   * Mark the current run as ended
   */
  endRun(): void {
    if (this.currentRunId === null) return;
    this.stmtEndRun.run(this.currentRunId);
    this.currentRunId = null;
  }

  getCurrentRunId(): number | null {
    return this.currentRunId;
  }

  getRun(runId: number): RunInfo | null {
    const row = this.stmtGetRun.get(runId);
    return row ? toRunInfo(row) : null;
  }

  getAllRuns(): RunInfo[] {
    return this.stmtAllRuns.all().map(toRunInfo);
  }

  // ============================================================================
  // Period Recording
  // ============================================================================

  /**
   * Record a period snapshot for the current run
   * @param inputs Inputs applied to reach this state (null for period 0)
   * @returns true if recorded, false when no run is active
   */
  recordPeriod(state: ShopState, inputs: ControllableInputs | null = null): boolean {
    if (this.currentRunId === null) return false;

    this.stmtInsertPeriod.run(
      this.currentRunId,
      state.period,
      hashState(state),
      state.finance.cash,
      state.finance.revenue,
      state.finance.cost,
      state.finance.profit,
      state.production.unitsProduced,
      state.commercial.unitsSold,
      state.commercial.demand,
      state.inventory.finishedStock,
      state.inventory.materialStock,
      state.workforce.workers,
      state.machines.machines,
      state.workforce.motivation,
      state.machines.wear,
      state.commercial.awareness,
      JSON.stringify(state.warnings),
      inputs ? JSON.stringify(inputs) : null,
      JSON.stringify(state)
    );
    return true;
  }

  /**
   * Record a whole history in one transaction
   */
  recordHistory(history: readonly ShopState[]): void {
    if (this.currentRunId === null || history.length === 0) return;

    const insertAll = this.db.transaction((states: readonly ShopState[]) => {
      for (const state of states) {
        this.recordPeriod(state);
      }
    });

    insertAll(history);
  }

  getPeriods(runId: number): PeriodRecord[] {
    return this.stmtGetPeriods.all(runId).map((row) => ({
      period: row.period,
      stateHash: row.state_hash,
      cash: row.cash,
      revenue: row.revenue,
      cost: row.cost,
      profit: row.profit,
      unitsProduced: row.units_produced,
      unitsSold: row.units_sold,
      demand: row.demand,
      finishedStock: row.finished_stock,
      materialStock: row.material_stock,
      workers: row.workers,
      machines: row.machines,
      motivation: row.motivation,
      wear: row.wear,
      awareness: row.awareness,
      warnings: JSON.parse(row.warnings),
      inputs: row.inputs ? JSON.parse(row.inputs) : null,
      state: JSON.parse(row.state),
    }));
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  close(): void {
    this.db.close();
  }
}

function toRunInfo(row: RunRow): RunInfo {
  return {
    id: row.id,
    seed: row.seed,
    label: row.label,
    startedAt: new Date(row.started_at),
    endedAt: row.ended_at ? new Date(row.ended_at) : null,
    config: JSON.parse(row.config),
  };
}

/**
 * Create a database, or null when it cannot be opened
 */
export function createDatabase(dbPath: string = 'tailorshop.db'): RunDatabase | null {
  try {
    return new RunDatabase(dbPath);
  } catch (error) {
    console.warn('[RunDatabase] Failed to create database:', error);
    return null;
  }
}

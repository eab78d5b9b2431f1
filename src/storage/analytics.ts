/**
 * Analytics Queries for Run Data
 * Cash and sales trajectories, run totals and warning frequencies
 */

import type { RunDatabase } from './database.js';
import type { WarningCode } from '../core/types.js';

// ============================================================================
// Types
// ============================================================================

export interface CashPoint {
  period: number;
  cash: number;
  profit: number;
}

export interface SalesPoint {
  period: number;
  demand: number;
  unitsProduced: number;
  unitsSold: number;
  lostSales: number;
}

/**
 * Totals over every period after the initial one
 */
export interface RunTotals {
  periods: number;
  totalRevenue: number;
  totalCost: number;
  totalProfit: number;
  totalUnitsSold: number;
  totalUnitsProduced: number;
  finalCash: number | null;
  minCash: number | null;
  serviceLevel: number; // sold / demand, 1 when there was no demand
}

// ============================================================================
// Analytics Functions
// ============================================================================

export function getCashHistory(db: RunDatabase, runId: number): CashPoint[] {
  return db
    .getDb()
    .prepare<[number], CashPoint>(`
      SELECT period, cash, profit
      FROM periods
      WHERE run_id = ?
      ORDER BY period ASC
    `)
    .all(runId);
}

export function getSalesHistory(db: RunDatabase, runId: number): SalesPoint[] {
  return db
    .getDb()
    .prepare<[number], SalesPoint>(`
      SELECT
        period,
        demand,
        units_produced AS unitsProduced,
        units_sold AS unitsSold,
        MAX(demand - units_sold, 0) AS lostSales
      FROM periods
      WHERE run_id = ?
      ORDER BY period ASC
    `)
    .all(runId);
}

export function getRunTotals(db: RunDatabase, runId: number): RunTotals {
  const dbInstance = db.getDb();

  const sums = dbInstance
    .prepare<[number], {
      periods: number;
      revenue: number | null;
      cost: number | null;
      profit: number | null;
      sold: number | null;
      produced: number | null;
      demand: number | null;
      min_cash: number | null;
    }>(`
      SELECT
        COUNT(*) AS periods,
        SUM(revenue) AS revenue,
        SUM(cost) AS cost,
        SUM(profit) AS profit,
        SUM(units_sold) AS sold,
        SUM(units_produced) AS produced,
        SUM(demand) AS demand,
        MIN(cash) AS min_cash
      FROM periods
      WHERE run_id = ? AND period > 0
    `)
    .get(runId);

  const last = dbInstance
    .prepare<[number], { cash: number }>(`
      SELECT cash FROM periods WHERE run_id = ? ORDER BY period DESC LIMIT 1
    `)
    .get(runId);

  const demand = sums?.demand ?? 0;
  const sold = sums?.sold ?? 0;

  return {
    periods: sums?.periods ?? 0,
    totalRevenue: sums?.revenue ?? 0,
    totalCost: sums?.cost ?? 0,
    totalProfit: sums?.profit ?? 0,
    totalUnitsSold: sold,
    totalUnitsProduced: sums?.produced ?? 0,
    finalCash: last?.cash ?? null,
    minCash: sums?.min_cash ?? null,
    serviceLevel: demand > 0 ? sold / demand : 1,
  };
}

/**
 * How often each warning code was raised over a run
 */
export function getWarningCounts(
  db: RunDatabase,
  runId: number
): Partial<Record<WarningCode, number>> {
  const rows = db
    .getDb()
    .prepare<[number], { code: WarningCode; count: number }>(`
      SELECT json_extract(w.value, '$.code') AS code, COUNT(*) AS count
      FROM periods p, json_each(p.warnings) w
      WHERE p.run_id = ?
      GROUP BY code
      ORDER BY code
    `)
    .all(runId);

  const counts: Partial<Record<WarningCode, number>> = {};
  for (const row of rows) {
    counts[row.code] = row.count;
  }
  return counts;
}

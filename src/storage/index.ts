/**
 * Storage Module
 * SQLite run storage and analytics
 */

export { RunDatabase, createDatabase } from './database.js';
export type { RunInfo, PeriodRecord } from './database.js';

export {
  getCashHistory,
  getSalesHistory,
  getRunTotals,
  getWarningCounts,
} from './analytics.js';

export type { CashPoint, SalesPoint, RunTotals } from './analytics.js';

/**
 * Human-readable rendering of period warnings for logs and the CLI
 */

import type { SimulationWarning, WarningCode } from './types.js';

function fmt(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

export function formatWarning(warning: SimulationWarning): string {
  switch (warning.code) {
    case 'input_clamped':
      return `${warning.field} clamped from ${fmt(warning.requested)} to ${fmt(warning.applied)}`;
    case 'material_shortfall':
      return `material shortage: produced ${warning.produced} of ${warning.capacity} (short ${warning.shortfall})`;
    case 'lost_sales':
      return `lost sales: demand ${warning.demand}, sold ${warning.sold} (lost ${warning.lost})`;
    case 'workforce_depleted':
      return `workforce reduced from ${warning.previousWorkers} to 0 with demand ${warning.demand}`;
    case 'low_cash':
      return `cash ${fmt(warning.cash)} below zero, purchase ceilings at ${(warning.creditFactor * 100).toFixed(0)}%`;
    case 'storage_overflow':
      return `storage full (${warning.capacity}), discarded ${warning.discarded} units`;
  }
}

/**
 * Count warnings per code
 */
export function countWarnings(
  warnings: readonly SimulationWarning[]
): Partial<Record<WarningCode, number>> {
  const counts: Partial<Record<WarningCode, number>> = {};
  for (const w of warnings) {
    counts[w.code] = (counts[w.code] ?? 0) + 1;
  }
  return counts;
}

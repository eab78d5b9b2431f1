/**
 * Workforce & Machines System
 * Headcount, motivation, machine fleet, wear and maintenance backlog
 *
 * Runs first in the period: production capacity depends on its output.
 */

import type {
  ControllableInputs,
  MachineState,
  ShopConfig,
  ShopState,
  SimulationWarning,
  WorkforceState,
} from '../core/types.js';
import { clamp, safeDivide } from '../core/math.js';

export interface WorkforceResult {
  workforce: WorkforceState;
  machines: MachineState;
  warnings: SimulationWarning[];
}

/**
 * Level motivation drifts toward
 * Formula: neutral + wageSens * (w - w_ref) / w_ref + benefitSens * benefits
 *          + profitSens * tanh(profit / scale)
 */
export function calculateMotivationTarget(
  wage: number,
  previousProfit: number,
  config: ShopConfig
): number {
  const c = config.workforce;
  const wageEffect = c.wageSensitivity * safeDivide(wage - c.referenceWage, c.referenceWage);
  const benefitEffect = c.benefitSensitivity * c.benefits;
  const profitEffect = c.profitSensitivity * Math.tanh(safeDivide(previousProfit, c.profitScale));
  return c.neutralMotivation + wageEffect + benefitEffect + profitEffect;
}

/**
 * Motivation lost to a large single-period hiring or firing wave
 */
export function calculateShockPenalty(workerDelta: number, config: ShopConfig): number {
  const excess = Math.abs(workerDelta) - config.workforce.shockThreshold;
  return excess > 0 ? excess * config.workforce.shockPenalty : 0;
}

export function updateMotivation(
  previous: number,
  workerDelta: number,
  wage: number,
  previousProfit: number,
  config: ShopConfig
): number {
  const target = calculateMotivationTarget(wage, previousProfit, config);
  const adjusted = previous + config.workforce.adjustmentRate * (target - previous);
  return clamp(adjusted - calculateShockPenalty(workerDelta, config), 0, 100);
}

/**
 * Update fleet size, wear and maintenance backlog
 *
 * New machines arrive unworn, so fleet wear is averaged over kept and
 * bought machines before usage and maintenance are applied.
 */
export function updateMachines(
  prev: MachineState,
  machineDelta: number,
  maintenance: number,
  previousUnitsProduced: number,
  config: ShopConfig
): MachineState {
  const c = config.machines;
  const machines = Math.max(0, prev.machines + machineDelta);
  const kept = Math.min(prev.machines, machines);

  const need = machines * c.maintenancePerMachine;
  const maintenanceBacklog = Math.max(0, prev.maintenanceBacklog + need - maintenance);

  const blendedWear = safeDivide(prev.wear * kept, machines, prev.wear);
  const usagePerMachine = safeDivide(previousUnitsProduced, prev.machines);

  const wear = clamp(
    blendedWear +
      c.wearPerUnit * usagePerMachine -
      c.maintenanceRecovery * safeDivide(maintenance, machines) +
      c.backlogWear * safeDivide(maintenanceBacklog, machines),
    0,
    100
  );

  return { machines, wear, maintenanceBacklog };
}

/**
 * Apply hiring/firing, wage and machine decisions for one period
 */
export function updateWorkforce(
  prev: ShopState,
  inputs: ControllableInputs,
  config: ShopConfig
): WorkforceResult {
  const warnings: SimulationWarning[] = [];
  const previousWorkers = prev.workforce.workers;
  const workers = Math.max(0, previousWorkers + inputs.workerDelta);

  const motivation = updateMotivation(
    prev.workforce.motivation,
    inputs.workerDelta,
    inputs.wage,
    prev.finance.profit,
    config
  );

  if (previousWorkers > 0 && workers === 0 && prev.commercial.demand > 0) {
    warnings.push({
      code: 'workforce_depleted',
      previousWorkers,
      demand: prev.commercial.demand,
    });
  }

  const machines = updateMachines(
    prev.machines,
    inputs.machineDelta,
    inputs.maintenance,
    prev.production.unitsProduced,
    config
  );

  return {
    workforce: { workers, motivation, wage: inputs.wage },
    machines,
    warnings,
  };
}

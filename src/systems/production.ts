/**
 * Production System
 * Output is bottlenecked by the scarcer of labour and machines, then
 * limited by material on hand
 */

import type {
  ControllableInputs,
  InventoryState,
  MachineState,
  ProductionState,
  ShopConfig,
  ShopState,
  SimulationWarning,
  WorkforceState,
} from '../core/types.js';
import { safeDivide } from '../core/math.js';

export interface ProductionResult {
  production: ProductionState;
  inventory: InventoryState;
  warnings: SimulationWarning[];
}

/**
 * Labour-side capacity
 * Formula: workers * unitsPerWorker * sqrt(motivation / neutral)
 */
export function calculateLabourCapacity(
  workers: number,
  motivation: number,
  config: ShopConfig
): number {
  const motivationFactor = Math.sqrt(
    safeDivide(motivation, config.workforce.neutralMotivation)
  );
  return workers * config.production.unitsPerWorker * motivationFactor;
}

/**
 * Machine-side capacity
 * Formula: machines * unitsPerMachine * (1 - wearPenalty * wear / 100)
 */
export function calculateMachineCapacity(
  machines: number,
  wear: number,
  config: ShopConfig
): number {
  const condition = 1 - (config.production.wearPenalty * wear) / 100;
  return machines * config.production.unitsPerMachine * condition;
}

/**
 * Effective capacity: the scarcer resource sets the pace, whole units only
 */
export function calculateCapacity(labourCapacity: number, machineCapacity: number): number {
  return Math.floor(Math.max(0, Math.min(labourCapacity, machineCapacity)));
}

/**
 * Run production for one period
 *
 * Material bought this period is delivered before production starts.
 * Finished goods beyond storage capacity are discarded.
 */
export function updateProduction(
  prev: ShopState,
  inputs: ControllableInputs,
  workforce: WorkforceState,
  machines: MachineState,
  config: ShopConfig
): ProductionResult {
  const warnings: SimulationWarning[] = [];
  const materialPerUnit = config.production.materialPerUnit;

  const labourCapacity = calculateLabourCapacity(workforce.workers, workforce.motivation, config);
  const machineCapacity = calculateMachineCapacity(machines.machines, machines.wear, config);
  const capacity = calculateCapacity(labourCapacity, machineCapacity);

  const materialAvailable = prev.inventory.materialStock + inputs.materialPurchase;
  const materialLimit = Math.floor(materialAvailable / materialPerUnit);

  const unitsProduced = Math.min(capacity, materialLimit);

  if (materialLimit < capacity) {
    warnings.push({
      code: 'material_shortfall',
      capacity,
      produced: unitsProduced,
      shortfall: capacity - materialLimit,
    });
  }

  const storageCapacity = prev.inventory.storageCapacity;
  const finishedBeforeCap = prev.inventory.finishedStock + unitsProduced;
  const finishedStock = Math.min(finishedBeforeCap, storageCapacity);
  const discarded = finishedBeforeCap - finishedStock;

  if (discarded > 0) {
    warnings.push({ code: 'storage_overflow', capacity: storageCapacity, discarded });
  }

  return {
    production: {
      labourCapacity,
      machineCapacity,
      capacity,
      materialLimit,
      unitsProduced,
      idleRatio: safeDivide(capacity - unitsProduced, capacity),
    },
    inventory: {
      materialStock: materialAvailable - unitsProduced * materialPerUnit,
      finishedStock,
      storageCapacity,
    },
    warnings,
  };
}

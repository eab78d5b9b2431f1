/**
 * Finance System
 * Aggregates the period's monetary flows into revenue, cost, profit and cash
 *
 * Negative cash is allowed (debt). While in debt the credit factor
 * shrinks next period's material and machine purchase ceilings.
 */

import type {
  CommercialState,
  ControllableInputs,
  CostBreakdown,
  FinancialState,
  InventoryState,
  MachineState,
  ShopConfig,
  ShopState,
  SimulationWarning,
  WorkforceState,
} from '../core/types.js';
import { clamp } from '../core/math.js';

export interface FinanceResult {
  finance: FinancialState;
  warnings: SimulationWarning[];
}

/**
 * Net cost of buying (positive) or selling (negative) machines
 * Used machines sell at resaleFactor of list price scaled by condition.
 */
export function calculateMachineTradeCost(
  machineDelta: number,
  previousWear: number,
  config: ShopConfig
): number {
  const c = config.machines;
  if (machineDelta > 0) {
    return machineDelta * c.machinePrice;
  }
  return machineDelta * c.machinePrice * c.resaleFactor * (1 - previousWear / 100);
}

/**
 * Interest as a cost: negative on deposits, positive on debt
 */
export function calculateInterestCost(cash: number, config: ShopConfig): number {
  const rate = cash >= 0 ? config.finance.depositRate : config.finance.debtRate;
  return 0 - cash * rate;
}

/**
 * Storage charged on stock held at the start of the period
 */
export function calculateStorageCost(inventory: InventoryState, config: ShopConfig): number {
  return (
    config.finance.finishedStorageCost * inventory.finishedStock +
    config.finance.materialStorageCost * inventory.materialStock
  );
}

/**
 * Rent for the outlets and the shop's location
 */
export function calculateRent(config: ShopConfig): number {
  const p = config.premises;
  return p.outlets * p.outletRent + p.locationRents[p.location];
}

/**
 * Purchase-ceiling multiplier for the next period
 * Formula: max(minFactor, 1 - deficit / creditScale) while cash < 0
 */
export function calculateCreditFactor(cash: number, config: ShopConfig): number {
  if (cash >= 0) return 1;
  const c = config.finance;
  return clamp(1 - -cash / c.creditScale, c.minCreditFactor, 1);
}

/**
 * Cash plus book value of machines and stock
 */
export function calculateCompanyValue(
  cash: number,
  machines: number,
  wear: number,
  materialStock: number,
  finishedStock: number,
  config: ShopConfig
): number {
  const machineValue = machines * config.machines.machinePrice * (1 - wear / 100);
  return (
    cash +
    machineValue +
    materialStock * config.finance.materialValue +
    finishedStock * config.finance.finishedValue
  );
}

export function sumCosts(costs: CostBreakdown): number {
  return (
    costs.material +
    costs.wages +
    costs.advertising +
    costs.maintenance +
    costs.machines +
    costs.storage +
    costs.interest +
    costs.benefits +
    costs.rent
  );
}

/**
 * Settle the period's accounts
 */
export function updateFinance(
  prev: ShopState,
  inputs: ControllableInputs,
  workforce: WorkforceState,
  machines: MachineState,
  inventory: InventoryState,
  commercial: CommercialState,
  config: ShopConfig
): FinanceResult {
  const warnings: SimulationWarning[] = [];

  const revenue = commercial.unitsSold * commercial.price;

  const costs: CostBreakdown = {
    material: inputs.materialPurchase * prev.commercial.materialPrice,
    wages: workforce.workers * workforce.wage,
    advertising: inputs.advertising,
    maintenance: inputs.maintenance,
    machines: calculateMachineTradeCost(inputs.machineDelta, prev.machines.wear, config),
    storage: calculateStorageCost(prev.inventory, config),
    interest: calculateInterestCost(prev.finance.cash, config),
    benefits: workforce.workers * config.workforce.benefits,
    rent: calculateRent(config),
  };
  const cost = sumCosts(costs);

  const profit = revenue - cost;
  const cash = prev.finance.cash + profit;
  const creditFactor = calculateCreditFactor(cash, config);

  if (cash < 0) {
    warnings.push({ code: 'low_cash', cash, creditFactor });
  }

  return {
    finance: {
      cash,
      revenue,
      cost,
      costs,
      profit,
      cumulativeProfit: prev.finance.cumulativeProfit + profit,
      creditFactor,
      companyValue: calculateCompanyValue(
        cash,
        machines.machines,
        machines.wear,
        inventory.materialStock,
        inventory.finishedStock,
        config
      ),
    },
    warnings,
  };
}

/**
 * Demand & Sales System
 * Awareness accumulates advertising with diminishing returns; demand falls
 * with price; sales are capped by finished goods on hand (no backlog)
 */

import type {
  CommercialState,
  ControllableInputs,
  InventoryState,
  ShopConfig,
  ShopState,
  SimulationWarning,
} from '../core/types.js';
import { clamp } from '../core/math.js';
import type { MarketConditions } from './fluctuations.js';

export interface DemandResult {
  commercial: CommercialState;
  inventory: InventoryState;
  warnings: SimulationWarning[];
}

/**
 * Awareness points the outlets add each period, before the location factor
 */
export function calculatePremisesEffect(config: ShopConfig): number {
  const p = config.premises;
  return p.outlets * p.outletAwareness;
}

/**
 * Awareness after decay and this period's advertising
 * Formula: a * (1 - decay) + (gain * (1 - exp(-spend / scale)) + outlets * perOutlet) * locationFactor
 */
export function updateAwareness(
  previous: number,
  advertising: number,
  config: ShopConfig
): number {
  const c = config.demand;
  const advertisingEffect = c.advertisingGain * (1 - Math.exp(-advertising / c.advertisingScale));
  const locationFactor = config.premises.locationFactors[config.premises.location];
  const gain = (advertisingEffect + calculatePremisesEffect(config)) * locationFactor;
  return clamp(previous * (1 - c.awarenessDecay) + gain, 0, 100);
}

/**
 * Demand multiplier for a price
 * Formula: peak * exp(-price^2 / scale); no posted price means no sales
 */
export function calculatePriceResponse(price: number, config: ShopConfig): number {
  if (price <= 0) return 0;
  const c = config.demand;
  return c.peakMultiplier * Math.exp(-(price * price) / c.elasticityScale);
}

/**
 * Whole units customers want this period
 */
export function calculateDemand(
  price: number,
  awareness: number,
  noise: number,
  config: ShopConfig
): number {
  const response = calculatePriceResponse(price, config);
  if (response === 0) return 0;

  const baseline = config.demand.baseDemand + config.demand.awarenessWeight * awareness;
  return Math.floor(Math.max(0, baseline * response + noise));
}

/**
 * Sell from post-production stock
 */
export function updateDemand(
  prev: ShopState,
  inputs: ControllableInputs,
  inventory: InventoryState,
  market: MarketConditions,
  config: ShopConfig
): DemandResult {
  const warnings: SimulationWarning[] = [];

  const awareness = updateAwareness(prev.commercial.awareness, inputs.advertising, config);
  const demand = calculateDemand(inputs.price, awareness, market.demandNoise, config);

  const stockAvailable = inventory.finishedStock;
  const unitsSold = Math.min(demand, stockAvailable);
  const lostSales = demand - unitsSold;

  if (lostSales > 0) {
    warnings.push({ code: 'lost_sales', demand, sold: unitsSold, lost: lostSales });
  }

  return {
    commercial: {
      price: inputs.price,
      advertising: inputs.advertising,
      awareness,
      demand,
      stockAvailable,
      unitsSold,
      lostSales,
      materialPrice: market.materialPrice,
    },
    inventory: {
      ...inventory,
      finishedStock: stockAvailable - unitsSold,
    },
    warnings,
  };
}

/**
 * Market Fluctuations
 * Per-period swings of the material price and of demand, either drawn from
 * the seeded generator or replayed from fixed series
 *
 * The generator state travels inside ShopState, so a run replayed from
 * any snapshot draws the same numbers.
 */

import type { ShopConfig, ShopState } from '../core/types.js';
import { SeededRNG, type RNGState } from '../core/rng.js';

export interface MarketConditions {
  /** Material price quoted for the next period's purchases */
  materialPrice: number;
  /** Units added to (or removed from) this period's demand */
  demandNoise: number;
}

export interface FluctuationResult {
  market: MarketConditions;
  rngState: RNGState;
}

/**
 * Value of a fixed series for the period being played; wraps around
 */
export function seriesValue(series: readonly number[], period: number): number {
  return series[period % series.length];
}

/**
 * Draw this period's market conditions
 * Only random mode draws numbers; otherwise the generator state is unchanged.
 */
export function drawMarketConditions(prev: ShopState, config: ShopConfig): FluctuationResult {
  const c = config.fluctuations;

  if (!c.enabled) {
    return {
      market: { materialPrice: config.materialPrice, demandNoise: 0 },
      rngState: { ...prev.rngState },
    };
  }

  if (c.mode === 'series') {
    return {
      market: {
        materialPrice: Math.round(seriesValue(c.materialPriceSeries, prev.period)),
        demandNoise: seriesValue(c.demandSeries, prev.period),
      },
      rngState: { ...prev.rngState },
    };
  }

  const rng = SeededRNG.fromState(prev.rngState);
  const materialPrice = Math.round(rng.randomRange(c.materialPriceMin, c.materialPriceMax));
  const demandNoise = rng.randomRange(-c.demandNoise, c.demandNoise);

  return {
    market: { materialPrice, demandNoise },
    rngState: rng.getState(),
  };
}

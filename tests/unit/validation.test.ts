/**
 * Config Validation Tests
 */

import { describe, it, expect } from 'vitest';
import {
  assertValidConfig,
  checkConfigValue,
  validateConfig,
} from '../../src/core/validation.js';
import { DEFAULT_CONFIG, ORIGINAL_ECONOMY, mergeConfig } from '../../src/core/shop.js';
import { Simulation } from '../../src/core/simulation.js';
import { InvalidConfigError } from '../../src/core/errors.js';

describe('checkConfigValue', () => {
  it('should require divisors to be positive', () => {
    expect(checkConfigValue('production.materialPerUnit', 0)).toBe(
      'production.materialPerUnit must be > 0, got 0'
    );
    expect(checkConfigValue('production.materialPerUnit', 0.5)).toBeNull();
    expect(checkConfigValue('workforce.referenceWage', -1)).not.toBeNull();
  });

  it('should keep rates and factors within [0, 1]', () => {
    expect(checkConfigValue('demand.awarenessDecay', 1.2)).toBe(
      'demand.awarenessDecay must be >= 0 and <= 1, got 1.2'
    );
    expect(checkConfigValue('finance.debtRate', -0.01)).not.toBeNull();
    expect(checkConfigValue('machines.resaleFactor', 0.8)).toBeNull();
  });

  it('should cover whole sections through wildcards', () => {
    expect(checkConfigValue('inputLimits.maxPrice', -5)).not.toBeNull();
    expect(checkConfigValue('inputSteps.steps.wage', 100)).toBeNull();
    expect(checkConfigValue('premises.locationRents.city', -1)).not.toBeNull();
  });

  it('should reject NaN everywhere and Infinity except on scales', () => {
    expect(checkConfigValue('seed', NaN)).not.toBeNull();
    expect(checkConfigValue('materialPrice', Infinity)).not.toBeNull();
    expect(checkConfigValue('demand.elasticityScale', Infinity)).toBeNull();
  });

  it('should restrict string leaves to their choices', () => {
    expect(checkConfigValue('premises.location', 'city')).toBeNull();
    expect(checkConfigValue('premises.location', 'harbour')).toBe(
      'premises.location must be one of suburb, city, innerCity'
    );
    expect(checkConfigValue('fluctuations.mode', 'series')).toBeNull();
  });
});

describe('validateConfig', () => {
  it('should accept the default and classic configs', () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual([]);
    expect(validateConfig(mergeConfig(DEFAULT_CONFIG, ORIGINAL_ECONOMY))).toEqual([]);
  });

  it('should list every problem', () => {
    const config = mergeConfig(DEFAULT_CONFIG, {
      demand: { advertisingScale: 0 },
      fluctuations: { materialPriceMin: 10, materialPriceSeries: [3, NaN] },
    });

    expect(validateConfig(config)).toEqual([
      'demand.advertisingScale must be > 0, got 0',
      'fluctuations.materialPriceSeries[1] must be a finite number',
      'fluctuations.materialPriceMin must not exceed fluctuations.materialPriceMax',
    ]);
  });

  it('should require both series in series mode', () => {
    const config = mergeConfig(DEFAULT_CONFIG, { fluctuations: { enabled: true, mode: 'series' } });
    expect(validateConfig(config)).toEqual([
      'fluctuations series mode needs a material price and a demand series',
    ]);
  });

  it('should throw InvalidConfigError with the problems', () => {
    const config = mergeConfig(DEFAULT_CONFIG, { production: { materialPerUnit: 0 } });
    expect(() => assertValidConfig(config)).toThrow(InvalidConfigError);
  });
});

describe('Simulation config guard', () => {
  it('should refuse to start with an out-of-range coefficient', () => {
    expect(() => Simulation.initialize({}, { production: { materialPerUnit: 0 } })).toThrow(
      InvalidConfigError
    );
    expect(() => Simulation.initialize({}, { demand: { awarenessDecay: -0.5 } })).toThrow(
      'demand.awarenessDecay must be >= 0 and <= 1, got -0.5'
    );
  });
});

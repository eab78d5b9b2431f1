/**
 * Input Tests
 * Boundary validation and clamping of controllable inputs
 */

import { describe, it, expect } from 'vitest';
import { parseInputs, clampInputs, getInputRanges } from '../../src/core/inputs.js';
import { InvalidInputError } from '../../src/core/errors.js';
import { DEFAULT_CONFIG, DEFAULT_INPUTS, initializeShop, mergeConfig } from '../../src/core/shop.js';

describe('parseInputs', () => {
  it('should accept a complete numeric record', () => {
    expect(parseInputs({ ...DEFAULT_INPUTS })).toEqual(DEFAULT_INPUTS);
  });

  it('should ignore extra fields', () => {
    const parsed = parseInputs({ ...DEFAULT_INPUTS, note: 'hello' });
    expect(Object.keys(parsed)).toHaveLength(7);
  });

  it('should reject non-objects', () => {
    expect(() => parseInputs(null)).toThrow(InvalidInputError);
    expect(() => parseInputs(42)).toThrow(InvalidInputError);
    expect(() => parseInputs([1, 2, 3])).toThrow(InvalidInputError);
  });

  it('should name the missing field', () => {
    const { wage: _wage, ...rest } = DEFAULT_INPUTS;
    try {
      parseInputs(rest);
      expect.fail('expected InvalidInputError');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      if (error instanceof InvalidInputError) {
        expect(error.field).toBe('wage');
        expect(error.message).toBe('Missing input field "wage"');
      }
    }
  });

  it('should reject non-numeric and non-finite values', () => {
    expect(() => parseInputs({ ...DEFAULT_INPUTS, price: '52' })).toThrow(
      'Input field "price" must be a number, got string'
    );
    expect(() => parseInputs({ ...DEFAULT_INPUTS, advertising: NaN })).toThrow(
      'Input field "advertising" must be finite, got NaN'
    );
    expect(() => parseInputs({ ...DEFAULT_INPUTS, wage: Infinity })).toThrow(InvalidInputError);
  });
});

describe('clampInputs', () => {
  const shop = initializeShop();

  it('should leave in-range inputs untouched', () => {
    const result = clampInputs(DEFAULT_INPUTS, shop, DEFAULT_CONFIG);
    expect(result.inputs).toEqual(DEFAULT_INPUTS);
    expect(result.warnings).toEqual([]);
  });

  it('should clamp values above the limit and warn', () => {
    const result = clampInputs({ ...DEFAULT_INPUTS, price: 500 }, shop, DEFAULT_CONFIG);
    expect(result.inputs.price).toBe(200);
    expect(result.warnings).toEqual([
      { code: 'input_clamped', field: 'price', requested: 500, applied: 200 },
    ]);
  });

  it('should clamp negative spend to zero', () => {
    const result = clampInputs({ ...DEFAULT_INPUTS, advertising: -100 }, shop, DEFAULT_CONFIG);
    expect(result.inputs.advertising).toBe(0);
    expect(result.warnings).toHaveLength(1);
  });

  it('should not fire more workers than are employed', () => {
    const result = clampInputs({ ...DEFAULT_INPUTS, workerDelta: -20 }, shop, DEFAULT_CONFIG);
    expect(result.inputs.workerDelta).toBe(-8);
    expect(result.warnings).toEqual([
      { code: 'input_clamped', field: 'workerDelta', requested: -20, applied: -8 },
    ]);
  });

  it('should truncate fractional deltas toward zero', () => {
    const result = clampInputs(
      { ...DEFAULT_INPUTS, workerDelta: 2.7, machineDelta: -0.5 },
      shop,
      DEFAULT_CONFIG
    );
    expect(result.inputs.workerDelta).toBe(2);
    expect(Object.is(result.inputs.machineDelta, 0)).toBe(true);
    expect(result.warnings.map((w) => w.code)).toEqual(['input_clamped', 'input_clamped']);
  });

  it('should shrink purchase ceilings while cash is negative', () => {
    const indebted = initializeShop({ cash: -25000 });
    expect(indebted.finance.creditFactor).toBe(0.5);

    const ranges = getInputRanges(indebted, DEFAULT_CONFIG);
    expect(ranges.materialPurchase.max).toBe(2500);
    expect(ranges.machineDelta.max).toBe(5);

    const result = clampInputs(
      { ...DEFAULT_INPUTS, materialPurchase: 5000, machineDelta: 10 },
      indebted,
      DEFAULT_CONFIG
    );
    expect(result.inputs.materialPurchase).toBe(2500);
    expect(result.inputs.machineDelta).toBe(5);
  });

  it('should snap to control steps when enabled', () => {
    const config = mergeConfig(DEFAULT_CONFIG, { inputSteps: { enabled: true } });
    const result = clampInputs(
      { ...DEFAULT_INPUTS, price: 53, wage: 1250, materialPurchase: 120 },
      shop,
      config
    );
    expect(result.inputs.price).toBe(52);
    expect(result.inputs.wage).toBe(1200);
    expect(result.inputs.materialPurchase).toBe(100);
    expect(result.warnings).toEqual([]);
  });
});

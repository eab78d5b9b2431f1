/**
 * Lifecycle Scenarios
 * Zero decisions, over-hiring, closing and the period horizon
 */

import { describe, it, expect } from 'vitest';
import { Simulation } from '../../src/core/simulation.js';
import { DEFAULT_INPUTS, ORIGINAL_ECONOMY } from '../../src/core/shop.js';
import { InvalidInputError, RunClosedError } from '../../src/core/errors.js';
import type { ControllableInputs } from '../../src/core/types.js';

const ZERO_DECISIONS: ControllableInputs = {
  price: 0,
  materialPurchase: 0,
  advertising: 0,
  wage: 1000,
  workerDelta: 0,
  machineDelta: 0,
  maintenance: 0,
};

describe('Zero decisions', () => {
  it('should sell nothing and pay only wages', () => {
    const sim = Simulation.initialize();
    const before = sim.getState();
    const { state } = sim.advance(ZERO_DECISIONS);

    expect(state.commercial.demand).toBe(0);
    expect(state.commercial.unitsSold).toBe(0);
    expect(state.finance.revenue).toBe(0);
    expect(state.finance.costs.wages).toBe(8000);
    expect(state.finance.cost).toBe(8000);
    expect(state.finance.cash).toBe(before.finance.cash - state.finance.costs.wages);
    expect(state.finance.cash).toBe(157775);
  });

  it('should keep producing from material already in stock', () => {
    const sim = Simulation.initialize();
    const { state } = sim.advance(ZERO_DECISIONS);

    expect(state.production.unitsProduced).toBe(16);
    expect(state.inventory.materialStock).toBe(0);
    expect(state.inventory.finishedStock).toBe(97);
  });
});

describe('Over-hiring', () => {
  it('should report material shortfalls while stock stays below capacity', () => {
    const sim = Simulation.initialize();
    const hiring = { ...DEFAULT_INPUTS, workerDelta: 5, materialPurchase: 100 };

    for (let i = 0; i < 4; i++) {
      const { state, warnings } = sim.advance(hiring);

      expect(warnings.some((w) => w.code === 'material_shortfall')).toBe(true);
      expect(state.production.unitsProduced).toBe(state.production.materialLimit);
      expect(state.inventory.finishedStock).toBeLessThan(state.inventory.storageCapacity);
    }

    expect(sim.getState().workforce.workers).toBe(28);
  });
});

describe('Closed run', () => {
  it('should reject advance after close and keep history', () => {
    const sim = Simulation.initialize();
    sim.advance(DEFAULT_INPUTS);
    sim.close();

    expect(sim.getStatus()).toBe('closed');
    expect(() => sim.advance(DEFAULT_INPUTS)).toThrow(RunClosedError);
    expect(sim.history()).toHaveLength(2);
    expect(sim.getPeriod()).toBe(1);
  });

  it('should treat a second close as a no-op', () => {
    const sim = Simulation.initialize();
    sim.close();
    expect(() => sim.close()).not.toThrow();
    expect(sim.isClosed()).toBe(true);
  });

  it('should close itself at the configured horizon', () => {
    const sim = Simulation.initialize({}, { maxPeriods: 3 });
    const results = sim.run([DEFAULT_INPUTS, DEFAULT_INPUTS, DEFAULT_INPUTS]);

    expect(results.map((r) => r.state.period)).toEqual([1, 2, 3]);
    expect(sim.isClosed()).toBe(true);
    expect(() => sim.advance(DEFAULT_INPUTS)).toThrow('Run is closed at period 3');
    expect(sim.history()).toHaveLength(4);
  });
});

describe('Malformed inputs', () => {
  it('should leave state and history unchanged', () => {
    const sim = Simulation.initialize();
    const before = sim.getState();

    expect(() => sim.advance(JSON.parse('{"price": "cheap"}'))).toThrow(InvalidInputError);
    expect(sim.getState()).toBe(before);
    expect(sim.history()).toHaveLength(1);
    expect(sim.getStatus()).toBe('ready');
  });
});

describe('Credit penalty', () => {
  it('should shrink purchases while the shop is in debt', () => {
    const sim = Simulation.initialize({ cash: -25000 });
    const { warnings } = sim.advance({ ...DEFAULT_INPUTS, materialPurchase: 5000, machineDelta: 10 });

    expect(sim.getLastInputs()?.materialPurchase).toBe(2500);
    expect(sim.getLastInputs()?.machineDelta).toBe(5);
    expect(warnings.filter((w) => w.code === 'input_clamped')).toEqual([
      { code: 'input_clamped', field: 'materialPurchase', requested: 5000, applied: 2500 },
      { code: 'input_clamped', field: 'machineDelta', requested: 10, applied: 5 },
    ]);
    expect(warnings.some((w) => w.code === 'low_cash')).toBe(true);
  });
});

describe('Summary', () => {
  it('should describe the current period', () => {
    const sim = Simulation.initialize();
    sim.advance(DEFAULT_INPUTS);

    expect(sim.getSummary()).toMatchObject({
      period: 1,
      status: 'ready',
      workers: 8,
      machines: 10,
      materialStock: 0,
      finishedStock: 0,
      unitsSold: 97,
      warnings: 2,
    });
  });
});

describe('Classic economy', () => {
  it('should replay the fixed 14-month market and close', () => {
    const sim = Simulation.initialize({}, ORIGINAL_ECONOMY);
    sim.run(Array.from({ length: 14 }, () => DEFAULT_INPUTS));

    const played = sim.history().slice(1);
    expect(played.map((s) => s.commercial.materialPrice)).toEqual([
      8, 5, 5, 6, 5, 7, 7, 8, 8, 3, 5, 6, 8, 3,
    ]);
    expect(played.every((s) => s.finance.costs.rent === 1500)).toBe(true);
    expect(played.every((s) => s.finance.costs.benefits === s.workforce.workers * 50)).toBe(true);
    expect(sim.isClosed()).toBe(true);
  });

  it('should give the same market whatever the seed', () => {
    const a = Simulation.initialize({}, { ...ORIGINAL_ECONOMY, seed: 1 });
    const b = Simulation.initialize({}, { ...ORIGINAL_ECONOMY, seed: 2 });
    a.run([DEFAULT_INPUTS, DEFAULT_INPUTS, DEFAULT_INPUTS]);
    b.run([DEFAULT_INPUTS, DEFAULT_INPUTS, DEFAULT_INPUTS]);

    expect(b.history().map((s) => s.commercial)).toEqual(a.history().map((s) => s.commercial));
    expect(b.getState().finance).toEqual(a.getState().finance);
  });
});

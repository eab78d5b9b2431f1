/**
 * Production Tests
 */

import { describe, it, expect } from 'vitest';
import {
  calculateLabourCapacity,
  calculateMachineCapacity,
  calculateCapacity,
  updateProduction,
} from '../../src/systems/production.js';
import { DEFAULT_CONFIG, DEFAULT_INPUTS, initializeShop } from '../../src/core/shop.js';

describe('Capacity', () => {
  it('should scale labour with the square root of motivation', () => {
    expect(calculateLabourCapacity(8, 50, DEFAULT_CONFIG)).toBe(400);
    expect(calculateLabourCapacity(8, 12.5, DEFAULT_CONFIG)).toBe(200);
    expect(calculateLabourCapacity(8, 0, DEFAULT_CONFIG)).toBe(0);
  });

  it('should reduce machine output with wear', () => {
    expect(calculateMachineCapacity(10, 0, DEFAULT_CONFIG)).toBe(500);
    expect(calculateMachineCapacity(10, 6, DEFAULT_CONFIG)).toBeCloseTo(485, 9);
    expect(calculateMachineCapacity(10, 100, DEFAULT_CONFIG)).toBe(250);
  });

  it('should take the scarcer resource in whole units', () => {
    expect(calculateCapacity(400.7, 490)).toBe(400);
    expect(calculateCapacity(600, 489.9)).toBe(489);
    expect(calculateCapacity(-5, 100)).toBe(0);
  });
});

describe('updateProduction', () => {
  const workforce = { workers: 8, motivation: 50, wage: 1000 };
  const machines = { machines: 10, wear: 4, maintenanceBacklog: 0 };

  it('should be limited by material on hand', () => {
    const shop = initializeShop();
    const result = updateProduction(shop, DEFAULT_INPUTS, workforce, machines, DEFAULT_CONFIG);

    expect(result.production.capacity).toBe(400);
    expect(result.production.materialLimit).toBe(16);
    expect(result.production.unitsProduced).toBe(16);
    expect(result.production.idleRatio).toBe(0.96);
    expect(result.inventory.materialStock).toBe(0);
    expect(result.inventory.finishedStock).toBe(97);
    expect(result.warnings).toEqual([
      { code: 'material_shortfall', capacity: 400, produced: 16, shortfall: 384 },
    ]);
  });

  it('should use material bought this period', () => {
    const shop = initializeShop();
    const result = updateProduction(
      shop,
      { ...DEFAULT_INPUTS, materialPurchase: 500 },
      workforce,
      machines,
      DEFAULT_CONFIG
    );

    expect(result.production.unitsProduced).toBe(400);
    expect(result.inventory.materialStock).toBe(116);
    expect(result.production.idleRatio).toBe(0);
    expect(result.warnings).toEqual([]);
  });

  it('should discard output beyond storage capacity', () => {
    const shop = initializeShop({ finishedStock: 1990, materialStock: 1000 });
    const result = updateProduction(shop, DEFAULT_INPUTS, workforce, machines, DEFAULT_CONFIG);

    expect(result.production.unitsProduced).toBe(400);
    expect(result.inventory.finishedStock).toBe(2000);
    expect(result.inventory.materialStock).toBe(600);
    expect(result.warnings).toEqual([
      { code: 'storage_overflow', capacity: 2000, discarded: 390 },
    ]);
  });

  it('should produce nothing without workers', () => {
    const shop = initializeShop();
    const result = updateProduction(
      shop,
      DEFAULT_INPUTS,
      { ...workforce, workers: 0 },
      machines,
      DEFAULT_CONFIG
    );

    expect(result.production.capacity).toBe(0);
    expect(result.production.unitsProduced).toBe(0);
    expect(result.production.idleRatio).toBe(0);
    expect(result.warnings).toEqual([]);
  });
});

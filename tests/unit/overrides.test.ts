/**
 * Config Override Tests
 * Uses a temporary overrides file per test
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  loadOverrides,
  addOverride,
  removeOverride,
  clearOverrides,
  applyOverridesToConfig,
  type OverridesFile,
} from '../../src/config/overrides.js';
import { DEFAULT_CONFIG, DEFAULT_INPUTS } from '../../src/core/shop.js';
import { Simulation } from '../../src/core/simulation.js';

function overridesOf(...entries: Array<{ path: string; newValue: unknown }>): OverridesFile {
  return {
    version: 1,
    lastModified: '2026-01-01T00:00:00.000Z',
    overrides: entries.map((e) => ({
      ...e,
      oldValue: null,
      appliedAt: '2026-01-01T00:00:00.000Z',
      source: 'test',
    })),
  };
}

describe('Overrides file', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    dir = mkdtempSync(join(tmpdir(), 'shop-overrides-'));
    file = join(dir, 'overrides.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should return an empty set when the file is missing', () => {
    expect(loadOverrides(file).overrides).toEqual([]);
  });

  it('should ignore a malformed file', () => {
    writeFileSync(file, '{"version": "one"}', 'utf-8');
    expect(loadOverrides(file).overrides).toEqual([]);

    writeFileSync(file, 'not json', 'utf-8');
    expect(loadOverrides(file).overrides).toEqual([]);
  });

  it('should add, replace and remove overrides by path', () => {
    expect(addOverride({ path: 'demand.baseDemand', oldValue: 280, newValue: 300, source: 'test' }, file)).toBe(true);
    expect(addOverride({ path: 'demand.baseDemand', oldValue: 280, newValue: 320, source: 'test' }, file)).toBe(true);

    const loaded = loadOverrides(file);
    expect(loaded.overrides).toHaveLength(1);
    expect(loaded.overrides[0].newValue).toBe(320);

    expect(removeOverride('demand.baseDemand', file)).toBe(true);
    expect(removeOverride('demand.baseDemand', file)).toBe(false);
    expect(loadOverrides(file).overrides).toEqual([]);
  });

  it('should clear all overrides', () => {
    addOverride({ path: 'seed', oldValue: 12345, newValue: 7, source: 'test' }, file);
    expect(clearOverrides(file)).toBe(true);
    expect(loadOverrides(file).overrides).toEqual([]);
  });
});

describe('applyOverridesToConfig', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should set nested values without touching the base config', () => {
    const config = applyOverridesToConfig(
      DEFAULT_CONFIG,
      overridesOf({ path: 'demand.baseDemand', newValue: 300 }, { path: 'fluctuations.enabled', newValue: true })
    );

    expect(config.demand.baseDemand).toBe(300);
    expect(config.fluctuations.enabled).toBe(true);
    expect(DEFAULT_CONFIG.demand.baseDemand).toBe(280);
    expect(DEFAULT_CONFIG.fluctuations.enabled).toBe(false);
  });

  it('should allow maxPeriods to move between null and a number', () => {
    const config = applyOverridesToConfig(DEFAULT_CONFIG, overridesOf({ path: 'maxPeriods', newValue: 14 }));
    expect(config.maxPeriods).toBe(14);

    const back = applyOverridesToConfig(config, overridesOf({ path: 'maxPeriods', newValue: null }));
    expect(back.maxPeriods).toBeNull();
  });

  it('should skip overrides with unknown paths or mismatched types', () => {
    const config = applyOverridesToConfig(
      DEFAULT_CONFIG,
      overridesOf(
        { path: 'demand.baseDemand', newValue: 'lots' },
        { path: 'demand.unknownKnob', newValue: 1 },
        { path: 'demand', newValue: 5 },
        { path: 'seed', newValue: null },
        { path: 'nothing.here', newValue: 1 }
      )
    );

    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('should skip values outside the declared range', () => {
    const config = applyOverridesToConfig(
      DEFAULT_CONFIG,
      overridesOf(
        { path: 'production.materialPerUnit', newValue: 0 },
        { path: 'demand.advertisingScale', newValue: 0 },
        { path: 'demand.awarenessDecay', newValue: -0.1 },
        { path: 'finance.minCreditFactor', newValue: 1.5 },
        { path: 'premises.outlets', newValue: 1.5 },
        { path: 'premises.location', newValue: 'harbour' },
        { path: 'maxPeriods', newValue: 0 }
      )
    );

    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('should skip an override that breaks a cross-field rule', () => {
    const config = applyOverridesToConfig(
      DEFAULT_CONFIG,
      overridesOf(
        { path: 'fluctuations.materialPriceMin', newValue: 9 },
        { path: 'fluctuations.mode', newValue: 'series' },
        { path: 'fluctuations.materialPriceMax', newValue: 12 }
      )
    );

    expect(config.fluctuations.materialPriceMin).toBe(2);
    expect(config.fluctuations.mode).toBe('random');
    expect(config.fluctuations.materialPriceMax).toBe(12);
  });

  it('should accept in-range values for premises and rates', () => {
    const config = applyOverridesToConfig(
      DEFAULT_CONFIG,
      overridesOf(
        { path: 'premises.location', newValue: 'innerCity' },
        { path: 'premises.locationRents.innerCity', newValue: 2000 },
        { path: 'demand.awarenessDecay', newValue: 1 }
      )
    );

    expect(config.premises.location).toBe('innerCity');
    expect(config.premises.locationRents.innerCity).toBe(2000);
    expect(config.demand.awarenessDecay).toBe(1);
  });

  it('should leave a run that advances to finite values', () => {
    const config = applyOverridesToConfig(
      DEFAULT_CONFIG,
      overridesOf({ path: 'production.materialPerUnit', newValue: 0 })
    );
    const sim = Simulation.initialize({ materialStock: 0 }, config);
    const { state } = sim.advance(DEFAULT_INPUTS);

    expect(Number.isFinite(state.production.unitsProduced)).toBe(true);
    expect(Number.isFinite(state.inventory.finishedStock)).toBe(true);
    expect(Number.isFinite(state.finance.cash)).toBe(true);
  });
});

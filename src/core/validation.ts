/**
 * Config and State Validation
 * Declared ranges for every numeric coefficient, plus the invariants a
 * snapshot must satisfy before a run can start from it
 */

import type { ShopConfig, ShopState } from './types.js';
import { InvalidConfigError, InvalidInputError } from './errors.js';

export interface ValueBound {
  min: number;
  max?: number;
  exclusiveMin?: boolean;
  /** Accepts +Infinity (a scale that switches its effect off) */
  unbounded?: boolean;
  integer?: boolean;
}

const ANY: ValueBound = { min: -Number.MAX_VALUE };
const NON_NEGATIVE: ValueBound = { min: 0 };
const POSITIVE: ValueBound = { min: 0, exclusiveMin: true };
const SCALE: ValueBound = { min: 0, exclusiveMin: true, unbounded: true };
const SHARE: ValueBound = { min: 0, max: 1 };
const COUNT: ValueBound = { min: 0, integer: true };

/**
 * Range of each numeric config leaf, by dotted path
 * A `section.*` entry covers every leaf of that section.
 */
export const CONFIG_BOUNDS: Readonly<Record<string, ValueBound>> = {
  seed: ANY,
  maxPeriods: { min: 1, integer: true },
  materialPrice: NON_NEGATIVE,
  'inputLimits.*': NON_NEGATIVE,
  'inputSteps.steps.*': NON_NEGATIVE,

  'workforce.neutralMotivation': { min: 0, max: 100, exclusiveMin: true },
  'workforce.referenceWage': POSITIVE,
  'workforce.wageSensitivity': NON_NEGATIVE,
  'workforce.profitSensitivity': NON_NEGATIVE,
  'workforce.profitScale': SCALE,
  'workforce.adjustmentRate': SHARE,
  'workforce.shockThreshold': NON_NEGATIVE,
  'workforce.shockPenalty': NON_NEGATIVE,
  'workforce.benefits': NON_NEGATIVE,
  'workforce.benefitSensitivity': NON_NEGATIVE,

  'machines.resaleFactor': SHARE,
  'machines.*': NON_NEGATIVE,

  'production.wearPenalty': SHARE,
  'production.materialPerUnit': POSITIVE,
  'production.*': NON_NEGATIVE,

  'demand.elasticityScale': SCALE,
  'demand.advertisingScale': SCALE,
  'demand.awarenessDecay': SHARE,
  'demand.*': NON_NEGATIVE,

  'finance.depositRate': SHARE,
  'finance.debtRate': SHARE,
  'finance.minCreditFactor': SHARE,
  'finance.creditScale': SCALE,
  'finance.*': NON_NEGATIVE,

  'premises.outlets': COUNT,
  'premises.locationRents.*': NON_NEGATIVE,
  'premises.locationFactors.*': NON_NEGATIVE,
  'premises.*': NON_NEGATIVE,

  'fluctuations.*': NON_NEGATIVE,
};

/**
 * String leaves and the values they take
 */
export const CONFIG_CHOICES: Readonly<Record<string, readonly string[]>> = {
  'premises.location': ['suburb', 'city', 'innerCity'],
  'fluctuations.mode': ['random', 'series'],
};

export function boundFor(path: string): ValueBound | undefined {
  const exact = CONFIG_BOUNDS[path];
  if (exact) return exact;
  const section = path.slice(0, path.lastIndexOf('.'));
  return section ? CONFIG_BOUNDS[`${section}.*`] : undefined;
}

export function isWithinBound(value: number, bound: ValueBound): boolean {
  if (Number.isNaN(value)) return false;
  if (!Number.isFinite(value) && !(bound.unbounded && value === Infinity)) return false;
  if (bound.exclusiveMin ? value <= bound.min : value < bound.min) return false;
  if (bound.max !== undefined && value > bound.max) return false;
  return !bound.integer || Number.isInteger(value);
}

function describeBound(bound: ValueBound): string {
  const low = bound.exclusiveMin ? `> ${bound.min}` : `>= ${bound.min}`;
  const high = bound.max === undefined ? '' : ` and <= ${bound.max}`;
  return `${bound.integer ? 'an integer ' : ''}${low}${high}`;
}

/**
 * Check one leaf value against its declared range or choices
 * Returns null when the value is acceptable.
 */
export function checkConfigValue(path: string, value: unknown): string | null {
  const choices = CONFIG_CHOICES[path];
  if (choices) {
    return typeof value === 'string' && choices.includes(value)
      ? null
      : `${path} must be one of ${choices.join(', ')}`;
  }

  if (typeof value !== 'number') return null;
  const bound = boundFor(path);
  if (!bound || isWithinBound(value, bound)) return null;
  return `${path} must be ${describeBound(bound)}, got ${value}`;
}

function collectProblems(value: unknown, path: string, problems: string[]): void {
  if (Array.isArray(value)) {
    value.forEach((item, i) => {
      if (typeof item !== 'number' || !Number.isFinite(item)) {
        problems.push(`${path}[${i}] must be a finite number`);
      }
    });
    return;
  }

  if (typeof value === 'object' && value !== null) {
    for (const [key, child] of Object.entries(value)) {
      collectProblems(child, path ? `${path}.${key}` : key, problems);
    }
    return;
  }

  if (value === null) return;
  const problem = checkConfigValue(path, value);
  if (problem) problems.push(problem);
}

/**
 * All range violations in a config, empty when it is usable
 */
export function validateConfig(config: ShopConfig): string[] {
  const problems: string[] = [];
  collectProblems(config, '', problems);

  const f = config.fluctuations;
  if (f.materialPriceMin > f.materialPriceMax) {
    problems.push('fluctuations.materialPriceMin must not exceed fluctuations.materialPriceMax');
  }
  if (f.mode === 'series' && (f.materialPriceSeries.length === 0 || f.demandSeries.length === 0)) {
    problems.push('fluctuations series mode needs a material price and a demand series');
  }
  if (f.materialPriceSeries.some((price) => price < 0)) {
    problems.push('fluctuations.materialPriceSeries must not contain negative prices');
  }

  return problems;
}

export function assertValidConfig(config: ShopConfig): void {
  const problems = validateConfig(config);
  if (problems.length > 0) {
    throw new InvalidConfigError(problems);
  }
}

function collectNonFinite(value: unknown, path: string, problems: string[]): void {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) problems.push(`${path} must be finite, got ${value}`);
    return;
  }
  if (typeof value === 'object' && value !== null) {
    for (const [key, child] of Object.entries(value)) {
      collectNonFinite(child, path ? `${path}.${key}` : key, problems);
    }
  }
}

function isIndex(value: number): boolean {
  return value >= 0 && value <= 100;
}

/**
 * Reject a snapshot that breaks the state invariants
 * Used for caller-supplied starting states.
 */
export function assertValidState(state: ShopState): void {
  const problems: string[] = [];
  collectNonFinite(state, '', problems);

  if (problems.length === 0) {
    const { inventory, workforce, machines, commercial, finance } = state;
    const checks: Array<[boolean, string]> = [
      [Number.isInteger(state.period) && state.period >= 0, 'period must be a whole number >= 0'],
      [inventory.materialStock >= 0, 'inventory.materialStock must be >= 0'],
      [inventory.storageCapacity >= 0, 'inventory.storageCapacity must be >= 0'],
      [
        inventory.finishedStock >= 0 && inventory.finishedStock <= inventory.storageCapacity,
        'inventory.finishedStock must lie between 0 and storageCapacity',
      ],
      [Number.isInteger(workforce.workers) && workforce.workers >= 0, 'workforce.workers must be a whole number >= 0'],
      [isIndex(workforce.motivation), 'workforce.motivation must lie in [0, 100]'],
      [Number.isInteger(machines.machines) && machines.machines >= 0, 'machines.machines must be a whole number >= 0'],
      [isIndex(machines.wear), 'machines.wear must lie in [0, 100]'],
      [machines.maintenanceBacklog >= 0, 'machines.maintenanceBacklog must be >= 0'],
      [isIndex(commercial.awareness), 'commercial.awareness must lie in [0, 100]'],
      [finance.creditFactor >= 0 && finance.creditFactor <= 1, 'finance.creditFactor must lie in [0, 1]'],
    ];
    for (const [ok, message] of checks) {
      if (!ok) problems.push(message);
    }
  }

  if (problems.length > 0) {
    throw new InvalidInputError(`Invalid starting state: ${problems.join('; ')}`);
  }
}

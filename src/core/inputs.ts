/**
 * Controllable Inputs
 * Structural validation at the boundary, then clamping to feasible ranges
 *
 * Malformed records are rejected with InvalidInputError. Out-of-range
 * values are never rejected: they are clamped and reported as warnings.
 */

import type {
  ControllableInputs,
  InputField,
  InputRange,
  ShopConfig,
  ShopState,
  SimulationWarning,
} from './types.js';
import { InvalidInputError } from './errors.js';
import { clamp } from './math.js';

export const INPUT_FIELDS: readonly InputField[] = [
  'price',
  'materialPurchase',
  'advertising',
  'wage',
  'workerDelta',
  'machineDelta',
  'maintenance',
];

const SIGNED_FIELDS: ReadonlySet<InputField> = new Set<InputField>(['workerDelta', 'machineDelta']);

export interface ClampResult {
  inputs: ControllableInputs;
  warnings: SimulationWarning[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(record: Record<string, unknown>, field: InputField): number {
  const value = record[field];
  if (value === undefined) {
    throw new InvalidInputError(`Missing input field "${field}"`, field);
  }
  if (typeof value !== 'number') {
    throw new InvalidInputError(`Input field "${field}" must be a number, got ${typeof value}`, field);
  }
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(`Input field "${field}" must be finite, got ${value}`, field);
  }
  return value;
}

/**
 * Check the shape of an untrusted input record
 * Extra fields are ignored.
 */
export function parseInputs(raw: unknown): ControllableInputs {
  if (!isRecord(raw)) {
    throw new InvalidInputError('Inputs must be an object with numeric fields');
  }

  return {
    price: readNumber(raw, 'price'),
    materialPurchase: readNumber(raw, 'materialPurchase'),
    advertising: readNumber(raw, 'advertising'),
    wage: readNumber(raw, 'wage'),
    workerDelta: readNumber(raw, 'workerDelta'),
    machineDelta: readNumber(raw, 'machineDelta'),
    maintenance: readNumber(raw, 'maintenance'),
  };
}

/**
 * Feasible range of every decision given the previous state
 *
 * Purchase ceilings shrink with the credit factor while cash is negative.
 */
export function getInputRanges(
  prev: ShopState,
  config: ShopConfig
): Record<InputField, InputRange> {
  const limits = config.inputLimits;
  const credit = prev.finance.creditFactor;

  return {
    price: { min: 0, max: limits.maxPrice },
    materialPurchase: { min: 0, max: limits.maxMaterialPurchase * credit },
    advertising: { min: 0, max: limits.maxAdvertising },
    wage: { min: 0, max: limits.maxWage },
    workerDelta: { min: -prev.workforce.workers, max: limits.maxHiresPerPeriod },
    machineDelta: {
      min: -prev.machines.machines,
      max: Math.floor(limits.maxMachinePurchasesPerPeriod * credit),
    },
    maintenance: { min: 0, max: limits.maxMaintenance },
  };
}

function snapToStep(value: number, step: number, signed: boolean): number {
  if (step <= 0) return value;
  const steps = signed ? Math.trunc(value / step) : Math.floor(value / step);
  return steps * step;
}

/**
 * Clamp validated inputs into their feasible ranges
 */
export function clampInputs(
  inputs: ControllableInputs,
  prev: ShopState,
  config: ShopConfig
): ClampResult {
  const ranges = getInputRanges(prev, config);
  const applied: ControllableInputs = { ...inputs };
  const warnings: SimulationWarning[] = [];

  for (const field of INPUT_FIELDS) {
    const requested = inputs[field];
    const signed = SIGNED_FIELDS.has(field);
    const range = ranges[field];

    let value = signed ? Math.trunc(requested) : requested;
    value = clamp(value, range.min, range.max);

    const changed = value !== requested;

    if (config.inputSteps.enabled) {
      value = snapToStep(value, config.inputSteps.steps[field], signed);
    }

    // -0 from truncating small negatives
    value = value + 0;
    applied[field] = value;

    if (changed) {
      warnings.push({ code: 'input_clamped', field, requested, applied: value });
    }
  }

  return { inputs: applied, warnings };
}

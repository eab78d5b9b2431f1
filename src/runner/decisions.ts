/**
 * Decision scripts for the headless runner
 */

import { readFileSync } from 'fs';
import type { ControllableInputs } from '../core/types.js';
import { DEFAULT_INPUTS } from '../core/shop.js';
import { parseInputs } from '../core/inputs.js';
import { InvalidInputError } from '../core/errors.js';

/**
 * Expand to the first period then hold steady
 */
export function createDefaultScript(periods: number): ControllableInputs[] {
  const script: ControllableInputs[] = [];
  for (let i = 0; i < periods; i++) {
    script.push(
      i === 0
        ? { ...DEFAULT_INPUTS, workerDelta: 2, machineDelta: 2, materialPurchase: 500 }
        : { ...DEFAULT_INPUTS }
    );
  }
  return script;
}

/**
 * Parse a decision sequence from JSON text
 *
 * Entries may be partial; missing fields are taken from the previous
 * entry (DEFAULT_INPUTS for the first) with deltas and purchases reset to 0.
 */
export function parseDecisions(text: string): ControllableInputs[] {
  const raw: unknown = JSON.parse(text);
  if (!Array.isArray(raw)) {
    throw new InvalidInputError('Decision file must contain a JSON array');
  }

  const decisions: ControllableInputs[] = [];
  let previous: ControllableInputs = DEFAULT_INPUTS;

  raw.forEach((entry: unknown, index) => {
    if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
      throw new InvalidInputError(`Decision ${index + 1} must be an object`);
    }
    const carried: ControllableInputs = {
      ...previous,
      materialPurchase: 0,
      workerDelta: 0,
      machineDelta: 0,
    };
    const inputs = parseInputs({ ...carried, ...entry });
    decisions.push(inputs);
    previous = inputs;
  });

  return decisions;
}

export function loadDecisions(filePath: string): ControllableInputs[] {
  return parseDecisions(readFileSync(filePath, 'utf-8'));
}

/**
 * Engine errors
 * Structural problems only; economic infeasibility is reported as warnings
 */

import type { InputField } from './types.js';

export class SimulationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Input record is malformed (not an object, missing field, not a finite number)
 */
export class InvalidInputError extends SimulationError {
  readonly field: InputField | null;

  constructor(message: string, field: InputField | null = null) {
    super(message);
    this.field = field;
  }
}

/**
 * advance() called after the run was closed
 */
export class RunClosedError extends SimulationError {
  readonly period: number;

  constructor(period: number) {
    super(`Run is closed at period ${period}; no further periods can be advanced`);
    this.period = period;
  }
}

/**
 * Model configuration has a value outside its declared range
 */
export class InvalidConfigError extends SimulationError {
  readonly problems: readonly string[];

  constructor(problems: readonly string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.problems = problems;
  }
}

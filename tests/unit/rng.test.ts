/**
 * RNG Tests
 * Verify seeded random number generator behavior
 */

import { describe, it, expect } from 'vitest';
import { SeededRNG, hashState } from '../../src/core/rng.js';

describe('SeededRNG', () => {
  it('should produce deterministic sequences', () => {
    const rng1 = new SeededRNG(12345);
    const rng2 = new SeededRNG(12345);

    const seq1 = Array.from({ length: 100 }, () => rng1.random());
    const seq2 = Array.from({ length: 100 }, () => rng2.random());

    expect(seq1).toEqual(seq2);
  });

  it('should produce different sequences for different seeds', () => {
    const rng1 = new SeededRNG(12345);
    const rng2 = new SeededRNG(67890);

    const seq1 = Array.from({ length: 10 }, () => rng1.random());
    const seq2 = Array.from({ length: 10 }, () => rng2.random());

    expect(seq1).not.toEqual(seq2);
  });

  it('should produce values in [0, 1) range', () => {
    const rng = new SeededRNG(42);

    for (let i = 0; i < 1000; i++) {
      const value = rng.random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('should produce uniform distribution', () => {
    const rng = new SeededRNG(12345);
    const buckets: number[] = new Array(10).fill(0);

    for (let i = 0; i < 10000; i++) {
      buckets[Math.floor(rng.random() * 10)]++;
    }

    // Each bucket should have roughly 1000 values
    for (const count of buckets) {
      expect(count).toBeGreaterThan(800);
      expect(count).toBeLessThan(1200);
    }
  });

  it('should save and restore state correctly', () => {
    const rng = new SeededRNG(12345);
    for (let i = 0; i < 50; i++) {
      rng.random();
    }

    const savedState = rng.getState();
    const valuesAfterSave = Array.from({ length: 10 }, () => rng.random());

    const restored = SeededRNG.fromState(savedState);
    const restoredValues = Array.from({ length: 10 }, () => restored.random());

    expect(restoredValues).toEqual(valuesAfterSave);
  });

  it('should not share state with the snapshot it was restored from', () => {
    const snapshot = SeededRNG.stateFromSeed(7);
    const rng = SeededRNG.fromState(snapshot);
    rng.random();

    expect(snapshot).toEqual(SeededRNG.stateFromSeed(7));
  });

  it('should derive a non-zero state from seed 0', () => {
    const state = SeededRNG.stateFromSeed(0);
    expect(state.s0).not.toBe(0);
    expect(state.s1).not.toBe(0);
  });

  it('randomRange should produce values in range', () => {
    const rng = new SeededRNG(42);

    for (let i = 0; i < 100; i++) {
      const value = rng.randomRange(-5, 5);
      expect(value).toBeGreaterThanOrEqual(-5);
      expect(value).toBeLessThan(5);
    }
  });
});

describe('hashState', () => {
  it('should produce consistent hashes', () => {
    const obj = { a: 1, b: 'test', c: [1, 2, 3] };
    expect(hashState(obj)).toBe(hashState({ a: 1, b: 'test', c: [1, 2, 3] }));
  });

  it('should produce different hashes for different objects', () => {
    expect(hashState({ a: 1 })).not.toBe(hashState({ a: 2 }));
  });
});

/**
 * Seeded Random Number Generator for reproducible market fluctuations
 * Uses xorshift128+ algorithm; state is carried in every ShopState
 */

export interface RNGState {
  s0: number;
  s1: number;
}

export class SeededRNG {
  private state: RNGState;

  constructor(seed: number) {
    this.state = SeededRNG.stateFromSeed(seed);
  }

  /**
   * Derive the initial generator state from a seed (splitmix-style mixing)
   */
  static stateFromSeed(seed: number): RNGState {
    let s = seed >>> 0;

    s = ((s >>> 16) ^ s) * 0x45d9f3b;
    s = ((s >>> 16) ^ s) * 0x45d9f3b;
    s = (s >>> 16) ^ s;
    const s0 = s >>> 0;

    s = ((s >>> 16) ^ s) * 0x45d9f3b;
    s = ((s >>> 16) ^ s) * 0x45d9f3b;
    s = (s >>> 16) ^ s;
    const s1 = s >>> 0;

    return { s0: s0 || 1, s1: s1 || 1 }; // Ensure non-zero
  }

  /**
   * Resume a generator from a state stored in a snapshot
   */
  static fromState(state: RNGState): SeededRNG {
    const rng = new SeededRNG(0);
    rng.setState(state);
    return rng;
  }

  getState(): RNGState {
    return { ...this.state };
  }

  setState(state: RNGState): void {
    this.state = { ...state };
  }

  /**
   * Generate next random uint32
   */
  private next(): number {
    const s0 = this.state.s0;
    let s1 = this.state.s1;

    const result = (s0 + s1) >>> 0;

    s1 ^= s0;
    this.state.s0 = (((s0 << 23) | (s0 >>> 9)) ^ s1 ^ (s1 << 14)) >>> 0;
    this.state.s1 = ((s1 << 4) | (s1 >>> 28)) >>> 0;

    return result;
  }

  /**
   * Generate random float in [0, 1)
   */
  random(): number {
    return this.next() / 0x100000000;
  }

  /**
   * Generate random float in [min, max)
   */
  randomRange(min: number, max: number): number {
    return min + this.random() * (max - min);
  }
}

/**
 * Create a hash from state for determinism verification
 */
export function hashState(obj: unknown): string {
  const str = JSON.stringify(obj);

  // Simple hash function (djb2)
  let hash = 5381;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) + hash + str.charCodeAt(i)) >>> 0;
  }
  return hash.toString(16);
}

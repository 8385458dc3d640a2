// src/core/math/random.ts
/**
 * Seedable random number generation for the simulation
 */

import { Random, MersenneTwister19937 } from 'random-js';

/**
 * Seeded random number generator using Mersenne Twister
 */
export class RNG {
  private random: Random;
  private engine: MersenneTwister19937;
  private currentSeed: number | undefined;

  constructor(seed?: number) {
    this.currentSeed = seed;
    this.engine = seed !== undefined
      ? MersenneTwister19937.seed(seed)
      : MersenneTwister19937.autoSeed();
    this.random = new Random(this.engine);
  }

  /**
   * Reset the RNG with a new seed
   */
  setSeed(seed: number): void {
    this.currentSeed = seed;
    this.engine = MersenneTwister19937.seed(seed);
    this.random = new Random(this.engine);
  }

  /**
   * Seed the generator was created or last reset with, if any
   */
  get seed(): number | undefined {
    return this.currentSeed;
  }

  /**
   * Uniform random in [0, 1)
   */
  uniform(): number {
    return this.random.real(0, 1, false);
  }

  /**
   * Uniform random in [min, max)
   */
  between(min: number, max: number): number {
    return min + (max - min) * this.uniform();
  }
}

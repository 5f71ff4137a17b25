import type { IRNG } from '../rng';

/**
 * FakeRng - Test helper that returns predefined draws in [0, 1)
 * Implements the same interface as RNG for testing purposes
 */
export class FakeRng implements IRNG {
  private draws: number[];
  private index: number = 0;

  constructor(draws: number[]) {
    this.draws = [...draws];
  }

  /**
   * Returns the next predefined draw
   * Throws if draws are exhausted
   */
  next(): number {
    if (this.index >= this.draws.length) {
      throw new Error(`FakeRng: No more draws available. Requested draw ${this.index + 1}, but only ${this.draws.length} draws provided.`);
    }
    const draw = this.draws[this.index];
    this.index++;
    return draw;
  }

  getCounter(): number {
    return this.index;
  }

  /**
   * Returns seed (always 0 for FakeRng)
   */
  getSeed(): number {
    return 0;
  }
}

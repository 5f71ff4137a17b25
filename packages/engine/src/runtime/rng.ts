/**
 * Random source consumed by the resolver.
 * Anything returning uniform values in [0, 1) fits; tests script it.
 */
export interface IRNG {
  next(): number;
  getCounter(): number;
  getSeed(): number;
}

/**
 * Simple deterministic RNG using seed and counter
 * Based on mulberry32 PRNG for better distribution
 * Seed remains constant; counter advances for seekability
 */
export class RNG implements IRNG {
  private readonly seed: number;
  private counter: number;

  constructor(seed: number, counter: number = 0) {
    this.seed = seed;
    this.counter = counter;
  }

  /**
   * mulberry32 output for step `counter`, computed directly from the seed
   * (the state after n steps is seed + (n + 1) * 0x6d2b79f5), so the
   * sequence can be entered at any point without replaying it
   */
  private mulberry32(counter: number): number {
    let t = ((this.seed >>> 0) + Math.imul((counter + 1) >>> 0, 0x6d2b79f5)) | 0;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /**
   * Generates next random number in range [0, 1)
   * Increments counter but does not mutate seed
   */
  next(): number {
    const n = this.mulberry32(this.counter);
    this.counter++;
    return n;
  }

  getCounter(): number {
    return this.counter;
  }

  /**
   * Gets current seed (always returns the original seed)
   */
  getSeed(): number {
    return this.seed;
  }
}

/**
 * Process-wide generator used when no random source is injected.
 * Seeded once at load; no reuse guarantee across processes.
 */
export const processRng: IRNG = new RNG(Math.floor(Math.random() * 4294967296));

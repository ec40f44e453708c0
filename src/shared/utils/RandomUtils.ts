import seedrandom from "seedrandom";

/**
 * Random source handed to goals and behaviour modules.
 * Every roll the planner makes goes through one of these so a seeded run
 * replays turn for turn.
 */
export interface RandomSource {
  /** Float in [0, 1) */
  float(): number;
  /** Float in [min, max) */
  floatRange(min: number, max: number): number;
  /** Integer in [min, max] */
  intRange(min: number, max: number): number;
  chance(probability: number): boolean;
  element<T>(array: readonly T[]): T | undefined;
  shuffle<T>(array: T[]): T[];
  /**
   * Weighted-random pick: each item is chosen with probability
   * weight / total. Items with a non-positive or non-finite weight never win.
   */
  pickWeighted<T>(
    items: readonly T[],
    weightOf: (item: T) => number,
  ): T | undefined;
}

/**
 * Seedable RNG built on seedrandom's ARC4 generator.
 */
export class RandomUtils implements RandomSource {
  private readonly prng: seedrandom.PRNG;

  constructor(public readonly seed?: string) {
    this.prng = seedrandom(seed);
  }

  public float(): number {
    return this.prng();
  }

  public floatRange(min: number, max: number): number {
    return min + this.prng() * (max - min);
  }

  public intRange(min: number, max: number): number {
    return Math.floor(this.prng() * (max - min + 1)) + min;
  }

  public chance(probability: number): boolean {
    return this.prng() < probability;
  }

  public element<T>(array: readonly T[]): T | undefined {
    if (array.length === 0) return undefined;
    return array[Math.floor(this.prng() * array.length)];
  }

  public shuffle<T>(array: T[]): T[] {
    for (let i = array.length - 1; i > 0; i--) {
      const j = Math.floor(this.prng() * (i + 1));
      [array[i], array[j]] = [array[j], array[i]];
    }
    return array;
  }

  public pickWeighted<T>(
    items: readonly T[],
    weightOf: (item: T) => number,
  ): T | undefined {
    let total = 0;
    for (const item of items) {
      const weight = weightOf(item);
      if (weight > 0 && Number.isFinite(weight)) total += weight;
    }
    if (total <= 0) return undefined;

    let roll = this.prng() * total;
    let last: T | undefined;
    for (const item of items) {
      const weight = weightOf(item);
      if (!(weight > 0 && Number.isFinite(weight))) continue;
      last = item;
      roll -= weight;
      if (roll < 0) return item;
    }
    // Float rounding can leave a sliver past the last bucket.
    return last;
  }
}

export function createRandomSource(seed?: string): RandomSource {
  return new RandomUtils(seed);
}

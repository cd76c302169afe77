import seedrandom from "seedrandom";

/**
 * Seeded random source. Every stochastic decision in a run draws from one of
 * these; nothing reads ambient randomness.
 *
 * `fork(label)` derives an independent stream seeded by `<seed>/<label>`, so a
 * consumer's draws do not shift when unrelated consumers are added.
 */
export class RandomSource {
  readonly seed: string;
  private readonly rng: seedrandom.PRNG;

  constructor(seed: string | number) {
    this.seed = String(seed);
    this.rng = seedrandom(this.seed);
  }

  fork(label: string): RandomSource {
    return new RandomSource(`${this.seed}/${label}`);
  }

  /** Uniform float in [0, 1). */
  next(): number {
    return this.rng();
  }

  /** Bernoulli trial. Probabilities outside [0, 1] are clamped. */
  chance(probability: number): boolean {
    if (probability <= 0) return false;
    if (probability >= 1) return true;
    return this.rng() < probability;
  }

  /** Integer in [min, max], inclusive. */
  int(min: number, max: number): number {
    return min + Math.floor(this.rng() * (max - min + 1));
  }

  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[Math.floor(this.rng() * items.length)];
  }

  /**
   * Pick one item with probability proportional to its weight.
   * Falls back to a uniform pick when no weight is positive.
   */
  weightedPick<T>(items: readonly T[], weights: readonly number[]): T | undefined {
    if (items.length === 0) return undefined;
    const total = weights.reduce((sum, w) => sum + Math.max(0, w), 0);
    if (total <= 0) return this.pick(items);

    let target = this.rng() * total;
    for (let i = 0; i < items.length; i++) {
      target -= Math.max(0, weights[i] ?? 0);
      if (target < 0) return items[i];
    }
    return items[items.length - 1];
  }

  /** Choose `count` distinct items, preserving draw order. */
  sample<T>(items: readonly T[], count: number): T[] {
    const pool = [...items];
    const chosen: T[] = [];
    while (chosen.length < count && pool.length > 0) {
      const index = Math.floor(this.rng() * pool.length);
      chosen.push(pool[index]);
      pool.splice(index, 1);
    }
    return chosen;
  }
}

import { OutcomeTableError } from './errors';
import type { Outcome, OutcomeSet, RandomSource } from './types';

/**
 * Picks one item with probability weight / sum(weights).
 * Weights need not sum to 1.
 */
export function selectWeighted<T extends { weight: number }>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) {
    throw new OutcomeTableError('Cannot select from an empty outcome set');
  }

  const total = items.reduce((sum, item) => sum + item.weight, 0);
  const target = random() * total;

  let cumulative = 0;
  for (const item of items) {
    cumulative += item.weight;
    if (target < cumulative) {
      return item;
    }
  }

  // Floating-point residue can leave target at the upper edge.
  return items[items.length - 1];
}

export function selectOutcome(set: OutcomeSet, random: RandomSource): Outcome {
  return selectWeighted(set, random);
}

export class WeightedSelector {
  constructor(private readonly random: RandomSource = Math.random) {}

  pick(set: OutcomeSet): Outcome {
    return selectOutcome(set, this.random);
  }

  /** Uniform draw in [min, max). */
  uniform(min: number, max: number): number {
    return min + this.random() * (max - min);
  }

  chance(probability: number): boolean {
    return this.random() < probability;
  }
}

/**
 * Deterministic random source (mulberry32) for reproducible runs.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /**
   * Generate random number [0, 1)
   */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  asSource(): RandomSource {
    return () => this.next();
  }
}

// src/util/rng.ts
import seedrandom from "seedrandom";
import type { RNG } from "../types/rng.js";

/**
 * Seeded generator for every non-Faker random choice in a run.
 */
export function createRng(seed: number): RNG {
  return seedrandom(String(seed));
}

/** Integer in [min, max], both ends included. */
export function randomInt(rng: RNG, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

export function randomFloat(rng: RNG, min: number, max: number): number {
  return min + rng() * (max - min);
}

export function randomPick<T>(rng: RNG, items: readonly T[]): T {
  const item = items[Math.floor(rng() * items.length)];
  if (item === undefined) {
    throw new Error("Cannot pick from empty array");
  }
  return item;
}

/**
 * Pick a key with probability proportional to its weight. Keys weighted 0
 * are never returned.
 */
export function weightedPick<K extends string>(
  rng: RNG,
  weights: Readonly<Record<K, number>>,
): K {
  const positive: Array<[K, number]> = [];
  for (const key in weights) {
    if (weights[key] > 0) positive.push([key, weights[key]]);
  }

  const last = positive[positive.length - 1];
  if (!last) {
    throw new Error("Total weight must be positive");
  }

  let remaining = rng() * positive.reduce((sum, [, w]) => sum + w, 0);
  for (const [key, weight] of positive) {
    remaining -= weight;
    if (remaining <= 0) return key;
  }
  // float rounding
  return last[0];
}

/** Round to cents. */
export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

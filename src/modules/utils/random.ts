export const RANDOM_SOURCE = Symbol('RANDOM_SOURCE');

/**
 * Returns a float in [0, 1), like Math.random.
 */
export type RandomSource = () => number;

export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}

export function randomInt(random: RandomSource, min: number, max: number): number {
  return Math.floor(uniform(random, min, max + 1));
}

export function pick<T>(random: RandomSource, items: readonly T[]): T {
  return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}

export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

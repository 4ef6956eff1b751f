/**
 * Fastener Mutation
 * Moves one constant one step at a time: integers by one, powers of two
 * by a factor of two, booleans by flipping.
 */

import { Fastener, FastenerKind, Individual, RandomSource, SourceFile } from '../types/core';

export type RandomStep = 'down' | 'stay' | 'up';

export function randomStep(random: RandomSource): RandomStep {
  const value = random();
  if (value < 0.33) {return 'down';}
  if (value < 0.66) {return 'stay';}
  return 'up';
}

export function randomInRange(random: RandomSource, range: number): number {
  if (range <= 0) {return 0;}
  return Math.min(range - 1, Math.floor(random() * range));
}

/**
 * Copy of items with f applied to one randomly chosen element
 */
export function mapRandom<T>(random: RandomSource, f: (item: T) => T, items: readonly T[]): T[] {
  if (items.length === 0) {
    return [...items];
  }
  const index = randomInRange(random, items.length);
  return items.map((item, i) => (i === index ? f(item) : item));
}

export const RANDOM_PERIOD = 233280;

/**
 * Seeded generator for reproducible runs. Seeds are taken modulo
 * RANDOM_PERIOD, so 7 and 7 + RANDOM_PERIOD replay the same sequence.
 */
export function seededRandom(seed: number): RandomSource {
  let value = ((Math.trunc(seed) % RANDOM_PERIOD) + RANDOM_PERIOD) % RANDOM_PERIOD;
  return () => {
    value = (value * 9301 + 49297) % RANDOM_PERIOD;
    return value / RANDOM_PERIOD;
  };
}

export function mutateValue(kind: FastenerKind, value: number, random: RandomSource): number {
  const step = randomStep(random);
  if (step === 'stay') {
    return value;
  }

  switch (kind) {
    case 'INT': {
      const next = step === 'up' ? value + 1 : value - 1;
      return Number.isSafeInteger(next) ? next : value;
    }
    case 'POW': {
      // Halving 1 or doubling past the safe range keeps the old value
      const next = step === 'up' ? value * 2 : Math.floor(value / 2);
      return next !== 0 && Number.isSafeInteger(next) ? next : value;
    }
    case 'BOOL':
      return value === 0 ? 1 : 0;
  }
}

export function mutateFastener(fastener: Fastener, random: RandomSource): Fastener {
  return { ...fastener, value: mutateValue(fastener.kind, fastener.value, random) };
}

export function mutateFile(file: SourceFile, random: RandomSource): SourceFile {
  return {
    ...file,
    fasteners: mapRandom(random, (fastener) => mutateFastener(fastener, random), file.fasteners)
  };
}

export function mutateIndividual(individual: Individual, random: RandomSource): Individual {
  return mapRandom(random, (file) => mutateFile(file, random), individual);
}

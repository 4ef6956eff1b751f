/**
 * Fastener Mutation Tests
 */

import * as fc from 'fast-check';
import {
  mapRandom,
  mutateFile,
  mutateIndividual,
  mutateValue,
  randomInRange,
  randomStep,
  seededRandom,
  RANDOM_PERIOD
} from '../mutate';
import { readFasteners } from '../reader';
import { isPowerOfTwo } from '../../conformance/check';
import { SourceFile } from '../../types/core';
import { SAMPLE_HEADER, sequenceRandom } from '../../__tests__/test-helpers';

function sampleFile(filePath: string = 'config.h'): SourceFile {
  const file = readFasteners(filePath, SAMPLE_HEADER);
  if (!file) {
    throw new Error('sample header has no fasteners');
  }
  return file;
}

describe('randomStep', () => {
  test.each([
    [0, 'down'],
    [0.32, 'down'],
    [0.33, 'stay'],
    [0.65, 'stay'],
    [0.66, 'up'],
    [0.99, 'up']
  ])('maps %p to %s', (value, step) => {
    expect(randomStep(() => value)).toBe(step);
  });
});

describe('randomInRange', () => {
  test('scales into [0, range)', () => {
    expect(randomInRange(() => 0, 3)).toBe(0);
    expect(randomInRange(() => 0.5, 3)).toBe(1);
    expect(randomInRange(() => 0.999, 3)).toBe(2);
  });

  test('returns 0 for an empty range', () => {
    expect(randomInRange(() => 0.7, 0)).toBe(0);
  });
});

describe('mapRandom', () => {
  test('applies f to exactly one element', () => {
    expect(mapRandom(() => 0.5, (n: number) => n * 10, [1, 2, 3])).toEqual([1, 20, 3]);
  });

  test('returns a copy of an empty array', () => {
    expect(mapRandom(() => 0.5, (n: number) => n, [])).toEqual([]);
  });
});

describe('mutateValue', () => {
  test('moves INT values by one', () => {
    expect(mutateValue('INT', 10, () => 0.1)).toBe(9);
    expect(mutateValue('INT', 10, () => 0.5)).toBe(10);
    expect(mutateValue('INT', 10, () => 0.9)).toBe(11);
  });

  test('halves and doubles POW values', () => {
    expect(mutateValue('POW', 4, () => 0.1)).toBe(2);
    expect(mutateValue('POW', 4, () => 0.9)).toBe(8);
    expect(mutateValue('POW', 6, () => 0.1)).toBe(3);
  });

  test('never lets POW reach zero or leave the safe range', () => {
    expect(mutateValue('POW', 1, () => 0.1)).toBe(1);
    expect(mutateValue('POW', 2 ** 52, () => 0.9)).toBe(2 ** 52);
  });

  test('flips BOOL values on up or down', () => {
    expect(mutateValue('BOOL', 1, () => 0.1)).toBe(0);
    expect(mutateValue('BOOL', 0, () => 0.9)).toBe(1);
    expect(mutateValue('BOOL', 2, () => 0.9)).toBe(0);
    expect(mutateValue('BOOL', 1, () => 0.5)).toBe(1);
  });

  test('POW mutation keeps powers of two', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 52 }),
        fc.double({ min: 0, max: 0.999, noNaN: true }),
        (exponent, roll) => {
          expect(isPowerOfTwo(mutateValue('POW', 2 ** exponent, () => roll))).toBe(true);
        }
      )
    );
  });
});

describe('mutateFile', () => {
  test('mutates one randomly chosen fastener', () => {
    // First roll picks the fastener (index 2 of 3), second picks the step
    const mutated = mutateFile(sampleFile(), sequenceRandom(0.9, 0.9));

    expect(mutated.fasteners.map((fastener) => fastener.value)).toEqual([10, 1, 8]);
    expect(mutated.fasteners.map((fastener) => fastener.original)).toEqual([10, 1, 4]);
  });

  test('leaves the input untouched', () => {
    const file = sampleFile();
    mutateFile(file, sequenceRandom(0, 0.9));
    expect(file.fasteners[0].value).toBe(10);
  });
});

describe('mutateIndividual', () => {
  test('mutates one fastener in one file', () => {
    const individual = [sampleFile('a.h'), sampleFile('b.h')];
    // file index 1, fastener index 0, step down
    const mutated = mutateIndividual(individual, sequenceRandom(0.6, 0, 0.1));

    expect(mutated[0]).toBe(individual[0]);
    expect(mutated[1].fasteners.map((fastener) => fastener.value)).toEqual([9, 1, 4]);
  });
});

describe('seededRandom', () => {
  test('replays the same sequence for the same seed', () => {
    const a = seededRandom(42);
    const b = seededRandom(42);
    expect([a(), a(), a()]).toEqual([b(), b(), b()]);
  });

  test('follows the linear congruential recurrence', () => {
    const random = seededRandom(42);
    expect(random()).toBe(206659 / 233280);
    expect(random()).toBe(190736 / 233280);
  });

  test('takes seeds modulo the period without folding the sign', () => {
    const first = (seed: number) => seededRandom(seed)();

    expect(first(7 + RANDOM_PERIOD)).toBe(first(7));
    expect(first(-7)).toBe(first(RANDOM_PERIOD - 7));
    expect(first(-7)).not.toBe(first(7));
  });

  test('stays within [0, 1) for any seed', () => {
    fc.assert(
      fc.property(fc.integer(), (seed) => {
        const random = seededRandom(seed);
        for (let i = 0; i < 10; i++) {
          const value = random();
          expect(value).toBeGreaterThanOrEqual(0);
          expect(value).toBeLessThan(1);
        }
      })
    );
  });
});

/**
 * Sweep
 * Runs the conformance check over many parameter sets, and over mutants
 * of annotated sources.
 */

import {
  ExplorationEntry,
  Individual,
  NamedParameterSet,
  ParameterBinding,
  RandomSource,
  SweepEntry,
  SweepReport
} from '../types/core';
import { runLoggedCheck } from '../conformance/check';
import { bindIndividual } from '../fasteners/binding';
import { mutateIndividual } from '../fasteners/mutate';
import { describeChanges } from '../fasteners/writer';
import { logger } from '../utils/logger';

export function runSweep(sets: readonly NamedParameterSet[]): SweepReport {
  const outcomes: SweepEntry[] = sets.map((set) => ({
    name: set.name,
    outcome: runLoggedCheck(set.parameters, set.name)
  }));

  const passed = outcomes.filter((entry) => entry.outcome.success).length;
  logger.info(`Sweep complete: ${passed}/${outcomes.length} parameter sets conform`, { component: 'Sweep' });

  return {
    outcomes,
    passed,
    failed: outcomes.length - passed
  };
}

export interface ExplorationOptions {
  size: number;
  random?: RandomSource;
  binding?: ParameterBinding;
}

/**
 * Mutates the starting sources size times, each mutant independently
 * from the start, and checks every mutant.
 */
export function exploreNeighbourhood(initial: Individual, options: ExplorationOptions): ExplorationEntry[] {
  const random = options.random ?? Math.random;
  if (!Number.isInteger(options.size) || options.size < 0) {
    throw new RangeError(`Exploration size must be a non-negative integer, got ${options.size}`);
  }

  logger.info(`Exploring ${options.size} mutants`, { component: 'Sweep' });

  const entries: ExplorationEntry[] = [];
  for (let i = 0; i < options.size; i++) {
    const individual = mutateIndividual(initial, random);
    const parameters = bindIndividual(individual, options.binding);
    entries.push({
      individual,
      changes: describeChanges(individual),
      outcome: runLoggedCheck(parameters, `mutant-${i}`)
    });
  }
  return entries;
}

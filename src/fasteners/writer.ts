/**
 * Fastener Writer
 * Re-emits annotated sources with their current fastener values
 */

import * as fs from 'fs';
import { Fastener, Individual, SourceFile } from '../types/core';
import { matchFastener } from './reader';

/**
 * "path:line: change a to b", or an empty string when the value is unchanged
 */
export function describeChange(fastener: Fastener): string {
  if (fastener.value === fastener.original) {
    return '';
  }
  return `${fastener.path}:${fastener.line}: change ${fastener.original} to ${fastener.value}`;
}

export function describeChanges(individual: Individual): string[] {
  return individual
    .flatMap((file) => file.fasteners)
    .map(describeChange)
    .filter((change) => change.length > 0);
}

/**
 * Copy of individual that takes the current values as the originals,
 * so later changes are described relative to it
 */
export function rebaseIndividual(individual: Individual): Individual {
  return individual.map((file) => ({
    ...file,
    fasteners: file.fasteners.map((fastener) => ({ ...fastener, original: fastener.value }))
  }));
}

function rewriteLine(line: string, fastener: Fastener): string {
  const match = matchFastener(line);
  if (!match) {
    return line;
  }
  return line.slice(0, match.start) + String(fastener.value) + line.slice(match.start + match.literal.length);
}

export function writeSource(file: SourceFile): string {
  const byLine = new Map(file.fasteners.map((fastener) => [fastener.line, fastener]));

  return file.lines
    .map((line, index) => {
      const fastener = byLine.get(index);
      return fastener && fastener.value !== fastener.original ? rewriteLine(line, fastener) : line;
    })
    .join('\n');
}

export async function writeSourceFile(file: SourceFile): Promise<void> {
  await fs.promises.writeFile(file.path, writeSource(file), 'utf-8');
}

export async function writeIndividual(individual: Individual): Promise<void> {
  for (const file of individual) {
    await writeSourceFile(file);
  }
}

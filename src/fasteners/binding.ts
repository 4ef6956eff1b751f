/**
 * Fastener Binding
 * Maps annotated constants onto the check's parameters
 */

import {
  ConformanceParameters,
  Fastener,
  FastenerKind,
  Individual,
  ParameterBinding,
  ParameterName
} from '../types/core';
import { FastenerBindingError } from '../conformance/errors';
import { PARAMETER_NAMES } from '../config/parameters';

export const PARAMETER_KINDS: Record<ParameterName, FastenerKind> = {
  bound: 'INT',
  flag: 'BOOL',
  powerValue: 'POW'
};

export type ResolvedBinding = Record<ParameterName, Fastener>;

function locate(fastener: Fastener): string {
  return `${fastener.path}:${fastener.line}`;
}

function resolveOne(fasteners: readonly Fastener[], parameter: ParameterName, name?: string): Fastener {
  if (name !== undefined) {
    const named = fasteners.filter((fastener) => fastener.name === name);
    if (named.length === 0) {
      throw new FastenerBindingError(`No fastener named ${name} for ${parameter}`);
    }
    if (named.length > 1) {
      throw new FastenerBindingError(
        `Fastener name ${name} is ambiguous: ${named.map(locate).join(', ')}`
      );
    }
    return named[0];
  }

  const kind = PARAMETER_KINDS[parameter];
  const candidates = fasteners.filter((fastener) => fastener.kind === kind);
  if (candidates.length === 0) {
    throw new FastenerBindingError(`No ${kind} fastener found for ${parameter}`);
  }
  if (candidates.length > 1) {
    throw new FastenerBindingError(
      `Found ${candidates.length} ${kind} fasteners for ${parameter}; name one in the binding (${candidates
        .map(locate)
        .join(', ')})`
    );
  }
  return candidates[0];
}

export function resolveBinding(fasteners: readonly Fastener[], binding: ParameterBinding = {}): ResolvedBinding {
  return {
    bound: resolveOne(fasteners, 'bound', binding.bound),
    flag: resolveOne(fasteners, 'flag', binding.flag),
    powerValue: resolveOne(fasteners, 'powerValue', binding.powerValue)
  };
}

export function bindParameters(fasteners: readonly Fastener[], binding: ParameterBinding = {}): ConformanceParameters {
  const resolved = resolveBinding(fasteners, binding);
  return {
    bound: resolved.bound.value,
    flag: resolved.flag.value,
    powerValue: resolved.powerValue.value
  };
}

export function bindIndividual(individual: Individual, binding: ParameterBinding = {}): ConformanceParameters {
  return bindParameters(individual.flatMap((file) => file.fasteners), binding);
}

/**
 * Copy of individual with the bound fasteners set to parameters
 */
export function applyParameters(
  individual: Individual,
  parameters: ConformanceParameters,
  binding: ParameterBinding = {}
): Individual {
  const resolved = resolveBinding(individual.flatMap((file) => file.fasteners), binding);
  const updates = new Map<string, number>();
  for (const name of PARAMETER_NAMES) {
    updates.set(locate(resolved[name]), parameters[name]);
  }

  return individual.map((file) => ({
    ...file,
    fasteners: file.fasteners.map((fastener) => {
      const value = updates.get(locate(fastener));
      return value === undefined ? fastener : { ...fastener, value };
    })
  }));
}

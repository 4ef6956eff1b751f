#!/usr/bin/env node
/**
 * Command-line entry point for the conformance check
 */

import {
  ConformanceParameters,
  Individual,
  ParameterBinding,
  ParameterName
} from './types/core';
import { runLoggedCheck } from './conformance/check';
import { formatFixed } from './conformance/format';
import { ConfigurationError, ConstraintViolationError, UsageError } from './conformance/errors';
import { mergeParameters, parametersFromEnvironment, parseIntegerParameter } from './config/parameters';
import { loadRuntimeConfig } from './config/runtime';
import { DEFAULT_FILE_PATTERN, readSources } from './fasteners/reader';
import { applyParameters, bindIndividual } from './fasteners/binding';
import { seededRandom } from './fasteners/mutate';
import { rebaseIndividual, writeIndividual } from './fasteners/writer';
import { exploreNeighbourhood } from './sweep/sweep';
import { openParameterStore, StoreHandle, StoreOpener } from './storage/connection';
import { logger } from './utils/logger';

/**
 * Exit status of a failed constraint, matching an assertion abort (128 + SIGABRT)
 */
export const EXIT_CONSTRAINT_VIOLATION = 134;
export const EXIT_USAGE = 1;

export const USAGE = `Usage:

\tconformance-check [<options>]

Parameters (highest precedence last: defaults, environment, --source, --set, flags):

\t--bound <integer>\t\tBound; must be greater than 7 (env CONFORMANCE_BOUND)
\t--flag <0|1>\t\t\tFlag; must be 0 or 1 (env CONFORMANCE_FLAG)
\t--power <integer>\t\tPowerValue; must be a power of two (env CONFORMANCE_POWER_VALUE)

Sources:

\t--source <file|directory>\tRead constants annotated /* INT|BOOL|POW FASTENABLE */
\t--files <regex>\t\t\tFile names to read under a directory (default \\.(c|h)$)
\t--bind-bound <name>\t\tFastener bound to Bound (likewise --bind-flag, --bind-power)
\t--apply\t\t\t\tRewrite the bound fasteners with the checked parameters
\t--explore <count>\t\tCheck <count> random single-step mutants of the source
\t--seed <integer>\t\tNon-negative seed for --explore (taken modulo 233280)

Storage (requires DATABASE_URL; REDIS_URL defaults to redis://localhost:6379):

\t--set <name>\t\t\tLoad a stored parameter set
\t--save <name>\t\t\tStore the parameters as a new version once they pass
\t--record\t\t\tAppend the outcome to the run history

\t--help\t\t\t\tPrint this help message
`;

export interface CliOptions {
  overrides: Partial<Record<ParameterName, number>>;
  binding: ParameterBinding;
  source?: string;
  filePattern: RegExp;
  set?: string;
  save?: string;
  record: boolean;
  apply: boolean;
  explore?: number;
  seed?: number;
  help: boolean;
}

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  env: NodeJS.ProcessEnv;
}

export interface CliDependencies {
  openStore: StoreOpener;
}

const PARAMETER_FLAGS = new Map<string, ParameterName>([
  ['--bound', 'bound'],
  ['--flag', 'flag'],
  ['--power', 'powerValue'],
  ['--power-value', 'powerValue']
]);

const BINDING_FLAGS = new Map<string, ParameterName>([
  ['--bind-bound', 'bound'],
  ['--bind-flag', 'flag'],
  ['--bind-power', 'powerValue']
]);

const VALUE_FLAGS = ['--source', '--files', '--set', '--save', '--explore', '--seed'];

function parseCount(flag: string, raw: string, minimum: number): number {
  if (!/^[+-]?\d+$/.test(raw)) {
    throw new UsageError(`Invalid flag ${flag}; expected an integer, got '${raw}'.`);
  }
  const value = parseInt(raw, 10);
  if (value < minimum) {
    throw new UsageError(`Invalid flag ${flag}; expected at least ${minimum}, got ${value}.`);
  }
  return value;
}

export function parseArguments(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    overrides: {},
    binding: {},
    filePattern: DEFAULT_FILE_PATTERN,
    record: false,
    apply: false,
    help: false
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      options.help = true;
      continue;
    }
    if (arg === '--record') {
      options.record = true;
      continue;
    }
    if (arg === '--apply') {
      options.apply = true;
      continue;
    }

    const parameterName = PARAMETER_FLAGS.get(arg);
    const bindingName = BINDING_FLAGS.get(arg);
    if (!parameterName && !bindingName && !VALUE_FLAGS.includes(arg)) {
      throw new UsageError(`Unknown argument: ${arg}`);
    }

    const value = argv[i + 1];
    if (value === undefined) {
      throw new UsageError(`Invalid flag ${arg}; expected a value.`);
    }
    i++;

    if (parameterName) {
      options.overrides[parameterName] = parseIntegerParameter(parameterName, value);
    } else if (bindingName) {
      options.binding[bindingName] = value;
    } else if (arg === '--source') {
      options.source = value;
    } else if (arg === '--files') {
      try {
        options.filePattern = new RegExp(value);
      } catch {
        throw new UsageError(`Invalid flag --files; '${value}' is not a regular expression.`);
      }
    } else if (arg === '--set') {
      options.set = value;
    } else if (arg === '--save') {
      options.save = value;
    } else if (arg === '--explore') {
      options.explore = parseCount(arg, value, 0);
    } else {
      options.seed = parseCount(arg, value, 0);
    }
  }

  if (options.apply && !options.source) {
    throw new UsageError('--apply requires --source.');
  }
  if (options.explore !== undefined && !options.source) {
    throw new UsageError('--explore requires --source.');
  }
  if (options.explore !== undefined && (options.apply || options.save !== undefined)) {
    throw new UsageError('--explore cannot be combined with --apply or --save.');
  }

  return options;
}

const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  env: process.env
};

async function loadSources(options: CliOptions): Promise<Individual> {
  if (!options.source) {
    return [];
  }
  const files = await readSources(options.source, options.filePattern);
  if (files.length === 0) {
    throw new ConfigurationError(`No fasteners found in ${options.source}`);
  }
  return files;
}

async function execute(
  options: CliOptions,
  io: CliIO,
  sources: Individual,
  handle: StoreHandle | undefined
): Promise<number> {
  let parameters = parametersFromEnvironment(io.env);

  if (sources.length > 0) {
    parameters = bindIndividual(sources, options.binding);
  }

  if (options.set !== undefined) {
    if (!handle) {throw new ConfigurationError('--set requires parameter set storage');}
    const record = await handle.store.getParameterSet(options.set);
    if (!record) {
      throw new ConfigurationError(`Unknown parameter set: ${options.set}`);
    }
    parameters = record.parameters;
  }

  parameters = mergeParameters(parameters, options.overrides);

  if (options.explore !== undefined) {
    // Changes are reported against the overridden parameters, not the file on disk
    const start = rebaseIndividual(applyParameters(sources, parameters, options.binding));
    const random = options.seed !== undefined ? seededRandom(options.seed) : Math.random;
    const entries = exploreNeighbourhood(start, { size: options.explore, random, binding: options.binding });

    for (const entry of entries) {
      const changes = entry.changes.length > 0 ? entry.changes.join('; ') : 'unchanged';
      const verdict = entry.outcome.success
        ? formatFixed(entry.outcome.result)
        : `violation: ${entry.outcome.violation.message}`;
      io.stdout(`${changes}\t${verdict}\n`);

      if (options.record && handle) {
        await handle.store.recordRun(options.set, entry.outcome);
      }
    }
    return 0;
  }

  const outcome = runLoggedCheck(parameters, options.set);

  if (options.record && handle) {
    await handle.store.recordRun(options.set, outcome);
  }

  if (!outcome.success) {
    io.stderr(`conformance-check: ${outcome.violation.message}\n`);
    return EXIT_CONSTRAINT_VIOLATION;
  }

  if (options.save !== undefined && handle) {
    await handle.store.saveParameterSet(options.save, parameters);
  }

  if (options.apply) {
    await writeIndividual(applyParameters(sources, parameters, options.binding));
  }

  io.stdout(outcome.output);
  return 0;
}

/**
 * Runs the CLI and resolves to the process exit status
 */
export async function main(
  argv: readonly string[],
  io: CliIO = processIO,
  dependencies: CliDependencies = { openStore: openParameterStore }
): Promise<number> {
  try {
    const options = parseArguments(argv);
    if (options.help) {
      io.stdout(USAGE);
      return 0;
    }

    const runtime = loadRuntimeConfig(io.env);
    logger.setLevel(runtime.logLevel);

    const sources = await loadSources(options);
    const needsStore = options.set !== undefined || options.save !== undefined || options.record;
    const handle = needsStore ? await dependencies.openStore(runtime) : undefined;

    try {
      return await execute(options, io, sources, handle);
    } finally {
      await handle?.close();
    }
  } catch (error) {
    if (error instanceof ConstraintViolationError) {
      io.stderr(`conformance-check: ${error.message}\n`);
      return EXIT_CONSTRAINT_VIOLATION;
    }
    if (error instanceof UsageError) {
      io.stderr(`${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    if (error instanceof ConfigurationError) {
      io.stderr(`conformance-check: ${error.message}\n`);
      return EXIT_USAGE;
    }
    throw error;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      logger.error('Unexpected failure', { component: 'CLI' }, error instanceof Error ? error.stack : String(error));
      process.exitCode = 1;
    });
}

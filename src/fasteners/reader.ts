/**
 * Fastener Reader
 * Finds integer literals annotated as tunable, e.g.
 *
 *   #define LIMIT  10  /* INT FASTENABLE *\/
 */

import * as fs from 'fs';
import * as path from 'path';
import { Fastener, FastenerKind, SourceFile } from '../types/core';
import { ConfigurationError } from '../conformance/errors';
import { logger } from '../utils/logger';

export const FASTENER_PATTERN =
  /(?:#\s*define\s+(?<name>\w+)\s+)?(?<![\w.])(?<literal>[+-]?\d+)(?=\s*\/\*\s*(?<kind>INT|BOOL|POW)\s+FASTENABLE\s*\*\/)/;

export const DEFAULT_FILE_PATTERN = /\.(c|h)$/;

export interface FastenerMatch {
  name?: string;
  literal: string;
  kind: FastenerKind;
  start: number; // column of the literal
}

function isFastenerKind(value: string): value is FastenerKind {
  return value === 'INT' || value === 'BOOL' || value === 'POW';
}

export function matchFastener(line: string): FastenerMatch | null {
  const match = FASTENER_PATTERN.exec(line);
  const groups = match?.groups;
  if (!match || !groups) {
    return null;
  }

  const { name, literal, kind } = groups;
  if (!literal || !kind || !isFastenerKind(kind)) {
    return null;
  }

  return {
    name: name || undefined,
    literal,
    kind,
    start: match.index + match[0].length - literal.length
  };
}

/**
 * Literals are kept as written: a BOOL of 2 or a POW of 6 reaches the
 * check unchanged and fails there.
 */
export function readFasteners(filePath: string, text: string): SourceFile | null {
  const lines = text.split('\n');
  const fasteners: Fastener[] = [];

  lines.forEach((line, index) => {
    const match = matchFastener(line);
    if (!match) {
      return;
    }

    const value = Number(match.literal);
    if (!Number.isSafeInteger(value)) {
      logger.warn(`Skipping out-of-range literal ${match.literal}`, {
        component: 'Reader',
        step: `${filePath}:${index}`
      });
      return;
    }

    fasteners.push({
      path: filePath,
      line: index,
      name: match.name,
      kind: match.kind,
      original: value,
      value
    });
  });

  if (fasteners.length === 0) {
    return null;
  }

  logger.debug(`File ${filePath} contains ${fasteners.length} fasteners.`, { component: 'Reader' });
  return { path: filePath, lines, fasteners };
}

export async function readSourceFile(filePath: string): Promise<SourceFile | null> {
  const text = await fs.promises.readFile(filePath, 'utf-8');
  return readFasteners(filePath, text);
}

/**
 * Reads every matching file under directory, recursively.
 * Files are visited in sorted order so results are stable.
 */
export async function readSourceTree(
  directory: string,
  filePattern: RegExp = DEFAULT_FILE_PATTERN
): Promise<SourceFile[]> {
  let entries: string[];
  try {
    entries = await fs.promises.readdir(directory, { encoding: 'utf-8', recursive: true });
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigurationError(`Directory not found: ${directory}`);
    }
    throw error;
  }

  const files: SourceFile[] = [];
  for (const entry of [...entries].sort()) {
    const fullPath = path.join(directory, entry);
    if (!filePattern.test(entry)) {continue;}

    const stat = await fs.promises.stat(fullPath);
    if (!stat.isFile()) {continue;}

    const file = await readSourceFile(fullPath);
    if (file) {
      files.push(file);
    }
  }
  return files;
}

/**
 * Accepts either a single file or a directory
 */
export async function readSources(
  target: string,
  filePattern: RegExp = DEFAULT_FILE_PATTERN
): Promise<SourceFile[]> {
  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(target);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigurationError(`Source not found: ${target}`);
    }
    throw error;
  }

  if (stat.isDirectory()) {
    return readSourceTree(target, filePattern);
  }

  const file = await readSourceFile(target);
  return file ? [file] : [];
}

/**
 * Resolve a user- or model-supplied directory into one that exists.
 *
 * Models like to fill a `cwd` field with template text instead of a path.
 * Those placeholders mean "no directory supplied" and are rejected before any
 * filesystem access.
 */

import { statSync } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

export const PLACEHOLDER_PATHS: ReadonlySet<string> = new Set([
  '<path>',
  '<dir>',
  '<directory>',
  '/path/to',
  '/path/to/dir',
  '/path/to/directory',
  '/path/to/...',
  '/absolute/or/relative',
  '/your/path',
  'path/to',
  'none',
  'null',
  'undefined',
  '...',
]);

const ANGLE_BRACKETED = /^<[^>]*>$/;
const PATH_TO_PREFIX = /^\/?path\/to(?:\/|$)/i;

export interface NormalizeDirectoryOptions {
  /** Directory relative paths resolve against, normally the tracked cwd. */
  baseDir?: string | null;
  homeDir?: string;
  isDirectory?: (candidate: string) => boolean;
}

export function defaultIsDirectory(candidate: string): boolean {
  try {
    return statSync(candidate).isDirectory();
  } catch {
    return false;
  }
}

function stripMatchingQuotes(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'" || first === '`') && first === last) {
      return value.slice(1, -1).trim();
    }
  }
  return value;
}

export function isPlaceholderPath(raw: string): boolean {
  const value = stripMatchingQuotes(raw.trim());
  if (!value) {
    return true;
  }
  const lowered = value.toLowerCase();
  return (
    PLACEHOLDER_PATHS.has(lowered) ||
    PLACEHOLDER_PATHS.has(lowered.replace(/\/+$/, '')) ||
    ANGLE_BRACKETED.test(value) ||
    PATH_TO_PREFIX.test(value)
  );
}

function expandHome(value: string, homeDir: string): string {
  if (value === '~') {
    return homeDir;
  }
  if (value.startsWith('~/')) {
    return path.join(homeDir, value.slice(2));
  }
  return value;
}

/**
 * Returns an absolute, existing directory or `null` when the value is empty,
 * a placeholder, or does not resolve to a directory.
 */
export function normalizeDirectory(
  raw: string | null | undefined,
  {
    baseDir = null,
    homeDir = os.homedir(),
    isDirectory = defaultIsDirectory,
  }: NormalizeDirectoryOptions = {},
): string | null {
  if (typeof raw !== 'string') {
    return null;
  }
  if (isPlaceholderPath(raw)) {
    return null;
  }

  const expanded = expandHome(stripMatchingQuotes(raw.trim()), homeDir);
  const resolved = path.resolve(baseDir ?? process.cwd(), expanded);

  return isDirectory(resolved) ? resolved : null;
}

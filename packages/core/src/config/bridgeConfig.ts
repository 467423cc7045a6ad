/**
 * Bridge settings resolved from the environment.
 *
 * Values are validated here so a typo fails at startup with the variable
 * name rather than surfacing later as a stuck session.
 */

import * as path from 'node:path';

import {
  DEFAULT_COMMAND_TIMEOUT_SEC,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_SCRIPT_INTERPRETER,
  DEFAULT_SHELL,
  DEFAULT_SHELL_ARGS,
} from '../constants.js';
import { ConfigurationError } from '../errors.js';

export interface BridgeConfig {
  shell: string;
  shellArgs: readonly string[];
  commandTimeoutSec: number;
  pollIntervalMs: number;
  scriptInterpreter: string;
  autoExecute: boolean;
  explainResults: boolean;
  /** Explicit memory file; `null` means the default data directory. */
  memoryPath: string | null;
}

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

function readString(env: NodeJS.ProcessEnv, variable: string): string | null {
  const value = env[variable];
  return typeof value === 'string' && value.trim() ? value.trim() : null;
}

export function parseBooleanSetting(variable: string, raw: string | null, fallback: boolean): boolean {
  if (raw === null) {
    return fallback;
  }
  const normalized = raw.toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  throw new ConfigurationError(variable, 'must be one of 1/0, true/false, yes/no or on/off.');
}

function parsePositiveNumber(variable: string, raw: string | null, fallback: number): number {
  if (raw === null) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(variable, 'must be a positive number when provided.');
  }
  return parsed;
}

function defaultArgsFor(shell: string): readonly string[] {
  return path.basename(shell) === 'bash' ? DEFAULT_SHELL_ARGS : [];
}

export function resolveBridgeConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const shell = readString(env, 'BRIDGE_SHELL') ?? DEFAULT_SHELL;

  return {
    shell,
    shellArgs: defaultArgsFor(shell),
    commandTimeoutSec: parsePositiveNumber(
      'BRIDGE_COMMAND_TIMEOUT_SEC',
      readString(env, 'BRIDGE_COMMAND_TIMEOUT_SEC'),
      DEFAULT_COMMAND_TIMEOUT_SEC,
    ),
    pollIntervalMs: parsePositiveNumber(
      'BRIDGE_POLL_INTERVAL_MS',
      readString(env, 'BRIDGE_POLL_INTERVAL_MS'),
      DEFAULT_POLL_INTERVAL_MS,
    ),
    scriptInterpreter: readString(env, 'BRIDGE_SCRIPT_INTERPRETER') ?? DEFAULT_SCRIPT_INTERPRETER,
    autoExecute: parseBooleanSetting('BRIDGE_AUTO_EXECUTE', readString(env, 'BRIDGE_AUTO_EXECUTE'), false),
    explainResults: parseBooleanSetting('BRIDGE_EXPLAIN_RESULTS', readString(env, 'BRIDGE_EXPLAIN_RESULTS'), true),
    memoryPath: readString(env, 'BRIDGE_MEMORY_PATH'),
  };
}

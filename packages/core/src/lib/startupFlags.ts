export interface StartupFlags {
  autoExecute: boolean;
  explainResults: boolean;
  debug: boolean;
}

const DEFAULT_FLAGS: StartupFlags = {
  autoExecute: false,
  explainResults: true,
  debug: false,
};

const startupFlags: StartupFlags = { ...DEFAULT_FLAGS };

export function getStartupFlags(): StartupFlags {
  return { ...startupFlags };
}

export function getAutoExecuteFlag(): boolean {
  return startupFlags.autoExecute;
}

export function getExplainResultsFlag(): boolean {
  return startupFlags.explainResults;
}

export function getDebugFlag(): boolean {
  return startupFlags.debug;
}

export interface StartupFlagOverrides {
  autoExecute?: unknown;
  explainResults?: unknown;
  debug?: unknown;
}

export function setStartupFlags(nextFlags: StartupFlagOverrides = {}): StartupFlags {
  if (!nextFlags || typeof nextFlags !== 'object') {
    return getStartupFlags();
  }

  if (Object.prototype.hasOwnProperty.call(nextFlags, 'autoExecute')) {
    startupFlags.autoExecute = Boolean(nextFlags.autoExecute);
  }

  if (Object.prototype.hasOwnProperty.call(nextFlags, 'explainResults')) {
    startupFlags.explainResults = Boolean(nextFlags.explainResults);
  }

  if (Object.prototype.hasOwnProperty.call(nextFlags, 'debug')) {
    startupFlags.debug = Boolean(nextFlags.debug);
  }

  return getStartupFlags();
}

export function resetStartupFlags(): StartupFlags {
  return setStartupFlags({ ...DEFAULT_FLAGS });
}

/**
 * Only flags that appear on the command line are returned, so env-derived
 * defaults survive when the operator does not override them.
 */
export function parseStartupFlagsFromArgv(
  argv: readonly unknown[] = process.argv,
): StartupFlagOverrides {
  const positional = Array.isArray(argv) ? argv.slice(2).map((value) => String(value)) : [];
  const overrides: StartupFlagOverrides = {};

  for (const arg of positional) {
    if (!arg) continue;
    const normalized = arg.trim().toLowerCase();
    if (normalized === 'auto' || normalized === '--auto' || normalized === '--auto-execute') {
      overrides.autoExecute = true;
      continue;
    }

    if (normalized === '--no-auto') {
      overrides.autoExecute = false;
      continue;
    }

    if (normalized === '--no-explain') {
      overrides.explainResults = false;
      continue;
    }

    if (normalized === 'debug' || normalized === '--debug') {
      overrides.debug = true;
    }
  }

  return overrides;
}

export function applyStartupFlagsFromArgv(
  argv: readonly unknown[] = process.argv,
  defaults: StartupFlagOverrides = {},
): StartupFlags {
  setStartupFlags(defaults);
  return setStartupFlags(parseStartupFlagsFromArgv(argv));
}

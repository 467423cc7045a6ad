/**
 * Shared runtime defaults for the command bridge.
 *
 * Keep these values in a single module so configuration parsing, the session
 * manager and tests stay aligned when defaults change.
 */

export const DEFAULT_COMMAND_TIMEOUT_SEC = 60;
export const DEFAULT_POLL_INTERVAL_MS = 25;
export const DEFAULT_SHELL = '/bin/bash';
export const DEFAULT_SHELL_ARGS: readonly string[] = ['--noprofile', '--norc'];
export const DEFAULT_SCRIPT_INTERPRETER = 'python3';
export const DEFAULT_STARTUP_TIMEOUT_MS = 10_000;
export const DEFAULT_OLLAMA_URL = 'http://127.0.0.1:11434';
export const DEFAULT_MODEL = 'llama3.2:3b';
export const DEFAULT_EXPLAIN_MAX_LINES = 80;

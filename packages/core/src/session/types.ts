import type { Logger } from '../utils/logger.js';
import type { SessionLock } from './sessionLock.js';

export interface Disposable {
  dispose: () => void;
}

export interface PtyExitEvent {
  exitCode: number;
  signal?: number;
}

/**
 * The slice of node-pty's `IPty` the session manager relies on. Tests provide
 * an in-process implementation.
 */
export interface PtyProcess {
  readonly pid: number;
  write: (data: string) => void;
  kill: (signal?: string) => void;
  onData: (listener: (data: string) => void) => Disposable;
  onExit: (listener: (event: PtyExitEvent) => void) => Disposable;
}

export interface PtySpawnOptions {
  cwd: string;
  env: Record<string, string>;
  cols?: number;
  rows?: number;
}

export type PtyFactory = (file: string, args: readonly string[], options: PtySpawnOptions) => PtyProcess;

export interface CommandRequest {
  readonly command: string;
  readonly cwd?: string | null;
  readonly timeoutSec?: number | null;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exit_code: number | null;
  timed_out: boolean;
  session_restarted: boolean;
  cwd: string | null;
  runtime_ms: number;
}

export interface SessionManagerOptions {
  ptyFactory?: PtyFactory;
  shell?: string;
  shellArgs?: readonly string[];
  env?: NodeJS.ProcessEnv;
  initialCwd?: string;
  defaultTimeoutSec?: number;
  pollIntervalMs?: number;
  startupTimeoutMs?: number;
  markerFactory?: () => string;
  logger?: Logger;
  /** Taken before the first spawn and released by `stop()`. */
  lock?: SessionLock | null;
}

/**
 * Owns the single persistent shell session used for command execution.
 *
 * Responsibilities:
 * - Lazily spawn an interactive shell on a pty with prompts and echo disabled.
 * - Serialize `execute` calls; the terminal stream cannot be demultiplexed, so
 *   only one command may be in flight.
 * - Frame each command with a sentinel marker and poll with short sleeps until
 *   the frame completes, the shell exits, or the deadline passes.
 * - Track the working directory reported by completed frames.
 * - Hold the working-tree session lock, when one is given, from the first
 *   spawn until `stop()`.
 *
 * A timed-out command cannot be cancelled inside the shell, so the session is
 * torn down and the next request starts a fresh shell in the last tracked
 * directory. Output from an orphaned command would otherwise land in the next
 * command's frame.
 */

import * as path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';

import {
  DEFAULT_COMMAND_TIMEOUT_SEC,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_SHELL,
  DEFAULT_SHELL_ARGS,
  DEFAULT_STARTUP_TIMEOUT_MS,
} from '../constants.js';
import { SessionStartError } from '../errors.js';
import { createMarker, encodeCommand, SentinelDecoder, type SentinelFrame } from '../protocol/sentinel.js';
import { AsyncMutex } from '../utils/asyncMutex.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { shellQuote } from '../utils/text.js';
import { nodePtyFactory, toPtyEnv } from './ptyProcess.js';
import type { SessionLock } from './sessionLock.js';
import type {
  CommandRequest,
  CommandResult,
  Disposable,
  PtyFactory,
  PtyProcess,
  SessionManagerOptions,
} from './types.js';

const SHELL_SETUP =
  "stty -echo 2>/dev/null; bind 'set enable-bracketed-paste off' 2>/dev/null; " +
  "PS1=''; PS2=''; PROMPT_COMMAND=''; unset HISTFILE\n";

const SHELL_ENV_OVERRIDES: Record<string, string> = {
  PS1: '',
  PS2: '',
  PROMPT_COMMAND: '',
  TERM: 'dumb',
};

interface LiveSession {
  pty: PtyProcess;
  exited: boolean;
  exitCode: number | null;
  decoder: SentinelDecoder | null;
  subscriptions: Disposable[];
}

type FramedOutcome =
  | { kind: 'frame'; frame: SentinelFrame }
  | { kind: 'timeout'; partial: string; timeoutMs: number }
  | { kind: 'exited'; partial: string; exitCode: number | null };

function formatSeconds(ms: number): string {
  const seconds = ms / 1000;
  return Number.isInteger(seconds) ? `${seconds}s` : `${seconds.toFixed(2)}s`;
}

export class SessionManager {
  private readonly ptyFactory: PtyFactory;

  private readonly shell: string;

  private readonly shellArgs: readonly string[];

  private readonly env: NodeJS.ProcessEnv;

  private readonly initialCwd: string;

  private readonly defaultTimeoutSec: number;

  private readonly pollIntervalMs: number;

  private readonly startupTimeoutMs: number;

  private readonly markerFactory: () => string;

  private readonly logger: Logger;

  private readonly lock: SessionLock | null;

  private readonly mutex = new AsyncMutex();

  private session: LiveSession | null = null;

  private trackedCwd: string | null = null;

  constructor({
    ptyFactory = nodePtyFactory,
    shell = DEFAULT_SHELL,
    shellArgs = DEFAULT_SHELL_ARGS,
    env = process.env,
    initialCwd = process.cwd(),
    defaultTimeoutSec = DEFAULT_COMMAND_TIMEOUT_SEC,
    pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
    startupTimeoutMs = DEFAULT_STARTUP_TIMEOUT_MS,
    markerFactory = createMarker,
    logger = createLogger('session'),
    lock = null,
  }: SessionManagerOptions = {}) {
    this.ptyFactory = ptyFactory;
    this.shell = shell;
    this.shellArgs = shellArgs;
    this.env = env;
    this.initialCwd = path.resolve(initialCwd);
    this.defaultTimeoutSec = defaultTimeoutSec;
    this.pollIntervalMs = Math.max(1, pollIntervalMs);
    this.startupTimeoutMs = startupTimeoutMs;
    this.markerFactory = markerFactory;
    this.logger = logger;
    this.lock = lock;
  }

  /**
   * Last directory confirmed by a completed frame; `null` before the first
   * session has started.
   */
  get cwd(): string | null {
    return this.trackedCwd;
  }

  get isAlive(): boolean {
    return this.session !== null && !this.session.exited;
  }

  async start(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      await this.ensureSession();
    });
  }

  execute(request: CommandRequest): Promise<CommandResult> {
    return this.mutex.runExclusive(() => this.executeExclusive(request));
  }

  /**
   * Tear the session down, forget the tracked directory and give up the
   * session lock. Safe to call on a stopped manager.
   */
  async stop(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.teardown('stop requested');
      this.trackedCwd = null;
      if (this.lock) {
        await this.lock.release().catch((error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.warn(`Failed to release the session lock: ${message}`);
        });
      }
    });
  }

  async reset(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.teardown('reset requested');
      this.trackedCwd = null;
      await this.ensureSession();
    });
  }

  private async executeExclusive(request: CommandRequest): Promise<CommandResult> {
    const startedAt = Date.now();

    if (this.session?.exited) {
      const { exitCode } = this.session;
      this.logger.warn(`Shell session exited (code ${exitCode ?? 'unknown'}); starting a new one.`);
      this.teardown('session exited');
      await this.ensureSession();
      return {
        stdout: '',
        stderr: `Shell session had exited (code ${exitCode ?? 'unknown'}); session restarted. The command was not run.`,
        exit_code: null,
        timed_out: false,
        session_restarted: true,
        cwd: this.trackedCwd,
        runtime_ms: Date.now() - startedAt,
      };
    }

    const session = await this.ensureSession();
    const timeoutMs = this.resolveTimeoutMs(request.timeoutSec);

    const target = this.resolveTargetDirectory(request.cwd);
    if (target && target !== this.trackedCwd) {
      const change = await this.runFramed(session, `cd -- ${shellQuote(target)}`, timeoutMs);
      if (change.kind !== 'frame') {
        return this.toResult(change, startedAt);
      }
      if (change.frame.exitCode !== 0 || change.frame.cwd !== target) {
        return {
          stdout: change.frame.output,
          stderr: `Could not change directory to ${target}; the command was not run.`,
          exit_code: change.frame.exitCode !== 0 ? change.frame.exitCode : 1,
          timed_out: false,
          session_restarted: false,
          cwd: this.trackedCwd,
          runtime_ms: Date.now() - startedAt,
        };
      }
    }

    const outcome = await this.runFramed(session, request.command, timeoutMs);
    return this.toResult(outcome, startedAt);
  }

  private resolveTimeoutMs(timeoutSec: number | null | undefined): number {
    const seconds =
      typeof timeoutSec === 'number' && Number.isFinite(timeoutSec) && timeoutSec > 0
        ? timeoutSec
        : this.defaultTimeoutSec;
    return Math.round(seconds * 1000);
  }

  private resolveTargetDirectory(cwd: string | null | undefined): string | null {
    if (typeof cwd !== 'string' || !cwd.trim()) {
      return null;
    }
    return path.resolve(this.trackedCwd ?? this.initialCwd, cwd.trim());
  }

  private async ensureSession(): Promise<LiveSession> {
    if (this.session && !this.session.exited) {
      return this.session;
    }
    if (this.session) {
      this.teardown('session exited');
    }

    if (this.lock) {
      try {
        await this.lock.acquire();
      } catch (error) {
        throw new SessionStartError(this.shell, error);
      }
    }

    const cwd = this.trackedCwd ?? this.initialCwd;
    let pty: PtyProcess;
    try {
      pty = this.ptyFactory(this.shell, this.shellArgs, {
        cwd,
        env: toPtyEnv(this.env, SHELL_ENV_OVERRIDES),
      });
    } catch (error) {
      throw new SessionStartError(this.shell, error);
    }

    const session: LiveSession = {
      pty,
      exited: false,
      exitCode: null,
      decoder: null,
      subscriptions: [],
    };

    session.subscriptions.push(
      pty.onData((data) => {
        session.decoder?.push(data);
      }),
      pty.onExit(({ exitCode }) => {
        session.exited = true;
        session.exitCode = exitCode;
        this.logger.debug(`Shell pid ${pty.pid} exited with code ${exitCode}.`);
      }),
    );

    this.session = session;
    this.logger.debug(`Spawned ${this.shell} (pid ${pty.pid}) in ${cwd}.`);

    pty.write(SHELL_SETUP);
    const handshake = await this.runFramed(session, ':', this.startupTimeoutMs);
    if (handshake.kind !== 'frame') {
      this.teardown('handshake failed');
      const reason =
        handshake.kind === 'timeout'
          ? `shell did not answer within ${formatSeconds(handshake.timeoutMs)}`
          : `shell exited with code ${handshake.exitCode ?? 'unknown'} during startup`;
      throw new SessionStartError(this.shell, new Error(reason));
    }

    return session;
  }

  private async runFramed(session: LiveSession, command: string, timeoutMs: number): Promise<FramedOutcome> {
    const decoder = new SentinelDecoder(this.markerFactory());
    session.decoder = decoder;

    try {
      session.pty.write(encodeCommand(command, decoder.marker));
    } catch (error) {
      session.decoder = null;
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Failed to write to shell: ${message}`);
      session.exited = true;
      return { kind: 'exited', partial: '', exitCode: session.exitCode };
    }

    const deadline = Date.now() + timeoutMs;
    while (!decoder.completed && !session.exited) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        break;
      }
      await sleep(Math.min(this.pollIntervalMs, remaining));
    }

    session.decoder = null;

    const frame = decoder.result();
    if (frame) {
      this.trackedCwd = frame.cwd;
      return { kind: 'frame', frame };
    }

    if (session.exited) {
      return { kind: 'exited', partial: decoder.partialOutput(), exitCode: session.exitCode };
    }

    return { kind: 'timeout', partial: decoder.partialOutput(), timeoutMs };
  }

  private toResult(outcome: FramedOutcome, startedAt: number): CommandResult {
    const runtime_ms = Date.now() - startedAt;

    if (outcome.kind === 'frame') {
      return {
        stdout: outcome.frame.output,
        stderr: '',
        exit_code: outcome.frame.exitCode,
        timed_out: false,
        session_restarted: false,
        cwd: outcome.frame.cwd,
        runtime_ms,
      };
    }

    if (outcome.kind === 'timeout') {
      this.logger.warn(`Command timed out after ${formatSeconds(outcome.timeoutMs)}; stopping the shell session.`);
      this.teardown('command timed out');
      return {
        stdout: outcome.partial,
        stderr: `Command timed out after ${formatSeconds(outcome.timeoutMs)}; session restarted for the next command.`,
        exit_code: null,
        timed_out: true,
        session_restarted: true,
        cwd: this.trackedCwd,
        runtime_ms,
      };
    }

    this.logger.warn(`Shell session exited (code ${outcome.exitCode ?? 'unknown'}) while a command was running.`);
    this.teardown('session exited');
    return {
      stdout: outcome.partial,
      stderr: `Shell session exited (code ${outcome.exitCode ?? 'unknown'}) before the command completed; session restarted for the next command.`,
      exit_code: null,
      timed_out: false,
      session_restarted: true,
      cwd: this.trackedCwd,
      runtime_ms,
    };
  }

  private teardown(reason: string): void {
    const session = this.session;
    if (!session) {
      return;
    }
    this.session = null;
    this.logger.debug(`Tearing down shell pid ${session.pty.pid}: ${reason}.`);

    for (const subscription of session.subscriptions) {
      subscription.dispose();
    }
    session.subscriptions = [];
    session.decoder = null;

    if (session.exited) {
      return;
    }

    // Best effort: the pty may already be closing, and a failed `exit` write
    // is followed by a kill anyway.
    try {
      session.pty.write('exit\n');
    } catch (error) {
      this.logger.debug(`Ignoring failed exit write: ${error instanceof Error ? error.message : String(error)}`);
    }
    try {
      session.pty.kill();
    } catch (error) {
      this.logger.debug(`Ignoring failed kill: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

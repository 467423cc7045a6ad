/**
 * One-line status shown while a turn waits on the model or the shell, e.g.
 * `… Running npm test (3.4s)`. Draws only on a TTY.
 */

import chalk from 'chalk';

import type { TurnActivity } from './orchestrator.js';

export interface ProgressIndicator {
  show(activity: TurnActivity): void;
  stop(): void;
}

export interface StatusStream {
  readonly isTTY?: boolean;
  write(text: string): unknown;
}

const CLEAR_LINE = '\r\u001b[2K';
const MAX_COMMAND_WIDTH = 60;

function summarizeCommand(command: string): string {
  const lines = command.split('\n');
  const first = (lines[0] ?? '').trim();
  const clipped = first.length > MAX_COMMAND_WIDTH ? `${first.slice(0, MAX_COMMAND_WIDTH - 1)}…` : first;
  return lines.length > 1 ? `${clipped} …` : clipped;
}

export function describeActivity(activity: TurnActivity): string {
  switch (activity.kind) {
    case 'deciding':
      return 'Deciding';
    case 'running':
      return `Running ${summarizeCommand(activity.command)}`;
    case 'explaining':
      return 'Explaining the result';
    case 'replying':
      return 'Waiting for the model';
  }
}

export function formatElapsedSeconds(elapsedMs: number): string {
  return `${(Math.max(0, elapsedMs) / 1000).toFixed(1)}s`;
}

export interface ActivityLineOptions {
  stream?: StatusStream;
  refreshMs?: number;
  now?: () => number;
}

export class ActivityLine implements ProgressIndicator {
  private readonly stream: StatusStream;

  private readonly refreshMs: number;

  private readonly now: () => number;

  private label = '';

  // Elapsed time counts from the first activity of the turn.
  private startedAt: number | null = null;

  private timer: ReturnType<typeof setInterval> | null = null;

  constructor({ stream = process.stdout, refreshMs = 200, now = Date.now }: ActivityLineOptions = {}) {
    this.stream = stream;
    this.refreshMs = Math.max(50, refreshMs);
    this.now = now;
  }

  show(activity: TurnActivity): void {
    if (!this.stream.isTTY) {
      return;
    }
    this.label = describeActivity(activity);
    if (this.startedAt === null) {
      this.startedAt = this.now();
      this.timer = setInterval(() => this.draw(), this.refreshMs);
      this.timer.unref();
    }
    this.draw();
  }

  stop(): void {
    if (this.startedAt === null) {
      return;
    }
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.startedAt = null;
    this.stream.write(CLEAR_LINE);
  }

  private draw(): void {
    if (this.startedAt === null) {
      return;
    }
    const elapsed = formatElapsedSeconds(this.now() - this.startedAt);
    this.stream.write(`${CLEAR_LINE}${chalk.dim(`… ${this.label} (${elapsed})`)}`);
  }
}

export const noopIndicator: ProgressIndicator = {
  show: () => {},
  stop: () => {},
};

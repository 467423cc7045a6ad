/**
 * Completion framing over a raw terminal stream.
 *
 * A terminal has no message boundaries, so every command is followed by a
 * statement that prints `<marker> <exit_code> <directory>`. The marker is
 * fresh per command; reading until it appears tells us exactly when the
 * command finished, how it exited and where the shell ended up.
 *
 * The marker is printed from two halves, so even if the shell echoed the
 * input back the contiguous token only ever appears in real output. A command
 * that happens to print the same 128-bit token is an accepted risk.
 */

import { randomBytes } from 'node:crypto';

import { TerminalTextCleaner } from '../utils/text.js';

const MARKER_PREFIX = '__PTYBRIDGE_';
const EXIT_CODE_VARIABLE = '__ptybridge_rc';

export interface SentinelFrame {
  output: string;
  exitCode: number;
  cwd: string;
}

export function createMarker(): string {
  return `${MARKER_PREFIX}${randomBytes(16).toString('hex')}__`;
}

export function encodeCommand(command: string, marker: string): string {
  const split = Math.ceil(marker.length / 2);
  const head = marker.slice(0, split);
  const tail = marker.slice(split);
  const body = command.endsWith('\n') ? command : `${command}\n`;

  return (
    body +
    `${EXIT_CODE_VARIABLE}=$?; ` +
    `printf '%s%s %s %s\\n' '${head}' '${tail}' "$${EXIT_CODE_VARIABLE}" "$PWD"\n`
  );
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function dropTrailingNewline(text: string): string {
  return text.endsWith('\n') ? text.slice(0, -1) : text;
}

/** Decode a complete capture in one go. */
export function decodeFrame(rawOutput: string, marker: string): SentinelFrame | null {
  return new SentinelDecoder(marker).push(rawOutput);
}

/**
 * Incremental decoder bound to one command's marker.
 *
 * Each chunk is cleaned once. Only the text that could still hold the status
 * line is searched; everything before it is kept for the output but never
 * rescanned.
 */
export class SentinelDecoder {
  readonly marker: string;

  private readonly statusLine: RegExp;

  private readonly cleaner = new TerminalTextCleaner();

  private readonly parts: string[] = [];

  // Unsearched tail of the cleaned text, starting `scanOffset` characters in.
  private scan = '';

  private scanOffset = 0;

  private frame: SentinelFrame | null = null;

  constructor(marker: string) {
    this.marker = marker;
    // The directory is the rest of the line, verbatim; only a complete line counts.
    this.statusLine = new RegExp(`^${escapeRegExp(marker)} (-?\\d+) ([^\\n]*)\\n`);
  }

  get completed(): boolean {
    return this.frame !== null;
  }

  push(chunk: string): SentinelFrame | null {
    if (this.frame) {
      return this.frame;
    }
    const text = this.cleaner.push(chunk);
    if (!text) {
      return null;
    }
    this.parts.push(text);
    this.scan += text;
    this.frame = this.findStatusLine();
    return this.frame;
  }

  result(): SentinelFrame | null {
    return this.frame;
  }

  partialOutput(): string {
    return dropTrailingNewline(this.parts.join('') + this.cleaner.pending());
  }

  private findStatusLine(): SentinelFrame | null {
    for (;;) {
      const index = this.scan.indexOf(this.marker);
      if (index < 0) {
        // Keep enough to catch a marker split across chunks.
        this.advance(this.scan.length - Math.min(this.scan.length, this.marker.length - 1));
        return null;
      }
      this.advance(index);
      if (!this.scan.includes('\n')) {
        return null;
      }

      const match = this.statusLine.exec(this.scan);
      if (match) {
        const [, exitCode = '', cwd = ''] = match;
        return {
          output: dropTrailingNewline(this.parts.join('').slice(0, this.scanOffset)),
          exitCode: Number.parseInt(exitCode, 10),
          cwd,
        };
      }
      this.advance(1);
    }
  }

  private advance(count: number): void {
    this.scanOffset += count;
    this.scan = this.scan.slice(count);
  }
}

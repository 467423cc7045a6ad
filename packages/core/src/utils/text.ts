/**
 * Text and shell utility helpers used across the bridge.
 *
 * Responsibilities:
 * - Clean raw pty output (carriage returns, ANSI control sequences), whole or
 *   chunk by chunk as it streams in.
 * - Truncate long command output before it is shown to the language model.
 * - Quote values for safe interpolation into shell statements.
 */

export type TruncateOptions = {
  head?: number;
  tail?: number;
  snipMarker?: string;
};

// CSI, OSC (BEL or ST terminated) and two-character escape sequences.
const ANSI_PATTERN =
  // eslint-disable-next-line no-control-regex
  /\u001b\[[0-?]*[ -/]*[@-~]|\u001b\][^\u0007\u001b]*(?:\u0007|\u001b\\)|\u001b[@-Z\\-_]/g;

export function stripTerminalControl(text: string): string {
  if (!text) {
    return '';
  }
  return text.replace(ANSI_PATTERN, '').replace(/\r\n?/g, '\n');
}

// A sequence cut off at the end of a chunk: CSI parameters, an OSC body still
// waiting for its terminator, or a lone ESC.
// eslint-disable-next-line no-control-regex
const INCOMPLETE_ESCAPE = /\u001b(?:\[[0-?]*[ -/]*|\][^\u0007\u001b]*\u001b?)?$/;
const MAX_HELD_ESCAPE = 4096;

/**
 * Streaming form of `stripTerminalControl`. Each chunk is cleaned once; an
 * escape sequence or `\r` split across chunks is held until the next one, so
 * the concatenated output equals cleaning the whole stream at once.
 */
export class TerminalTextCleaner {
  private heldEscape = '';

  private heldReturn = false;

  push(chunk: string): string {
    let raw = this.heldEscape + chunk;
    this.heldEscape = '';

    const incomplete = INCOMPLETE_ESCAPE.exec(raw);
    if (incomplete && raw.length - incomplete.index <= MAX_HELD_ESCAPE) {
      this.heldEscape = raw.slice(incomplete.index);
      raw = raw.slice(0, incomplete.index);
    }

    let text = raw.replace(ANSI_PATTERN, '');
    if (this.heldReturn) {
      text = `\r${text}`;
      this.heldReturn = false;
    }
    if (text.endsWith('\r')) {
      this.heldReturn = true;
      text = text.slice(0, -1);
    }
    return text.replace(/\r\n?/g, '\n');
  }

  /** What is held back, cleaned as if the stream ended here. */
  pending(): string {
    return (this.heldReturn ? '\n' : '') + stripTerminalControl(this.heldEscape);
  }
}

export function truncateOutput(
  text: unknown,
  { head = 40, tail = 40, snipMarker = '<snip....>' }: TruncateOptions = {},
): string {
  if (text === undefined || text === null) {
    return '';
  }

  const asString = String(text);
  if (asString === '') {
    return '';
  }

  const lines = asString.split('\n');
  if (lines.length <= head + tail) {
    return asString;
  }

  const headSlice = head > 0 ? lines.slice(0, head) : [];
  const tailSlice = tail > 0 ? lines.slice(-tail) : [];

  const parts: string[] = [];
  if (headSlice.length) {
    parts.push(headSlice.join('\n'));
  }
  parts.push(snipMarker);
  if (tailSlice.length) {
    parts.push(tailSlice.join('\n'));
  }

  return parts.join('\n');
}

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Readline wrapper behind the interactive chat loop.
 *
 * Ctrl+C on a terminal reaches readline as a keypress rather than a process
 * signal, so the interface's own `SIGINT` event is forwarded to the caller.
 */

import * as readline from 'node:readline';

export interface ChatIo {
  /** Resolves with the next line, or `null` once input has closed. */
  ask(prompt: string): Promise<string | null>;
  write(text: string): void;
  close(): void;
}

export interface ReadlineChatIoOptions {
  input?: NodeJS.ReadableStream & { isTTY?: boolean };
  output?: NodeJS.WritableStream;
  onInterrupt?: () => void;
}

export function createReadlineChatIo({
  input = process.stdin,
  output = process.stdout,
  onInterrupt,
}: ReadlineChatIoOptions = {}): ChatIo {
  const rl = readline.createInterface({
    input,
    output,
    terminal: input.isTTY === true,
  });

  let closed = false;
  let pending: ((answer: string | null) => void) | null = null;

  rl.on('close', () => {
    closed = true;
    const resolve = pending;
    pending = null;
    resolve?.(null);
  });

  if (onInterrupt) {
    rl.on('SIGINT', onInterrupt);
  }

  return {
    ask(prompt) {
      if (closed) {
        return Promise.resolve(null);
      }
      return new Promise<string | null>((resolve) => {
        pending = resolve;
        rl.question(prompt, (answer: string) => {
          pending = null;
          resolve(answer);
        });
      });
    },
    write(text) {
      output.write(`${text}\n`);
    },
    close() {
      if (!closed) {
        rl.close();
      }
    },
  };
}

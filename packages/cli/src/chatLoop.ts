/**
 * Interactive read-decide-run loop.
 *
 * Each turn reads one line, hands it to the orchestrator and prints the
 * rendered outcome. The loop ends on `/exit`, when input closes, or at the
 * first checkpoint after an interrupt. A shell command that is already
 * running is not cancelled by an interrupt; its result is printed and the
 * loop stops afterwards.
 */

import type { InterruptController } from '@ptybridge/core';

import type { ChatIo } from './io.js';
import type { HandleInputOptions, InputMode, TurnOutcome } from './orchestrator.js';
import { formatPrompt, renderOutcome } from './render.js';
import { noopIndicator, type ProgressIndicator } from './activityLine.js';

export interface TurnHandler {
  readonly mode: InputMode;
  handleInput(line: string, options?: HandleInputOptions): Promise<TurnOutcome>;
}

export type ChatLoopExitReason = 'exit' | 'closed' | 'interrupted';

export interface ChatLoopSummary {
  reason: ChatLoopExitReason;
  turns: number;
}

export interface ChatLoopOptions {
  orchestrator: TurnHandler;
  io: ChatIo;
  interrupt: InterruptController;
  indicator?: ProgressIndicator;
}

async function nextLine(io: ChatIo, interrupt: InterruptController, prompt: string): Promise<string | null> {
  const waiter = interrupt.waitForInterrupt();
  try {
    return await Promise.race([io.ask(prompt), waiter.promise.then(() => null)]);
  } finally {
    waiter.cleanup();
  }
}

export async function runChatLoop({
  orchestrator,
  io,
  interrupt,
  indicator = noopIndicator,
}: ChatLoopOptions): Promise<ChatLoopSummary> {
  let turns = 0;

  while (!interrupt.isTriggered()) {
    const line = await nextLine(io, interrupt, formatPrompt(orchestrator.mode));
    if (interrupt.isTriggered()) {
      break;
    }
    if (line === null) {
      return { reason: 'closed', turns };
    }

    let outcome: TurnOutcome;
    try {
      outcome = await orchestrator.handleInput(line, {
        signal: interrupt.signal,
        onActivity: (activity) => indicator.show(activity),
      });
    } finally {
      indicator.stop();
    }

    const rendered = renderOutcome(outcome);
    if (rendered !== null) {
      io.write(rendered);
    }
    if (outcome.type === 'exit') {
      return { reason: 'exit', turns };
    }
    if (outcome.type !== 'empty') {
      turns += 1;
    }
  }

  return { reason: 'interrupted', turns };
}

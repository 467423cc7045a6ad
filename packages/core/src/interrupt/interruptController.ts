/**
 * Two-stage interrupt handling for the interactive loop.
 *
 * The first interrupt moves the controller from `armed` to `triggered`,
 * aborts its signal (cancelling in-flight model calls) and notifies waiters;
 * the loop is expected to stop at its next checkpoint. A second interrupt
 * while `triggered` terminates the process through `hardExit`.
 */

import { createLogger, type Logger } from '../utils/logger.js';

export const HARD_EXIT_CODE = 130;

export type InterruptPhase = 'armed' | 'triggered';

export type InterruptListener = (reason: string) => void;

export type InterruptOutcome = 'triggered' | 'hard-exit';

export interface InterruptState {
  phase: InterruptPhase;
  reason: string | null;
  listeners: Set<InterruptListener>;
}

export interface InterruptWaiter {
  promise: Promise<string>;
  cleanup: () => void;
}

export interface CreateInterruptControllerOptions {
  hardExit?: (code: number) => void;
  /** Connects an interrupt source (e.g. SIGINT); may return a detach function. */
  attach?: (interrupt: () => void) => (() => void) | void;
  logger?: Logger;
}

export interface InterruptController {
  readonly state: InterruptState;
  readonly signal: AbortSignal;
  interrupt: (reason?: string) => InterruptOutcome;
  isTriggered: () => boolean;
  onInterrupt: (listener: InterruptListener) => () => void;
  waitForInterrupt: () => InterruptWaiter;
  detach: () => void;
}

export function createInterruptController({
  hardExit = (code) => process.exit(code),
  attach,
  logger = createLogger('interrupt'),
}: CreateInterruptControllerOptions = {}): InterruptController {
  const state: InterruptState = {
    phase: 'armed',
    reason: null,
    listeners: new Set<InterruptListener>(),
  };
  const abortController = new AbortController();

  const interrupt = (reason = 'interrupted'): InterruptOutcome => {
    if (state.phase === 'triggered') {
      logger.debug('Second interrupt received; exiting immediately.');
      hardExit(HARD_EXIT_CODE);
      return 'hard-exit';
    }

    state.phase = 'triggered';
    state.reason = reason;
    abortController.abort(new Error(reason));

    const listeners = Array.from(state.listeners);
    state.listeners.clear();
    for (const listener of listeners) {
      try {
        listener(reason);
      } catch (error) {
        logger.warn(`Interrupt listener failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    return 'triggered';
  };

  const onInterrupt = (listener: InterruptListener): (() => void) => {
    if (state.phase === 'triggered') {
      listener(state.reason ?? 'interrupted');
      return () => {};
    }
    state.listeners.add(listener);
    return () => {
      state.listeners.delete(listener);
    };
  };

  const waitForInterrupt = (): InterruptWaiter => {
    let cleanup: () => void = () => {};
    const promise = new Promise<string>((resolve) => {
      cleanup = onInterrupt(resolve);
    });
    return { promise, cleanup };
  };

  let unsubscribe: (() => void) | null = null;
  if (typeof attach === 'function') {
    const maybeCleanup = attach(() => {
      interrupt('interrupt signal');
    });
    unsubscribe = typeof maybeCleanup === 'function' ? maybeCleanup : null;
  }

  const detach = () => {
    if (unsubscribe) {
      const current = unsubscribe;
      unsubscribe = null;
      current();
    }
  };

  return {
    state,
    signal: abortController.signal,
    interrupt,
    isTriggered: () => state.phase === 'triggered',
    onInterrupt,
    waitForInterrupt,
    detach,
  };
}

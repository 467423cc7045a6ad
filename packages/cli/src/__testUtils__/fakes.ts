import type {
  CommandRequest,
  CommandResult,
  CompletionRequest,
  SessionLock,
  SessionLockStatus,
  TextCompleter,
} from '@ptybridge/core';

import type { ChatIo } from '../io.js';
import type { CommandSession } from '../orchestrator.js';

export const HOME = '/home/tester';

type SessionResponder = (request: CommandRequest) => Partial<CommandResult> | Promise<Partial<CommandResult>>;

/**
 * Records requests and answers them with a successful result in the requested
 * (or tracked) directory unless the responder overrides fields.
 */
export class FakeSession implements CommandSession {
  cwd: string | null = null;

  readonly requests: CommandRequest[] = [];

  resets = 0;

  stops = 0;

  constructor(private readonly respond: SessionResponder = () => ({})) {}

  async execute(request: CommandRequest): Promise<CommandResult> {
    this.requests.push(request);
    const overrides = await this.respond(request);
    const result: CommandResult = {
      stdout: '',
      stderr: '',
      exit_code: 0,
      timed_out: false,
      session_restarted: false,
      cwd: request.cwd ?? this.cwd ?? HOME,
      runtime_ms: 5,
      ...overrides,
    };
    this.cwd = result.cwd;
    return result;
  }

  async reset(): Promise<void> {
    this.resets += 1;
    this.cwd = HOME;
  }

  async stop(): Promise<void> {
    this.stops += 1;
    this.cwd = null;
  }
}

type ModelResponder = (request: CompletionRequest) => string | Promise<string>;

export class FakeModel implements TextCompleter {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly respond: ModelResponder = () => '') {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    return this.respond(request);
  }
}

/** Feeds scripted lines, then reports closed input. */
export class ScriptedChatIo implements ChatIo {
  readonly prompts: string[] = [];

  readonly written: string[] = [];

  closed = false;

  constructor(
    private readonly lines: string[],
    private readonly beforeAnswer: (index: number) => void = () => {},
  ) {}

  async ask(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    const index = this.prompts.length - 1;
    this.beforeAnswer(index);
    return index < this.lines.length ? this.lines[index] : null;
  }

  write(text: string): void {
    this.written.push(text);
  }

  close(): void {
    this.closed = true;
  }
}

export class FakeSessionLock implements SessionLock {
  readonly workingTree = HOME;

  acquired = 0;

  released = 0;

  constructor(private readonly status: SessionLockStatus = { state: 'idle', workingTree: HOME }) {}

  async acquire(): Promise<void> {
    this.acquired += 1;
  }

  async release(): Promise<void> {
    this.released += 1;
  }

  async inspect(): Promise<SessionLockStatus> {
    return this.status;
  }
}

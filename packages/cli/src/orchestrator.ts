/**
 * Turns one line of operator input into an outcome the CLI can render.
 *
 * Responsibilities:
 * - Route `/directives` (mode switches, toggles, memory, session control).
 * - In chat mode, ask the decision engine what to do; run decisions go
 *   through the safety gate and directory normalization before reaching the
 *   shell session, replies fall back to a conversational model answer.
 * - In shell and script mode, send the line straight to the session.
 *
 * Every request-scoped failure becomes an outcome value. Only
 * `SessionStartError` (the shell cannot be spawned at all) propagates.
 */

import * as os from 'node:os';

import {
  buildConversationSystemPrompt,
  buildExplainPrompt,
  buildScriptCommand,
  createLogger,
  DEFAULT_SCRIPT_INTERPRETER,
  defaultIsDirectory,
  evaluateCommandSafety,
  normalizeDirectory,
  runScript,
  runShell,
  type CommandRequest,
  type CommandResult,
  type DecisionOutcome,
  type DecisionSource,
  type DecideOptions,
  type Logger,
  type MemoryStore,
  type SafetyVerdict,
  type ScriptDecision,
  type ShellDecision,
  type TextCompleter,
} from '@ptybridge/core';

import { createSlashCommandRouter, type SlashCommandHandler, type SlashCommandRouter } from './slashCommands.js';

export type InputMode = 'chat' | 'shell' | 'script';

/** The part of `SessionManager` the orchestrator drives. */
export interface CommandSession {
  readonly cwd: string | null;
  execute(request: CommandRequest): Promise<CommandResult>;
  reset(): Promise<void>;
  stop(): Promise<void>;
}

export interface DecisionMaker {
  decide(utterance: string, options: DecideOptions): Promise<DecisionOutcome>;
}

export interface OrchestratorSettings {
  autoExecute: boolean;
  explainResults: boolean;
  scriptInterpreter: string;
  /** Per-command timeout; `null` uses the session default. */
  commandTimeoutSec: number | null;
}

export type RunKind = 'run_shell' | 'run_script';

/** Where a run came from: the decision engine, or the operator in shell/script mode. */
export type RunOrigin = DecisionSource | 'operator';

export type TurnOutcome =
  | { type: 'empty' }
  | { type: 'exit' }
  | { type: 'info'; message: string }
  | { type: 'error'; message: string }
  | { type: 'reply'; message: string }
  | {
      type: 'rejected';
      kind: RunKind;
      command: string;
      verdict: Extract<SafetyVerdict, { allowed: false }>;
    }
  | {
      type: 'executed';
      kind: RunKind;
      command: string;
      /** The directory the decision asked for but that did not resolve. */
      ignoredDirectory: string | null;
      result: CommandResult;
      explanation: string | null;
    };

/** What a turn is waiting on, reported as it happens. */
export type TurnActivity =
  | { kind: 'deciding' }
  | { kind: 'running'; command: string }
  | { kind: 'explaining' }
  | { kind: 'replying' };

export interface HandleInputOptions {
  signal?: AbortSignal;
  onActivity?: (activity: TurnActivity) => void;
}

export interface ExecutionOrchestratorOptions {
  session: CommandSession;
  decisionEngine: DecisionMaker;
  model?: TextCompleter | null;
  memory?: MemoryStore | null;
  settings?: Partial<OrchestratorSettings>;
  initialMode?: InputMode;
  homeDir?: string;
  isDirectory?: (candidate: string) => boolean;
  /** How many remembered notes are given to the conversational model. */
  memoryContextSize?: number;
  logger?: Logger;
}

export const HELP_TEXT = [
  'Type a request in plain language, or use a directive:',
  '  /chat [text]        switch to chat mode, or send one chat request',
  '  /shell [command]    switch to shell mode, or run one shell command',
  '  /script [code]      switch to script mode, or run one script',
  '  /cd <directory>     change the session directory',
  '  /pwd                show the session directory',
  '  /auto [on|off]      toggle automatic execution of model decisions',
  '  /explain [on|off]   toggle model explanations of command results',
  '  /reset              restart the shell session',
  '  /remember <text>    store a note for later conversations',
  '  /memory             list remembered notes',
  '  /exit               leave',
].join('\n');

const MODE_DESCRIPTIONS: Record<InputMode, string> = {
  chat: 'Chat mode: requests go to the decision engine.',
  shell: 'Shell mode: each line runs as a shell command. /chat to return.',
  script: 'Script mode: each line runs as a script. /chat to return.',
};

type Toggle = 'autoExecute' | 'explainResults';

const TOGGLE_LABELS: Record<Toggle, string> = {
  autoExecute: 'Automatic execution',
  explainResults: 'Result explanations',
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseToggleArgument(rest: string): boolean | null | 'invalid' {
  const normalized = rest.trim().toLowerCase();
  if (!normalized) {
    return null;
  }
  if (normalized === 'on') {
    return true;
  }
  if (normalized === 'off') {
    return false;
  }
  return 'invalid';
}

export class ExecutionOrchestrator {
  private readonly session: CommandSession;

  private readonly decisionEngine: DecisionMaker;

  private readonly model: TextCompleter | null;

  private readonly memory: MemoryStore | null;

  private readonly homeDir: string;

  private readonly isDirectory: (candidate: string) => boolean;

  private readonly memoryContextSize: number;

  private readonly logger: Logger;

  private readonly settingsState: OrchestratorSettings;

  private readonly route: SlashCommandRouter<TurnOutcome>;

  private currentMode: InputMode;

  private activeSignal: AbortSignal | undefined;

  private activityListener: ((activity: TurnActivity) => void) | undefined;

  constructor({
    session,
    decisionEngine,
    model = null,
    memory = null,
    settings = {},
    initialMode = 'chat',
    homeDir = os.homedir(),
    isDirectory = defaultIsDirectory,
    memoryContextSize = 20,
    logger,
  }: ExecutionOrchestratorOptions) {
    this.session = session;
    this.decisionEngine = decisionEngine;
    this.model = model;
    this.memory = memory;
    this.homeDir = homeDir;
    this.isDirectory = isDirectory;
    this.memoryContextSize = memoryContextSize;
    this.logger = logger ?? createLogger('orchestrator');
    this.currentMode = initialMode;
    this.settingsState = {
      autoExecute: settings.autoExecute ?? false,
      explainResults: settings.explainResults ?? true,
      scriptInterpreter: settings.scriptInterpreter ?? DEFAULT_SCRIPT_INTERPRETER,
      commandTimeoutSec: settings.commandTimeoutSec ?? null,
    };
    this.route = createSlashCommandRouter(this.buildDirectives());
  }

  get mode(): InputMode {
    return this.currentMode;
  }

  get settings(): Readonly<OrchestratorSettings> {
    return { ...this.settingsState };
  }

  async handleInput(line: string, { signal, onActivity }: HandleInputOptions = {}): Promise<TurnOutcome> {
    const text = line.trim();
    if (!text) {
      return { type: 'empty' };
    }

    this.activeSignal = signal;
    this.activityListener = onActivity;
    try {
      const routed = await this.route(text);
      if (routed.kind === 'handled') {
        return routed.result;
      }
      if (routed.kind === 'unknown') {
        return { type: 'error', message: `Unknown command /${routed.name}. Type /help for the list.` };
      }

      switch (this.currentMode) {
        case 'shell':
          return await this.dispatch(runShell(text), null, 'operator');
        case 'script':
          return await this.dispatch(runScript(line), null, 'operator');
        default:
          return await this.chat(text);
      }
    } finally {
      this.activeSignal = undefined;
      this.activityListener = undefined;
    }
  }

  private report(activity: TurnActivity): void {
    this.activityListener?.(activity);
  }

  private async chat(text: string): Promise<TurnOutcome> {
    this.report({ kind: 'deciding' });
    const outcome = await this.decisionEngine.decide(text, {
      autoExecute: this.settingsState.autoExecute,
      cwd: this.session.cwd,
      signal: this.activeSignal,
    });
    this.logger.debug(`Decision ${outcome.decision.kind} from ${outcome.source}${outcome.detail ? ` (${outcome.detail})` : ''}.`);

    const { decision } = outcome;
    if (decision.kind === 'reply') {
      if (decision.message.trim()) {
        return { type: 'reply', message: decision.message.trim() };
      }
      return this.converse(text);
    }
    return this.dispatch(decision, text, outcome.source);
  }

  /**
   * Gate, place and run a shell or script decision. `request` is the chat
   * text that produced it; explanations are only requested for chat turns.
   */
  private async dispatch(
    decision: ShellDecision | ScriptDecision,
    request: string | null,
    origin: RunOrigin,
  ): Promise<TurnOutcome> {
    const command =
      decision.kind === 'run_shell'
        ? decision.command
        : buildScriptCommand(decision.code, this.settingsState.scriptInterpreter);

    const verdict = evaluateCommandSafety(command);
    if (!verdict.allowed) {
      this.logger.warn(`Blocked ${decision.kind} from ${origin}: rule ${verdict.rule}.`);
      return { type: 'rejected', kind: decision.kind, command, verdict };
    }

    let targetDirectory: string | null = null;
    let ignoredDirectory: string | null = null;
    if (decision.cwd !== null) {
      targetDirectory = normalizeDirectory(decision.cwd, {
        baseDir: this.session.cwd,
        homeDir: this.homeDir,
        isDirectory: this.isDirectory,
      });
      if (targetDirectory === null) {
        ignoredDirectory = decision.cwd;
        this.logger.debug(`Ignoring unusable directory ${JSON.stringify(decision.cwd)}.`);
      }
    }

    this.report({ kind: 'running', command });
    const result = await this.session.execute({
      command,
      cwd: targetDirectory,
      timeoutSec: this.settingsState.commandTimeoutSec,
    });

    const explanation = request !== null ? await this.explain(request, command, result) : null;

    return { type: 'executed', kind: decision.kind, command, ignoredDirectory, result, explanation };
  }

  private async explain(request: string, command: string, result: CommandResult): Promise<string | null> {
    if (!this.settingsState.explainResults || !this.model) {
      return null;
    }
    this.report({ kind: 'explaining' });
    try {
      const text = await this.model.complete({
        prompt: buildExplainPrompt({ request, command, result }),
        signal: this.activeSignal,
      });
      return text || null;
    } catch (error) {
      return `(model error) ${errorMessage(error)}`;
    }
  }

  private async converse(text: string): Promise<TurnOutcome> {
    if (!this.model) {
      return {
        type: 'info',
        message: 'No language model is configured. Use /shell to run commands directly.',
      };
    }

    const notes = await this.rememberedNotes();
    this.report({ kind: 'replying' });
    try {
      const message = await this.model.complete({
        prompt: text,
        system: buildConversationSystemPrompt(notes),
        signal: this.activeSignal,
      });
      return { type: 'reply', message: message || '(empty reply)' };
    } catch (error) {
      return { type: 'reply', message: `(model error) ${errorMessage(error)}` };
    }
  }

  private async rememberedNotes(): Promise<string[]> {
    if (!this.memory) {
      return [];
    }
    try {
      const entries = await this.memory.list(this.memoryContextSize);
      return entries.map((entry) => entry.content);
    } catch (error) {
      this.logger.warn(`Could not read memory: ${errorMessage(error)}`);
      return [];
    }
  }

  private switchMode(mode: InputMode): TurnOutcome {
    this.currentMode = mode;
    return { type: 'info', message: MODE_DESCRIPTIONS[mode] };
  }

  private toggle(setting: Toggle, rest: string, directive: string): TurnOutcome {
    const parsed = parseToggleArgument(rest);
    if (parsed === 'invalid') {
      return { type: 'error', message: `Usage: /${directive} [on|off]` };
    }
    const next = parsed ?? !this.settingsState[setting];
    this.settingsState[setting] = next;
    return { type: 'info', message: `${TOGGLE_LABELS[setting]} ${next ? 'on' : 'off'}.` };
  }

  private async changeDirectory(rest: string): Promise<TurnOutcome> {
    if (!rest) {
      return { type: 'error', message: 'Usage: /cd <directory>' };
    }
    const target = normalizeDirectory(rest, {
      baseDir: this.session.cwd,
      homeDir: this.homeDir,
      isDirectory: this.isDirectory,
    });
    if (target === null) {
      return { type: 'error', message: `Not a directory: ${rest}` };
    }

    const result = await this.session.execute({ command: ':', cwd: target });
    if (result.exit_code !== 0) {
      return { type: 'error', message: result.stderr || `Could not change directory to ${target}.` };
    }
    return { type: 'info', message: `Directory: ${result.cwd ?? target}` };
  }

  private async remember(rest: string): Promise<TurnOutcome> {
    if (!rest) {
      return { type: 'error', message: 'Usage: /remember <text>' };
    }
    if (!this.memory) {
      return { type: 'error', message: 'Memory is not configured.' };
    }
    try {
      await this.memory.append('user', rest);
      return { type: 'info', message: 'Remembered.' };
    } catch (error) {
      return { type: 'error', message: `(memory error) ${errorMessage(error)}` };
    }
  }

  private async listMemory(): Promise<TurnOutcome> {
    if (!this.memory) {
      return { type: 'error', message: 'Memory is not configured.' };
    }
    try {
      const entries = await this.memory.list();
      if (entries.length === 0) {
        return { type: 'info', message: 'Nothing remembered yet.' };
      }
      return {
        type: 'info',
        message: entries.map((entry) => `- ${entry.content} (${entry.createdAt})`).join('\n'),
      };
    } catch (error) {
      return { type: 'error', message: `(memory error) ${errorMessage(error)}` };
    }
  }

  private buildDirectives(): Map<string, SlashCommandHandler<TurnOutcome>> {
    const exit = (): TurnOutcome => ({ type: 'exit' });

    return new Map<string, SlashCommandHandler<TurnOutcome>>([
      ['help', () => ({ type: 'info', message: HELP_TEXT })],
      ['chat', (rest) => (rest ? this.chat(rest) : this.switchMode('chat'))],
      ['shell', (rest) => (rest ? this.dispatch(runShell(rest), null, 'operator') : this.switchMode('shell'))],
      ['script', (rest) => (rest ? this.dispatch(runScript(rest), null, 'operator') : this.switchMode('script'))],
      ['cd', (rest) => this.changeDirectory(rest)],
      [
        'pwd',
        () => ({
          type: 'info',
          message: this.session.cwd ?? 'No shell session yet; it starts with the first command.',
        }),
      ],
      ['auto', (rest) => this.toggle('autoExecute', rest, 'auto')],
      ['explain', (rest) => this.toggle('explainResults', rest, 'explain')],
      [
        'reset',
        async () => {
          await this.session.reset();
          return { type: 'info', message: `Shell session restarted in ${this.session.cwd ?? this.homeDir}.` };
        },
      ],
      ['remember', (rest) => this.remember(rest)],
      ['memory', () => this.listMemory()],
      ['exit', exit],
      ['quit', exit],
    ]);
  }
}

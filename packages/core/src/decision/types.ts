export type Decision =
  | { kind: 'reply'; message: string }
  | { kind: 'run_shell'; command: string; cwd: string | null }
  | { kind: 'run_script'; code: string; cwd: string | null };

export type DecisionKind = Decision['kind'];

export type DecisionSource = 'rule' | 'model' | 'fallback';

export interface DecisionOutcome {
  decision: Decision;
  source: DecisionSource;
  /** Rule id for rule decisions; the failure reason for fallbacks. */
  detail?: string;
}

export type ReplyDecision = Extract<Decision, { kind: 'reply' }>;
export type ShellDecision = Extract<Decision, { kind: 'run_shell' }>;
export type ScriptDecision = Extract<Decision, { kind: 'run_script' }>;

export const reply = (message: string): ReplyDecision => ({ kind: 'reply', message });

export const runShell = (command: string, cwd: string | null = null): ShellDecision => ({
  kind: 'run_shell',
  command,
  cwd,
});

export const runScript = (code: string, cwd: string | null = null): ScriptDecision => ({
  kind: 'run_script',
  code,
  cwd,
});

export const isRunDecision = (
  decision: Decision,
): decision is ShellDecision | ScriptDecision =>
  decision.kind === 'run_shell' || decision.kind === 'run_script';

import { DecisionActionSchema, type DecisionAction } from './decisionSchema.js';
import { extractFirstJsonObject } from './jsonExtractor.js';
import { reply, runScript, runShell, type Decision } from './types.js';

export const STRATEGY_DIRECT = 'direct' as const;
export const STRATEGY_BALANCED_SLICE = 'balanced_slice' as const;

export type RecoveryStrategy = typeof STRATEGY_DIRECT | typeof STRATEGY_BALANCED_SLICE;

export type DecisionParseResult =
  | { ok: true; decision: Decision; strategy: RecoveryStrategy }
  | { ok: false; reason: string };

const toDecision = (action: DecisionAction): Decision => {
  switch (action.action) {
    case 'reply':
      return reply(action.message);
    case 'run_shell':
      return runShell(action.command, action.cwd);
    case 'run_script':
      return runScript(action.code, action.cwd);
  }
};

const tryJson = (text: string): { ok: true; value: unknown } | { ok: false; error: string } => {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
};

const isPlainObject = (value: unknown): boolean =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Parse a classifier response into a Decision. Models wrap JSON in prose or
 * in an array, so the whole text is tried first and, unless it parses to an
 * object, its first top-level `{...}` span.
 */
export function parseDecision(rawContent: unknown): DecisionParseResult {
  if (typeof rawContent !== 'string' || !rawContent.trim()) {
    return { ok: false, reason: 'Model response was empty.' };
  }

  const trimmed = rawContent.trim();
  let strategy: RecoveryStrategy = STRATEGY_DIRECT;
  let parsed = tryJson(trimmed);

  if (!parsed.ok || !isPlainObject(parsed.value)) {
    const sliced = extractFirstJsonObject(trimmed);
    if (!sliced) {
      return { ok: false, reason: 'Model response contained no JSON object.' };
    }
    strategy = STRATEGY_BALANCED_SLICE;
    parsed = tryJson(sliced);
    if (!parsed.ok) {
      return { ok: false, reason: `Model response JSON was invalid: ${parsed.error}` };
    }
  }

  const validation = DecisionActionSchema.safeParse(parsed.value);
  if (!validation.success) {
    const issues = validation.error.issues
      .map((issue) => `${issue.path.join('.') || 'action'}: ${issue.message}`)
      .join('; ');
    return { ok: false, reason: `Model decision failed validation: ${issues}` };
  }

  return { ok: true, decision: toDecision(validation.data), strategy };
}

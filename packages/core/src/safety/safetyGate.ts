import { DENY_RULES, type DenyRule } from './denyList.js';

const LEADING_SEPARATORS = /^[\s;&|({'"`$]+/;

export type SafetyVerdict =
  | { allowed: true }
  | {
      allowed: false;
      rule: string;
      /** The fragment of the command that matched. */
      pattern: string;
      description: string;
    };

/**
 * Check a fully assembled command (scripts in their heredoc form) against the
 * deny-list. Commands outside the deny-list pass.
 */
export function evaluateCommandSafety(
  command: string,
  rules: readonly DenyRule[] = DENY_RULES,
): SafetyVerdict {
  if (typeof command !== 'string' || !command.trim()) {
    return { allowed: true };
  }

  for (const rule of rules) {
    const match = rule.pattern.exec(command);
    if (match) {
      return {
        allowed: false,
        rule: rule.id,
        pattern: match[0].replace(LEADING_SEPARATORS, '').trim(),
        description: rule.description,
      };
    }
  }

  return { allowed: true };
}

export function isCommandAllowed(command: string): boolean {
  return evaluateCommandSafety(command).allowed;
}

export function describeRejection(verdict: SafetyVerdict): string | null {
  if (verdict.allowed) {
    return null;
  }
  return `Refused: ${verdict.description.toLowerCase()} (${verdict.rule}) matched "${verdict.pattern}".`;
}

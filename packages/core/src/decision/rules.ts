import { runShell, type Decision } from './types.js';

export interface DecisionRule {
  id: string;
  pattern: RegExp;
  build: (match: RegExpExecArray) => Decision;
}

const END = String.raw`\s*[?.!]*\s*$`;

function stripQuotes(value: string): string {
  const trimmed = value.trim();
  const first = trimmed[0];
  if (trimmed.length >= 2 && (first === '"' || first === "'") && trimmed.endsWith(first)) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

/**
 * Literal requests answered without the model. Each pattern must match the
 * whole utterance; order matters only when two could match.
 */
export const DECISION_RULES: readonly DecisionRule[] = [
  {
    id: 'pwd',
    pattern: new RegExp(
      String.raw`^\s*(?:(?:what(?:'s|\s+is)|show(?:\s+me)?|print)\s+(?:your|the)\s+(?:pwd|cwd|(?:current\s+)?(?:working\s+)?directory|current\s+folder)|(?:what|which)\s+(?:directory|folder)\s+are\s+you\s+in|where\s+are\s+you|pwd)${END}`,
      'i',
    ),
    build: () => runShell('pwd'),
  },
  {
    id: 'list-files',
    pattern: new RegExp(
      String.raw`^\s*(?:please\s+)?(?:list|show(?:\s+me)?)\s+(?:all\s+|the\s+)?files(?:\s+in\s+(.+?))?${END}`,
      'i',
    ),
    build: (match) => {
      const target = match[1] ? stripQuotes(match[1]) : '';
      return runShell('ls -la', target || null);
    },
  },
  {
    id: 'whoami',
    pattern: new RegExp(String.raw`^\s*(?:who\s*am\s*i|whoami)${END}`, 'i'),
    build: () => runShell('whoami'),
  },
  {
    id: 'git-status',
    pattern: new RegExp(
      String.raw`^\s*(?:(?:show(?:\s+me)?|check|what(?:'s|\s+is))\s+(?:the\s+)?)?git\s+status${END}`,
      'i',
    ),
    build: () => runShell('git status'),
  },
  {
    id: 'disk-usage',
    pattern: new RegExp(
      String.raw`^\s*(?:(?:show(?:\s+me)?|check|what(?:'s|\s+is))\s+(?:the\s+)?)?disk\s+(?:usage|space)${END}`,
      'i',
    ),
    build: () => runShell('df -h'),
  },
];

export interface RuleMatch {
  rule: DecisionRule;
  decision: Decision;
}

export function matchDecisionRule(
  utterance: string,
  rules: readonly DecisionRule[] = DECISION_RULES,
): RuleMatch | null {
  for (const rule of rules) {
    const match = rule.pattern.exec(utterance);
    if (match) {
      return { rule, decision: rule.build(match) };
    }
  }
  return null;
}

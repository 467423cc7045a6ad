/**
 * Prompt text sent to the local model.
 *
 * Responsibilities:
 * - The classifier instruction that asks for exactly one decision object.
 * - The conversational system prompt, optionally seeded with remembered notes.
 * - The follow-up prompt that explains a command result.
 */

import type { CommandResult } from '../session/types.js';
import { truncateOutput } from '../utils/text.js';
import { DEFAULT_EXPLAIN_MAX_LINES } from '../constants.js';

export const CLASSIFIER_SYSTEM_PROMPT = [
  'You route requests for an assistant that can run commands on the operator\'s machine.',
  'Respond with exactly one JSON object and nothing else. No prose, no code fences.',
  'Choose one of these shapes:',
  '{"action":"reply","message":"<answer for the operator>"}',
  '{"action":"run_shell","command":"<one shell command line>","cwd":null}',
  '{"action":"run_script","code":"<script source for the configured interpreter>","cwd":null}',
  'Use run_shell or run_script only when running something is required to answer.',
  'Set "cwd" to an existing directory only when the operator named one; otherwise null.',
  'Never emit placeholder paths such as /path/to or <path>.',
].join('\n');

export const CONVERSATION_SYSTEM_PROMPT = [
  'You are a concise local assistant running in the operator\'s terminal.',
  'Answer directly. When a shell command would help, suggest it but do not claim to have run it.',
].join('\n');

export interface ClassifierContext {
  cwd?: string | null;
}

export function buildClassifierPrompt(utterance: string, { cwd = null }: ClassifierContext = {}): string {
  const lines: string[] = [];
  if (cwd) {
    lines.push(`Current directory: ${cwd}`);
  }
  lines.push(`Request: ${utterance.trim()}`);
  return lines.join('\n');
}

export function buildConversationSystemPrompt(notes: readonly string[] = []): string {
  if (notes.length === 0) {
    return CONVERSATION_SYSTEM_PROMPT;
  }
  const remembered = notes.map((note) => `- ${note}`).join('\n');
  return `${CONVERSATION_SYSTEM_PROMPT}\n\nThe operator asked you to remember:\n${remembered}`;
}

export interface ExplainPromptInput {
  /** What the operator asked for, if the run came from a chat request. */
  request?: string | null;
  /** The command or script that ran, as dispatched. */
  command: string;
  result: CommandResult;
  maxLines?: number;
}

function describeStatus(result: CommandResult): string {
  if (result.timed_out) {
    return 'timed out (no exit code)';
  }
  if (result.exit_code === null) {
    return 'did not complete (no exit code)';
  }
  return `exit code ${result.exit_code}`;
}

export function buildExplainPrompt({
  request = null,
  command,
  result,
  maxLines = DEFAULT_EXPLAIN_MAX_LINES,
}: ExplainPromptInput): string {
  const half = Math.max(1, Math.floor(maxLines / 2));
  const output = truncateOutput(result.stdout, { head: half, tail: half }) || '(no output)';

  const sections = [
    'Explain the result of this command for the operator in a few sentences.',
    'Point out errors and what to try next when it failed.',
  ];
  if (request) {
    sections.push(`Request: ${request}`);
  }
  sections.push(`Command:\n${command}`, `Status: ${describeStatus(result)}`, `Directory: ${result.cwd ?? 'unknown'}`);
  if (result.stderr) {
    sections.push(`Notes: ${result.stderr}`);
  }
  sections.push(`Output:\n${output}`);

  return sections.join('\n\n');
}

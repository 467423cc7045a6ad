/**
 * Terminal formatting for orchestrator outcomes.
 *
 * Returns strings instead of writing so the chat loop owns the output stream
 * and tests can assert exact text.
 */

import chalk from 'chalk';

import { describeRejection, type CommandResult } from '@ptybridge/core';

import type { InputMode, TurnOutcome } from './orchestrator.js';

const COMMAND_PREVIEW_LINES = 3;

export function previewCommand(command: string, maxLines: number = COMMAND_PREVIEW_LINES): string {
  const lines = command.split('\n');
  if (lines.length <= maxLines) {
    return command;
  }
  return [...lines.slice(0, maxLines), `… (${lines.length - maxLines} more lines)`].join('\n');
}

export function formatStatus(result: CommandResult): string {
  let status: string;
  if (result.timed_out) {
    status = chalk.red('timed out');
  } else if (result.exit_code === null) {
    status = chalk.red('no exit code');
  } else if (result.exit_code === 0) {
    status = chalk.green('exit 0');
  } else {
    status = chalk.red(`exit ${result.exit_code}`);
  }

  const where = result.cwd ? ` in ${result.cwd}` : '';
  return `${status}${chalk.dim(`${where} (${result.runtime_ms}ms)`)}`;
}

function renderResult(command: string, ignoredDirectory: string | null, result: CommandResult): string[] {
  const lines = [chalk.dim(`$ ${previewCommand(command)}`)];
  if (ignoredDirectory !== null) {
    lines.push(chalk.yellow(`Ignored directory ${JSON.stringify(ignoredDirectory)}: not an existing directory.`));
  }
  if (result.stdout) {
    lines.push(result.stdout);
  }
  if (result.stderr) {
    lines.push(chalk.yellow(result.stderr));
  }
  lines.push(formatStatus(result));
  return lines;
}

/** `null` means there is nothing to print for this outcome. */
export function renderOutcome(outcome: TurnOutcome): string | null {
  switch (outcome.type) {
    case 'empty':
    case 'exit':
      return null;
    case 'info':
      return chalk.cyan(outcome.message);
    case 'error':
      return chalk.red(outcome.message);
    case 'reply':
      return outcome.message;
    case 'rejected':
      return [
        chalk.red(describeRejection(outcome.verdict) ?? 'Refused.'),
        chalk.dim(previewCommand(outcome.command)),
      ].join('\n');
    case 'executed': {
      const lines = renderResult(outcome.command, outcome.ignoredDirectory, outcome.result);
      if (outcome.explanation) {
        lines.push('', outcome.explanation);
      }
      return lines.join('\n');
    }
  }
}

const MODE_PROMPTS: Record<InputMode, string> = {
  chat: 'you> ',
  shell: 'sh> ',
  script: 'script> ',
};

export function formatPrompt(mode: InputMode): string {
  return chalk.bold.blue(MODE_PROMPTS[mode]);
}

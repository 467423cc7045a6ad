import { describe, expect, test } from '@jest/globals';

import type { CommandResult } from '../../session/types.js';
import {
  buildClassifierPrompt,
  buildConversationSystemPrompt,
  buildExplainPrompt,
  CONVERSATION_SYSTEM_PROMPT,
} from '../prompts.js';

const result = (overrides: Partial<CommandResult> = {}): CommandResult => ({
  stdout: 'total 0',
  stderr: '',
  exit_code: 0,
  timed_out: false,
  session_restarted: false,
  cwd: '/srv',
  runtime_ms: 12,
  ...overrides,
});

describe('buildClassifierPrompt', () => {
  test('includes the directory when known', () => {
    expect(buildClassifierPrompt('  clean up  ', { cwd: '/srv' })).toBe('Current directory: /srv\nRequest: clean up');
    expect(buildClassifierPrompt('clean up')).toBe('Request: clean up');
  });
});

describe('buildConversationSystemPrompt', () => {
  test('appends remembered notes', () => {
    expect(buildConversationSystemPrompt()).toBe(CONVERSATION_SYSTEM_PROMPT);
    expect(buildConversationSystemPrompt(['deploys happen on Fridays'])).toBe(
      `${CONVERSATION_SYSTEM_PROMPT}\n\nThe operator asked you to remember:\n- deploys happen on Fridays`,
    );
  });
});

describe('buildExplainPrompt', () => {
  test('describes a completed command', () => {
    expect(buildExplainPrompt({ request: 'list files', command: 'ls -la', result: result() })).toBe(
      [
        'Explain the result of this command for the operator in a few sentences.',
        'Point out errors and what to try next when it failed.',
        'Request: list files',
        'Command:\nls -la',
        'Status: exit code 0',
        'Directory: /srv',
        'Output:\ntotal 0',
      ].join('\n\n'),
    );
  });

  test('reports timeouts and notes', () => {
    const prompt = buildExplainPrompt({
      command: 'sleep 99',
      result: result({ stdout: '', exit_code: null, timed_out: true, stderr: 'Command timed out after 1s.' }),
    });

    expect(prompt).toContain('Status: timed out (no exit code)');
    expect(prompt).toContain('Notes: Command timed out after 1s.');
    expect(prompt.endsWith('Output:\n(no output)')).toBe(true);
  });

  test('truncates long output around the middle', () => {
    const stdout = Array.from({ length: 10 }, (_, index) => `line ${index + 1}`).join('\n');

    const prompt = buildExplainPrompt({ command: 'seq', result: result({ stdout }), maxLines: 4 });

    expect(prompt.endsWith('Output:\nline 1\nline 2\n<snip....>\nline 9\nline 10')).toBe(true);
  });
});

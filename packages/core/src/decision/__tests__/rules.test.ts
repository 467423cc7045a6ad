import { describe, expect, test } from '@jest/globals';

import { matchDecisionRule } from '../rules.js';
import { runShell } from '../types.js';

describe('matchDecisionRule', () => {
  test.each([
    ['what is your pwd', 'pwd', runShell('pwd')],
    ["What's the current working directory?", 'pwd', runShell('pwd')],
    ['which directory are you in', 'pwd', runShell('pwd')],
    ['where are you?', 'pwd', runShell('pwd')],
    ['list files', 'list-files', runShell('ls -la')],
    ['list files in /var/log', 'list-files', runShell('ls -la', '/var/log')],
    ['show me all files in "my docs"?', 'list-files', runShell('ls -la', 'my docs')],
    ['who am i', 'whoami', runShell('whoami')],
    ['git status', 'git-status', runShell('git status')],
    ['show me the git status', 'git-status', runShell('git status')],
    ['check disk usage', 'disk-usage', runShell('df -h')],
    ["what's the disk space?", 'disk-usage', runShell('df -h')],
  ])('maps %j to %s', (utterance, ruleId, decision) => {
    const match = matchDecisionRule(utterance);

    expect(match?.rule.id).toBe(ruleId);
    expect(match?.decision).toEqual(decision);
  });

  test.each(['list files and delete them', 'please write a poem', 'what is your name', ''])(
    'leaves %j to the model',
    (utterance) => {
      expect(matchDecisionRule(utterance)).toBeNull();
    },
  );
});

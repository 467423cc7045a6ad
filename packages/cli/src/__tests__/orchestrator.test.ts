import { describe, expect, test } from '@jest/globals';

import {
  buildConversationSystemPrompt,
  CLASSIFIER_SYSTEM_PROMPT,
  CONVERSATION_SYSTEM_PROMPT,
  DecisionEngine,
  InMemoryMemoryStore,
  SessionStartError,
  silentLogger,
  type CompletionRequest,
} from '@ptybridge/core';

import { FakeModel, FakeSession, HOME } from '../__testUtils__/fakes.js';
import {
  ExecutionOrchestrator,
  HELP_TEXT,
  type ExecutionOrchestratorOptions,
  type TurnActivity,
} from '../orchestrator.js';

type Responder = (request: CompletionRequest) => string;

function setup({
  classifier = () => '{"action":"reply","message":""}',
  model = () => 'model text',
  session = new FakeSession(),
  options = {},
}: {
  classifier?: Responder;
  model?: Responder;
  session?: FakeSession;
  options?: Partial<ExecutionOrchestratorOptions>;
} = {}) {
  const fakeModel = new FakeModel((request) =>
    request.system === CLASSIFIER_SYSTEM_PROMPT ? classifier(request) : model(request),
  );
  const memory = new InMemoryMemoryStore(() => new Date('2026-01-02T03:04:05.000Z'));
  const orchestrator = new ExecutionOrchestrator({
    session,
    decisionEngine: new DecisionEngine({ model: fakeModel, logger: silentLogger }),
    model: fakeModel,
    memory,
    homeDir: HOME,
    isDirectory: (candidate) => candidate === '/srv/data',
    logger: silentLogger,
    ...options,
  });
  return { orchestrator, session, model: fakeModel, memory };
}

describe('ExecutionOrchestrator chat mode', () => {
  test('ignores blank input', async () => {
    const { orchestrator, session, model } = setup();

    await expect(orchestrator.handleInput('   ')).resolves.toEqual({ type: 'empty' });
    expect(session.requests).toEqual([]);
    expect(model.requests).toEqual([]);
  });

  test('runs rule matches without the classifier and explains the result', async () => {
    const session = new FakeSession(() => ({ stdout: HOME }));
    const { orchestrator, model } = setup({ session, model: () => 'You are in your home directory.' });

    const outcome = await orchestrator.handleInput('pwd');

    expect(session.requests).toEqual([{ command: 'pwd', cwd: null, timeoutSec: null }]);
    expect(outcome).toEqual({
      type: 'executed',
      kind: 'run_shell',
      command: 'pwd',
      ignoredDirectory: null,
      result: {
        stdout: HOME,
        stderr: '',
        exit_code: 0,
        timed_out: false,
        session_restarted: false,
        cwd: HOME,
        runtime_ms: 5,
      },
      explanation: 'You are in your home directory.',
    });
    expect(model.requests).toHaveLength(1);
    expect(model.requests[0].system).toBeUndefined();
    expect(model.requests[0].prompt).toContain('Request: pwd');
    expect(model.requests[0].prompt).toContain('Command:\npwd');
    expect(model.requests[0].prompt).toContain('Status: exit code 0');
  });

  test('skips the explanation when explanations are off', async () => {
    const { orchestrator, model } = setup({ options: { settings: { explainResults: false } } });

    const outcome = await orchestrator.handleInput('whoami');

    expect(outcome).toMatchObject({ type: 'executed', command: 'whoami', explanation: null });
    expect(model.requests).toEqual([]);
  });

  test('reports a failed explanation in place of the text', async () => {
    const { orchestrator } = setup({
      model: () => {
        throw new Error('boom');
      },
    });

    await expect(orchestrator.handleInput('git status')).resolves.toMatchObject({
      type: 'executed',
      command: 'git status',
      explanation: '(model error) boom',
    });
  });

  test('answers conversationally while automatic execution is off', async () => {
    const { orchestrator, model, session } = setup({ model: () => 'Hello!' });

    await expect(orchestrator.handleInput('hello there')).resolves.toEqual({ type: 'reply', message: 'Hello!' });
    expect(session.requests).toEqual([]);
    expect(model.requests).toEqual([
      { prompt: 'hello there', system: CONVERSATION_SYSTEM_PROMPT, signal: undefined },
    ]);
  });

  test('passes remembered notes and the caller signal to the conversation', async () => {
    const { orchestrator, model } = setup({ model: () => 'Noted.' });
    const controller = new AbortController();

    await orchestrator.handleInput('/remember the project lives in /srv/data');
    await orchestrator.handleInput('hello there', { signal: controller.signal });

    expect(model.requests).toHaveLength(1);
    expect(model.requests[0].system).toBe(buildConversationSystemPrompt(['the project lives in /srv/data']));
    expect(model.requests[0].signal).toBe(controller.signal);
  });

  test('turns a conversational model failure into a reply', async () => {
    const { orchestrator } = setup({
      model: () => {
        throw new Error('connection refused');
      },
    });

    await expect(orchestrator.handleInput('hello there')).resolves.toEqual({
      type: 'reply',
      message: '(model error) connection refused',
    });
  });

  test('explains that no model is configured', async () => {
    const session = new FakeSession();
    const orchestrator = new ExecutionOrchestrator({
      session,
      decisionEngine: new DecisionEngine({ logger: silentLogger }),
      logger: silentLogger,
    });

    await expect(orchestrator.handleInput('hello there')).resolves.toEqual({
      type: 'info',
      message: 'No language model is configured. Use /shell to run commands directly.',
    });
  });

  test('runs classifier decisions in the requested directory when automatic execution is on', async () => {
    const { orchestrator, session, model } = setup({
      classifier: () => '{"action":"run_shell","command":"ls /srv","cwd":"/srv/data"}',
      model: () => 'Listed.',
      options: { settings: { autoExecute: true, commandTimeoutSec: 5 } },
    });

    const outcome = await orchestrator.handleInput('what is under srv');

    expect(session.requests).toEqual([{ command: 'ls /srv', cwd: '/srv/data', timeoutSec: 5 }]);
    expect(outcome).toMatchObject({ type: 'executed', ignoredDirectory: null, explanation: 'Listed.' });
    expect(model.requests.map((request) => request.system)).toEqual([CLASSIFIER_SYSTEM_PROMPT, undefined]);
  });

  test('drops placeholder directories and reports them', async () => {
    const { orchestrator, session } = setup({
      classifier: () => '{"action":"run_shell","command":"ls","cwd":"/path/to/dir"}',
      options: { settings: { autoExecute: true, explainResults: false } },
    });

    const outcome = await orchestrator.handleInput('list stuff over there');

    expect(session.requests).toEqual([{ command: 'ls', cwd: null, timeoutSec: null }]);
    expect(outcome).toMatchObject({ type: 'executed', ignoredDirectory: '/path/to/dir' });
  });

  test('refuses unsafe commands without touching the session', async () => {
    const { orchestrator, session } = setup({
      classifier: () => '{"action":"run_shell","command":"sudo rm -rf /"}',
      options: { settings: { autoExecute: true } },
    });

    await expect(orchestrator.handleInput('clean everything up')).resolves.toEqual({
      type: 'rejected',
      kind: 'run_shell',
      command: 'sudo rm -rf /',
      verdict: {
        allowed: false,
        rule: 'recursive-root-delete',
        pattern: 'sudo rm -rf /',
        description: 'Recursive deletion of the filesystem root or home directory',
      },
    });
    expect(session.requests).toEqual([]);
  });

  test('wraps script decisions in a heredoc for the configured interpreter', async () => {
    const { orchestrator, session } = setup({
      classifier: () => '{"action":"run_script","code":"print(1)"}',
      options: { settings: { autoExecute: true, explainResults: false, scriptInterpreter: 'python3' } },
    });

    const outcome = await orchestrator.handleInput('compute something');

    expect(outcome).toMatchObject({ type: 'executed', kind: 'run_script' });
    expect(session.requests).toHaveLength(1);
    expect(session.requests[0].command).toMatch(
      /^python3 - <<'PTYBRIDGE_SCRIPT_[0-9A-F]{12}'\nprint\(1\)\nPTYBRIDGE_SCRIPT_[0-9A-F]{12}$/,
    );
  });

  test('falls back to conversation when the classifier answers in prose', async () => {
    const { orchestrator, session } = setup({
      classifier: () => 'Sure, I can help with that.',
      model: () => 'Here is an answer.',
      options: { settings: { autoExecute: true } },
    });

    await expect(orchestrator.handleInput('tell me a joke')).resolves.toEqual({
      type: 'reply',
      message: 'Here is an answer.',
    });
    expect(session.requests).toEqual([]);
  });

  test('lets SessionStartError escape', async () => {
    const session = new FakeSession(() => {
      throw new SessionStartError('/bin/bash', new Error('fork failed'));
    });
    const { orchestrator } = setup({ session });

    await expect(orchestrator.handleInput('pwd')).rejects.toThrow(
      'Failed to start shell session (/bin/bash): fork failed',
    );
  });
});

describe('ExecutionOrchestrator shell and script modes', () => {
  test('switches to shell mode and runs lines verbatim', async () => {
    const { orchestrator, session, model } = setup();

    await expect(orchestrator.handleInput('/shell')).resolves.toEqual({
      type: 'info',
      message: 'Shell mode: each line runs as a shell command. /chat to return.',
    });
    expect(orchestrator.mode).toBe('shell');

    const outcome = await orchestrator.handleInput('echo hi');

    expect(session.requests).toEqual([{ command: 'echo hi', cwd: null, timeoutSec: null }]);
    expect(outcome).toMatchObject({ type: 'executed', command: 'echo hi', explanation: null });
    expect(model.requests).toEqual([]);

    await orchestrator.handleInput('/chat');
    expect(orchestrator.mode).toBe('chat');
  });

  test('treats absolute paths in shell mode as commands', async () => {
    const { orchestrator, session } = setup({ options: { initialMode: 'shell' } });

    await orchestrator.handleInput('/bin/ls -la');

    expect(session.requests.map((request) => request.command)).toEqual(['/bin/ls -la']);
  });

  test('runs a single shell command without leaving chat mode', async () => {
    const { orchestrator, session } = setup();

    await orchestrator.handleInput('/shell printf "%s  %s" a b');

    expect(session.requests.map((request) => request.command)).toEqual(['printf "%s  %s" a b']);
    expect(orchestrator.mode).toBe('chat');
  });

  test('still gates commands typed in shell mode', async () => {
    const { orchestrator, session } = setup({ options: { initialMode: 'shell' } });

    await expect(orchestrator.handleInput('shutdown -h now')).resolves.toMatchObject({
      type: 'rejected',
      verdict: { rule: 'shutdown-reboot' },
    });
    expect(session.requests).toEqual([]);
  });

  test('runs lines as scripts in script mode', async () => {
    const { orchestrator, session } = setup({ options: { settings: { scriptInterpreter: 'node' } } });

    await orchestrator.handleInput('/script');
    expect(orchestrator.mode).toBe('script');
    await orchestrator.handleInput('console.log(2)');

    expect(session.requests).toHaveLength(1);
    expect(session.requests[0].command).toMatch(/^node - <<'PTYBRIDGE_SCRIPT_[0-9A-F]{12}'\nconsole\.log\(2\)\n/);
  });
});

describe('ExecutionOrchestrator directives', () => {
  test('prints help', async () => {
    const { orchestrator } = setup();

    await expect(orchestrator.handleInput('/help')).resolves.toEqual({ type: 'info', message: HELP_TEXT });
  });

  test('rejects unknown directives', async () => {
    const { orchestrator } = setup();

    await expect(orchestrator.handleInput('/frobnicate now')).resolves.toEqual({
      type: 'error',
      message: 'Unknown command /frobnicate. Type /help for the list.',
    });
  });

  test('toggles automatic execution', async () => {
    const { orchestrator } = setup();

    await expect(orchestrator.handleInput('/auto')).resolves.toEqual({
      type: 'info',
      message: 'Automatic execution on.',
    });
    expect(orchestrator.settings.autoExecute).toBe(true);
    await expect(orchestrator.handleInput('/auto off')).resolves.toEqual({
      type: 'info',
      message: 'Automatic execution off.',
    });
    await expect(orchestrator.handleInput('/auto maybe')).resolves.toEqual({
      type: 'error',
      message: 'Usage: /auto [on|off]',
    });
    expect(orchestrator.settings.autoExecute).toBe(false);
  });

  test('toggles explanations', async () => {
    const { orchestrator } = setup();

    await expect(orchestrator.handleInput('/explain off')).resolves.toEqual({
      type: 'info',
      message: 'Result explanations off.',
    });
    expect(orchestrator.settings.explainResults).toBe(false);
  });

  test('changes directory through the session', async () => {
    const { orchestrator, session } = setup();

    await expect(orchestrator.handleInput('/cd')).resolves.toEqual({ type: 'error', message: 'Usage: /cd <directory>' });
    await expect(orchestrator.handleInput('/cd /nope')).resolves.toEqual({
      type: 'error',
      message: 'Not a directory: /nope',
    });
    await expect(orchestrator.handleInput('/cd /srv/data')).resolves.toEqual({
      type: 'info',
      message: 'Directory: /srv/data',
    });
    expect(session.requests).toEqual([{ command: ':', cwd: '/srv/data' }]);
  });

  test('reports a directory change the shell refused', async () => {
    const session = new FakeSession(() => ({
      exit_code: 1,
      stderr: 'Could not change directory to /srv/data; the command was not run.',
      cwd: HOME,
    }));
    const { orchestrator } = setup({ session });

    await expect(orchestrator.handleInput('/cd /srv/data')).resolves.toEqual({
      type: 'error',
      message: 'Could not change directory to /srv/data; the command was not run.',
    });
  });

  test('shows the tracked directory', async () => {
    const { orchestrator, session } = setup();

    await expect(orchestrator.handleInput('/pwd')).resolves.toEqual({
      type: 'info',
      message: 'No shell session yet; it starts with the first command.',
    });
    session.cwd = '/srv/data';
    await expect(orchestrator.handleInput('/pwd')).resolves.toEqual({ type: 'info', message: '/srv/data' });
  });

  test('restarts the session', async () => {
    const { orchestrator, session } = setup();

    await expect(orchestrator.handleInput('/reset')).resolves.toEqual({
      type: 'info',
      message: `Shell session restarted in ${HOME}.`,
    });
    expect(session.resets).toBe(1);
  });

  test('remembers and lists notes', async () => {
    const { orchestrator } = setup();

    await expect(orchestrator.handleInput('/memory')).resolves.toEqual({
      type: 'info',
      message: 'Nothing remembered yet.',
    });
    await expect(orchestrator.handleInput('/remember')).resolves.toEqual({
      type: 'error',
      message: 'Usage: /remember <text>',
    });
    await expect(orchestrator.handleInput('/remember prefers tabs')).resolves.toEqual({
      type: 'info',
      message: 'Remembered.',
    });
    await expect(orchestrator.handleInput('/memory')).resolves.toEqual({
      type: 'info',
      message: '- prefers tabs (2026-01-02T03:04:05.000Z)',
    });
  });

  test('reports missing memory', async () => {
    const { orchestrator } = setup({ options: { memory: null } });

    await expect(orchestrator.handleInput('/remember x')).resolves.toEqual({
      type: 'error',
      message: 'Memory is not configured.',
    });
  });

  test('exits on /exit and /quit', async () => {
    const { orchestrator } = setup();

    await expect(orchestrator.handleInput('/exit')).resolves.toEqual({ type: 'exit' });
    await expect(orchestrator.handleInput('/QUIT')).resolves.toEqual({ type: 'exit' });
  });
});

describe('ExecutionOrchestrator activity reports', () => {
  async function collect(orchestrator: ExecutionOrchestrator, line: string): Promise<TurnActivity[]> {
    const activities: TurnActivity[] = [];
    await orchestrator.handleInput(line, { onActivity: (activity) => activities.push(activity) });
    return activities;
  }

  test('reports deciding, running and explaining for an explained run', async () => {
    const { orchestrator } = setup({ model: () => 'You are home.' });

    await expect(collect(orchestrator, 'pwd')).resolves.toEqual([
      { kind: 'deciding' },
      { kind: 'running', command: 'pwd' },
      { kind: 'explaining' },
    ]);
  });

  test('reports the conversational wait', async () => {
    const { orchestrator } = setup({ model: () => 'Hello!' });

    await expect(collect(orchestrator, 'hello there')).resolves.toEqual([{ kind: 'deciding' }, { kind: 'replying' }]);
  });

  test('reports only the run in shell mode', async () => {
    const { orchestrator } = setup({ options: { initialMode: 'shell' } });

    await expect(collect(orchestrator, 'echo hi')).resolves.toEqual([{ kind: 'running', command: 'echo hi' }]);
  });
});

import { afterEach, beforeAll, describe, expect, jest, test } from '@jest/globals';
import chalk from 'chalk';

import {
  InMemoryMemoryStore,
  resetStartupFlags,
  SessionStartError,
  type BridgeConfig,
  type SessionLock,
} from '@ptybridge/core';

import { FakeModel, FakeSession, FakeSessionLock, HOME, ScriptedChatIo } from '../__testUtils__/fakes.js';
import { describeLockStatus, readPackageVersion, runCli, USAGE, type CliDependencies } from '../runner.js';
import { noopIndicator } from '../activityLine.js';

function createIo() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    io: {
      stdout: (message: string) => {
        out.push(message);
      },
      stderr: (message: string) => {
        err.push(message);
      },
    },
  };
}

function createDependencies(lines: string[], session = new FakeSession(), lock = new FakeSessionLock()) {
  const chatIo = new ScriptedChatIo(lines);
  const detach = jest.fn();
  const configs: BridgeConfig[] = [];
  const locks: SessionLock[] = [];
  const overrides: Partial<CliDependencies> = {
    env: {},
    createSessionLock: () => lock,
    createSession: (config, sessionLock) => {
      configs.push(config);
      locks.push(sessionLock);
      return session;
    },
    createModel: () => new FakeModel(() => 'Done.'),
    createMemory: () => new InMemoryMemoryStore(),
    createChatIo: () => chatIo,
    createIndicator: () => noopIndicator,
    attachInterrupt: () => detach,
    hardExit: jest.fn(),
  };
  return { chatIo, detach, configs, locks, lock, session, overrides };
}

describe('runCli', () => {
  const exitCodeBackup = process.exitCode;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    process.exitCode = exitCodeBackup;
    resetStartupFlags();
  });

  test('prints usage', async () => {
    const { out, io } = createIo();

    await runCli(['node', 'ptybridge', '--help'], io);

    expect(out).toEqual([USAGE]);
  });

  test('prints the package version', async () => {
    const { out, io } = createIo();

    await runCli(['node', 'ptybridge', '-v'], io);

    expect(readPackageVersion()).toBe('0.1.0');
    expect(out).toEqual(['ptybridge 0.1.0']);
  });

  test('reports invalid configuration without starting a session', async () => {
    const { err, io } = createIo();
    const { overrides, configs } = createDependencies([]);

    await runCli(['node', 'ptybridge'], io, { ...overrides, env: { BRIDGE_COMMAND_TIMEOUT_SEC: 'soon' } });

    expect(err).toEqual(['Configuration error: BRIDGE_COMMAND_TIMEOUT_SEC must be a positive number when provided.']);
    expect(configs).toEqual([]);
    expect(process.exitCode).toBe(1);
  });

  test('runs the chat loop and shuts everything down', async () => {
    const { err, io } = createIo();
    const { overrides, chatIo, detach, configs, locks, lock, session } = createDependencies(['/shell echo hi', '/exit']);

    await runCli(['node', 'ptybridge', '--auto'], io, {
      ...overrides,
      env: { BRIDGE_SHELL: '/bin/zsh', BRIDGE_COMMAND_TIMEOUT_SEC: '15' },
    });

    expect(err).toEqual([]);
    expect(configs).toHaveLength(1);
    expect(configs[0]).toMatchObject({ shell: '/bin/zsh', shellArgs: [], commandTimeoutSec: 15 });
    expect(locks).toEqual([lock]);
    expect(session.requests).toEqual([{ command: 'echo hi', cwd: null, timeoutSec: 15 }]);
    expect(chatIo.written).toEqual([
      'Model llama3.2:3b at http://127.0.0.1:11434/v1. Automatic execution on. Type /help for directives.',
      '$ echo hi\nexit 0 in /home/tester (5ms)',
    ]);
    expect(chatIo.closed).toBe(true);
    expect(session.stops).toBe(1);
    expect(detach).toHaveBeenCalledTimes(1);
  });

  test('reports a shell that cannot start', async () => {
    const { err, io } = createIo();
    const session = new FakeSession(() => {
      throw new SessionStartError('/bin/bash', new Error('fork failed'));
    });
    const { overrides, chatIo } = createDependencies(['/shell ls'], session);

    await runCli(['node', 'ptybridge'], io, overrides);

    expect(err).toEqual(['Failed to start shell session (/bin/bash): fork failed']);
    expect(process.exitCode).toBe(1);
    expect(chatIo.closed).toBe(true);
    expect(session.stops).toBe(1);
  });

  test('reports the working-tree lock without starting a session', async () => {
    const { out, io } = createIo();
    const lock = new FakeSessionLock({
      state: 'busy',
      workingTree: HOME,
      holder: { pid: 4242, workingTree: HOME, startedAt: '2026-01-02T03:04:05.000Z' },
    });
    const { overrides, configs } = createDependencies([], new FakeSession(), lock);

    await runCli(['node', 'ptybridge', '--status'], io, overrides);

    expect(out).toEqual(['Busy: pid 4242 has held /home/tester since 2026-01-02T03:04:05.000Z.']);
    expect(configs).toEqual([]);
    expect(lock.acquired).toBe(0);
  });
});

describe('describeLockStatus', () => {
  test('describes idle and stale locks', () => {
    expect(describeLockStatus({ state: 'idle', workingTree: '/work' })).toBe('Idle: no session holds /work.');
    expect(
      describeLockStatus({
        state: 'stale',
        workingTree: '/work',
        holder: { pid: 7, workingTree: '/work', startedAt: '2026-01-02T03:04:05.000Z' },
      }),
    ).toBe('Idle: pid 7 left a stale lock on /work; the next session replaces it.');
    expect(describeLockStatus({ state: 'stale', workingTree: '/work', holder: null })).toBe(
      'Idle: an unreadable lock sits on /work; the next session replaces it.',
    );
  });
});

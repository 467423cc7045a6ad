/**
 * CLI bootstrap: resolve configuration, wire the core services together and
 * run the chat loop until the operator leaves.
 *
 * Construction goes through `CliDependencies` so tests can swap the pty
 * session, the model and the terminal for in-process fakes.
 */

import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import chalk from 'chalk';

import {
  applyStartupFlagsFromArgv,
  ConfigurationError,
  createInterruptController,
  createLogger,
  DecisionEngine,
  FileMemoryStore,
  FileSessionLock,
  LanguageModelClient,
  resolveBridgeConfig,
  resolveDefaultLockDir,
  resolveDefaultMemoryPath,
  resolveModelConfiguration,
  resolveWorkingTree,
  SessionManager,
  SessionStartError,
  type BridgeConfig,
  type Logger,
  type MemoryStore,
  type ModelConfiguration,
  type SessionLock,
  type SessionLockStatus,
  type TextCompleter,
} from '@ptybridge/core';

import { runChatLoop } from './chatLoop.js';
import { createReadlineChatIo, type ChatIo } from './io.js';
import { ExecutionOrchestrator, type CommandSession } from './orchestrator.js';
import { ActivityLine, type ProgressIndicator } from './activityLine.js';

type CliIo = {
  stdout?: (message: string) => void;
  stderr?: (message: string) => void;
};

type ResolvedCliIo = {
  stdout: (message: string) => void;
  stderr: (message: string) => void;
};

function resolveIo(io?: CliIo): ResolvedCliIo {
  const target = io ?? {};
  const stdout = typeof target.stdout === 'function' ? target.stdout : console.log;
  const stderr = typeof target.stderr === 'function' ? target.stderr : console.error;
  return { stdout, stderr };
}

export interface CliDependencies {
  env: NodeJS.ProcessEnv;
  createSessionLock: (env: NodeJS.ProcessEnv, logger: Logger) => SessionLock;
  createSession: (config: BridgeConfig, lock: SessionLock, logger: Logger) => CommandSession;
  createModel: (configuration: ModelConfiguration, logger: Logger) => TextCompleter;
  createMemory: (config: BridgeConfig, env: NodeJS.ProcessEnv, logger: Logger) => MemoryStore;
  createChatIo: (onInterrupt: () => void) => ChatIo;
  createIndicator: () => ProgressIndicator;
  /** Connects process-level interrupts; returns a detach function. */
  attachInterrupt: (interrupt: () => void) => () => void;
  hardExit: (code: number) => void;
}

const defaultDependencies: CliDependencies = {
  env: process.env,
  createSessionLock: (env, logger) =>
    new FileSessionLock({
      workingTree: resolveWorkingTree(process.cwd()),
      lockDir: resolveDefaultLockDir(env),
      logger,
    }),
  createSession: (config, lock, logger) =>
    new SessionManager({
      shell: config.shell,
      shellArgs: config.shellArgs,
      defaultTimeoutSec: config.commandTimeoutSec,
      pollIntervalMs: config.pollIntervalMs,
      logger,
      lock,
    }),
  createModel: (configuration, logger) => new LanguageModelClient({ configuration, logger }),
  createMemory: (config, env, logger) =>
    new FileMemoryStore({ filePath: config.memoryPath ?? resolveDefaultMemoryPath(env), logger }),
  createChatIo: (onInterrupt) => createReadlineChatIo({ onInterrupt }),
  createIndicator: () => new ActivityLine(),
  attachInterrupt: (interrupt) => {
    process.on('SIGINT', interrupt);
    return () => {
      process.off('SIGINT', interrupt);
    };
  },
  hardExit: (code) => process.exit(code),
};

export const USAGE = [
  'Usage: ptybridge [options]',
  '',
  'Options:',
  '  --auto, --auto-execute   let the model run commands it decides on',
  '  --no-auto                keep automatic execution off',
  '  --no-explain             do not ask the model to explain command results',
  '  --debug                  print debug logging',
  '  --status                 report whether a session holds this working tree and exit',
  '  -v, --version            print the version and exit',
  '  -h, --help               print this help and exit',
  '',
  'Environment:',
  '  OLLAMA_URL, OLLAMA_MODEL, AGENT_TIMEOUT_MS, AGENT_MAX_RETRIES,',
  '  BRIDGE_SHELL, BRIDGE_COMMAND_TIMEOUT_SEC, BRIDGE_POLL_INTERVAL_MS,',
  '  BRIDGE_SCRIPT_INTERPRETER, BRIDGE_AUTO_EXECUTE, BRIDGE_EXPLAIN_RESULTS,',
  '  BRIDGE_MEMORY_PATH',
].join('\n');

export function readPackageVersion(): string {
  const raw = readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8');
  const parsed: unknown = JSON.parse(raw);
  if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

export function describeLockStatus(status: SessionLockStatus): string {
  switch (status.state) {
    case 'idle':
      return `Idle: no session holds ${status.workingTree}.`;
    case 'busy':
      return `Busy: pid ${status.holder.pid} has held ${status.workingTree} since ${status.holder.startedAt}.`;
    case 'stale':
      return status.holder
        ? `Idle: pid ${status.holder.pid} left a stale lock on ${status.workingTree}; the next session replaces it.`
        : `Idle: an unreadable lock sits on ${status.workingTree}; the next session replaces it.`;
  }
}

function describeToggle(value: boolean): string {
  return value ? 'on' : 'off';
}

export async function runCli(
  argv: string[] = process.argv,
  io?: CliIo,
  overrides: Partial<CliDependencies> = {},
): Promise<void> {
  const { stdout, stderr } = resolveIo(io);
  const deps: CliDependencies = { ...defaultDependencies, ...overrides };
  const args = argv.slice(2);

  if (args.includes('-h') || args.includes('--help')) {
    stdout(USAGE);
    return;
  }
  if (args.includes('-v') || args.includes('--version')) {
    stdout(`ptybridge ${readPackageVersion()}`);
    return;
  }

  const logger = createLogger('ptybridge');
  if (args.includes('--status')) {
    const status = await deps.createSessionLock(deps.env, logger.child('lock')).inspect();
    stdout(describeLockStatus(status));
    return;
  }

  let config: BridgeConfig;
  let modelConfiguration: ModelConfiguration;
  try {
    config = resolveBridgeConfig(deps.env);
    modelConfiguration = resolveModelConfiguration(deps.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      stderr(chalk.red(`Configuration error: ${error.message}`));
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const flags = applyStartupFlagsFromArgv(argv, {
    autoExecute: config.autoExecute,
    explainResults: config.explainResults,
  });

  const lock = deps.createSessionLock(deps.env, logger.child('lock'));
  const session = deps.createSession(config, lock, logger.child('session'));
  const model = deps.createModel(modelConfiguration, logger.child('model'));
  const orchestrator = new ExecutionOrchestrator({
    session,
    decisionEngine: new DecisionEngine({ model, logger: logger.child('decision') }),
    model,
    memory: deps.createMemory(config, deps.env, logger.child('memory')),
    settings: {
      autoExecute: flags.autoExecute,
      explainResults: flags.explainResults,
      scriptInterpreter: config.scriptInterpreter,
      commandTimeoutSec: config.commandTimeoutSec,
    },
    logger: logger.child('orchestrator'),
  });

  const interrupt = createInterruptController({
    attach: deps.attachInterrupt,
    hardExit: deps.hardExit,
    logger: logger.child('interrupt'),
  });
  const chatIo = deps.createChatIo(() => {
    interrupt.interrupt('interrupt key');
  });

  chatIo.write(
    chalk.dim(
      `Model ${modelConfiguration.model} at ${modelConfiguration.baseURL}. ` +
        `Automatic execution ${describeToggle(flags.autoExecute)}. Type /help for directives.`,
    ),
  );

  try {
    const summary = await runChatLoop({
      orchestrator,
      io: chatIo,
      interrupt,
      indicator: deps.createIndicator(),
    });
    if (summary.reason === 'interrupted') {
      chatIo.write(chalk.yellow('Interrupted. Press Ctrl+C again to force quit while shutting down.'));
    }
  } catch (error) {
    if (error instanceof SessionStartError) {
      stderr(chalk.red(error.message));
      process.exitCode = 1;
      return;
    }
    throw error;
  } finally {
    chatIo.close();
    await session.stop();
    interrupt.detach();
  }
}

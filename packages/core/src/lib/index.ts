/**
 * Aggregated library entry for the ptybridge core.
 *
 * Responsibilities:
 * - Load `.env` before any configuration is resolved.
 * - Provide a CLI-agnostic export surface: the session manager and its codec,
 *   the safety gate, path normalization, the decision engine, the model
 *   client, memory, interrupts, configuration and logging.
 */

import 'dotenv/config';

export * from '../constants.js';
export * from '../errors.js';

export { createMarker, decodeFrame, encodeCommand, SentinelDecoder } from '../protocol/sentinel.js';
export type { SentinelFrame } from '../protocol/sentinel.js';

export { SessionManager } from '../session/sessionManager.js';
export { nodePtyFactory, toPtyEnv } from '../session/ptyProcess.js';
export { buildScriptCommand } from '../session/scriptCommand.js';
export {
  defaultIsProcessAlive,
  FileSessionLock,
  resolveDefaultLockDir,
  resolveWorkingTree,
} from '../session/sessionLock.js';
export type { FileSessionLockOptions, SessionLock, SessionLockStatus } from '../session/sessionLock.js';
export type {
  CommandRequest,
  CommandResult,
  Disposable,
  PtyExitEvent,
  PtyFactory,
  PtyProcess,
  PtySpawnOptions,
  SessionManagerOptions,
} from '../session/types.js';

export { DENY_RULES } from '../safety/denyList.js';
export type { DenyRule } from '../safety/denyList.js';
export { describeRejection, evaluateCommandSafety, isCommandAllowed } from '../safety/safetyGate.js';
export type { SafetyVerdict } from '../safety/safetyGate.js';

export {
  defaultIsDirectory,
  isPlaceholderPath,
  normalizeDirectory,
  PLACEHOLDER_PATHS,
} from '../paths/pathNormalizer.js';
export type { NormalizeDirectoryOptions } from '../paths/pathNormalizer.js';

export { DecisionEngine } from '../decision/decisionEngine.js';
export type { DecideOptions, DecisionEngineOptions } from '../decision/decisionEngine.js';
export { parseDecision } from '../decision/decisionParser.js';
export type { DecisionParseResult } from '../decision/decisionParser.js';
export { DECISION_RULES, matchDecisionRule } from '../decision/rules.js';
export type { DecisionRule, RuleMatch } from '../decision/rules.js';
export { isRunDecision, reply, runScript, runShell } from '../decision/types.js';
export type {
  Decision,
  DecisionKind,
  DecisionOutcome,
  DecisionSource,
  ReplyDecision,
  ScriptDecision,
  ShellDecision,
} from '../decision/types.js';

export { createModelProvider, resolveModelConfiguration } from '../model/client.js';
export type { ModelConfiguration } from '../model/client.js';
export { LanguageModelClient } from '../model/textCompletion.js';
export type {
  CompletionRequest,
  LanguageModelClientOptions,
  TextCompleter,
  TextGenerator,
} from '../model/textCompletion.js';

export { FileMemoryStore, InMemoryMemoryStore, resolveDefaultMemoryPath } from '../memory/memoryStore.js';
export type { MemoryEntry, MemoryRole, MemoryStore } from '../memory/memoryStore.js';

export { createInterruptController, HARD_EXIT_CODE } from '../interrupt/interruptController.js';
export type {
  InterruptController,
  InterruptOutcome,
  InterruptPhase,
} from '../interrupt/interruptController.js';

export { parseBooleanSetting, resolveBridgeConfig } from '../config/bridgeConfig.js';
export type { BridgeConfig } from '../config/bridgeConfig.js';
export {
  buildClassifierPrompt,
  buildConversationSystemPrompt,
  buildExplainPrompt,
  CLASSIFIER_SYSTEM_PROMPT,
  CONVERSATION_SYSTEM_PROMPT,
} from '../config/prompts.js';

export {
  applyStartupFlagsFromArgv,
  getAutoExecuteFlag,
  getDebugFlag,
  getExplainResultsFlag,
  getStartupFlags,
  parseStartupFlagsFromArgv,
  resetStartupFlags,
  setStartupFlags,
} from './startupFlags.js';
export type { StartupFlagOverrides, StartupFlags } from './startupFlags.js';

export { AsyncMutex } from '../utils/asyncMutex.js';
export { createLogger, silentLogger } from '../utils/logger.js';
export type { Logger, LogSink } from '../utils/logger.js';
export { shellQuote, stripTerminalControl, TerminalTextCleaner, truncateOutput } from '../utils/text.js';

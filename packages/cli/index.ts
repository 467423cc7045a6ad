/**
 * Public entry point for the ptybridge CLI package.
 *
 * Re-exports the core library and surfaces the CLI pieces (orchestrator,
 * chat loop, rendering, readline wrapper) for embedding.
 */

export * from '@ptybridge/core';

export { runChatLoop } from './src/chatLoop.js';
export type { ChatLoopExitReason, ChatLoopOptions, ChatLoopSummary, TurnHandler } from './src/chatLoop.js';
export { createReadlineChatIo } from './src/io.js';
export type { ChatIo, ReadlineChatIoOptions } from './src/io.js';
export { ExecutionOrchestrator, HELP_TEXT } from './src/orchestrator.js';
export type {
  CommandSession,
  DecisionMaker,
  ExecutionOrchestratorOptions,
  HandleInputOptions,
  InputMode,
  OrchestratorSettings,
  RunKind,
  RunOrigin,
  TurnActivity,
  TurnOutcome,
} from './src/orchestrator.js';
export { formatPrompt, formatStatus, previewCommand, renderOutcome } from './src/render.js';
export { describeLockStatus, readPackageVersion, runCli, USAGE } from './src/runner.js';
export type { CliDependencies } from './src/runner.js';
export { createSlashCommandRouter, isDirectiveInput, parseSlashCommandInput } from './src/slashCommands.js';
export type { ParsedSlashCommand, SlashCommandHandler, SlashCommandRoute, SlashCommandRouter } from './src/slashCommands.js';
export { ActivityLine, describeActivity, formatElapsedSeconds, noopIndicator } from './src/activityLine.js';
export type { ActivityLineOptions, ProgressIndicator, StatusStream } from './src/activityLine.js';

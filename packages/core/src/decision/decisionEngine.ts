/**
 * Classifies one utterance as a reply, a shell command or a script.
 *
 * Rules run first and never touch the model. The model stage only runs when
 * automatic execution is enabled; every failure there (request error, prose,
 * invalid JSON, empty command) degrades to an empty reply so the caller falls
 * back to a plain conversational answer.
 */

import { buildClassifierPrompt, CLASSIFIER_SYSTEM_PROMPT } from '../config/prompts.js';
import type { TextCompleter } from '../model/textCompletion.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { parseDecision } from './decisionParser.js';
import { DECISION_RULES, matchDecisionRule, type DecisionRule } from './rules.js';
import { reply, type DecisionOutcome } from './types.js';

export interface DecideOptions {
  autoExecute: boolean;
  cwd?: string | null;
  signal?: AbortSignal;
}

export interface DecisionEngineOptions {
  model?: TextCompleter | null;
  rules?: readonly DecisionRule[];
  logger?: Logger;
}

export class DecisionEngine {
  private readonly model: TextCompleter | null;

  private readonly rules: readonly DecisionRule[];

  private readonly logger: Logger;

  constructor({ model = null, rules = DECISION_RULES, logger }: DecisionEngineOptions = {}) {
    this.model = model;
    this.rules = rules;
    this.logger = logger ?? createLogger('decision');
  }

  async decide(utterance: string, { autoExecute, cwd = null, signal }: DecideOptions): Promise<DecisionOutcome> {
    const text = utterance.trim();
    if (!text) {
      return { decision: reply(''), source: 'fallback', detail: 'empty input' };
    }

    const ruleMatch = matchDecisionRule(text, this.rules);
    if (ruleMatch) {
      this.logger.debug(`Rule "${ruleMatch.rule.id}" matched.`);
      return { decision: ruleMatch.decision, source: 'rule', detail: ruleMatch.rule.id };
    }

    if (!autoExecute || !this.model) {
      return { decision: reply(''), source: 'fallback', detail: 'automatic execution disabled' };
    }

    let raw: string;
    try {
      raw = await this.model.complete({
        system: CLASSIFIER_SYSTEM_PROMPT,
        prompt: buildClassifierPrompt(text, { cwd }),
        signal,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Classifier request failed: ${message}`);
      return { decision: reply(''), source: 'fallback', detail: `model error: ${message}` };
    }

    const parsed = parseDecision(raw);
    if (!parsed.ok) {
      this.logger.debug(parsed.reason);
      return { decision: reply(''), source: 'fallback', detail: parsed.reason };
    }

    this.logger.debug(`Classifier chose ${parsed.decision.kind} (${parsed.strategy}).`);
    return { decision: parsed.decision, source: 'model' };
  }
}

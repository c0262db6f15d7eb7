/**
 * Prompt Builder
 *
 * Assembles the message list for each model-backed stage from the stage
 * templates, the domain knowledge and a trimmed copy of the conversation.
 * Every list goes through ContextWindowManager.prepareForRequest, so a
 * single system turn leads it and the whole list fits the budget.
 */

import type { ContextWindowManager } from '@/services/context-window.service.js';
import type {
  ConversationHistory,
  ConversationTurn,
  DomainKnowledge,
  LLMMessage,
  SandboxRun,
  StageSettings,
} from '@/types/index.js';

import {
  CLASSIFY_TEMPLATE,
  CODEGEN_TEMPLATES,
  GREETING_TEMPLATE,
  PLAN_TEMPLATE,
  REPHRASE_TEMPLATE,
  REPORT_INPUT_TEMPLATE,
  REPORT_TEMPLATE,
  renderTemplate,
  type CodeLanguage,
} from './prompt-templates.js';

export const NO_HISTORY_TEXT = '(no previous conversation)';

/** Head and tail of long execution output that reach the report stage */
const REPORT_OUTPUT_HEAD_CHARS = 8000;
const REPORT_OUTPUT_TAIL_CHARS = 16000;

const ROLE_LABELS: Record<ConversationTurn['role'], string> = {
  user: 'User',
  assistant: 'Assistant',
  system: 'System',
};

export interface PromptBuilder {
  classify(message: string, domain: DomainKnowledge): LLMMessage[];
  greeting(message: string, domain: DomainKnowledge): LLMMessage[];
  rephrase(
    question: string,
    domain: DomainKnowledge,
    history: ConversationHistory,
    settings: StageSettings
  ): LLMMessage[];
  plan(
    question: string,
    domain: DomainKnowledge,
    history: ConversationHistory,
    settings: StageSettings
  ): LLMMessage[];
  codegen(
    plan: string,
    domain: DomainKnowledge,
    currentDate: string,
    language: CodeLanguage
  ): LLMMessage[];
  report(question: string, domain: DomainKnowledge, run: SandboxRun): LLMMessage[];
}

/**
 * Last `historyTurns` turns, each clipped, fitted to the stage's history
 * budget and rendered one line per turn
 */
export function formatHistory(
  history: ConversationHistory,
  settings: StageSettings,
  contextWindow: ContextWindowManager
): string {
  if (settings.historyTurns <= 0 || history.length === 0) {
    return NO_HISTORY_TEXT;
  }

  const recent = history.slice(-settings.historyTurns).map((turn) => ({
    ...turn,
    content: turn.content.slice(0, settings.historyCharLimit),
  }));
  const fitted = contextWindow.fitToBudget(recent, settings.historyTokenBudget);

  if (fitted.length === 0) {
    return NO_HISTORY_TEXT;
  }
  return fitted
    .map((turn) => `${ROLE_LABELS[turn.role]}: ${turn.content}`)
    .join('\n');
}

export function clipOutput(output: string): string {
  const limit = REPORT_OUTPUT_HEAD_CHARS + REPORT_OUTPUT_TAIL_CHARS;
  if (output.length <= limit) {
    return output;
  }
  const omitted = output.length - limit;
  return `${output.slice(0, REPORT_OUTPUT_HEAD_CHARS)}\n[... ${omitted} characters omitted ...]\n${output.slice(-REPORT_OUTPUT_TAIL_CHARS)}`;
}

export function describeRun(run: SandboxRun): string {
  if (run.success) {
    const charts = run.artifacts.map((artifact) => artifact.name);
    return charts.length > 0
      ? `completed successfully; charts produced: ${charts.join(', ')}`
      : 'completed successfully; no charts produced';
  }
  return `failed (${run.status}): ${run.error ?? 'unknown error'}`;
}

/**
 * Create a prompt builder instance
 */
export function createPromptBuilder(
  contextWindow: ContextWindowManager
): PromptBuilder {
  function messages(systemPrompt: string, userContent?: string): LLMMessage[] {
    const turns: ConversationTurn[] =
      userContent === undefined ? [] : [{ role: 'user', content: userContent }];
    return contextWindow
      .prepareForRequest(turns, systemPrompt)
      .map((turn) => ({ role: turn.role, content: turn.content }));
  }

  return {
    classify(message, domain) {
      return messages(
        renderTemplate(CLASSIFY_TEMPLATE, { domain: domain.name }),
        message
      );
    },

    greeting(message, domain) {
      return messages(
        renderTemplate(GREETING_TEMPLATE, {
          domainName: domain.displayName,
          domain: domain.name,
        }),
        message
      );
    },

    rephrase(question, domain, history, settings) {
      return messages(
        renderTemplate(REPHRASE_TEMPLATE, {
          domain: domain.name,
          schema: domain.schemaDescription,
          history: formatHistory(history, settings, contextWindow),
        }),
        `Rephrase this question: ${question}`
      );
    },

    plan(question, domain, history, settings) {
      return messages(
        renderTemplate(PLAN_TEMPLATE, {
          domain: domain.name,
          schema: domain.schemaDescription,
          history: formatHistory(history, settings, contextWindow),
          tables: domain.tableNames.join(', '),
        }),
        `Question: ${question}`
      );
    },

    codegen(plan, domain, currentDate, language) {
      return messages(
        renderTemplate(CODEGEN_TEMPLATES[language], {
          tables: domain.tableNames.join(', '),
          currentDate,
          plan,
        })
      );
    },

    report(question, domain, run) {
      const output = run.output.trim();
      return messages(
        renderTemplate(REPORT_TEMPLATE, { domain: domain.name }),
        renderTemplate(REPORT_INPUT_TEMPLATE, {
          question,
          status: describeRun(run),
          output: output ? clipOutput(output) : '(the analysis printed nothing)',
        })
      );
    },
  };
}

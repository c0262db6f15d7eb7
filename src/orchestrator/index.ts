/**
 * Orchestrator Exports
 *
 * The orchestrator turns one user message into one answer:
 * - Stage prompt templates and message assembly
 * - LLM client (any OpenAI-compatible endpoint)
 * - Code extraction from model output
 * - The staged pipeline itself
 */

export { createLLMClient } from './llm-client.js';
export type { LLMClientConfig } from './llm-client.js';
export {
  createPromptBuilder,
  formatHistory,
  clipOutput,
  describeRun,
  NO_HISTORY_TEXT,
} from './prompt-builder.js';
export type { PromptBuilder } from './prompt-builder.js';
export {
  renderTemplate,
  CLASSIFY_TEMPLATE,
  GREETING_TEMPLATE,
  REPHRASE_TEMPLATE,
  PLAN_TEMPLATE,
  CODEGEN_TEMPLATES,
  REPORT_TEMPLATE,
  REPORT_INPUT_TEMPLATE,
} from './prompt-templates.js';
export type { PromptTemplate, CodeLanguage } from './prompt-templates.js';
export { extractCode, composeProgram } from './code-extractor.js';
export {
  createOrchestrator,
  parseClassification,
  greetingFallback,
  degradedReport,
} from './orchestrator.js';
export type { Orchestrator, OrchestratorDeps } from './orchestrator.js';

/**
 * Workflow Orchestrator
 *
 * Runs one user message through the fixed pipeline:
 *
 *   classify -> (greeting) | rephrase -> plan -> codegen -> execute -> report
 *
 * Stages run strictly in order. Classify, rephrase and plan failures end the
 * request before any code runs. Codegen failures end it with a best-effort
 * explanation. Sandbox failures are handed to the report stage as evidence.
 * Nothing is retried here, and nothing is thrown to the caller: every path
 * ends in a PipelineResult with a readable finalAnswer.
 */

import { nanoid } from 'nanoid';

import { createLogger, type Logger } from '@/lib/logger.js';
import type { ContextWindowManager } from '@/services/context-window.service.js';
import type {
  DomainKnowledge,
  DomainKnowledgeProvider,
  ErrorCode,
  ExecutionSandbox,
  LLMClient,
  LLMMessage,
  MessageType,
  ModelStage,
  OrchestratorConfig,
  PipelineEvent,
  PipelineRequest,
  PipelineResult,
  PipelineState,
  Result,
  SandboxRun,
  SandboxRunStatus,
  StageName,
  StageResult,
  WarningCode,
} from '@/types/index.js';
import { PipelineError, failure, success } from '@/types/index.js';

import { composeProgram, extractCode } from './code-extractor.js';
import { createPromptBuilder } from './prompt-builder.js';
import type { CodeLanguage } from './prompt-templates.js';

const baseLog = createLogger('orchestrator');

/**
 * Orchestrator interface
 */
export interface Orchestrator {
  /**
   * Run the pipeline and return its final result
   */
  process(request: PipelineRequest): Promise<PipelineResult>;

  /**
   * Run the pipeline, yielding stage events and finally a `result` event
   */
  stream(request: PipelineRequest): AsyncIterable<PipelineEvent>;
}

/**
 * Dependencies for orchestrator
 */
export interface OrchestratorDeps {
  llmClient: LLMClient;
  sandbox: ExecutionSandbox;
  domains: DomainKnowledgeProvider;
  contextWindow: ContextWindowManager;
  config: OrchestratorConfig;

  /** Language the codegen stage writes; must match the sandbox runtime */
  codeLanguage?: CodeLanguage;

  /** Clock for the date given to codegen */
  now?: () => Date;
}

const SANDBOX_ERROR_CODES: Record<
  Exclude<SandboxRunStatus, 'success'>,
  ErrorCode
> = {
  'nonzero-exit': 'SANDBOX_NONZERO_EXIT',
  timeout: 'SANDBOX_TIMEOUT',
  'launch-failure': 'SANDBOX_LAUNCH_FAILURE',
};

const STAGE_DESCRIPTIONS: Record<StageName, string> = {
  classify: 'understanding your message',
  greeting: 'replying to your greeting',
  rephrase: 'interpreting your question',
  plan: 'planning the analysis',
  codegen: 'writing the analysis code',
  execute: 'running the analysis',
  report: 'writing up the findings',
};

const STAGE_STATES: Record<StageName, PipelineState> = {
  classify: 'classifying',
  greeting: 'greeting-reply',
  rephrase: 'rephrasing',
  plan: 'planning',
  codegen: 'code-generating',
  execute: 'executing',
  report: 'reporting',
};

/**
 * Map a raw label to a message type. Anything that is not exactly one of
 * the two labels is reported as ambiguous.
 */
export function parseClassification(raw: string): {
  messageType: MessageType;
  ambiguous: boolean;
} {
  const label = raw.trim().toLowerCase().replace(/[^a-z]/g, '');
  if (label === 'greeting' || label === 'analysis') {
    return { messageType: label, ambiguous: false };
  }
  return { messageType: 'analysis', ambiguous: true };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function unavailableRun(error: unknown): SandboxRun {
  return {
    id: 'unavailable',
    status: 'launch-failure',
    success: false,
    exitCode: null,
    output: '',
    stdout: '',
    stderr: '',
    artifacts: [],
    error: `Sandbox failed: ${errorMessage(error)}`,
    durationMs: 0,
  };
}

export function greetingFallback(domain: DomainKnowledge): string {
  return `Hello! I'm here to help you analyze your ${domain.name} data. What would you like to explore?`;
}

export function degradedReport(run: SandboxRun): string {
  if (!run.success) {
    return `I couldn't complete the analysis: ${run.error ?? 'the analysis failed'}.\n\nRaw output:\n${run.output}`;
  }
  return `I ran the analysis but couldn't write up a summary. Here is the raw output:\n\n${run.output}`;
}

/**
 * Create an orchestrator instance
 */
export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const {
    llmClient,
    sandbox,
    domains,
    contextWindow,
    config,
    codeLanguage = 'python',
    now = () => new Date(),
  } = deps;

  const prompts = createPromptBuilder(contextWindow);

  async function complete(
    stage: ModelStage,
    messages: LLMMessage[]
  ): Promise<string> {
    const settings = config.stages[stage];
    try {
      const response = await llmClient.complete({
        model: config.model,
        messages,
        max_tokens: settings.maxTokens,
        temperature: settings.temperature,
      });
      return response.content.trim();
    } catch (error) {
      throw new PipelineError(
        'STAGE_COMPLETION_FAILURE',
        `${stage} completion failed: ${errorMessage(error)}`
      );
    }
  }

  function requireText(stage: ModelStage, text: string): string {
    if (!text) {
      throw new PipelineError(
        'STAGE_COMPLETION_FAILURE',
        `${stage} completion returned no text`
      );
    }
    return text;
  }

  async function* stream(
    request: PipelineRequest
  ): AsyncGenerator<PipelineEvent, void, undefined> {
    const requestId = `pipe-${nanoid(10)}`;
    const log: Logger = baseLog.child({
      requestId,
      sessionId: request.sessionId,
      domain: request.domain,
    });

    const stages: StageResult[] = [];
    const warnings: WarningCode[] = [];
    let state: PipelineState = 'classifying';

    function transition(next: PipelineState): void {
      log.debug('Pipeline state change', { from: state, to: next });
      state = next;
    }

    function resultEvent(result: PipelineResult): PipelineEvent {
      log.info('Pipeline finished', {
        state,
        success: result.success,
        messageType: result.messageType,
        error: result.error?.code,
        stages: stages.map((s) => `${s.stage}:${s.durationMs}ms`),
      });
      return { type: 'result', result, timestamp: Date.now() };
    }

    /**
     * Time one stage, record its StageResult and emit its events
     */
    async function* runStage<T>(
      stage: StageName,
      work: () => Promise<{ output: string; value: T }>
    ): AsyncGenerator<PipelineEvent, Result<T>, undefined> {
      transition(STAGE_STATES[stage]);
      yield { type: 'stage.start', stage, timestamp: Date.now() };

      const startedAt = Date.now();
      try {
        const { output, value } = await work();
        const result: StageResult = {
          stage,
          output,
          durationMs: Date.now() - startedAt,
        };
        stages.push(result);
        yield { type: 'stage.complete', result, timestamp: Date.now() };
        return success(value);
      } catch (error) {
        const code: ErrorCode =
          error instanceof PipelineError ? error.code : 'INTERNAL_ERROR';
        const message = errorMessage(error);
        log.warn('Stage failed', { stage, code, message });
        yield {
          type: 'stage.error',
          stage,
          code,
          message,
          timestamp: Date.now(),
        };
        return failure(code, message);
      }
    }

    async function* textStage(
      stage: ModelStage,
      messages: () => LLMMessage[],
      validate: (text: string) => string = (text) => requireText(stage, text)
    ): AsyncGenerator<PipelineEvent, Result<string>, undefined> {
      return yield* runStage(stage, async () => {
        const text = validate(await complete(stage, messages()));
        return { output: text, value: text };
      });
    }

    function errored(
      stage: StageName | undefined,
      code: ErrorCode,
      message: string,
      extra: Partial<PipelineResult> = {}
    ): PipelineResult {
      transition('errored');
      const step = stage ? ` while ${STAGE_DESCRIPTIONS[stage]}` : '';
      return {
        success: false,
        messageType: 'analysis',
        finalAnswer: `Sorry, something went wrong${step}: ${message}`,
        sessionId: request.sessionId,
        domain: request.domain,
        warnings,
        stages,
        ...extra,
        error: { code, ...(stage ? { stage } : {}), message },
      };
    }

    try {
      const domainResult = await domains.getDomain(request.domain);
      if (!domainResult.success) {
        yield resultEvent(
          errored(
            undefined,
            domainResult.error.code,
            domainResult.error.message
          )
        );
        return;
      }
      const domain = domainResult.data;

      // Classify
      const classified = yield* runStage('classify', async () => {
        const raw = await complete(
          'classify',
          prompts.classify(request.message, domain)
        );
        const parsed = parseClassification(raw);
        if (parsed.ambiguous) {
          warnings.push('CLASSIFICATION_AMBIGUOUS');
          log.warn('Ambiguous classification, treating as analysis', { raw });
        }
        return { output: parsed.messageType, value: parsed.messageType };
      });
      if (!classified.success) {
        yield resultEvent(
          errored('classify', classified.error.code, classified.error.message)
        );
        return;
      }

      // Greeting short-circuit
      if (classified.data === 'greeting') {
        const reply = yield* textStage('greeting', () =>
          prompts.greeting(request.message, domain)
        );
        yield resultEvent({
          success: true,
          messageType: 'greeting',
          finalAnswer: reply.success ? reply.data : greetingFallback(domain),
          sessionId: request.sessionId,
          domain: request.domain,
          executionArtifacts: [],
          warnings,
          stages,
        });
        return;
      }

      // Rephrase
      const rephrased = yield* textStage('rephrase', () =>
        prompts.rephrase(
          request.message,
          domain,
          request.history,
          config.stages.rephrase
        )
      );
      if (!rephrased.success) {
        yield resultEvent(
          errored('rephrase', rephrased.error.code, rephrased.error.message)
        );
        return;
      }
      const question = rephrased.data;

      // Plan
      const planned = yield* textStage('plan', () =>
        prompts.plan(question, domain, request.history, config.stages.plan)
      );
      if (!planned.success) {
        yield resultEvent(
          errored('plan', planned.error.code, planned.error.message, {
            rephrasedQuestion: question,
          })
        );
        return;
      }
      const plan = planned.data;

      // Codegen
      const generated = yield* runStage('codegen', async () => {
        const response = await complete(
          'codegen',
          prompts.codegen(
            plan,
            domain,
            now().toISOString().slice(0, 10),
            codeLanguage
          )
        );
        const code = extractCode(response);
        if (!code) {
          throw new PipelineError(
            'CODE_GENERATION_EMPTY',
            'The model returned no usable code'
          );
        }
        const program = composeProgram(domain.loaderSnippet, code);
        return { output: program, value: program };
      });
      if (!generated.success) {
        transition('errored');
        yield resultEvent({
          success: false,
          messageType: 'analysis',
          finalAnswer: `I planned an analysis for "${question}" but couldn't produce runnable code for it (${generated.error.message}). Try asking again, perhaps with a narrower question.`,
          sessionId: request.sessionId,
          domain: request.domain,
          rephrasedQuestion: question,
          analysisPlan: plan,
          error: {
            code: generated.error.code,
            stage: 'codegen',
            message: generated.error.message,
          },
          warnings,
          stages,
        });
        return;
      }
      const program = generated.data;

      // Execute
      const executed = yield* runStage('execute', async () => {
        let run: SandboxRun;
        try {
          run = await sandbox.execute(program);
        } catch (error) {
          run = unavailableRun(error);
        }
        return { output: run.output, value: run };
      });
      const run = executed.success
        ? executed.data
        : unavailableRun(executed.error.message);
      if (!run.success) {
        log.warn('Sandbox run failed; reporting it', {
          status: run.status,
          error: run.error,
        });
      }

      // Report
      const reported = yield* textStage('report', () =>
        prompts.report(question, domain, run)
      );
      let finalAnswer: string;
      if (reported.success) {
        finalAnswer = reported.data;
      } else {
        warnings.push('REPORTING_DEGRADED');
        finalAnswer = degradedReport(run);
      }

      const result: PipelineResult = {
        success: run.success,
        messageType: 'analysis',
        finalAnswer,
        sessionId: request.sessionId,
        domain: request.domain,
        rephrasedQuestion: question,
        analysisPlan: plan,
        generatedCode: program,
        execution: run,
        executionArtifacts: run.artifacts,
        warnings,
        stages,
      };
      if (run.status !== 'success') {
        result.error = {
          code: SANDBOX_ERROR_CODES[run.status],
          stage: 'execute',
          message: run.error ?? 'The analysis failed',
        };
      }
      yield resultEvent(result);
    } catch (error) {
      log.error('Unexpected pipeline error', { error: errorMessage(error) });
      yield resultEvent(
        errored(undefined, 'INTERNAL_ERROR', errorMessage(error))
      );
    }
  }

  return {
    stream,

    async process(request: PipelineRequest): Promise<PipelineResult> {
      let final: PipelineResult | undefined;
      for await (const event of stream(request)) {
        if (event.type === 'result') {
          final = event.result;
        }
      }
      if (!final) {
        return {
          success: false,
          messageType: 'analysis',
          finalAnswer: 'Sorry, the analysis ended without a result.',
          sessionId: request.sessionId,
          domain: request.domain,
          error: { code: 'INTERNAL_ERROR', message: 'No result produced' },
          warnings: [],
          stages: [],
        };
      }
      return final;
    },
  };
}

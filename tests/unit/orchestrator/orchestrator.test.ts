/**
 * Orchestrator Unit Tests
 *
 * The model is scripted; the sandbox is faked except in the end-to-end
 * case, which runs generated JavaScript on the current Node binary.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  createOrchestrator,
  degradedReport,
  greetingFallback,
  parseClassification,
} from '@/orchestrator/orchestrator.js';
import { createNodeRuntime } from '@/sandbox/runtimes.js';
import { createSandbox } from '@/sandbox/sandbox.js';
import { createContextWindowManager } from '@/services/context-window.service.js';
import {
  createDomainKnowledge,
  javascriptLoaderSnippet,
} from '@/services/domain.service.js';
import type {
  ConversationTurn,
  DomainKnowledge,
  ExecutionSandbox,
  PipelineEvent,
  PipelineRequest,
  SandboxRun,
} from '@/types/index.js';
import { DEFAULT_ORCHESTRATOR_CONFIG } from '@/types/index.js';

import { makeTempDir, removeTempDir, wordTokenizer } from '../../helpers/test-utils.js';
import {
  BANKING_SCHEMA,
  createBankingDomain,
  createFakeSandbox,
  createSandboxRun,
  createScriptedLLMClient,
  createStaticDomainProvider,
} from '../../mocks/index.js';

const contextWindow = createContextWindowManager({
  budget: 100000,
  tokenizer: wordTokenizer,
});
const domain = createBankingDomain();

const ANALYSIS_REPLIES = [
  'analysis',
  'How many customers are there?',
  'Step 1: count the rows of customers',
  '```python\nprint(f"Total customers: {len(customers)}")\n```',
  'There are 500 customers.',
];

function request(
  message: string,
  history: ConversationTurn[] = []
): PipelineRequest {
  return { message, sessionId: 'session-1', domain: 'banking', history };
}

function setup(
  replies: Array<string | Error>,
  run: SandboxRun = createSandboxRun({
    output: 'Total customers: 500\n',
    stdout: 'Total customers: 500\n',
  }),
  knowledge: DomainKnowledge = domain
) {
  const llmClient = createScriptedLLMClient(replies);
  const { sandbox, execute } = createFakeSandbox(run);
  const orchestrator = createOrchestrator({
    llmClient,
    sandbox,
    domains: createStaticDomainProvider([knowledge]),
    contextWindow,
    config: DEFAULT_ORCHESTRATOR_CONFIG,
    now: () => new Date('2024-05-01T12:00:00Z'),
  });
  return { orchestrator, llmClient, execute, run };
}

describe('parseClassification()', () => {
  it.each([
    ['greeting', 'greeting'],
    [' Analysis\n', 'analysis'],
    ['"greeting".', 'greeting'],
  ])('should read %j as %s', (raw, expected) => {
    expect(parseClassification(raw)).toEqual({
      messageType: expected,
      ambiguous: false,
    });
  });

  it('should treat anything else as an ambiguous analysis', () => {
    expect(parseClassification('It is a greeting')).toEqual({
      messageType: 'analysis',
      ambiguous: true,
    });
    expect(parseClassification('')).toEqual({
      messageType: 'analysis',
      ambiguous: true,
    });
  });
});

describe('Orchestrator', () => {
  describe('greetings', () => {
    it('should answer a greeting without running code', async () => {
      const { orchestrator, llmClient, execute } = setup([
        'greeting',
        'Hello! Ask me anything about your banking data.',
      ]);

      const result = await orchestrator.process(request('Hi'));

      expect(result.success).toBe(true);
      expect(result.messageType).toBe('greeting');
      expect(result.finalAnswer).toBe('Hello! Ask me anything about your banking data.');
      expect(result.executionArtifacts).toEqual([]);
      expect(result.stages.map((s) => s.stage)).toEqual(['classify', 'greeting']);
      expect(execute).not.toHaveBeenCalled();
      expect(
        llmClient.requests.map((r) => [r.max_tokens, r.temperature])
      ).toEqual([
        [10, 0],
        [100, 0.7],
      ]);
    });

    it('should fall back to a fixed greeting when the model fails', async () => {
      const { orchestrator } = setup(['greeting', new Error('unavailable')]);

      const result = await orchestrator.process(request('Hello'));

      expect(result.success).toBe(true);
      expect(result.finalAnswer).toBe(greetingFallback(domain));
      expect(result.finalAnswer).toBe(
        "Hello! I'm here to help you analyze your banking data. What would you like to explore?"
      );
    });
  });

  describe('analysis', () => {
    it('should run every stage in order', async () => {
      const { orchestrator, llmClient, execute, run } = setup(ANALYSIS_REPLIES);

      const result = await orchestrator.process(request('how many customers'));

      expect(result).toMatchObject({
        success: true,
        messageType: 'analysis',
        finalAnswer: 'There are 500 customers.',
        sessionId: 'session-1',
        domain: 'banking',
        rephrasedQuestion: 'How many customers are there?',
        analysisPlan: 'Step 1: count the rows of customers',
        generatedCode: `print('loaded')\n\nprint(f"Total customers: {len(customers)}")\n`,
        execution: run,
        executionArtifacts: [],
        warnings: [],
      });
      expect(result.error).toBeUndefined();
      expect(result.stages.map((s) => s.stage)).toEqual([
        'classify',
        'rephrase',
        'plan',
        'codegen',
        'execute',
        'report',
      ]);
      expect(execute).toHaveBeenCalledTimes(1);
      expect(execute).toHaveBeenCalledWith(result.generatedCode);
      expect(llmClient.requests.map((r) => r.max_tokens)).toEqual([
        10, 200, 1500, 4000, 1200,
      ]);
      expect(llmClient.requests.every((r) => r.model === 'gpt-4o')).toBe(true);
    });

    it('should give codegen the current date and the plan', async () => {
      const { orchestrator, llmClient } = setup(ANALYSIS_REPLIES);

      await orchestrator.process(request('how many customers'));

      const codegen = llmClient.requests[3]?.messages[0]?.content ?? '';
      expect(codegen).toContain('Current date: 2024-05-01');
      expect(codegen).toContain('Analysis plan:\nStep 1: count the rows of customers');
    });

    it('should hand the execution output to the report stage', async () => {
      const { orchestrator, llmClient } = setup(ANALYSIS_REPLIES);

      await orchestrator.process(request('how many customers'));

      const report = llmClient.requests[4]?.messages[1]?.content ?? '';
      expect(report).toBe(
        'Question: How many customers are there?\n\nExecution status: completed successfully; no charts produced\n\nAnalysis Results:\nTotal customers: 500'
      );
    });

    it('should treat an unclear classification as analysis with a warning', async () => {
      const { orchestrator, execute } = setup([
        'Not sure, maybe both',
        ...ANALYSIS_REPLIES.slice(1),
      ]);

      const result = await orchestrator.process(request('hello, churn by city?'));

      expect(result.messageType).toBe('analysis');
      expect(result.success).toBe(true);
      expect(result.warnings).toEqual(['CLASSIFICATION_AMBIGUOUS']);
      expect(execute).toHaveBeenCalledTimes(1);
    });

    it('should resolve references through the conversation history', async () => {
      const history: ConversationTurn[] = [
        { role: 'user', content: 'Which customers are over 60?' },
        { role: 'assistant', content: '42 customers are over 60.' },
      ];
      const resolved = 'What is the average balance of customers over 60?';
      const { orchestrator, llmClient } = setup([
        'analysis',
        resolved,
        'Step 1: filter customers with age > 60',
        '```python\nprint(1)\n```',
        'Their average balance is 1,000.',
      ]);

      const result = await orchestrator.process(
        request("What's the average balance of those customers?", history)
      );

      const rephrase = llmClient.requests[1]?.messages ?? [];
      expect(rephrase[0]?.content).toContain(
        'Conversation Context:\nUser: Which customers are over 60?\nAssistant: 42 customers are over 60.'
      );
      expect(rephrase[1]?.content).toBe(
        "Rephrase this question: What's the average balance of those customers?"
      );
      expect(result.rephrasedQuestion).toBe(resolved);
      expect(llmClient.requests[2]?.messages[1]?.content).toBe(`Question: ${resolved}`);
    });

    it('should not modify the caller history', async () => {
      const history = Object.freeze([
        Object.freeze<ConversationTurn>({ role: 'user', content: 'Top cities?' }),
        Object.freeze<ConversationTurn>({ role: 'assistant', content: 'Lisbon.' }),
      ]);
      const { orchestrator } = setup(ANALYSIS_REPLIES);

      const result = await orchestrator.process({
        message: 'and by balance?',
        sessionId: 'session-1',
        domain: 'banking',
        history,
      });

      expect(result.success).toBe(true);
      expect(history).toEqual([
        { role: 'user', content: 'Top cities?' },
        { role: 'assistant', content: 'Lisbon.' },
      ]);
    });
  });

  describe('failures', () => {
    it('should report an unknown domain without calling the model', async () => {
      const { orchestrator, llmClient } = setup(ANALYSIS_REPLIES);

      const result = await orchestrator.process({ ...request('hi'), domain: 'retail' });

      expect(result.success).toBe(false);
      expect(result.error).toEqual({
        code: 'DOMAIN_NOT_FOUND',
        message: 'Unknown domain: retail',
      });
      expect(result.finalAnswer).toBe('Sorry, something went wrong: Unknown domain: retail');
      expect(llmClient.requests).toHaveLength(0);
    });

    it('should stop when classification fails', async () => {
      const { orchestrator, execute } = setup([new Error('rate limited')]);

      const result = await orchestrator.process(request('how many customers'));

      expect(result.success).toBe(false);
      expect(result.error).toEqual({
        code: 'STAGE_COMPLETION_FAILURE',
        stage: 'classify',
        message: 'classify completion failed: rate limited',
      });
      expect(result.finalAnswer).toBe(
        'Sorry, something went wrong while understanding your message: classify completion failed: rate limited'
      );
      expect(result.stages).toEqual([]);
      expect(execute).not.toHaveBeenCalled();
    });

    it('should stop when rephrasing returns nothing', async () => {
      const { orchestrator, execute } = setup(['analysis', '   ']);

      const result = await orchestrator.process(request('how many customers'));

      expect(result.error).toEqual({
        code: 'STAGE_COMPLETION_FAILURE',
        stage: 'rephrase',
        message: 'rephrase completion returned no text',
      });
      expect(result.stages.map((s) => s.stage)).toEqual(['classify']);
      expect(execute).not.toHaveBeenCalled();
    });

    it('should keep the rephrased question when planning fails', async () => {
      const { orchestrator } = setup(['analysis', 'How many customers?', new Error('timeout')]);

      const result = await orchestrator.process(request('how many customers'));

      expect(result.success).toBe(false);
      expect(result.rephrasedQuestion).toBe('How many customers?');
      expect(result.error?.stage).toBe('plan');
    });

    it('should not run anything when codegen returns no code', async () => {
      const { orchestrator, execute } = setup([
        'analysis',
        'How many customers?',
        'Step 1: count rows',
        '```python\n```',
      ]);

      const result = await orchestrator.process(request('how many customers'));

      expect(result.success).toBe(false);
      expect(result.error).toEqual({
        code: 'CODE_GENERATION_EMPTY',
        stage: 'codegen',
        message: 'The model returned no usable code',
      });
      expect(result.analysisPlan).toBe('Step 1: count rows');
      expect(result.finalAnswer).toBe(
        'I planned an analysis for "How many customers?" but couldn\'t produce runnable code for it (The model returned no usable code). Try asking again, perhaps with a narrower question.'
      );
      expect(execute).not.toHaveBeenCalled();
    });

    it('should still report a failed sandbox run', async () => {
      const failed = createSandboxRun({
        status: 'nonzero-exit',
        success: false,
        exitCode: 1,
        output: "Analysis Error: name 'x' is not defined",
        error: "NameError: name 'x' is not defined",
      });
      const { orchestrator, llmClient } = setup(
        [...ANALYSIS_REPLIES.slice(0, 4), 'The analysis hit an error; try rephrasing.'],
        failed
      );

      const result = await orchestrator.process(request('how many customers'));

      expect(result.success).toBe(false);
      expect(result.finalAnswer).toBe('The analysis hit an error; try rephrasing.');
      expect(result.execution).toBe(failed);
      expect(result.error).toEqual({
        code: 'SANDBOX_NONZERO_EXIT',
        stage: 'execute',
        message: "NameError: name 'x' is not defined",
      });
      expect(llmClient.requests[4]?.messages[1]?.content).toContain(
        "Execution status: failed (nonzero-exit): NameError: name 'x' is not defined"
      );
    });

    it('should map a timeout to its own code', async () => {
      const timedOut = createSandboxRun({
        status: 'timeout',
        success: false,
        exitCode: null,
        error: 'Code execution timed out (exceeded 120000 ms)',
      });
      const { orchestrator } = setup(ANALYSIS_REPLIES, timedOut);

      const result = await orchestrator.process(request('how many customers'));

      expect(result.error?.code).toBe('SANDBOX_TIMEOUT');
      expect(result.executionArtifacts).toEqual([]);
    });

    it('should treat a sandbox that throws as a launch failure', async () => {
      const llmClient = createScriptedLLMClient(ANALYSIS_REPLIES);
      const broken: ExecutionSandbox = {
        ...createFakeSandbox().sandbox,
        execute: async () => {
          throw new Error('disk full');
        },
      };
      const orchestrator = createOrchestrator({
        llmClient,
        sandbox: broken,
        domains: createStaticDomainProvider([domain]),
        contextWindow,
        config: DEFAULT_ORCHESTRATOR_CONFIG,
      });

      const result = await orchestrator.process(request('how many customers'));

      expect(result.success).toBe(false);
      expect(result.error).toEqual({
        code: 'SANDBOX_LAUNCH_FAILURE',
        stage: 'execute',
        message: 'Sandbox failed: disk full',
      });
      expect(result.finalAnswer).toBe('There are 500 customers.');
    });

    it('should fall back to the raw output when reporting fails', async () => {
      const { orchestrator, run } = setup([
        ...ANALYSIS_REPLIES.slice(0, 4),
        new Error('overloaded'),
      ]);

      const result = await orchestrator.process(request('how many customers'));

      expect(result.success).toBe(true);
      expect(result.warnings).toEqual(['REPORTING_DEGRADED']);
      expect(result.finalAnswer).toBe(degradedReport(run));
      expect(result.finalAnswer).toBe(
        "I ran the analysis but couldn't write up a summary. Here is the raw output:\n\nTotal customers: 500\n"
      );
    });
  });

  describe('stream()', () => {
    it('should emit stage events before the result', async () => {
      const { orchestrator } = setup(['greeting', 'Hi there!']);

      const events: PipelineEvent[] = [];
      for await (const event of orchestrator.stream(request('Hi'))) {
        events.push(event);
      }

      expect(events.map((e) => e.type)).toEqual([
        'stage.start',
        'stage.complete',
        'stage.start',
        'stage.complete',
        'result',
      ]);
      const last = events.at(-1);
      expect(last?.type === 'result' && last.result.finalAnswer).toBe('Hi there!');
    });

    it('should emit a stage error for a failed stage', async () => {
      const { orchestrator } = setup([new Error('down')]);

      const events: PipelineEvent[] = [];
      for await (const event of orchestrator.stream(request('Hi'))) {
        events.push(event);
      }

      expect(events.map((e) => e.type)).toEqual(['stage.start', 'stage.error', 'result']);
      expect(events[1]).toMatchObject({
        type: 'stage.error',
        stage: 'classify',
        code: 'STAGE_COMPLETION_FAILURE',
      });
    });
  });

  describe('end to end', () => {
    let root: string;
    let sandbox: ExecutionSandbox;

    beforeEach(async () => {
      root = await makeTempDir();
      sandbox = createSandbox({
        runtime: createNodeRuntime(),
        outputDirectory: path.join(root, 'output'),
        workingDirectory: root,
        scratchParent: root,
        timeoutMs: 10000,
      });
    });

    afterEach(async () => {
      await sandbox.teardown();
      await removeTempDir(root);
    });

    it('should answer from data loaded and counted in the sandbox', async () => {
      const dataDir = path.join(root, 'data');
      await mkdir(path.join(dataDir, 'banking'), { recursive: true });
      const rows = Array.from({ length: 500 }, (_, i) => `${i + 1},City ${i % 5}`);
      await writeFile(
        path.join(dataDir, 'banking', 'customers.csv'),
        `customer_id,city\n${rows.join('\n')}\n`
      );

      const tables = BANKING_SCHEMA.tables.slice(0, 1);
      const knowledge = createDomainKnowledge(
        'banking',
        { ...BANKING_SCHEMA, tables },
        javascriptLoaderSnippet('banking', tables, dataDir)
      );
      const llmClient = createScriptedLLMClient([
        'analysis',
        'How many customers are there in total?',
        'Step 1: count the rows of customers',
        "```javascript\nconsole.log('Total customers: ' + customers.length);\n```",
        'There are 500 customers in total.',
      ]);
      const orchestrator = createOrchestrator({
        llmClient,
        sandbox,
        domains: createStaticDomainProvider([knowledge]),
        contextWindow,
        config: DEFAULT_ORCHESTRATOR_CONFIG,
        codeLanguage: 'javascript',
      });

      const result = await orchestrator.process(request('How many customers are there?'));

      expect(result.success).toBe(true);
      expect(result.execution?.status).toBe('success');
      expect(result.execution?.stdout).toBe(
        [
          'Loading customers...',
          'customers loaded: 500 rows',
          'All tables loaded successfully!',
          'Total customers: 500',
          '',
        ].join('\n')
      );
      expect(result.finalAnswer).toContain('500');
      expect(llmClient.requests[4]?.messages[1]?.content).toContain(
        'Analysis Results:\nLoading customers...\ncustomers loaded: 500 rows\nAll tables loaded successfully!\nTotal customers: 500'
      );
      expect(llmClient.requests[3]?.messages[0]?.content).toContain(
        'You are a JavaScript data analyst'
      );
    });
  });
});

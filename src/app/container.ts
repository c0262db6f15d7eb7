/**
 * Service container
 *
 * Builds every long-lived component from an AppConfig. Shared by the HTTP
 * entry point and the environment check script.
 */

import type { AppConfig } from '@/config/index.js';
import { createSerialQueue, type SerialQueue } from '@/lib/index.js';
import {
  createLLMClient,
  createOrchestrator,
  type Orchestrator,
} from '@/orchestrator/index.js';
import { createNodeRuntime, createPythonRuntime, createSandbox } from '@/sandbox/index.js';
import {
  createContextWindowManager,
  createEnvironmentService,
  createFileDomainProvider,
  javascriptLoaderSnippet,
  pandasLoaderSnippet,
  type EnvironmentService,
} from '@/services/index.js';
import type {
  DomainKnowledgeProvider,
  ExecutionSandbox,
  SandboxRuntime,
} from '@/types/index.js';
import { DEFAULT_ORCHESTRATOR_CONFIG } from '@/types/index.js';

export interface Container {
  runtime: SandboxRuntime;
  sandbox: ExecutionSandbox;
  domains: DomainKnowledgeProvider;
  environment: EnvironmentService;
  orchestrator: Orchestrator;
  queue: SerialQueue;
}

export function createContainer(config: AppConfig): Container {
  const usesNode = config.sandbox.runtime === 'node';
  const runtime = usesNode
    ? createNodeRuntime(config.sandbox.interpreter)
    : createPythonRuntime(config.sandbox.interpreter);

  const domains = createFileDomainProvider({
    metadataDir: config.metadataDir,
    dataDir: config.dataDir,
    buildLoaderSnippet: usesNode ? javascriptLoaderSnippet : pandasLoaderSnippet,
  });

  const sandbox = createSandbox({
    runtime,
    outputDirectory: config.sandbox.outputDir,
    timeoutMs: config.sandbox.timeoutMs,
  });

  const orchestrator = createOrchestrator({
    llmClient: createLLMClient({
      apiKey: config.openai.apiKey,
      ...(config.openai.baseURL ? { baseURL: config.openai.baseURL } : {}),
    }),
    sandbox,
    domains,
    contextWindow: createContextWindowManager({
      budget: config.contextMaxTokens,
      model: config.openai.model,
    }),
    config: { ...DEFAULT_ORCHESTRATOR_CONFIG, model: config.openai.model },
    codeLanguage: usesNode ? 'javascript' : 'python',
  });

  const environment = createEnvironmentService({
    apiKey: config.openai.apiKey,
    interpreter: runtime.command,
    domains,
    dataDir: config.dataDir,
  });

  return {
    runtime,
    sandbox,
    domains,
    environment,
    orchestrator,
    queue: createSerialQueue(),
  };
}

/**
 * Service Layer Exports
 */

export {
  createContextWindowManager,
  createTiktokenTokenizer,
  encodingForModel,
  truncationMarker,
  MESSAGE_OVERHEAD_TOKENS,
  DEFAULT_CONTEXT_BUDGET,
} from './context-window.service.js';
export type {
  ContextWindowManager,
  ContextWindowManagerConfig,
} from './context-window.service.js';

export {
  createFileDomainProvider,
  createDomainKnowledge,
  formatSchemaDescription,
  pandasLoaderSnippet,
  javascriptLoaderSnippet,
  domainSchemaSchema,
  SCHEMA_FILE_NAME,
} from './domain.service.js';
export type {
  FileDomainProviderConfig,
  LoaderSnippetBuilder,
} from './domain.service.js';

export { createEnvironmentService } from './environment.service.js';
export type {
  EnvironmentCheck,
  EnvironmentReport,
  EnvironmentService,
  EnvironmentServiceDeps,
} from './environment.service.js';

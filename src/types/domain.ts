/**
 * Domain Knowledge Types
 *
 * A domain is a named business vertical (banking, hospital, ...) with a
 * schema description for prompts and a snippet that binds every table.
 */

import type { Result } from './result.js';

export interface DomainTable {
  name: string;
  description: string;
  pk: string;
  fk?: string | string[];
  columns: Record<string, string>;
}

export interface DomainSchema {
  domain_name: string;
  domain_description: string;
  tables: DomainTable[];
}

/**
 * Read-only view of one domain, built once and shared across requests
 */
export interface DomainKnowledge {
  readonly name: string;
  readonly displayName: string;
  readonly description: string;
  readonly tableNames: readonly string[];

  /** Human-readable schema used verbatim in prompts */
  readonly schemaDescription: string;

  /** Source prepended to generated code; binds each table by name */
  readonly loaderSnippet: string;
}

export interface DomainKnowledgeProvider {
  getDomain(name: string): Promise<Result<DomainKnowledge>>;
  listDomains(): Promise<string[]>;

  /** Drop one cached domain, or all of them */
  invalidate(name?: string): void;
}

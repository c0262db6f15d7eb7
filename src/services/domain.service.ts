/**
 * Domain Knowledge Provider
 *
 * Reads `<metadataDir>/<domain>/_schema.json`, validates it and builds a
 * read-only DomainKnowledge value: the schema text used in prompts and the
 * snippet that loads `<dataDir>/<domain>/<table>.csv` into one variable per
 * table. Built values are cached per domain name until invalidated.
 */

import { access, readdir, readFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import { createLogger } from '@/lib/logger.js';
import type {
  DomainKnowledge,
  DomainKnowledgeProvider,
  DomainSchema,
  DomainTable,
  Result,
} from '@/types/index.js';
import { failure, success } from '@/types/index.js';

const log = createLogger('domain');

export const SCHEMA_FILE_NAME = '_schema.json';

const DOMAIN_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Table names become variables in generated code
 */
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const domainSchemaSchema = z.object({
  domain_name: z.string().min(1),
  domain_description: z.string(),
  tables: z
    .array(
      z.object({
        name: z.string().regex(IDENTIFIER_PATTERN, 'must be an identifier'),
        description: z.string(),
        pk: z.string(),
        fk: z.union([z.string(), z.array(z.string())]).optional(),
        columns: z.record(z.string()),
      })
    )
    .min(1),
});

export type LoaderSnippetBuilder = (
  domain: string,
  tables: readonly DomainTable[],
  dataDir: string
) => string;

export interface FileDomainProviderConfig {
  metadataDir: string;
  dataDir: string;

  /** Defaults to a pandas CSV loader */
  buildLoaderSnippet?: LoaderSnippetBuilder;
}

/**
 * Format the schema for inclusion in prompts
 */
export function formatSchemaDescription(schema: DomainSchema): string {
  const lines: string[] = [
    `Domain: ${schema.domain_name}`,
    `Description: ${schema.domain_description}`,
    '',
    'Available Tables:',
  ];

  for (const table of schema.tables) {
    lines.push('', `${table.name}:`);
    lines.push(`  Description: ${table.description}`);
    lines.push(`  Primary Key: ${table.pk}`);
    if (Array.isArray(table.fk)) {
      lines.push(`  Foreign Keys: ${table.fk.join(', ')}`);
    } else if (table.fk) {
      lines.push(`  Foreign Key: ${table.fk}`);
    }
    lines.push('  Columns:');
    for (const [column, description] of Object.entries(table.columns)) {
      lines.push(`    - ${column}: ${description}`);
    }
  }

  return lines.join('\n');
}

export const pandasLoaderSnippet: LoaderSnippetBuilder = (
  domain,
  tables,
  dataDir
) => {
  const lines: string[] = ['import pandas as pd', 'import numpy as np', ''];

  for (const table of tables) {
    const csvPath = path.resolve(dataDir, domain, `${table.name}.csv`);
    lines.push(`print('Loading ${table.name}...')`);
    // JSON string literals are valid Python string literals
    lines.push(`${table.name} = pd.read_csv(${JSON.stringify(csvPath)})`);
    lines.push(
      `print(f'${table.name} loaded: {len(${table.name})} rows')`
    );
  }

  lines.push("print('All dataframes loaded successfully!')");
  return lines.join('\n');
};

/**
 * CSV reader embedded in JavaScript loader snippets. Handles quoted fields
 * and converts numeric cells to numbers.
 */
const JAVASCRIPT_CSV_READER = String.raw`function readCsvTable(file) {
  const text = fs.readFileSync(file, 'utf8');
  const rows = [];
  let row = [];
  let field = '';
  let quoted = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') { field += '"'; i++; }
      else if (ch === '"') quoted = false;
      else field += ch;
    } else if (ch === '"') quoted = true;
    else if (ch === ',') { row.push(field); field = ''; }
    else if (ch === '\n') { row.push(field); rows.push(row); row = []; field = ''; }
    else if (ch !== '\r') field += ch;
  }
  if (field !== '' || row.length > 0) { row.push(field); rows.push(row); }
  const [header = [], ...body] = rows;
  return body.map((cells) => Object.fromEntries(header.map((name, i) => {
    const value = cells[i] ?? '';
    return [name, value !== '' && !Number.isNaN(Number(value)) ? Number(value) : value];
  })));
}`;

/**
 * Loads each table as an array of row objects, for the node runtime
 */
export const javascriptLoaderSnippet: LoaderSnippetBuilder = (
  domain,
  tables,
  dataDir
) => {
  const lines: string[] = [JAVASCRIPT_CSV_READER, ''];

  for (const table of tables) {
    const csvPath = path.resolve(dataDir, domain, `${table.name}.csv`);
    lines.push(`console.log('Loading ${table.name}...');`);
    lines.push(`const ${table.name} = readCsvTable(${JSON.stringify(csvPath)});`);
    lines.push(
      `console.log('${table.name} loaded: ' + ${table.name}.length + ' rows');`
    );
  }

  lines.push("console.log('All tables loaded successfully!');");
  return lines.join('\n');
};

export function createDomainKnowledge(
  name: string,
  schema: DomainSchema,
  loaderSnippet: string
): DomainKnowledge {
  return Object.freeze({
    name,
    displayName: schema.domain_name,
    description: schema.domain_description,
    tableNames: Object.freeze(schema.tables.map((table) => table.name)),
    schemaDescription: formatSchemaDescription(schema),
    loaderSnippet,
  });
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create a file-backed domain provider
 */
export function createFileDomainProvider(
  config: FileDomainProviderConfig
): DomainKnowledgeProvider {
  const { metadataDir, dataDir } = config;
  const buildLoaderSnippet = config.buildLoaderSnippet ?? pandasLoaderSnippet;
  const cache = new Map<string, DomainKnowledge>();

  async function load(name: string): Promise<Result<DomainKnowledge>> {
    const schemaPath = path.join(metadataDir, name, SCHEMA_FILE_NAME);

    let raw: string;
    try {
      raw = await readFile(schemaPath, 'utf-8');
    } catch {
      return failure('DOMAIN_NOT_FOUND', `Unknown domain: ${name}`);
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(raw);
    } catch (error) {
      return failure(
        'VALIDATION_ERROR',
        `Schema file for ${name} is not valid JSON`,
        { reason: error instanceof Error ? error.message : String(error) }
      );
    }

    const parsed = domainSchemaSchema.safeParse(parsedJson);
    if (!parsed.success) {
      return failure('VALIDATION_ERROR', `Invalid schema for domain ${name}`, {
        issues: parsed.error.issues,
      });
    }

    const schema = parsed.data;
    return success(
      createDomainKnowledge(
        name,
        schema,
        buildLoaderSnippet(name, schema.tables, dataDir)
      )
    );
  }

  return {
    async getDomain(name: string): Promise<Result<DomainKnowledge>> {
      if (!DOMAIN_NAME_PATTERN.test(name)) {
        return failure('DOMAIN_NOT_FOUND', `Unknown domain: ${name}`);
      }

      const cached = cache.get(name);
      if (cached) {
        return success(cached);
      }

      const result = await load(name);
      if (result.success) {
        cache.set(name, result.data);
        log.debug('Domain loaded', {
          domain: name,
          tables: result.data.tableNames.length,
        });
      }
      return result;
    },

    async listDomains(): Promise<string[]> {
      let entries;
      try {
        entries = await readdir(metadataDir, { withFileTypes: true });
      } catch {
        return [];
      }

      const domains: string[] = [];
      for (const entry of entries) {
        if (
          entry.isDirectory() &&
          (await exists(path.join(metadataDir, entry.name, SCHEMA_FILE_NAME)))
        ) {
          domains.push(entry.name);
        }
      }
      return domains.sort();
    },

    invalidate(name?: string): void {
      if (name === undefined) {
        cache.clear();
      } else {
        cache.delete(name);
      }
    },
  };
}

/**
 * Environment Service
 *
 * Startup diagnostics: is an API key configured, can the sandbox
 * interpreter be launched, and does every domain have its schema and data.
 */

import { execFile } from 'node:child_process';
import { access } from 'node:fs/promises';
import path from 'node:path';
import { promisify } from 'node:util';

import { isPlaceholderApiKey } from '@/config/index.js';
import { createLogger } from '@/lib/logger.js';
import type { DomainKnowledgeProvider } from '@/types/index.js';

const log = createLogger('environment');
const execFileAsync = promisify(execFile);

export interface EnvironmentCheck {
  name: string;
  ok: boolean;
  detail: string;
}

export interface EnvironmentReport {
  ok: boolean;
  checks: EnvironmentCheck[];
}

export interface EnvironmentServiceDeps {
  apiKey: string | undefined;
  interpreter: string;
  domains: DomainKnowledgeProvider;
  dataDir: string;

  /** Limit for `<interpreter> --version` */
  probeTimeoutMs?: number;
}

export interface EnvironmentService {
  checkEnvironment(): Promise<EnvironmentReport>;
}

export function createEnvironmentService(
  deps: EnvironmentServiceDeps
): EnvironmentService {
  const { apiKey, interpreter, domains, dataDir } = deps;
  const probeTimeoutMs = deps.probeTimeoutMs ?? 10000;

  function checkApiKey(): EnvironmentCheck {
    const ok = !isPlaceholderApiKey(apiKey);
    return {
      name: 'api-key',
      ok,
      detail: ok
        ? 'API key configured'
        : 'OPENAI_API_KEY is missing or still a placeholder',
    };
  }

  async function checkInterpreter(): Promise<EnvironmentCheck> {
    try {
      const { stdout, stderr } = await execFileAsync(
        interpreter,
        ['--version'],
        { timeout: probeTimeoutMs }
      );
      return {
        name: 'interpreter',
        ok: true,
        detail: `${interpreter}: ${(stdout || stderr).trim()}`,
      };
    } catch (error) {
      return {
        name: 'interpreter',
        ok: false,
        detail: `${interpreter} could not be launched: ${
          error instanceof Error ? error.message : String(error)
        }`,
      };
    }
  }

  async function checkDomain(name: string): Promise<EnvironmentCheck> {
    const result = await domains.getDomain(name);
    if (!result.success) {
      return { name: `domain:${name}`, ok: false, detail: result.error.message };
    }

    const missing: string[] = [];
    for (const table of result.data.tableNames) {
      const file = `${table}.csv`;
      try {
        await access(path.join(dataDir, name, file));
      } catch {
        missing.push(file);
      }
    }

    const total = result.data.tableNames.length;
    return {
      name: `domain:${name}`,
      ok: missing.length === 0,
      detail:
        missing.length === 0
          ? `schema ok, ${total}/${total} tables present`
          : `schema ok, missing data files: ${missing.join(', ')}`,
    };
  }

  return {
    async checkEnvironment(): Promise<EnvironmentReport> {
      const checks: EnvironmentCheck[] = [checkApiKey(), await checkInterpreter()];

      const names = await domains.listDomains();
      if (names.length === 0) {
        checks.push({
          name: 'domains',
          ok: false,
          detail: 'No domains with a schema file were found',
        });
      }
      for (const name of names) {
        checks.push(await checkDomain(name));
      }

      const ok = checks.every((check) => check.ok);
      if (!ok) {
        log.warn('Environment check failed', {
          failed: checks.filter((check) => !check.ok).map((check) => check.name),
        });
      }
      return { ok, checks };
    },
  };
}

/**
 * Environment Service Unit Tests
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createEnvironmentService } from '@/services/environment.service.js';

import { makeTempDir, removeTempDir } from '../../helpers/test-utils.js';
import { createBankingDomain, createStaticDomainProvider } from '../../mocks/index.js';

describe('Environment Service', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await makeTempDir();
    await mkdir(path.join(dataDir, 'banking'));
    await writeFile(path.join(dataDir, 'banking', 'customers.csv'), 'customer_id\n1\n');
  });

  afterEach(async () => {
    await removeTempDir(dataDir);
  });

  function service(apiKey: string | undefined, interpreter = process.execPath) {
    return createEnvironmentService({
      apiKey,
      interpreter,
      domains: createStaticDomainProvider([createBankingDomain()]),
      dataDir,
    });
  }

  it('should pass the API key check for a real-looking key', async () => {
    const report = await service('test-secret').checkEnvironment();

    expect(report.checks[0]).toEqual({
      name: 'api-key',
      ok: true,
      detail: 'API key configured',
    });
  });

  it.each([undefined, '', '   ', 'your_openai_api_key_here'])(
    'should fail the API key check for %j',
    async (apiKey) => {
      const report = await service(apiKey).checkEnvironment();

      expect(report.ok).toBe(false);
      expect(report.checks[0]).toEqual({
        name: 'api-key',
        ok: false,
        detail: 'OPENAI_API_KEY is missing or still a placeholder',
      });
    }
  );

  it('should report the interpreter version', async () => {
    const report = await service('test-secret').checkEnvironment();
    const check = report.checks.find((c) => c.name === 'interpreter');

    expect(check?.ok).toBe(true);
    expect(check?.detail).toBe(`${process.execPath}: ${process.version}`);
  });

  it('should fail when the interpreter cannot be launched', async () => {
    const report = await service(
      'test-secret',
      'analytics-no-such-interpreter'
    ).checkEnvironment();
    const check = report.checks.find((c) => c.name === 'interpreter');

    expect(check?.ok).toBe(false);
    expect(check?.detail).toMatch(
      /^analytics-no-such-interpreter could not be launched: /
    );
  });

  it('should list missing data files per domain', async () => {
    const report = await service('test-secret').checkEnvironment();

    expect(report.checks.find((c) => c.name === 'domain:banking')).toEqual({
      name: 'domain:banking',
      ok: false,
      detail: 'schema ok, missing data files: accounts.csv',
    });
    expect(report.ok).toBe(false);
  });

  it('should pass when every table has its data file', async () => {
    await writeFile(path.join(dataDir, 'banking', 'accounts.csv'), 'account_id\n1\n');

    const report = await service('test-secret').checkEnvironment();

    expect(report.checks.find((c) => c.name === 'domain:banking')).toEqual({
      name: 'domain:banking',
      ok: true,
      detail: 'schema ok, 2/2 tables present',
    });
    expect(report.ok).toBe(true);
  });

  it('should fail when no domains exist', async () => {
    const report = await createEnvironmentService({
      apiKey: 'test-secret',
      interpreter: process.execPath,
      domains: createStaticDomainProvider([]),
      dataDir,
    }).checkEnvironment();

    expect(report.checks.at(-1)).toEqual({
      name: 'domains',
      ok: false,
      detail: 'No domains with a schema file were found',
    });
  });
});

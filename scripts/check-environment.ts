/**
 * Prints the environment report without starting the server.
 * Exits 1 when any check fails.
 *
 * Usage: npm run check:env
 */
import 'dotenv/config';
import path from 'node:path';

import { loadConfig } from '../src/config/index.js';
import { createNodeRuntime, createPythonRuntime } from '../src/sandbox/index.js';
import {
  createEnvironmentService,
  createFileDomainProvider,
} from '../src/services/index.js';

async function main(): Promise<number> {
  const env = process.env;

  const config = loadConfig(env);
  if (!config.success) {
    console.log('Configuration problems:');
    console.log(JSON.stringify(config.error.details, null, 2));
  }

  const interpreter = env.SANDBOX_INTERPRETER || undefined;
  const runtime =
    env.SANDBOX_RUNTIME === 'node'
      ? createNodeRuntime(interpreter)
      : createPythonRuntime(interpreter);
  const dataDir = path.resolve(env.DATA_DIR || 'data');

  const environment = createEnvironmentService({
    apiKey: env.OPENAI_API_KEY,
    interpreter: runtime.command,
    domains: createFileDomainProvider({
      metadataDir: path.resolve(env.METADATA_DIR || 'metadata'),
      dataDir,
    }),
    dataDir,
  });

  const report = await environment.checkEnvironment();
  console.log('=== ENVIRONMENT ===\n');
  for (const check of report.checks) {
    console.log(`${check.ok ? 'ok  ' : 'FAIL'} ${check.name}: ${check.detail}`);
  }
  console.log(`\n${report.ok ? 'All checks passed' : 'Some checks failed'}`);

  return report.ok && config.success ? 0 : 1;
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error(error);
    process.exit(1);
  }
);

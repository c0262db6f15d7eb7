/**
 * Application Configuration
 *
 * Reads settings from the environment (after dotenv has loaded `.env`) and
 * validates them with zod. Nothing else in the app reads process.env.
 */

import path from 'node:path';

import { z } from 'zod';

import type { Result } from '@/types/index.js';
import { failure, success } from '@/types/index.js';

/**
 * Values shipped in `.env.example` and docs that must never reach the API
 */
export const PLACEHOLDER_API_KEYS: readonly string[] = [
  'your_openai_api_key_here',
  'your-api-key',
  'sk-your-key-here',
  'changeme',
];

export function isPlaceholderApiKey(value: string | undefined): boolean {
  const key = value?.trim() ?? '';
  return key === '' || PLACEHOLDER_API_KEYS.includes(key.toLowerCase());
}

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  OPENAI_API_KEY: z
    .string({ required_error: 'OPENAI_API_KEY is required' })
    .trim()
    .refine((key) => !isPlaceholderApiKey(key), {
      message: 'OPENAI_API_KEY is missing or still a placeholder',
    }),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o'),
  CONTEXT_MAX_TOKENS: positiveInt(120000),
  SANDBOX_TIMEOUT_MS: positiveInt(120000),
  SANDBOX_INTERPRETER: z.string().min(1).optional(),
  SANDBOX_RUNTIME: z.enum(['python', 'node']).default('python'),
  OUTPUT_DIR: z.string().min(1).default('output'),
  METADATA_DIR: z.string().min(1).default('metadata'),
  DATA_DIR: z.string().min(1).default('data'),
  PORT: positiveInt(3000),
  LOG_LEVEL: z
    .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
    .default('info'),
  ALLOWED_ORIGINS: z.string().optional(),
});

export type SandboxRuntimeName = 'python' | 'node';

export interface AppConfig {
  openai: {
    apiKey: string;
    baseURL?: string;
    model: string;
  };
  contextMaxTokens: number;
  sandbox: {
    runtime: SandboxRuntimeName;
    /** Interpreter binary; unset means the runtime's default */
    interpreter?: string;
    timeoutMs: number;
    outputDir: string;
  };
  metadataDir: string;
  dataDir: string;
  port: number;
  logLevel: string;
  allowedOrigins: string[];
}

/**
 * Validate environment variables into an AppConfig. Relative directories are
 * resolved against `cwd`.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): Result<AppConfig> {
  // Empty strings count as unset so `.env` lines like `PORT=` fall back
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    return failure('CONFIG_INVALID', 'Invalid configuration', {
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      ),
    });
  }

  const vars = parsed.data;
  return success({
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      ...(vars.OPENAI_BASE_URL ? { baseURL: vars.OPENAI_BASE_URL } : {}),
      model: vars.OPENAI_MODEL,
    },
    contextMaxTokens: vars.CONTEXT_MAX_TOKENS,
    sandbox: {
      runtime: vars.SANDBOX_RUNTIME,
      ...(vars.SANDBOX_INTERPRETER
        ? { interpreter: vars.SANDBOX_INTERPRETER }
        : {}),
      timeoutMs: vars.SANDBOX_TIMEOUT_MS,
      outputDir: path.resolve(cwd, vars.OUTPUT_DIR),
    },
    metadataDir: path.resolve(cwd, vars.METADATA_DIR),
    dataDir: path.resolve(cwd, vars.DATA_DIR),
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    allowedOrigins: (vars.ALLOWED_ORIGINS ?? 'http://localhost:3000')
      .split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
  });
}

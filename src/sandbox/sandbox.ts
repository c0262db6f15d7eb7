/**
 * Execution Sandbox
 *
 * Runs one LLM-authored source unit per call in a child process:
 * clear old artifacts, wrap the code in the runtime harness, write it to a
 * uniquely named scratch file, run it under the timeout, collect output and
 * artifacts, delete the scratch file.
 *
 * Isolation is process-level only: the child has the same filesystem and
 * network access as the host. One run at a time per instance, because the
 * output directory is cleared at the start of every run.
 */

import { rmSync } from 'node:fs';
import { mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { nanoid } from 'nanoid';

import { createLogger } from '@/lib/logger.js';
import type {
  ArtifactDescriptor,
  ExecutionSandbox,
  SandboxConfig,
  SandboxRun,
  SandboxRuntime,
  SandboxState,
} from '@/types/index.js';
import {
  DEFAULT_ARTIFACT_EXTENSIONS,
  DEFAULT_MAX_OUTPUT_BYTES,
  DEFAULT_SANDBOX_TIMEOUT_MS,
} from '@/types/index.js';

import { runProcess, type ProcessOutcome } from './process.js';
import { createPythonRuntime } from './runtimes.js';

const log = createLogger('sandbox');

export type CreateSandboxOptions = Partial<SandboxConfig> & {
  runtime?: SandboxRuntime;
};

function isMissingPath(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function combineOutput(stdout: string, stderr: string, failed: boolean): string {
  if (failed && stderr.trim()) {
    return `${stdout}\n\nErrors:\n${stderr}`;
  }
  return stdout;
}

/**
 * Create a sandbox instance
 */
export function createSandbox(
  options: CreateSandboxOptions = {}
): ExecutionSandbox {
  const config: SandboxConfig = {
    runtime: options.runtime ?? createPythonRuntime(),
    outputDirectory: path.resolve(options.outputDirectory ?? 'output'),
    workingDirectory: path.resolve(options.workingDirectory ?? process.cwd()),
    timeoutMs: options.timeoutMs ?? DEFAULT_SANDBOX_TIMEOUT_MS,
    maxOutputBytes: options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES,
    artifactExtensions: (
      options.artifactExtensions ?? DEFAULT_ARTIFACT_EXTENSIONS
    ).map((ext) => ext.toLowerCase()),
    scratchParent: options.scratchParent,
  };

  let state: SandboxState = 'idle';
  let scratchDirectory: string | null = null;
  let exitHook: (() => void) | null = null;

  function isArtifact(fileName: string): boolean {
    return config.artifactExtensions.includes(
      path.extname(fileName).toLowerCase()
    );
  }

  async function ensurePrepared(): Promise<string> {
    await mkdir(config.outputDirectory, { recursive: true });

    if (scratchDirectory) {
      return scratchDirectory;
    }

    const dir = await mkdtemp(
      path.join(config.scratchParent ?? os.tmpdir(), 'analytics-sandbox-')
    );
    scratchDirectory = dir;

    // Owners that never call teardown() still get the directory removed
    exitHook = () => {
      try {
        rmSync(dir, { recursive: true, force: true });
      } catch (error) {
        log.warn('Could not remove scratch directory on exit', {
          scratchDirectory: dir,
          error: describeError(error),
        });
      }
    };
    process.once('exit', exitHook);

    log.debug('Sandbox prepared', {
      scratchDirectory: dir,
      outputDirectory: config.outputDirectory,
    });
    return dir;
  }

  async function clearArtifacts(): Promise<void> {
    let names: string[];
    try {
      names = await readdir(config.outputDirectory);
    } catch (error) {
      if (isMissingPath(error)) {
        return;
      }
      throw error;
    }

    await Promise.all(
      names
        .filter(isArtifact)
        .map((name) => rm(path.join(config.outputDirectory, name), { force: true }))
    );
  }

  async function listArtifacts(): Promise<ArtifactDescriptor[]> {
    try {
      const entries = await readdir(config.outputDirectory, {
        withFileTypes: true,
      });
      return entries
        .filter((entry) => entry.isFile() && isArtifact(entry.name))
        .map((entry) => entry.name)
        .sort()
        .map((name) => ({
          name,
          path: path.join(config.outputDirectory, name),
        }));
    } catch (error) {
      log.warn('Could not list artifacts', { error: describeError(error) });
      return [];
    }
  }

  function launchFailure(
    id: string,
    startedAt: number,
    message: string
  ): SandboxRun {
    return {
      id,
      status: 'launch-failure',
      success: false,
      exitCode: null,
      output: '',
      stdout: '',
      stderr: '',
      artifacts: [],
      error: message,
      durationMs: Date.now() - startedAt,
    };
  }

  async function toRun(
    id: string,
    startedAt: number,
    outcome: ProcessOutcome
  ): Promise<SandboxRun> {
    switch (outcome.kind) {
      case 'launch-error':
        return launchFailure(
          id,
          startedAt,
          `Failed to launch ${config.runtime.command}: ${outcome.message}`
        );

      case 'timeout':
        return {
          id,
          status: 'timeout',
          success: false,
          exitCode: null,
          output: combineOutput(outcome.stdout, outcome.stderr, true),
          stdout: outcome.stdout,
          stderr: outcome.stderr,
          artifacts: [],
          error: `Code execution timed out (exceeded ${config.timeoutMs} ms)`,
          durationMs: Date.now() - startedAt,
          pid: outcome.pid,
        };

      case 'exited': {
        const succeeded = outcome.exitCode === 0;
        const exitDescription =
          outcome.exitCode !== null
            ? `Process exited with code ${outcome.exitCode}`
            : `Process terminated by signal ${outcome.signal ?? 'unknown'}`;

        return {
          id,
          status: succeeded ? 'success' : 'nonzero-exit',
          success: succeeded,
          exitCode: outcome.exitCode,
          output: combineOutput(outcome.stdout, outcome.stderr, !succeeded),
          stdout: outcome.stdout,
          stderr: outcome.stderr,
          artifacts: await listArtifacts(),
          error: succeeded ? null : outcome.stderr.trim() || exitDescription,
          durationMs: Date.now() - startedAt,
          pid: outcome.pid,
        };
      }
    }
  }

  return {
    get state(): SandboxState {
      return state;
    },

    get scratchDirectory(): string | null {
      return scratchDirectory;
    },

    outputDirectory: config.outputDirectory,

    async prepare(): Promise<void> {
      if (state !== 'idle') {
        throw new Error(`Cannot prepare sandbox while ${state}`);
      }
      state = 'preparing';
      try {
        await ensurePrepared();
      } finally {
        state = 'idle';
      }
    },

    async execute(code: string): Promise<SandboxRun> {
      const id = nanoid(12);
      const startedAt = Date.now();

      if (state === 'preparing' || state === 'running') {
        return launchFailure(id, startedAt, 'Sandbox is busy with another run');
      }
      state = 'preparing';

      let scriptPath: string | null = null;
      let run: SandboxRun;

      try {
        // Stale artifacts from a crashed run must never reach this one
        await clearArtifacts();

        const dir = await ensurePrepared();
        scriptPath = path.join(
          dir,
          `analysis_${id}${config.runtime.fileExtension}`
        );
        await writeFile(
          scriptPath,
          config.runtime.wrap(code, {
            workingDirectory: config.workingDirectory,
            outputDirectory: config.outputDirectory,
          }),
          'utf-8'
        );

        state = 'running';
        log.info('Sandbox run started', {
          runId: id,
          runtime: config.runtime.name,
          timeoutMs: config.timeoutMs,
        });

        const outcome = await runProcess(
          config.runtime.command,
          [...config.runtime.args, scriptPath],
          {
            cwd: config.workingDirectory,
            env: { ...process.env, ...config.runtime.env },
            timeoutMs: config.timeoutMs,
            maxOutputBytes: config.maxOutputBytes,
          }
        );
        run = await toRun(id, startedAt, outcome);
      } catch (error) {
        run = launchFailure(
          id,
          startedAt,
          `Failed to prepare run: ${describeError(error)}`
        );
      } finally {
        if (scriptPath) {
          await rm(scriptPath, { force: true }).catch((error: unknown) => {
            log.warn('Could not remove scratch file', {
              scriptPath,
              error: describeError(error),
            });
          });
        }
      }

      state =
        run.status === 'success'
          ? 'completed'
          : run.status === 'timeout'
            ? 'timed-out'
            : 'failed';
      log.info('Sandbox run finished', {
        runId: id,
        status: run.status,
        state,
        durationMs: run.durationMs,
        artifacts: run.artifacts.length,
      });
      state = 'idle';

      return run;
    },

    clearArtifacts,

    async teardown(): Promise<void> {
      if (exitHook) {
        process.removeListener('exit', exitHook);
        exitHook = null;
      }
      if (!scratchDirectory) {
        return;
      }

      const dir = scratchDirectory;
      scratchDirectory = null;
      try {
        await rm(dir, { recursive: true, force: true });
      } catch (error) {
        log.warn('Sandbox teardown failed', {
          scratchDirectory: dir,
          error: describeError(error),
        });
      }
    },
  };
}

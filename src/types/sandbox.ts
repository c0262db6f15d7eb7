/**
 * Execution Sandbox Types
 */

export interface ArtifactDescriptor {
  /** File name inside the output directory */
  name: string;

  /** Absolute path */
  path: string;
}

export type SandboxRunStatus =
  | 'success'
  | 'nonzero-exit'
  | 'timeout'
  | 'launch-failure';

export type SandboxState =
  | 'idle'
  | 'preparing'
  | 'running'
  | 'completed'
  | 'timed-out'
  | 'failed';

export interface SandboxRun {
  id: string;
  status: SandboxRunStatus;
  success: boolean;

  /** Exit code of the child, null when killed or never started */
  exitCode: number | null;

  /** stdout, plus stderr under an "Errors:" header when the run failed */
  output: string;
  stdout: string;
  stderr: string;

  artifacts: ArtifactDescriptor[];
  error: string | null;
  durationMs: number;

  /** Child pid, absent on launch failure */
  pid?: number;
}

/**
 * Describes how to turn a source string into a runnable script
 */
export interface SandboxRuntime {
  name: string;

  /** Executable to launch, e.g. python3 */
  command: string;

  /** Arguments placed before the script path */
  args: string[];

  /** Scratch file extension including the dot */
  fileExtension: string;

  /** Extra environment for the child */
  env?: Record<string, string>;

  wrap(code: string, context: HarnessContext): string;
}

export interface HarnessContext {
  workingDirectory: string;
  outputDirectory: string;
}

export interface SandboxConfig {
  runtime: SandboxRuntime;

  /** Shared, caller-visible directory for artifacts */
  outputDirectory: string;

  /** Working directory the harness switches into */
  workingDirectory: string;

  /** Wall-clock budget per run (ms) */
  timeoutMs: number;

  /** Cap on captured bytes per stream */
  maxOutputBytes: number;

  /** Lower-case extensions, dot included */
  artifactExtensions: string[];

  /** Parent for the private scratch directory (default: os tmpdir) */
  scratchParent?: string;
}

export const DEFAULT_SANDBOX_TIMEOUT_MS = 120000;

export const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;

export const DEFAULT_ARTIFACT_EXTENSIONS = [
  '.png',
  '.jpg',
  '.jpeg',
  '.svg',
  '.gif',
];

/**
 * Execution Sandbox interface
 */
export interface ExecutionSandbox {
  readonly state: SandboxState;

  /** Private scratch directory, null until prepared */
  readonly scratchDirectory: string | null;

  readonly outputDirectory: string;

  prepare(): Promise<void>;

  /**
   * Run one source unit. Never rejects: every outcome, including a
   * missing interpreter, comes back as a SandboxRun.
   */
  execute(code: string): Promise<SandboxRun>;

  /** Remove artifact files from the output directory */
  clearArtifacts(): Promise<void>;

  /** Remove the scratch directory. Never rejects. */
  teardown(): Promise<void>;
}

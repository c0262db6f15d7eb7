/**
 * Execution Sandbox Exports
 */

export { createSandbox } from './sandbox.js';
export type { CreateSandboxOptions } from './sandbox.js';
export {
  createNodeRuntime,
  createPythonRuntime,
  indentCode,
  wrapNodeCode,
  wrapPythonCode,
} from './runtimes.js';
export { runProcess } from './process.js';
export type { ProcessOptions, ProcessOutcome } from './process.js';

/**
 * Main entry point for tool-shim
 * Exports public API
 */

export * from './tools/index.js';
export { createToolProgram, formatUsage, runToolProgram } from './cli/createToolProgram.js';
export { main } from './cli/main.js';
export type { ToolProgramOptions } from './cli/createToolProgram.js';
export { ProcessExecutorAdapter } from './platform/ProcessExecutorAdapter.js';
export type {
  IProcessExecutor,
  ProcessExecuteOptions,
  ProcessExecuteResult,
} from './platform/IProcessExecutor.js';
export * from './shared/config/schemas.js';
export * from './shared/utils/logger.js';
export * from './shared/utils/errors.js';

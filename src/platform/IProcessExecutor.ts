/**
 * Process executor interface (platform abstraction)
 * Runs a program with an argument vector, without a shell
 */

/**
 * Process execution options
 */
export interface ProcessExecuteOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeout?: number;
}

/**
 * Process execution result
 */
export interface ProcessExecuteResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** stdout and stderr interleaved in arrival order */
  output: string;
  signal?: string;
  timedOut: boolean;
}

/**
 * Process executor interface
 */
export interface IProcessExecutor {
  /**
   * Execute a program and wait for completion
   */
  execute(
    file: string,
    args?: readonly string[],
    options?: ProcessExecuteOptions
  ): Promise<ProcessExecuteResult>;
}

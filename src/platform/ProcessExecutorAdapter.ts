/**
 * ProcessExecutorAdapter - Cross-platform process execution implementation
 * Uses execa for reliable cross-platform command execution
 */

import { execa } from 'execa';
import type {
  IProcessExecutor,
  ProcessExecuteOptions,
  ProcessExecuteResult,
} from './IProcessExecutor.js';

export class ProcessExecutorAdapter implements IProcessExecutor {
  /**
   * Execute program and wait for completion
   */
  async execute(
    file: string,
    args: readonly string[] = [],
    options: ProcessExecuteOptions = {}
  ): Promise<ProcessExecuteResult> {
    try {
      const result = await execa(file, args, {
        cwd: options.cwd,
        env: options.env,
        timeout: options.timeout,
        all: true,
        reject: false,
      });

      return {
        exitCode: result.exitCode ?? (result.failed ? 1 : 0),
        stdout: result.stdout,
        stderr: result.stderr,
        output: result.all ?? '',
        signal: result.signal,
        timedOut: result.timedOut,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      return {
        exitCode: 1,
        stdout: '',
        stderr: message,
        output: message,
        timedOut: false,
      };
    }
  }
}

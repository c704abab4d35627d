/**
 * ShellTool - Wraps an external executable that follows the tool convention
 */

import type { IProcessExecutor } from '../platform/IProcessExecutor.js';
import { formatIssues, resolveShellToolOptions } from '../shared/config/schemas.js';
import type { ResolvedShellToolOptions, ShellToolOptions } from '../shared/config/schemas.js';
import { ToolDiscoveryError } from '../shared/utils/errors.js';
import { logger } from '../shared/utils/logger.js';
import { EXECUTE_FLAG, SCHEMA_FLAG } from './convention.js';
import type { ITool } from './interfaces/ITool.js';
import { ToolSchemaSchema } from './types.js';
import type { ToolArguments, ToolContext, ToolDefinition, ToolResult, ToolSchema } from './types.js';

export class ShellTool implements ITool {
  readonly definition: ToolDefinition;

  private constructor(
    readonly command: string,
    private readonly schema: ToolSchema,
    private readonly executor: IProcessExecutor,
    private readonly options: ResolvedShellToolOptions
  ) {
    this.definition = {
      name: schema.title,
      description: schema.description,
      metadata: { source: 'shell' },
    };
  }

  /**
   * Discover a tool by running it with --schema
   */
  static async load(
    command: string,
    executor: IProcessExecutor,
    options: ShellToolOptions = {}
  ): Promise<ShellTool> {
    const resolved = resolveShellToolOptions(options);
    const result = await executor.execute(command, [SCHEMA_FLAG], {
      cwd: resolved.cwd,
      env: resolved.env,
      timeout: resolved.timeout,
    });

    if (result.exitCode !== 0 || result.timedOut) {
      const reason = result.timedOut ? 'timed out' : `exit code ${result.exitCode}`;
      throw new ToolDiscoveryError(`Failed to get schema from ${command}: ${reason}`, command);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(result.stdout.trim());
    } catch (error) {
      throw new ToolDiscoveryError(
        `Failed to parse schema from ${command}: ${error instanceof Error ? error.message : String(error)}`,
        command
      );
    }

    const parsed = ToolSchemaSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ToolDiscoveryError(
        `Invalid schema from ${command}: ${formatIssues(parsed.error)}`,
        command
      );
    }

    return new ShellTool(command, parsed.data, executor, resolved);
  }

  getSchema(): ToolSchema {
    return {
      ...this.schema,
      properties: { ...this.schema.properties },
      required: [...this.schema.required],
    };
  }

  async execute(args: ToolArguments, context: ToolContext = {}): Promise<ToolResult> {
    const startTime = Date.now();
    const env =
      this.options.env || context.environment
        ? { ...this.options.env, ...context.environment }
        : undefined;

    const result = await this.executor.execute(this.command, [EXECUTE_FLAG, JSON.stringify(args)], {
      cwd: context.workingDirectory ?? this.options.cwd,
      env,
      timeout: context.timeout ?? this.options.timeout,
    });

    const output = result.output.trim();
    logger.debug(`shelltool ${this.definition.name} finished`, {
      exitCode: result.exitCode,
      signal: result.signal,
      durationMs: Date.now() - startTime,
    });

    if (result.timedOut) {
      return {
        success: false,
        output,
        error: `Tool execution timed out after ${context.timeout ?? this.options.timeout}ms`,
        metadata: { exitCode: result.exitCode },
      };
    }

    if (result.exitCode !== 0) {
      return {
        success: false,
        output,
        error: `Tool execution failed with exit code ${result.exitCode} (output: ${output})`,
        metadata: { exitCode: result.exitCode },
      };
    }

    return {
      success: true,
      output,
      metadata: { exitCode: result.exitCode },
    };
  }
}

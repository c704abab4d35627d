/**
 * ToolRegistry - Manages available tools
 */

import path from 'path';
import type { IProcessExecutor } from '../platform/IProcessExecutor.js';
import type { ShellToolOptions } from '../shared/config/schemas.js';
import { logger } from '../shared/utils/logger.js';
import type { ITool } from './interfaces/ITool.js';
import { NamespacedTool } from './NamespacedTool.js';
import { ShellTool } from './ShellTool.js';
import type { ToolArguments, ToolContext, ToolResult, ToolSchema } from './types.js';

/**
 * Namespace for a tool loaded from a file: its base name without extension
 */
export function namespaceFor(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

export interface RegisterOptions {
  /** Replace a tool already registered under the same name instead of throwing */
  replace?: boolean;
}

/**
 * Registry for managing tools
 */
export class ToolRegistry {
  private tools: Map<string, ITool> = new Map();

  /**
   * Register a tool
   */
  register(tool: ITool, options: RegisterOptions = {}): void {
    if (!options.replace && this.tools.has(tool.definition.name)) {
      throw new Error(`Tool '${tool.definition.name}' is already registered`);
    }
    this.tools.set(tool.definition.name, tool);
  }

  /**
   * Unregister a tool
   */
  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  /**
   * Get a tool by name
   */
  get(name: string): ITool | undefined {
    return this.tools.get(name);
  }

  /**
   * Check if a tool exists
   */
  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * List all registered tools
   */
  list(): ITool[] {
    return Array.from(this.tools.values());
  }

  /**
   * Get Schema Descriptors, for all tools or the named ones
   */
  getSchemas(toolNames?: string[]): ToolSchema[] {
    const tools = toolNames
      ? toolNames.map((name) => this.get(name)).filter((t): t is ITool => t !== undefined)
      : this.list();

    return tools.map((tool) => tool.getSchema());
  }

  /**
   * Execute a tool by name
   */
  async execute(toolName: string, args: ToolArguments, context: ToolContext = {}): Promise<ToolResult> {
    const tool = this.get(toolName);

    if (!tool) {
      return {
        success: false,
        error: `Tool '${toolName}' not found`,
      };
    }

    try {
      const startTime = Date.now();
      const result = await tool.execute(args, context);
      const executionTime = Date.now() - startTime;

      return {
        ...result,
        metadata: {
          ...result.metadata,
          executionTime,
        },
      };
    } catch (error) {
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  /**
   * Discover a shell tool and register it as `<file name>__<title>`.
   * A later load under the same name replaces the earlier one.
   * @returns The namespaced name
   */
  async loadShellTool(
    filePath: string,
    executor: IProcessExecutor,
    options?: ShellToolOptions
  ): Promise<string> {
    const tool = await ShellTool.load(filePath, executor, options);
    const name = `${namespaceFor(filePath)}__${tool.definition.name}`;

    const replaced = this.tools.has(name);
    this.register(new NamespacedTool(tool, name), { replace: true });
    logger.info(`${replaced ? 'replaced' : 'registered'} shell tool: ${name}`, { command: filePath });

    return name;
  }

  /**
   * Load several shell tools, skipping any that fail
   * @returns Names of the tools that were registered
   */
  async loadShellTools(
    filePaths: string[],
    executor: IProcessExecutor,
    options?: ShellToolOptions
  ): Promise<string[]> {
    const names: string[] = [];

    for (const filePath of filePaths) {
      logger.debug(`loading tool from: ${filePath}`);
      try {
        names.push(await this.loadShellTool(filePath, executor, options));
      } catch (error) {
        logger.warn(`failed to load tool ${filePath}`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return names;
  }

  /**
   * Clear all tools
   */
  clear(): void {
    this.tools.clear();
  }
}

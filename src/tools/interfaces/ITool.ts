/**
 * ITool - Interface for tool implementations
 */

import type { ToolArguments, ToolContext, ToolDefinition, ToolResult, ToolSchema } from '../types.js';

/**
 * Tool interface - defines contract for all tool implementations
 */
export interface ITool {
  /**
   * Tool definition (name, description, metadata)
   */
  readonly definition: ToolDefinition;

  /**
   * Execute the tool with given arguments
   * @param args - Parsed JSON arguments (not validated against the schema)
   * @param context - Execution context
   */
  execute(args: ToolArguments, context?: ToolContext): Promise<ToolResult>;

  /**
   * Schema Descriptor for discovery
   */
  getSchema(): ToolSchema;
}

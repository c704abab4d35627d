/**
 * Tool system types
 */

import { z } from 'zod';

/**
 * Descriptor of a single tool parameter
 */
export const SchemaPropertySchema = z
  .object({
    type: z.string(),
    description: z.string().optional(),
  })
  .passthrough();

export type SchemaProperty = z.infer<typeof SchemaPropertySchema>;

/**
 * Schema Descriptor printed by `--schema` and read back by hosts.
 * Discovered schemas may omit everything but `title` and `type`.
 */
export const ToolSchemaSchema = z.object({
  title: z.string().min(1),
  description: z.string().default(''),
  type: z.literal('object'),
  properties: z.record(SchemaPropertySchema).default({}),
  required: z.array(z.string()).default([]),
});

export type ToolSchema = z.output<typeof ToolSchemaSchema>;

/**
 * Arguments passed to `execute`, parsed from one JSON object
 */
export type ToolArguments = Record<string, unknown>;

/**
 * Tool execution result
 */
export interface ToolResult {
  success: boolean;
  output?: string;
  error?: string;
  metadata?: {
    executionTime?: number;
    exitCode?: number;
    [key: string]: unknown;
  };
}

/**
 * Tool execution context
 */
export interface ToolContext {
  workingDirectory?: string;
  environment?: Record<string, string>;
  timeout?: number;
}

/**
 * Tool source type
 */
export type ToolSource = 'built-in' | 'shell';

/**
 * Tool metadata
 */
export interface ToolMetadata {
  source: ToolSource;
  version?: string;
}

/**
 * Tool definition
 */
export interface ToolDefinition {
  name: string;
  description: string;
  metadata: ToolMetadata;
}

/**
 * Definition of a tool whose parameters are declared with Zod
 */
export interface ParameterizedToolDefinition<TShape extends z.ZodRawShape = z.ZodRawShape>
  extends ToolDefinition {
  parameters: z.ZodObject<TShape>;
}

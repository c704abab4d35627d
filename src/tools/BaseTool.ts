/**
 * BaseTool - Abstract base class for tool implementations
 */

import { z } from 'zod';
import type { ITool } from './interfaces/ITool.js';
import type {
  ParameterizedToolDefinition,
  SchemaProperty,
  ToolArguments,
  ToolContext,
  ToolResult,
  ToolSchema,
} from './types.js';

/**
 * Base tool class providing common functionality
 */
export abstract class BaseTool<TShape extends z.ZodRawShape = z.ZodRawShape> implements ITool {
  constructor(public readonly definition: ParameterizedToolDefinition<TShape>) {}

  /**
   * Execute the tool - must be implemented by subclasses
   */
  abstract execute(args: ToolArguments, context?: ToolContext): Promise<ToolResult>;

  /**
   * Build the Schema Descriptor from the declared parameters.
   * A fresh object is returned on every call.
   */
  getSchema(): ToolSchema {
    const properties: Record<string, SchemaProperty> = {};
    const required: string[] = [];
    const shape: z.ZodRawShape = this.definition.parameters.shape;

    for (const [key, field] of Object.entries(shape)) {
      properties[key] =
        field.description === undefined
          ? { type: this.getJsonType(field) }
          : { type: this.getJsonType(field), description: field.description };

      if (!field.isOptional()) {
        required.push(key);
      }
    }

    return {
      title: this.definition.name,
      description: this.definition.description,
      type: 'object',
      properties,
      required,
    };
  }

  /**
   * Get JSON type from Zod type
   */
  private getJsonType(field: z.ZodTypeAny): string {
    if (field instanceof z.ZodOptional || field instanceof z.ZodNullable) {
      return this.getJsonType(field.unwrap());
    }
    if (field instanceof z.ZodDefault) return this.getJsonType(field.removeDefault());
    if (field instanceof z.ZodString || field instanceof z.ZodEnum) return 'string';
    if (field instanceof z.ZodNumber) return field.isInt ? 'integer' : 'number';
    if (field instanceof z.ZodBoolean) return 'boolean';
    if (field instanceof z.ZodArray) return 'array';
    if (field instanceof z.ZodObject || field instanceof z.ZodRecord) return 'object';
    return 'string'; // default
  }

  /**
   * Helper to create success result
   */
  protected success(output: string, metadata?: ToolResult['metadata']): ToolResult {
    return {
      success: true,
      output,
      metadata,
    };
  }

  /**
   * Helper to create error result
   */
  protected error(error: string, metadata?: ToolResult['metadata']): ToolResult {
    return {
      success: false,
      error,
      metadata,
    };
  }
}

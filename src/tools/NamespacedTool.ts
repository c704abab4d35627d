/**
 * NamespacedTool - Exposes a tool under a different name
 */

import type { ITool } from './interfaces/ITool.js';
import type { ToolArguments, ToolContext, ToolDefinition, ToolResult, ToolSchema } from './types.js';

export class NamespacedTool implements ITool {
  readonly definition: ToolDefinition;

  constructor(
    private readonly inner: ITool,
    name: string
  ) {
    this.definition = { ...inner.definition, name };
  }

  getSchema(): ToolSchema {
    return { ...this.inner.getSchema(), title: this.definition.name };
  }

  execute(args: ToolArguments, context?: ToolContext): Promise<ToolResult> {
    return this.inner.execute(args, context);
  }
}

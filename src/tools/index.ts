// Tools exports

// Types
export * from './types.js';

// Interfaces
export type { ITool } from './interfaces/ITool.js';

// Convention
export { EXECUTE_FLAG, SCHEMA_FLAG, isToolArguments, parseToolArguments } from './convention.js';

// Base classes
export { BaseTool } from './BaseTool.js';
export { NamespacedTool } from './NamespacedTool.js';
export { ShellTool } from './ShellTool.js';

// Registry
export { ToolRegistry, namespaceFor } from './ToolRegistry.js';
export type { RegisterOptions } from './ToolRegistry.js';

// Built-in tools
export { WeatherTool, getWeather, resolveLocation, DEFAULT_LOCATION } from './built-in/WeatherTool.js';

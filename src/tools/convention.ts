/**
 * The tool invocation convention shared by tools and hosts
 *
 *   <tool> --schema            print the Schema Descriptor as one JSON line
 *   <tool> --execute '<json>'  run with a JSON object of arguments
 */

import { MalformedArgumentsError } from '../shared/utils/errors.js';
import type { ToolArguments } from './types.js';

export const SCHEMA_FLAG = '--schema';
export const EXECUTE_FLAG = '--execute';

export function isToolArguments(value: unknown): value is ToolArguments {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON argument blob into an argument mapping.
 * Throws MalformedArgumentsError if the text is not JSON or not a JSON object.
 */
export function parseToolArguments(payload: string): ToolArguments {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch (error) {
    throw new MalformedArgumentsError(
      `Invalid JSON arguments: ${error instanceof Error ? error.message : String(error)}`,
      payload
    );
  }

  if (!isToolArguments(parsed)) {
    throw new MalformedArgumentsError('Tool arguments must be a JSON object', payload);
  }

  return parsed;
}

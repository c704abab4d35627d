/**
 * WeatherTool - Mocked weather lookup
 */

import { z } from 'zod';
import { BaseTool } from '../BaseTool.js';
import type { ToolArguments, ToolResult } from '../types.js';

export const DEFAULT_LOCATION = 'unknown';

/**
 * Stub capability: no data source is consulted.
 */
export function getWeather(location: string): string {
  return `The weather in ${location} is sunny and 72°F`;
}

const weatherParameters = {
  location: z.string().describe('The location to get weather for'),
};

// Scalars are formatted as given; missing, null and structured values fall back
const LenientLocationSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value))
  .catch(DEFAULT_LOCATION);

export function resolveLocation(args: ToolArguments): string {
  return LenientLocationSchema.parse(args.location);
}

/**
 * Weather lookup tool. The declared parameters only describe the tool;
 * arguments are read leniently and never rejected.
 */
export class WeatherTool extends BaseTool<typeof weatherParameters> {
  constructor() {
    super({
      name: 'get_weather',
      description: 'Get the current weather for a location',
      parameters: z.object(weatherParameters),
      metadata: {
        source: 'built-in',
      },
    });
  }

  async execute(args: ToolArguments): Promise<ToolResult> {
    return this.success(getWeather(resolveLocation(args)));
  }
}

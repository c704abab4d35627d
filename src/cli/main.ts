/**
 * get-weather program: runs the weather tool and maps failures to an exit code
 */

import { logger } from '../shared/utils/logger.js';
import { WeatherTool } from '../tools/built-in/WeatherTool.js';
import { runToolProgram } from './createToolProgram.js';

export async function main(
  userArgs: readonly string[],
  write?: (text: string) => void
): Promise<number> {
  try {
    await runToolProgram(
      new WeatherTool(),
      { name: 'get-weather', example: '{"location": "New York"}', write },
      userArgs
    );
    return 0;
  } catch (error) {
    logger.error(error instanceof Error ? `${error.name}: ${error.message}` : String(error));
    return 1;
  }
}

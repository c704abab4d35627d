/**
 * Tool program - exposes one tool through the --schema / --execute convention
 *
 * Only the first two arguments are read, in order. Anything that is not a
 * recognised mode prints the usage line and exits normally.
 */

import { Command } from 'commander';
import { EXECUTE_FLAG, SCHEMA_FLAG, parseToolArguments } from '../tools/convention.js';
import type { ITool } from '../tools/interfaces/ITool.js';
import { ToolShimError } from '../shared/utils/errors.js';

export interface ToolProgramOptions {
  /** Executable name shown in the usage line */
  name: string;
  /** Example JSON arguments shown in the usage line */
  example: string;
  /** Sink for protocol output (defaults to stdout) */
  write?: (text: string) => void;
}

export function formatUsage(name: string, example: string): string {
  return `Usage: ${name} ${SCHEMA_FLAG} | ${name} ${EXECUTE_FLAG} '${example}'`;
}

/**
 * Build the program for one invocation. The mode is read from `userArgs`
 * directly: commander drops a leading `--`, which must still count as the
 * first argument.
 */
export function createToolProgram(
  tool: ITool,
  options: ToolProgramOptions,
  userArgs: readonly string[]
): Command {
  const write =
    options.write ??
    ((text: string) => {
      process.stdout.write(text);
    });
  const [mode, payload] = userArgs;

  const program = new Command();

  program
    .name(options.name)
    .description(tool.definition.description)
    .helpOption(false)
    .allowUnknownOption()
    .allowExcessArguments()
    .argument('[mode]', `${SCHEMA_FLAG} or ${EXECUTE_FLAG}`)
    .argument('[payload]', 'JSON object of arguments for execute mode')
    .action(async () => {
      if (mode === SCHEMA_FLAG) {
        write(`${JSON.stringify(tool.getSchema())}\n`);
        return;
      }

      if (mode === EXECUTE_FLAG && payload !== undefined) {
        const args = parseToolArguments(payload);
        const result = await tool.execute(args);
        if (!result.success) {
          throw new ToolShimError(result.error ?? `Tool '${tool.definition.name}' failed`);
        }
        write(`${result.output ?? ''}\n`);
        return;
      }

      write(`${formatUsage(options.name, options.example)}\n`);
    });

  return program;
}

/**
 * Run a tool program against the user arguments (argv without node and script)
 */
export async function runToolProgram(
  tool: ITool,
  options: ToolProgramOptions,
  userArgs: readonly string[]
): Promise<void> {
  await createToolProgram(tool, options, userArgs).parseAsync([...userArgs], { from: 'user' });
}

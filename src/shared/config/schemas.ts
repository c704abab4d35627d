/**
 * Configuration schemas with Zod validation
 */

import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Logger settings. Defaults keep a normal tool run silent on stderr,
 * since hosts may read stdout and stderr together.
 */
export const LoggerConfigSchema = z.object({
  level: LogLevelSchema.default('warn'),
  logDir: z.string().min(1).optional(), // File logging stays off unless set
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;

export const ShellToolOptionsSchema = z.object({
  timeout: z.number().int().positive().default(30000),
  cwd: z.string().optional(),
  env: z.record(z.string()).optional(),
});

export type ShellToolOptions = z.input<typeof ShellToolOptionsSchema>;
export type ResolvedShellToolOptions = z.output<typeof ShellToolOptionsSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Read logger settings from the environment.
 * LOG_LEVEL picks the level, TOOL_SHIM_LOG_DIR turns on rotating file logs.
 */
export function loadLoggerConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const result = LoggerConfigSchema.safeParse({
    level: env.LOG_LEVEL ? env.LOG_LEVEL.toLowerCase() : undefined,
    logDir: env.TOOL_SHIM_LOG_DIR || undefined,
  });

  if (!result.success) {
    throw new ConfigurationError(`Invalid logger configuration: ${formatIssues(result.error)}`);
  }

  return result.data;
}

export function resolveShellToolOptions(options: ShellToolOptions = {}): ResolvedShellToolOptions {
  const result = ShellToolOptionsSchema.safeParse(options);

  if (!result.success) {
    throw new ConfigurationError(`Invalid shell tool options: ${formatIssues(result.error)}`);
  }

  return result.data;
}

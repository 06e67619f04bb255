/**
 * Configuration for Rendermark Scratch
 *
 * Settings come from the environment and are parsed once by loadConfig.
 */

import { z } from 'zod';
import { ScratchError, ScratchErrorCode } from '../errors/scratch-error.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ScratchConfig {
  /** Minimum level written by loggers */
  readonly logLevel: LogLevel;
  /** Name attached to every log line */
  readonly logName: string;
}

export const DEFAULT_CONFIG: ScratchConfig = {
  logLevel: 'info',
  logName: 'rendermark-scratch',
};

// LOG_LEVEL is shared with other tools, so values pino does not know are ignored.
const EnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional().catch(undefined),
  SCRATCH_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  SCRATCH_LOGGING: z.enum(['true', 'false']).optional(),
  SCRATCH_LOG_NAME: z.string().min(1).optional(),
});

function defaultLevel(nodeEnv: string | undefined): LogLevel {
  if (nodeEnv === 'test') return 'silent';
  if (nodeEnv === 'production') return DEFAULT_CONFIG.logLevel;
  return 'debug';
}

/**
 * Read configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScratchConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ScratchError(
      ScratchErrorCode.INVALID_CONFIG,
      `Invalid scratch configuration: ${issues.join(', ')}`,
      { issues }
    );
  }

  const vars = parsed.data;
  const logLevel =
    vars.SCRATCH_LOGGING === 'false'
      ? 'silent'
      : vars.SCRATCH_LOG_LEVEL ?? vars.LOG_LEVEL ?? defaultLevel(vars.NODE_ENV);

  return {
    logLevel,
    logName: vars.SCRATCH_LOG_NAME ?? DEFAULT_CONFIG.logName,
  };
}

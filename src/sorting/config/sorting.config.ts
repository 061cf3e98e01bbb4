import * as Joi from 'joi';
import type { LogLevel } from '@nestjs/common';

export const SORTING_LOG_LEVELS = [
  'error',
  'warn',
  'log',
  'debug',
  'verbose',
] as const satisfies readonly LogLevel[];

export type SortingLogLevel = (typeof SORTING_LOG_LEVELS)[number];

// stdout carries only report lines unless asked otherwise
export const sortingLogLevelSchema = Joi.string()
  .valid(...SORTING_LOG_LEVELS)
  .default('warn')
  .label('SORTING_LOG_LEVEL');

export const sortingEnvSchema = Joi.object({
  SORTING_VALIDATE_INPUT: Joi.boolean().default(false),
  SORTING_LOG_LEVEL: sortingLogLevelSchema,
});

/**
 * Levels enabled at and above `level`, in the order Nest expects them.
 * Runs before the config module boots, so it validates `level` itself.
 */
export function logLevelsFrom(level: string | undefined): LogLevel[] {
  const { value, error } = sortingLogLevelSchema.validate(level);
  if (error) {
    throw error;
  }
  const idx = SORTING_LOG_LEVELS.findIndex((l) => l === value);
  return SORTING_LOG_LEVELS.slice(0, idx + 1);
}

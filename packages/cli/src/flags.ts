import {
  ConfigError,
  ErrorCode,
  didYouMean,
  parseTier,
  type Tier,
} from '@schemasmith/core';
import { DEFAULT_LOG_LEVEL, isLogLevel, LOG_LEVELS, type LogLevel } from './logger.js';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  output?: string;
  tier?: string;
  pretty?: boolean;
  validate?: boolean;
  batch?: boolean;
  config?: string;
  maxDepth?: string;
  logLevel?: string;
}

/**
 * Resolve the --tier flag; undefined when the flag was not given.
 */
export function resolveTierFlag(raw: string | undefined): Tier | undefined {
  return raw === undefined ? undefined : parseTier(raw);
}

/**
 * Parse --max-depth into a non-negative integer.
 */
export function parseMaxDepth(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError({
      message: `Invalid --max-depth "${raw}". Expected a non-negative integer.`,
      context: { setting: 'maxDepth', value: raw },
    });
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Flag wins over the SCHEMASMITH_LOG environment variable; both fall back
 * to `warn`.
 */
export function resolveLogLevel(
  flag: string | undefined,
  env: string | undefined = process.env.SCHEMASMITH_LOG
): LogLevel {
  const raw = flag ?? env;
  if (raw === undefined || raw.trim() === '') return DEFAULT_LOG_LEVEL;

  const normalized = raw.trim().toLowerCase();
  if (isLogLevel(normalized)) return normalized;

  const candidates = didYouMean(normalized, LOG_LEVELS);
  const error = new ConfigError({
    message: `Invalid log level "${raw}". Expected one of: ${LOG_LEVELS.join(', ')}.`,
    errorCode: ErrorCode.CONFIGURATION_ERROR,
    context: { setting: 'logLevel', value: raw },
  });
  error.suggestions = candidates.map((level) => `Use --log-level ${level}`);
  throw error;
}

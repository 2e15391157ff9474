/**
 * Configuration options for schema inference
 *
 * All options are optional; the defaults reproduce the unguarded reference
 * behaviour.
 */

import { ConfigError } from './errors.js';

export interface InferenceOptions {
  /**
   * Maximum nesting depth of the input value (root = 0).
   * Default: Infinity (no guard; very deep input can exhaust the call stack).
   */
  maxDepth?: number;
}

export type ResolvedInferenceOptions = Required<InferenceOptions>;

export const DEFAULT_INFERENCE_OPTIONS: Readonly<ResolvedInferenceOptions> = {
  maxDepth: Number.POSITIVE_INFINITY,
};

/**
 * Merge user options over the defaults and validate the result.
 * @throws ConfigError on out-of-range values
 */
export function resolveInferenceOptions(
  userOptions: InferenceOptions = {}
): ResolvedInferenceOptions {
  const resolved: ResolvedInferenceOptions = {
    ...DEFAULT_INFERENCE_OPTIONS,
    ...stripUndefined(userOptions),
  };

  validateOptions(resolved);
  return resolved;
}

function stripUndefined(options: InferenceOptions): InferenceOptions {
  const out: InferenceOptions = {};
  if (options.maxDepth !== undefined) out.maxDepth = options.maxDepth;
  return out;
}

function validateOptions(options: ResolvedInferenceOptions): void {
  const { maxDepth } = options;
  if (
    maxDepth !== Number.POSITIVE_INFINITY &&
    (!Number.isInteger(maxDepth) || maxDepth < 0)
  ) {
    throw new ConfigError({
      message: `maxDepth must be a non-negative integer or Infinity, got ${String(maxDepth)}`,
      context: { setting: 'maxDepth', value: maxDepth },
    });
  }
}

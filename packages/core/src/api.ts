import type { JsonValue } from './types/json.js';
import type { SchemaDoc } from './types/schema.js';
import type { Tier } from './types/tier.js';
import type { InferenceOptions } from './types/options.js';
import { inferSchema } from './generator/index.js';

/**
 * Infer a JSON Schema document describing `value` at the given tier.
 *
 * Pure: the input is never mutated and every call returns a fresh document.
 *
 * @throws NumericRangeError when a derived numeric bound leaves the
 *   representable range (comprehensive and expert tiers only)
 * @throws InferenceError for values outside the JSON domain, or when
 *   `options.maxDepth` is exceeded
 * @throws ConfigError for an unknown tier or invalid options
 */
export function generateSchema(
  value: JsonValue,
  tier: Tier,
  options?: InferenceOptions
): SchemaDoc {
  return inferSchema(value, tier, options).unwrap();
}

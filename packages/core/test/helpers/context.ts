import {
  createInferenceContext,
  type InferenceContext,
} from '../../src/generator/schema-generator.js';
import { resolveInferenceOptions, type InferenceOptions } from '../../src/types/options.js';
import type { Tier } from '../../src/types/tier.js';

/** Root inference context for exercising a generator directly */
export function contextFor(tier: Tier, options: InferenceOptions = {}): InferenceContext {
  return createInferenceContext(tier, resolveInferenceOptions(options));
}

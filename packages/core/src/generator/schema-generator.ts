/**
 * Schema Generator Base Class and Context
 * Provides the foundation for the per-kind schema generators
 */

import type { Result } from '../types/result.js';
import type { InferenceError } from '../types/errors.js';
import type { JsonKind } from '../types/json.js';
import { appendPointer } from '../types/json.js';
import type { BaseSchemaDoc, SchemaDoc } from '../types/schema.js';
import type { Tier } from '../types/tier.js';
import type { ResolvedInferenceOptions } from '../types/options.js';
import {
  getTierPolicy,
  type Annotation,
  type TierPolicy,
} from '../policy/tier-policy.js';

/**
 * Inference context threaded read-only through the recursion
 */
export interface InferenceContext {
  /** Selected output tier */
  readonly tier: Tier;

  /** Policy row for the tier */
  readonly policy: Readonly<TierPolicy>;

  /** JSON Pointer of the value being processed (root = '') */
  readonly path: string;

  /** Nesting depth of the value (root = 0) */
  readonly depth: number;

  /** Resolved inference options */
  readonly options: Readonly<ResolvedInferenceOptions>;
}

export function createInferenceContext(
  tier: Tier,
  options: Readonly<ResolvedInferenceOptions>
): InferenceContext {
  return {
    tier,
    policy: getTierPolicy(tier),
    path: '',
    depth: 0,
    options,
  };
}

export function createChildContext(
  parent: InferenceContext,
  segment: string | number
): InferenceContext {
  return {
    ...parent,
    path: appendPointer(parent.path, segment),
    depth: parent.depth + 1,
  };
}

/**
 * Routes child values back through the dispatcher. Composite generators
 * receive one so they never import the dispatcher directly.
 */
export interface ChildSchemaResolver {
  resolveChild(
    value: unknown,
    parent: InferenceContext,
    segment: string | number
  ): Result<SchemaDoc, InferenceError>;
}

/**
 * Abstract base class for all schema generators
 */
export abstract class SchemaGenerator<V, S extends SchemaDoc> {
  /** Kind tag of the values this generator handles */
  abstract readonly kind: JsonKind;

  /**
   * Build the schema document for one value.
   * The returned document is freshly allocated and owned by the caller.
   */
  abstract generate(value: V, context: InferenceContext): Result<S, InferenceError>;

  /**
   * Copy a policy annotation (title, optional description) onto a document.
   */
  protected annotate<D extends BaseSchemaDoc>(
    schema: D,
    annotation: Annotation | undefined
  ): D {
    if (!annotation) return schema;
    schema.title = annotation.title;
    if (annotation.description !== undefined) {
      schema.description = annotation.description;
    }
    return schema;
  }
}

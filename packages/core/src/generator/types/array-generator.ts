/**
 * Array Generator
 * Infers array schemas. Element kinds decide between a single `items`
 * schema and a per-element `oneOf`.
 */

import { ok, type Result } from '../../types/result.js';
import type { InferenceError } from '../../types/errors.js';
import type { JsonArray } from '../../types/json.js';
import type { ArrayItems, ArraySchemaDoc, SchemaDoc } from '../../types/schema.js';
import { isHomogeneousArray } from '../../heuristics/array-kinds.js';
import {
  SchemaGenerator,
  type ChildSchemaResolver,
  type InferenceContext,
} from '../schema-generator.js';

export class ArrayGenerator extends SchemaGenerator<JsonArray, ArraySchemaDoc> {
  readonly kind = 'array' as const;

  constructor(private readonly resolver: ChildSchemaResolver) {
    super();
  }

  generate(
    value: JsonArray,
    context: InferenceContext
  ): Result<ArraySchemaDoc, InferenceError> {
    // Empty arrays carry no constraints at any tier.
    if (value.length === 0) {
      return ok({ type: 'array', items: {} });
    }

    const items = this.inferItems(value, context);
    if (items.isErr()) return items;

    return ok(
      this.applyPolicy({ type: 'array', items: items.value }, value.length, context)
    );
  }

  /**
   * A homogeneous array takes the schema of its first element only; sibling
   * shapes are not compared. Mixed kinds keep one schema per element, and any
   * hole or non-JSON element is dispatched so it fails at its own pointer.
   */
  private inferItems(
    value: JsonArray,
    context: InferenceContext
  ): Result<ArrayItems, InferenceError> {
    if (isHomogeneousArray(value)) {
      return this.resolver.resolveChild(value[0], context, 0);
    }

    const oneOf: SchemaDoc[] = [];
    for (let i = 0; i < value.length; i++) {
      const item = this.resolver.resolveChild(value[i], context, i);
      if (item.isErr()) return item;
      oneOf.push(item.value);
    }

    return ok({ oneOf });
  }

  private applyPolicy(
    schema: ArraySchemaDoc,
    length: number,
    context: InferenceContext
  ): ArraySchemaDoc {
    const policy = context.policy.array;
    if (policy.minItems !== undefined) {
      schema.minItems = policy.minItems;
    }
    if (policy.maxItemsFactor !== undefined) {
      schema.maxItems = length * policy.maxItemsFactor;
    }
    if (policy.uniqueItems !== undefined) {
      schema.uniqueItems = policy.uniqueItems;
    }
    return this.annotate(schema, policy.annotation);
  }
}

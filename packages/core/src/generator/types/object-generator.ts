/**
 * Object Generator
 * Infers object schemas: one property schema per key, in input key order,
 * with `required` and the closed-object keywords taken from the tier policy.
 */

import { ok, type Result } from '../../types/result.js';
import type { InferenceError } from '../../types/errors.js';
import type { JsonObject, JsonValue } from '../../types/json.js';
import type { ObjectSchemaDoc, SchemaDoc } from '../../types/schema.js';
import {
  SCHEMA_DRAFT_URI,
  type RequiredPolicy,
} from '../../policy/tier-policy.js';
import {
  SchemaGenerator,
  type ChildSchemaResolver,
  type InferenceContext,
} from '../schema-generator.js';

export class ObjectGenerator extends SchemaGenerator<JsonObject, ObjectSchemaDoc> {
  readonly kind = 'object' as const;

  constructor(private readonly resolver: ChildSchemaResolver) {
    super();
  }

  generate(
    value: JsonObject,
    context: InferenceContext
  ): Result<ObjectSchemaDoc, InferenceError> {
    const policy = context.policy.object;
    const properties: Record<string, SchemaDoc> = {};
    const required: string[] = [];

    for (const [key, child] of Object.entries(value)) {
      const result = this.resolver.resolveChild(child, context, key);
      if (result.isErr()) return result;

      defineProperty(properties, key, result.value);
      if (isRequired(policy.required, child)) {
        required.push(key);
      }
    }

    const schema: ObjectSchemaDoc = policy.declareDraft
      ? { $schema: SCHEMA_DRAFT_URI, type: 'object', properties }
      : { type: 'object', properties };
    if (required.length > 0) {
      schema.required = required;
    }
    if (policy.additionalProperties !== undefined) {
      schema.additionalProperties = policy.additionalProperties;
    }
    // Applied even when the input object has no keys.
    if (policy.minProperties !== undefined) {
      schema.minProperties = policy.minProperties;
    }

    return ok(this.annotate(schema, policy.annotation));
  }
}

function isRequired(policy: RequiredPolicy, child: JsonValue): boolean {
  switch (policy) {
    case 'none':
      return false;
    case 'non-null':
      return child !== null;
    case 'all':
      return true;
  }
}

/**
 * Plain assignment would route a `__proto__` key through the prototype
 * setter instead of creating an own property.
 */
function defineProperty(
  target: Record<string, SchemaDoc>,
  key: string,
  schema: SchemaDoc
): void {
  Object.defineProperty(target, key, {
    value: schema,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

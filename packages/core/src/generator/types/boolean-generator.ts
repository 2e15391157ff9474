/**
 * Boolean Generator
 * Infers boolean schemas; the value itself is only surfaced as an example
 */

import { ok, type Result } from '../../types/result.js';
import type { InferenceError } from '../../types/errors.js';
import type { BooleanSchemaDoc } from '../../types/schema.js';
import { SchemaGenerator, type InferenceContext } from '../schema-generator.js';

export class BooleanGenerator extends SchemaGenerator<
  boolean,
  BooleanSchemaDoc
> {
  readonly kind = 'boolean' as const;

  generate(
    value: boolean,
    context: InferenceContext
  ): Result<BooleanSchemaDoc, InferenceError> {
    const policy = context.policy.boolean;
    const schema: BooleanSchemaDoc = { type: 'boolean' };

    if (policy.examples) {
      schema.examples = [value];
    }

    return ok(this.annotate(schema, policy.annotation));
  }
}

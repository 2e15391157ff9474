/**
 * Null Generator
 */

import { ok, type Result } from '../../types/result.js';
import type { InferenceError } from '../../types/errors.js';
import type { NullSchemaDoc } from '../../types/schema.js';
import { SchemaGenerator, type InferenceContext } from '../schema-generator.js';

export class NullGenerator extends SchemaGenerator<null, NullSchemaDoc> {
  readonly kind = 'null' as const;

  // Identical at every tier.
  generate(
    _value: null,
    _context: InferenceContext
  ): Result<NullSchemaDoc, InferenceError> {
    return ok({ type: 'null' });
  }
}

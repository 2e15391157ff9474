/**
 * String Generator
 * Infers string schemas with length bounds, examples and format sniffing
 */

import { ok, type Result } from '../../types/result.js';
import type { InferenceError } from '../../types/errors.js';
import type { StringSchemaDoc } from '../../types/schema.js';
import {
  detectStringFormat,
  detectStringPattern,
} from '../../heuristics/string-format.js';
import { SchemaGenerator, type InferenceContext } from '../schema-generator.js';

export class StringGenerator extends SchemaGenerator<string, StringSchemaDoc> {
  readonly kind = 'string' as const;

  generate(
    value: string,
    context: InferenceContext
  ): Result<StringSchemaDoc, InferenceError> {
    const policy = context.policy.string;
    const schema: StringSchemaDoc = { type: 'string' };

    if (policy.minLength !== undefined) {
      schema.minLength = policy.minLength;
    }

    if (policy.maxLengthFactor !== undefined) {
      // Measured in UTF-8 bytes, not UTF-16 code units.
      schema.maxLength = Buffer.byteLength(value, 'utf8') * policy.maxLengthFactor;
    }

    if (value.length > 0) {
      if (policy.examples) {
        schema.examples = [value];
      }
      if (policy.detectFormat) {
        this.applyFormat(schema, value);
      }
    }

    return ok(this.annotate(schema, policy.annotation));
  }

  /** format and pattern are mutually exclusive */
  private applyFormat(schema: StringSchemaDoc, value: string): void {
    const format = detectStringFormat(value);
    if (format !== undefined) {
      schema.format = format;
      return;
    }
    const pattern = detectStringPattern(value);
    if (pattern !== undefined) {
      schema.pattern = pattern;
    }
  }
}

/**
 * Number Generator
 * Infers `integer` / `number` schemas. Integer bounds use exact 64-bit
 * arithmetic; float bounds use IEEE-754 and must stay finite.
 */

import { err, ok, type Result } from '../../types/result.js';
import {
  NumericRangeError,
  type InferenceError,
  type NumericBound,
} from '../../types/errors.js';
import type { NumberSchemaDoc, SchemaNumber } from '../../types/schema.js';
import {
  classifyNumber,
  offsetFloat,
  offsetInteger,
  toSchemaNumber,
  type NumericClass,
} from '../../util/numeric.js';
import { SchemaGenerator, type InferenceContext } from '../schema-generator.js';

export class NumberGenerator extends SchemaGenerator<
  number | bigint,
  NumberSchemaDoc
> {
  readonly kind = 'number' as const;

  generate(
    value: number | bigint,
    context: InferenceContext
  ): Result<NumberSchemaDoc, InferenceError> {
    const policy = context.policy.number;
    const numeric = classifyNumber(value);
    const literal = this.toLiteral(numeric);
    const schema: NumberSchemaDoc = {
      type: numeric.kind === 'integer' ? 'integer' : 'number',
    };

    if (policy.examples) {
      schema.examples = [literal];
    }

    switch (policy.bounds) {
      case 'none':
        break;
      case 'literal-minimum':
        schema.minimum = literal;
        break;
      case 'window': {
        const minimum = this.offset(numeric, -policy.boundWindow);
        if (minimum === undefined) {
          return err(this.rangeError(value, 'minimum', context));
        }
        const maximum = this.offset(numeric, policy.boundWindow);
        if (maximum === undefined) {
          return err(this.rangeError(value, 'maximum', context));
        }
        schema.minimum = minimum;
        schema.maximum = maximum;
        break;
      }
    }

    if (numeric.kind === 'integer') {
      if (policy.integerMultipleOf !== undefined) {
        schema.multipleOf = policy.integerMultipleOf;
      }
      return ok(this.annotate(schema, policy.integerAnnotation));
    }
    return ok(this.annotate(schema, policy.numberAnnotation));
  }

  private toLiteral(numeric: NumericClass): SchemaNumber {
    return numeric.kind === 'integer' ? toSchemaNumber(numeric.value) : numeric.value;
  }

  private offset(numeric: NumericClass, delta: number): SchemaNumber | undefined {
    if (numeric.kind === 'integer') {
      const shifted = offsetInteger(numeric.value, delta);
      return shifted === undefined ? undefined : toSchemaNumber(shifted);
    }
    return offsetFloat(numeric.value, delta);
  }

  private rangeError(
    value: number | bigint,
    bound: NumericBound,
    context: InferenceContext
  ): NumericRangeError {
    return new NumericRangeError({ value, bound, path: context.path });
  }
}

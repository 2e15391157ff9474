/**
 * Schema dispatcher
 * Routes each value to the generator for its kind and recurses through
 * itself for the children of objects and arrays.
 */

import { err, type Result } from '../types/result.js';
import { ErrorCode } from '../errors/codes.js';
import { ConfigError, InferenceError } from '../types/errors.js';
import { classifyValue, type JsonValue } from '../types/json.js';
import type { SchemaDoc } from '../types/schema.js';
import { isTier, TIERS, type Tier } from '../types/tier.js';
import {
  resolveInferenceOptions,
  type InferenceOptions,
  type ResolvedInferenceOptions,
} from '../types/options.js';
import {
  createChildContext,
  createInferenceContext,
  type ChildSchemaResolver,
  type InferenceContext,
} from './schema-generator.js';
import {
  ArrayGenerator,
  BooleanGenerator,
  NullGenerator,
  NumberGenerator,
  ObjectGenerator,
  StringGenerator,
} from './types/index.js';

export class SchemaDispatcher implements ChildSchemaResolver {
  private readonly objects = new ObjectGenerator(this);
  private readonly arrays = new ArrayGenerator(this);
  private readonly strings = new StringGenerator();
  private readonly numbers = new NumberGenerator();
  private readonly booleans = new BooleanGenerator();
  private readonly nulls = new NullGenerator();

  dispatch(
    value: unknown,
    context: InferenceContext
  ): Result<SchemaDoc, InferenceError> {
    if (context.depth > context.options.maxDepth) {
      return err(
        new InferenceError({
          message: `Maximum nesting depth ${context.options.maxDepth} exceeded at ${context.path}`,
          errorCode: ErrorCode.DEPTH_LIMIT_EXCEEDED,
          context: {
            path: context.path,
            depth: context.depth,
            suggestion: 'Raise --max-depth or flatten the input',
          },
        })
      );
    }

    const classified = classifyValue(value);
    switch (classified.kind) {
      case 'object':
        return this.objects.generate(classified.value, context);
      case 'array':
        return this.arrays.generate(classified.value, context);
      case 'string':
        return this.strings.generate(classified.value, context);
      case 'number':
        return this.numbers.generate(classified.value, context);
      case 'boolean':
        return this.booleans.generate(classified.value, context);
      case 'null':
        return this.nulls.generate(classified.value, context);
      case 'unsupported':
        return err(
          new InferenceError({
            message: `Unsupported value at ${context.path || '/'}: ${classified.reason}`,
            errorCode: ErrorCode.UNSUPPORTED_VALUE,
            context: { path: context.path, valueExcerpt: String(classified.value) },
          })
        );
      default: {
        const unreachable: never = classified;
        throw new Error(`Unhandled value kind: ${String(unreachable)}`);
      }
    }
  }

  resolveChild(
    value: unknown,
    parent: InferenceContext,
    segment: string | number
  ): Result<SchemaDoc, InferenceError> {
    return this.dispatch(value, createChildContext(parent, segment));
  }
}

const dispatcher = new SchemaDispatcher();

/**
 * Infer a schema document for `value` at `tier` without throwing.
 */
export function inferSchema(
  value: JsonValue,
  tier: Tier,
  options: InferenceOptions = {}
): Result<SchemaDoc, InferenceError | ConfigError> {
  if (!isTier(tier)) {
    return err(
      new ConfigError({
        message: `Invalid tier "${String(tier)}". Expected one of: ${TIERS.join(', ')}.`,
        errorCode: ErrorCode.INVALID_TIER,
        context: { setting: 'tier', value: tier },
      })
    );
  }

  let resolved: ResolvedInferenceOptions;
  try {
    resolved = resolveInferenceOptions(options);
  } catch (error) {
    if (error instanceof ConfigError) return err(error);
    throw error;
  }

  return dispatcher.dispatch(value, createInferenceContext(tier, resolved));
}

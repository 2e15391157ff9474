/**
 * Per-kind schema generators
 */

export { ObjectGenerator } from './object-generator.js';
export { ArrayGenerator } from './array-generator.js';
export { StringGenerator } from './string-generator.js';
export { NumberGenerator } from './number-generator.js';
export { BooleanGenerator } from './boolean-generator.js';
export { NullGenerator } from './null-generator.js';

export {
  SchemaGenerator,
  createInferenceContext,
  createChildContext,
} from '../schema-generator.js';

export type {
  InferenceContext,
  ChildSchemaResolver,
} from '../schema-generator.js';

// @schemasmith/core entry point
//
// Public API:
// - generateSchema() / inferSchema(): tiered schema inference from a parsed JSON value.
// - serializeSchema(): JSON text for produced documents (bigint-safe).
// - SchemaDocumentValidator: draft 2020-12 meta-schema check for produced documents.
// - Error hierarchy, codes and the CLI presenter shared with @schemasmith/cli.

export { generateSchema } from './api.js';
export { inferSchema, SchemaDispatcher } from './generator/index.js';
export {
  ObjectGenerator,
  ArrayGenerator,
  StringGenerator,
  NumberGenerator,
  BooleanGenerator,
  NullGenerator,
  SchemaGenerator,
  createInferenceContext,
  createChildContext,
  type InferenceContext,
  type ChildSchemaResolver,
} from './generator/types/index.js';

// Value model, tiers and policy
export * from './types/json.js';
export * from './types/schema.js';
export * from './types/tier.js';
export * from './types/options.js';
export * from './types/result.js';
export {
  TIER_POLICIES,
  SCHEMA_DRAFT_URI,
  getTierPolicy,
  type TierPolicy,
  type ObjectPolicy,
  type ArrayPolicy,
  type StringPolicy,
  type NumberPolicy,
  type NumberBounds,
  type BooleanPolicy,
  type RequiredPolicy,
  type Annotation,
} from './policy/tier-policy.js';
export * from './heuristics/index.js';
export {
  classifyNumber,
  INT64_MIN,
  UINT64_MAX,
  type NumericClass,
} from './util/numeric.js';

// Output
export { serializeSchema, type SerializeOptions } from './util/json-text.js';
export {
  SchemaDocumentValidator,
  createValidatorAjv,
  type SchemaValidationReport,
} from './validator/index.js';

// Errors
export { ErrorCode, type Severity, getExitCode, EXIT_CODES } from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
export { didYouMean, calculateDistance } from './errors/suggestions.js';
export * from './types/errors.js';

/**
 * Meta-schema validator for produced schema documents
 * Checks a document against the JSON Schema draft 2020-12 meta-schema
 */

import type { ErrorObject } from 'ajv';
import type { Ajv2020 } from 'ajv/dist/2020.js';

import { err, ok, type Result } from '../types/result.js';
import {
  SchemaValidationError,
  createValidationFailure,
  type ValidationFailure,
} from '../types/errors.js';
import { SCHEMA_DRAFT_URI } from '../policy/tier-policy.js';
import { createValidatorAjv } from './ajv-factory.js';

export interface SchemaValidationReport {
  valid: true;
  /** Meta-schema the document was checked against */
  dialect: string;
}

export class SchemaDocumentValidator {
  private readonly ajv: Ajv2020;

  constructor(ajv: Ajv2020 = createValidatorAjv()) {
    this.ajv = ajv;
  }

  validate(doc: object): Result<SchemaValidationReport, SchemaValidationError> {
    const valid = this.ajv.validateSchema(toValidatableRecord(doc));
    if (valid === true) {
      return ok({ valid: true, dialect: SCHEMA_DRAFT_URI });
    }

    const failures = (this.ajv.errors ?? []).map(toFailure);
    return err(
      new SchemaValidationError({
        message: `Generated schema does not conform to the draft 2020-12 meta-schema (${failures.length} issue${failures.length === 1 ? '' : 's'})`,
        failures,
        context: {
          path: failures[0]?.path ?? '',
          suggestion: 'Report the input that produced this schema',
        },
      })
    );
  }
}

function toFailure(error: ErrorObject): ValidationFailure {
  return createValidationFailure(
    error.instancePath,
    error.message ?? 'validation failed',
    error.keyword,
    error.schemaPath,
    error.params
  );
}

/**
 * Ajv's `number` / `integer` checks do not accept bigint; out-of-safe-range
 * bounds are approximated for the meta-schema check only.
 */
function toValidatable(value: unknown): unknown {
  if (typeof value === 'bigint') return Number(value);
  if (Array.isArray(value)) return value.map(toValidatable);
  if (value !== null && typeof value === 'object') return toValidatableRecord(value);
  return value;
}

function toValidatableRecord(record: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(record)) {
    Object.defineProperty(out, key, {
      value: toValidatable(child),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return out;
}

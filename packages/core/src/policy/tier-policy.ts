/**
 * Tier policy table
 *
 * Every tier-dependent decision the generators make is read from this table;
 * generators contain no per-tier branching of their own.
 */

import type { Tier } from '../types/tier.js';

export const SCHEMA_DRAFT_URI = 'https://json-schema.org/draft/2020-12/schema';

/** Which object keys end up in `required` */
export type RequiredPolicy = 'none' | 'non-null' | 'all';

export interface Annotation {
  title: string;
  description?: string;
}

export interface ObjectPolicy {
  required: RequiredPolicy;
  additionalProperties?: boolean;
  /** Applied even when the input object is empty */
  minProperties?: number;
  /** Emit `$schema` on every object document */
  declareDraft: boolean;
  annotation?: Annotation;
}

export interface ArrayPolicy {
  minItems?: number;
  /** maxItems = factor × input length */
  maxItemsFactor?: number;
  /** Emitted whether or not the input elements are distinct */
  uniqueItems?: boolean;
  annotation?: Annotation;
}

export interface StringPolicy {
  minLength?: number;
  /** maxLength = factor × UTF-8 byte length */
  maxLengthFactor?: number;
  /** Only for non-empty strings */
  examples: boolean;
  /** Only for non-empty strings */
  detectFormat: boolean;
  annotation?: Annotation;
}

export type NumberBounds = 'none' | 'literal-minimum' | 'window';

export interface NumberPolicy {
  bounds: NumberBounds;
  /** Half-width of the `window` bounds */
  boundWindow: number;
  examples: boolean;
  integerMultipleOf?: number;
  integerAnnotation?: Annotation;
  numberAnnotation?: Annotation;
}

export interface BooleanPolicy {
  examples: boolean;
  annotation?: Annotation;
}

export interface TierPolicy {
  tier: Tier;
  object: ObjectPolicy;
  array: ArrayPolicy;
  string: StringPolicy;
  number: NumberPolicy;
  boolean: BooleanPolicy;
}

const OBJECT_ANNOTATION: Annotation = {
  title: 'Generated Object Schema',
  description: 'Auto-generated schema from JSON data',
};

const ARRAY_ANNOTATION: Annotation = {
  title: 'Generated Array Schema',
  description: 'Auto-generated array schema from JSON data',
};

const STRING_ANNOTATION: Annotation = { title: 'Generated String Schema' };

const INTEGER_ANNOTATION: Annotation = { title: 'Generated Integer Schema' };

const NUMBER_ANNOTATION: Annotation = { title: 'Generated Number Schema' };

const BOOLEAN_ANNOTATION: Annotation = {
  title: 'Generated Boolean Schema',
  description: 'Boolean value from JSON data',
};

const BOUND_WINDOW = 1000;

export const TIER_POLICIES: Readonly<Record<Tier, Readonly<TierPolicy>>> = {
  basic: {
    tier: 'basic',
    object: { required: 'none', declareDraft: false },
    array: {},
    string: { examples: false, detectFormat: false },
    number: { bounds: 'none', boundWindow: BOUND_WINDOW, examples: false },
    boolean: { examples: false },
  },
  standard: {
    tier: 'standard',
    object: {
      required: 'non-null',
      additionalProperties: true,
      declareDraft: false,
    },
    array: { minItems: 0 },
    string: { minLength: 0, examples: false, detectFormat: false },
    number: {
      bounds: 'literal-minimum',
      boundWindow: BOUND_WINDOW,
      examples: false,
    },
    boolean: { examples: false },
  },
  comprehensive: {
    tier: 'comprehensive',
    object: {
      required: 'all',
      additionalProperties: false,
      minProperties: 1,
      declareDraft: true,
    },
    array: { minItems: 1, maxItemsFactor: 2 },
    string: {
      minLength: 0,
      maxLengthFactor: 2,
      examples: true,
      detectFormat: false,
    },
    number: { bounds: 'window', boundWindow: BOUND_WINDOW, examples: true },
    boolean: { examples: true },
  },
  expert: {
    tier: 'expert',
    object: {
      required: 'all',
      additionalProperties: false,
      minProperties: 1,
      declareDraft: true,
      annotation: OBJECT_ANNOTATION,
    },
    array: {
      minItems: 1,
      maxItemsFactor: 2,
      uniqueItems: true,
      annotation: ARRAY_ANNOTATION,
    },
    string: {
      minLength: 0,
      maxLengthFactor: 2,
      examples: true,
      detectFormat: true,
      annotation: STRING_ANNOTATION,
    },
    number: {
      bounds: 'window',
      boundWindow: BOUND_WINDOW,
      examples: true,
      integerMultipleOf: 1,
      integerAnnotation: INTEGER_ANNOTATION,
      numberAnnotation: NUMBER_ANNOTATION,
    },
    boolean: { examples: true, annotation: BOOLEAN_ANNOTATION },
  },
};

export function getTierPolicy(tier: Tier): Readonly<TierPolicy> {
  return TIER_POLICIES[tier];
}

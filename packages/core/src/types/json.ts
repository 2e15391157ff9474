/**
 * JSON value model consumed by the inference core.
 *
 * `bigint` is accepted alongside `number` so that callers holding 64-bit
 * integers beyond the IEEE-754 safe range can hand them in without loss.
 */

export type JsonPrimitive = null | boolean | number | bigint | string;

export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export type JsonArray = readonly JsonValue[];

export interface JsonObject {
  readonly [key: string]: JsonValue;
}

/** Top-level kind tag of a JSON value */
export type JsonKind =
  | 'object'
  | 'array'
  | 'string'
  | 'number'
  | 'boolean'
  | 'null';

/**
 * A value paired with its kind tag. `unsupported` covers runtime values that
 * slipped past the static type (undefined, functions, symbols, NaN, ±Infinity).
 */
export type ClassifiedValue =
  | { kind: 'object'; value: JsonObject }
  | { kind: 'array'; value: JsonArray }
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number | bigint }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'null'; value: null }
  | { kind: 'unsupported'; value: unknown; reason: string };

function isJsonObject(value: object): value is JsonObject {
  return !Array.isArray(value);
}

export function classifyValue(value: unknown): ClassifiedValue {
  if (value === null) return { kind: 'null', value };
  if (Array.isArray(value)) return { kind: 'array', value };
  switch (typeof value) {
    case 'string':
      return { kind: 'string', value };
    case 'boolean':
      return { kind: 'boolean', value };
    case 'bigint':
      return { kind: 'number', value };
    case 'number':
      return Number.isFinite(value)
        ? { kind: 'number', value }
        : { kind: 'unsupported', value, reason: `non-finite number ${value}` };
    case 'object':
      if (value !== null && isJsonObject(value)) return { kind: 'object', value };
      break;
    default:
      break;
  }
  return { kind: 'unsupported', value, reason: `value of type ${typeof value}` };
}

/**
 * Append a segment to a JSON Pointer (RFC 6901 escaping).
 */
export function appendPointer(pointer: string, segment: string | number): string {
  const escaped = String(segment).replace(/~/g, '~0').replace(/\//g, '~1');
  return `${pointer}/${escaped}`;
}

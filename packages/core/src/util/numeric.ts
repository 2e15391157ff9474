import type { SchemaNumber } from '../types/schema.js';

/** Smallest signed 64-bit integer */
export const INT64_MIN = -(2n ** 63n);

/** Largest unsigned 64-bit integer */
export const UINT64_MAX = 2n ** 64n - 1n;

const SAFE_MIN = BigInt(Number.MIN_SAFE_INTEGER);
const SAFE_MAX = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * A number is an integer when it is integral and fits a signed or unsigned
 * 64-bit integer; anything else is carried as a double.
 */
export type NumericClass =
  | { kind: 'integer'; value: bigint }
  | { kind: 'float'; value: number };

export function isInt64Range(value: bigint): boolean {
  return value >= INT64_MIN && value <= UINT64_MAX;
}

export function classifyNumber(value: number | bigint): NumericClass {
  if (typeof value === 'bigint') {
    return isInt64Range(value)
      ? { kind: 'integer', value }
      : { kind: 'float', value: Number(value) };
  }
  if (Number.isInteger(value)) {
    const exact = BigInt(value);
    if (isInt64Range(exact)) return { kind: 'integer', value: exact };
  }
  return { kind: 'float', value };
}

/**
 * Emit an integer as a plain number while it stays exact, as bigint beyond.
 */
export function toSchemaNumber(value: bigint): SchemaNumber {
  return value >= SAFE_MIN && value <= SAFE_MAX ? Number(value) : value;
}

/** Offset an integer; undefined once the result leaves the 64-bit range */
export function offsetInteger(value: bigint, delta: number): bigint | undefined {
  const result = value + BigInt(delta);
  return isInt64Range(result) ? result : undefined;
}

/** Offset a double; undefined when the result is not finite */
export function offsetFloat(value: number, delta: number): number | undefined {
  const result = value + delta;
  return Number.isFinite(result) ? result : undefined;
}

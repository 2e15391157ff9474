import type { StringFormat } from '../types/schema.js';

export const DIGIT_GROUP_PATTERN = '^[\\d\\-\\s]+$';

const DIGIT_GROUP_CHARS = /^[0-9\- ]*$/;

/**
 * Sniff a `format` from a sample string. Email wins over uri.
 */
export function detectStringFormat(s: string): StringFormat | undefined {
  if (s.includes('@') && s.includes('.')) return 'email';
  if (s.startsWith('http')) return 'uri';
  return undefined;
}

/**
 * Pattern for strings made only of ASCII digits, hyphens and spaces
 * (phone numbers, card-like groups). Callers skip empty strings.
 */
export function detectStringPattern(s: string): string | undefined {
  return DIGIT_GROUP_CHARS.test(s) ? DIGIT_GROUP_PATTERN : undefined;
}

import { describe, it, expect } from 'vitest';
import {
  DIGIT_GROUP_PATTERN,
  detectStringFormat,
  detectStringPattern,
  getArrayItemKinds,
  isHomogeneousArray,
} from '../index.js';

describe('array kinds', () => {
  it('collects top-level kind tags', () => {
    expect([...getArrayItemKinds([1, 2.5, 3n])]).toEqual(['number']);
    expect([...getArrayItemKinds([1, 'a', true, null, [], {}])]).toEqual([
      'number',
      'string',
      'boolean',
      'null',
      'array',
      'object',
    ]);
  });

  it('compares kinds only, not shapes', () => {
    expect(isHomogeneousArray([{ a: 1 }, { b: 'x' }])).toBe(true);
    expect(isHomogeneousArray([[1], ['x']])).toBe(true);
  });

  it('treats empty and single-element arrays as homogeneous', () => {
    expect(isHomogeneousArray([])).toBe(true);
    expect(isHomogeneousArray(['only'])).toBe(true);
    expect(isHomogeneousArray([1, null])).toBe(false);
  });

  it('tags holes and non-JSON elements as unsupported', () => {
    const sparse: number[] = [];
    sparse[1] = 1;
    expect([...getArrayItemKinds(sparse)]).toEqual(['unsupported', 'number']);
    expect([...getArrayItemKinds([1, Number.NaN])]).toEqual([
      'number',
      'unsupported',
    ]);
    expect(isHomogeneousArray([1, Number.NaN])).toBe(false);
    expect(isHomogeneousArray([Number.NaN, Number.NaN])).toBe(false);
  });
});

describe('string format detection', () => {
  it('detects email before uri', () => {
    expect(detectStringFormat('john@example.com')).toBe('email');
    expect(detectStringFormat('http://user@example.com')).toBe('email');
  });

  it('detects uri by prefix', () => {
    expect(detectStringFormat('https://example.com')).toBe('uri');
    expect(detectStringFormat('httpbin')).toBe('uri');
    expect(detectStringFormat('ftp://example.com')).toBeUndefined();
  });

  it('needs both @ and . for email', () => {
    expect(detectStringFormat('user@localhost')).toBeUndefined();
  });

  it('matches digit groups with hyphens and spaces', () => {
    expect(detectStringPattern('555-123 4567')).toBe(DIGIT_GROUP_PATTERN);
    expect(detectStringPattern('12a')).toBeUndefined();
    expect(detectStringPattern('1\t2')).toBeUndefined();
    expect(DIGIT_GROUP_PATTERN).toBe('^[\\d\\-\\s]+$');
  });
});

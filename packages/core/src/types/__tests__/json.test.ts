import { describe, it, expect } from 'vitest';
import { appendPointer, classifyValue } from '../json.js';

describe('classifyValue', () => {
  it('tags each JSON kind', () => {
    expect(classifyValue(null)).toEqual({ kind: 'null', value: null });
    expect(classifyValue(true)).toEqual({ kind: 'boolean', value: true });
    expect(classifyValue('x')).toEqual({ kind: 'string', value: 'x' });
    expect(classifyValue(1.5)).toEqual({ kind: 'number', value: 1.5 });
    expect(classifyValue(10n)).toEqual({ kind: 'number', value: 10n });
    expect(classifyValue([1])).toEqual({ kind: 'array', value: [1] });
    expect(classifyValue({ a: 1 })).toEqual({ kind: 'object', value: { a: 1 } });
  });

  it('treats null-prototype objects as objects', () => {
    const bare = Object.create(null);
    expect(classifyValue(bare).kind).toBe('object');
  });

  it('rejects values outside the JSON domain', () => {
    expect(classifyValue(undefined)).toEqual({
      kind: 'unsupported',
      value: undefined,
      reason: 'value of type undefined',
    });
    expect(classifyValue(Number.NaN)).toMatchObject({
      kind: 'unsupported',
      reason: 'non-finite number NaN',
    });
    expect(classifyValue(Number.POSITIVE_INFINITY)).toMatchObject({
      kind: 'unsupported',
      reason: 'non-finite number Infinity',
    });
    expect(classifyValue(() => 1)).toMatchObject({
      kind: 'unsupported',
      reason: 'value of type function',
    });
  });
});

describe('appendPointer', () => {
  it('escapes ~ and / per RFC 6901', () => {
    expect(appendPointer('', 'users')).toBe('/users');
    expect(appendPointer('/users', 0)).toBe('/users/0');
    expect(appendPointer('', 'a/b')).toBe('/a~1b');
    expect(appendPointer('', 'm~n')).toBe('/m~0n');
    expect(appendPointer('', '')).toBe('/');
  });
});

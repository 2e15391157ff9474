import { describe, it, expect, vi } from 'vitest';
import { ObjectGenerator } from '../object-generator.js';
import { SchemaDispatcher } from '../../index.js';
import type { ChildSchemaResolver, InferenceContext } from '../../schema-generator.js';
import { contextFor } from '../../../../test/helpers/context.js';
import { ok, err } from '../../../types/result.js';
import { InferenceError } from '../../../types/errors.js';
import type { JsonObject, JsonValue } from '../../../types/json.js';
import type { Tier } from '../../../types/tier.js';
import type { ObjectSchemaDoc } from '../../../types/schema.js';

const dispatcher = new SchemaDispatcher();
const generator = new ObjectGenerator(dispatcher);

function infer(value: JsonObject, tier: Tier): ObjectSchemaDoc {
  return generator.generate(value, contextFor(tier)).unwrap();
}

const person = { name: 'John', age: 30, nickname: null };

describe('ObjectGenerator', () => {
  it('lists properties without constraints at basic', () => {
    expect(infer(person, 'basic')).toEqual({
      type: 'object',
      properties: {
        name: { type: 'string' },
        age: { type: 'integer' },
        nickname: { type: 'null' },
      },
    });
  });

  it('requires non-null keys and allows additional properties at standard', () => {
    const schema = infer(person, 'standard');
    expect(schema.required).toEqual(['name', 'age']);
    expect(schema.additionalProperties).toBe(true);
    expect(schema.minProperties).toBeUndefined();
    expect(schema.$schema).toBeUndefined();
  });

  it('omits required when every value is null at standard', () => {
    expect(infer({ a: null }, 'standard')).not.toHaveProperty('required');
  });

  it('closes the object and declares the draft at comprehensive', () => {
    const schema = infer(person, 'comprehensive');
    expect(schema.required).toEqual(['name', 'age', 'nickname']);
    expect(schema.additionalProperties).toBe(false);
    expect(schema.minProperties).toBe(1);
    expect(schema.$schema).toBe('https://json-schema.org/draft/2020-12/schema');
    expect(schema.title).toBeUndefined();
  });

  it('annotates at expert', () => {
    const schema = infer(person, 'expert');
    expect(schema.title).toBe('Generated Object Schema');
    expect(schema.description).toBe('Auto-generated schema from JSON data');
  });

  it('applies minProperties to an empty object', () => {
    expect(infer({}, 'comprehensive')).toEqual({
      $schema: 'https://json-schema.org/draft/2020-12/schema',
      type: 'object',
      properties: {},
      additionalProperties: false,
      minProperties: 1,
    });
  });

  it('preserves input key order', () => {
    const schema = infer({ zeta: 1, alpha: 2, mid: 3 }, 'comprehensive');
    expect(Object.keys(schema.properties)).toEqual(['zeta', 'alpha', 'mid']);
    expect(schema.required).toEqual(['zeta', 'alpha', 'mid']);
  });

  it('keeps a __proto__ key as an own property', () => {
    const value: JsonObject = JSON.parse('{"__proto__":"x","a":1}');
    const schema = infer(value, 'basic');
    expect(Object.keys(schema.properties)).toEqual(['__proto__', 'a']);
    expect(Object.getPrototypeOf(schema.properties)).toBe(Object.prototype);
  });

  it('declares the draft on nested objects too', () => {
    const schema = infer({ inner: { x: true } }, 'comprehensive');
    expect(schema.properties.inner).toMatchObject({
      $schema: 'https://json-schema.org/draft/2020-12/schema',
      type: 'object',
    });
  });

  it('resolves each child with its key as the pointer segment', () => {
    const resolveChild = vi.fn(
      (_value: JsonValue, _parent: InferenceContext, _segment: string | number) =>
        ok({ type: 'null' as const })
    );
    const resolver: ChildSchemaResolver = { resolveChild };

    new ObjectGenerator(resolver).generate({ 'a/b': 1, c: 2 }, contextFor('basic'));

    expect(resolveChild.mock.calls.map(([value, , segment]) => [value, segment])).toEqual([
      [1, 'a/b'],
      [2, 'c'],
    ]);
  });

  it('stops at the first failing child', () => {
    const failure = new InferenceError({ message: 'nope', context: { path: '/b' } });
    const resolveChild = vi.fn((_value: JsonValue, _parent: InferenceContext, segment: string | number) =>
      segment === 'b' ? err(failure) : ok({ type: 'null' as const })
    );

    const result = new ObjectGenerator({ resolveChild }).generate(
      { a: 1, b: 2, c: 3 },
      contextFor('basic')
    );

    expect(result.isErr() && result.error).toBe(failure);
    expect(resolveChild).toHaveBeenCalledTimes(2);
  });
});

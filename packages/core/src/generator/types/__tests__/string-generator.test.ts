import { describe, it, expect } from 'vitest';
import { StringGenerator } from '../string-generator.js';
import { contextFor } from '../../../../test/helpers/context.js';
import type { Tier } from '../../../types/tier.js';
import type { StringSchemaDoc } from '../../../types/schema.js';

const generator = new StringGenerator();

function infer(value: string, tier: Tier): StringSchemaDoc {
  return generator.generate(value, contextFor(tier)).unwrap();
}

describe('StringGenerator', () => {
  it('emits only the type at basic', () => {
    expect(infer('hello', 'basic')).toEqual({ type: 'string' });
  });

  it('adds minLength at standard', () => {
    expect(infer('hello', 'standard')).toEqual({ type: 'string', minLength: 0 });
  });

  it('derives maxLength from the UTF-8 byte length at comprehensive', () => {
    expect(infer('héllo', 'comprehensive')).toEqual({
      type: 'string',
      minLength: 0,
      maxLength: 12,
      examples: ['héllo'],
    });
    expect(infer('😀', 'comprehensive').maxLength).toBe(8);
  });

  it('omits examples for the empty string', () => {
    expect(infer('', 'comprehensive')).toEqual({
      type: 'string',
      minLength: 0,
      maxLength: 0,
    });
  });

  it('sniffs an email at expert', () => {
    expect(infer('john@example.com', 'expert')).toEqual({
      type: 'string',
      minLength: 0,
      maxLength: 32,
      examples: ['john@example.com'],
      format: 'email',
      title: 'Generated String Schema',
    });
  });

  it('sniffs a uri at expert', () => {
    expect(infer('https://example.com', 'expert').format).toBe('uri');
  });

  it('falls back to the digit-group pattern at expert', () => {
    const schema = infer('555-123 4567', 'expert');
    expect(schema.pattern).toBe('^[\\d\\-\\s]+$');
    expect(schema.format).toBeUndefined();
  });

  it('never sets both format and pattern', () => {
    for (const value of ['1@2.3', 'http-1', '123', 'plain text']) {
      const schema = infer(value, 'expert');
      expect(schema.format !== undefined && schema.pattern !== undefined).toBe(false);
    }
  });

  it('skips format detection for the empty string', () => {
    expect(infer('', 'expert')).toEqual({
      type: 'string',
      minLength: 0,
      maxLength: 0,
      title: 'Generated String Schema',
    });
  });

  it('does not sniff formats below expert', () => {
    expect(infer('john@example.com', 'comprehensive').format).toBeUndefined();
  });
});

/**
 * Tests for Result<T, E> pattern
 */

import { describe, it, expect } from 'vitest';
import { type Result, Ok, Err, ok, err } from '../result.js';
import { ConfigError } from '../errors.js';

describe('Result Pattern', () => {
  describe('Ok class', () => {
    it('should create Ok instance with value', () => {
      const result = new Ok(42);

      expect(result.value).toBe(42);
      expect(result._tag).toBe('Ok');
      expect(result.isOk()).toBe(true);
      expect(result.isErr()).toBe(false);
    });

    it('should unwrap to its value', () => {
      expect(ok('value').unwrap()).toBe('value');
    });
  });

  describe('Err class', () => {
    it('should create Err instance with error', () => {
      const result = new Err('boom');

      expect(result.error).toBe('boom');
      expect(result._tag).toBe('Err');
      expect(result.isOk()).toBe(false);
      expect(result.isErr()).toBe(true);
    });

    it('should rethrow Error instances as-is from unwrap', () => {
      const error = new ConfigError({ message: 'bad setting' });

      expect(() => err(error).unwrap()).toThrow(error);
    });

    it('should wrap non-Error values thrown from unwrap', () => {
      expect(() => err('plain').unwrap()).toThrow(
        'Called unwrap on an Err value: plain'
      );
    });
  });

  it('isErr narrows a Result to its error', () => {
    const bad: Result<number, string> = err('nope');
    const good: Result<number, string> = ok(1);

    expect(good.isErr()).toBe(false);
    expect(bad.isErr() && bad.error).toBe('nope');
  });
});

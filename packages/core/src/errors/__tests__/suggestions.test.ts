import { describe, it, expect } from 'vitest';
import { didYouMean, calculateDistance } from '../suggestions.js';
import { TIERS } from '../../types/tier.js';

describe('Suggestion Helpers', () => {
  it('didYouMean finds close matches with simple distance', () => {
    expect(didYouMean('standrd', TIERS)).toEqual(['standard']);
    expect(didYouMean('expret', TIERS)).toEqual(['expert']);
  });

  it('didYouMean returns nothing when every option is too far away', () => {
    expect(didYouMean('zzzzzzzzzzzz', TIERS)).toEqual([]);
  });

  it('didYouMean orders candidates by distance and keeps at most three', () => {
    const out = didYouMean('ab', ['abcd', 'abc', 'ab', 'abcde', 'a']);
    expect(out).toEqual(['ab', 'abc', 'a']);
  });

  it('didYouMean keeps the option order on equal distances', () => {
    expect(didYouMean('bsh', ['bash', 'zsh', 'fish'])).toEqual([
      'bash',
      'zsh',
      'fish',
    ]);
    expect(didYouMean('bsh', ['zsh', 'bash'])).toEqual(['zsh', 'bash']);
  });

  it('calculateDistance behaves reasonably for basics', () => {
    expect(calculateDistance('abc', 'abc')).toBe(0);
    expect(calculateDistance('abc', 'ab')).toBe(1);
    expect(calculateDistance('', 'abcd')).toBe(4);
    expect(calculateDistance('basic', 'basik')).toBe(1);
  });

  it('calculateDistance counts insertions and deletions anywhere', () => {
    expect(calculateDistance('dbug', 'debug')).toBe(1);
    expect(calculateDistance('bsh', 'bash')).toBe(1);
    expect(calculateDistance('tandard', 'standard')).toBe(1);
    expect(calculateDistance('kitten', 'sitting')).toBe(3);
    expect(calculateDistance('expret', 'expert')).toBe(2);
    expect(calculateDistance('debug', 'dbug')).toBe(1);
  });
});

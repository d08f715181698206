import { describe, it, expect } from 'vitest';
import {
  countOccurrences,
  findPlaceholders,
  firstPlaceholder,
  isPlaceholder,
  PlaceholderRegistry,
} from '../../src/preservation/Placeholder';

describe('Placeholder', () => {
  it('should accept only the token grammar', () => {
    expect(isPlaceholder('__URL_001__')).toBe(true);
    expect(isPlaceholder('__MATH_BLOCK_999__')).toBe(true);
    expect(isPlaceholder('__url_001__')).toBe(false);
    expect(isPlaceholder('__URL_1__')).toBe(false);
    expect(isPlaceholder('x__URL_001__')).toBe(false);
  });

  it('should not see tokens glued to a preceding word', () => {
    expect(findPlaceholders('a__URL_001__ __HTML_002__')).toEqual([ '__HTML_002__' ]);
    expect(firstPlaceholder('plain text')).toBeUndefined();
  });

  it('should count non-overlapping occurrences', () => {
    expect(countOccurrences('__A_001__ x __A_001__', '__A_001__')).toBe(2);
    expect(countOccurrences('abc', '')).toBe(0);
  });

  describe('PlaceholderRegistry', () => {
    it('should number each kind separately', () => {
      const registry = new PlaceholderRegistry();

      expect(registry.register('URL', 'a')).toBe('__URL_001__');
      expect(registry.register('HTML', '<b>')).toBe('__HTML_001__');
      expect(registry.register('URL', 'b')).toBe('__URL_002__');
      expect(registry.size).toBe(3);
      expect(registry.toMap()).toEqual({ __URL_001__: 'a', __HTML_001__: '<b>', __URL_002__: 'b' });
    });

    it('should detect slices holding a registered token', () => {
      const registry = new PlaceholderRegistry();
      registry.register('URL', 'a');

      expect(registry.swallows('<a href="__URL_001__">')).toBe(true);
      expect(registry.swallows('<a href="__URL_002__">')).toBe(false);
    });
  });
});

/**
 * PreservationEngine unit tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PreservationEngine, protect, restore } from '../../src/preservation/PreservationEngine';
import { DetectionError, RestorationError } from '../../src/util/errors';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error: unknown) {
    return error;
  }
  throw new Error('expected an error');
}

describe('PreservationEngine', () => {
  let engine: PreservationEngine;

  beforeEach(() => {
    engine = new PreservationEngine();
  });

  describe('protect()', () => {
    it('should number inline code placeholders in document order', () => {
      const { protectedText, restorationMap } = engine.protect('Use `a`, `b` and `c`.');

      expect(protectedText).toBe('Use __INLINE_CODE_001__, __INLINE_CODE_002__ and __INLINE_CODE_003__.');
      expect(restorationMap).toEqual({
        __INLINE_CODE_001__: '`a`',
        __INLINE_CODE_002__: '`b`',
        __INLINE_CODE_003__: '`c`',
      });
    });

    it('should protect every kind with its own counter', () => {
      const text = '```\ncode\n```\nSee $x$ and [link](https://a.io) <br>\n';
      const { protectedText, restorationMap } = engine.protect(text);

      expect(protectedText).toBe('__CODE_BLOCK_001__See __MATH_INLINE_001__ and [link](__URL_001__) __HTML_001__\n');
      expect(restorationMap).toEqual({
        __CODE_BLOCK_001__: '```\ncode\n```\n',
        __MATH_INLINE_001__: '$x$',
        __URL_001__: 'https://a.io',
        __HTML_001__: '<br>',
      });
      expect(engine.restore(protectedText, restorationMap)).toBe(text);
    });

    it('should leave inline code alone when asked to', () => {
      expect(engine.protect('`a` $x$', { skipInlineCode: true }).protectedText).toBe('`a` __MATH_INLINE_001__');
    });

    it('should drop a later span that would swallow a placeholder', () => {
      const { protectedText, restorationMap } = engine.protect('<a title="[x](y)">');

      expect(protectedText).toBe('<a title="[x](__URL_001__)">');
      expect(restorationMap).toEqual({ __URL_001__: 'y' });
    });

    it('should leave a span unprotected when its token would merge with a preceding __WORD run', () => {
      expect(engine.protect('__NOTE__`rm -rf`')).toEqual({ protectedText: '__NOTE__`rm -rf`', restorationMap: {}});
      expect(engine.protect('__BOLD__<br>')).toEqual({ protectedText: '__BOLD__<br>', restorationMap: {}});
      expect(engine.protect('x __A$y$')).toEqual({ protectedText: 'x __A$y$', restorationMap: {}});
    });

    it('should still protect a span separated from a __WORD run', () => {
      const { protectedText, restorationMap } = engine.protect('__NOTE__ `rm`');

      expect(protectedText).toBe('__NOTE__ __INLINE_CODE_001__');
      expect(restorationMap).toEqual({ __INLINE_CODE_001__: '`rm`' });
    });

    it('should round-trip text with spans next to underscore-wrapped words', () => {
      const corpus = [
        '__NOTE__`rm -rf`',
        '__BOLD__<br> and __EM__<i>x</i>',
        'x __A$y$ and $z$',
        'See __LINK__[a](https://a.io) now',
        '```\ncode\n```\n__END__`tail`',
        'plain __UPPER_CASE__ text with `code` and <b>tags</b>',
        '__X__\\(a+b\\) then __Y__$$z$$',
      ];

      for (const text of corpus) {
        const { protectedText, restorationMap } = engine.protect(text);
        expect(engine.restore(protectedText, restorationMap)).toBe(text);
      }
    });

    it('should keep only the outer span of nested environments', () => {
      const text = '\\begin{a}\\begin{b}x\\end{b}\\end{a}';
      const { protectedText, restorationMap } = engine.protect(text);

      expect(protectedText).toBe('__MATH_BLOCK_001__');
      expect(restorationMap).toEqual({ __MATH_BLOCK_001__: text });
    });

    it('should reject text that already contains a placeholder', () => {
      const error = captureError(() => engine.protect('see __CODE_BLOCK_001__ here'));

      expect(error).toBeInstanceOf(DetectionError);
      expect(error).toMatchObject({
        token: '__CODE_BLOCK_001__',
        message: 'input text contains placeholder-like token: __CODE_BLOCK_001__',
      });
    });

    it('should fail when one kind needs more than 999 placeholders', () => {
      expect(() => engine.protect('`a` '.repeat(1000)))
        .toThrow('too many placeholders for INLINE_CODE (limit 999)');
    });

    it('should round-trip text without protected spans unchanged', () => {
      const { protectedText, restorationMap } = protect('Just prose, costs $5.');

      expect(protectedText).toBe('Just prose, costs $5.');
      expect(restorationMap).toEqual({});
    });
  });

  describe('restore()', () => {
    it('should reject keys outside the placeholder grammar', () => {
      const error = captureError(() => restore('x', { invalid_key: 'y' }));

      expect(error).toBeInstanceOf(RestorationError);
      expect(error).toMatchObject({ reason: 'grammar', message: 'invalid placeholder format: invalid_key' });
    });

    it('should report missing, duplicated and unknown placeholders in strict mode', () => {
      expect(captureError(() => restore('nothing', { __URL_001__: 'u' })))
        .toMatchObject({ reason: 'missing', message: 'placeholder missing: __URL_001__' });
      expect(captureError(() => restore('__URL_001__ __URL_001__', { __URL_001__: 'u' })))
        .toMatchObject({ reason: 'duplicated', message: 'placeholder duplicated: __URL_001__ (count=2)' });
      expect(captureError(() => restore('__URL_001__ __HTML_001__', { __URL_001__: 'u' })))
        .toMatchObject({ reason: 'unknown', token: '__HTML_001__' });
    });

    it('should substitute every occurrence in non-strict mode', () => {
      expect(restore('__URL_001__ __URL_001__', { __URL_001__: 'u' }, { strict: false })).toBe('u u');
      expect(restore('no tokens', { __URL_001__: 'u' }, { strict: false })).toBe('no tokens');
    });

    it('should fail on leftover tokens even in non-strict mode', () => {
      expect(captureError(() => restore('__URL_001__ __HTML_001__', { __URL_001__: 'u' }, { strict: false })))
        .toMatchObject({ reason: 'leftover', token: '__HTML_001__' });
    });

    it('should insert originals literally', () => {
      expect(restore('[x](__URL_001__)', { __URL_001__: 'a$&b' })).toBe('[x](a$&b)');
    });
  });
});

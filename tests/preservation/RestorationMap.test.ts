import { describe, it, expect } from 'vitest';
import { parseRestorationMap, serializeRestorationMap } from '../../src/preservation/RestorationMap';
import { RestorationError } from '../../src/util/errors';

describe('RestorationMap', () => {
  it('should serialize to a flat JSON object', () => {
    expect(serializeRestorationMap({ __URL_001__: 'https://a.io' })).toBe('{"__URL_001__":"https://a.io"}');
  });

  it('should parse a valid map', () => {
    expect(parseRestorationMap('{"__URL_001__":"x","__HTML_001__":"<br>"}'))
      .toEqual({ __URL_001__: 'x', __HTML_001__: '<br>' });
  });

  it('should reject malformed JSON and wrong shapes', () => {
    expect(() => parseRestorationMap('{')).toThrow(RestorationError);
    expect(() => parseRestorationMap('[]')).toThrow('restorationMap must be an object');
    expect(() => parseRestorationMap('{"__URL_001__":1}')).toThrow('restorationMap.__URL_001__ must be a string');
  });

  it('should reject keys outside the placeholder grammar', () => {
    expect(() => parseRestorationMap('{"bad":"x"}')).toThrow('invalid placeholder format: bad');
  });
});

/**
 * MarkdownChunkPlanner unit tests
 */

import { describe, it, expect } from 'vitest';
import { fromChunkRecords, reconstruct, toChunkRecords } from '../../src/document/ChunkPlan';
import { MarkdownChunkPlanner, plan } from '../../src/document/MarkdownChunkPlanner';
import { ConfigurationError } from '../../src/util/errors';

const MIXED_DOCUMENT = [
  'Preface line with some words.',
  '',
  '# Chapter 1',
  '',
  'First paragraph. It has two sentences.',
  '',
  '```python',
  '# comment, not a heading',
  'print("hi")',
  '',
  'x = 1',
  '```',
  '',
  '## Section 1.1',
  '',
  'Math $a^2 + b^2$ and a [link](https://example.com/path) here.',
  '',
  '$$',
  'E = mc^2',
  '$$',
  '',
  '# Chapter 2',
  '',
  'Closing words 😀 with an emoji.',
].join('\n');

describe('MarkdownChunkPlanner', () => {
  describe('plan()', () => {
    it('should return empty array for empty text', () => {
      expect(plan('', 10)).toEqual([]);
    });

    it('should reject limits that are not positive integers', () => {
      expect(() => new MarkdownChunkPlanner(0)).toThrow(ConfigurationError);
      expect(() => plan('x', 1.5)).toThrow('maxChunkChars must be a positive integer, got 1.5');
    });

    it('should split a document at its headings', () => {
      const chunks = plan('# H1\n\nContent 1\n\n# H2\n\nContent 2', 50);

      expect(chunks).toEqual([
        { chunkId: 'chunk-0001', sourceText: '# H1\n\nContent 1\n\n', separators: [ '\n\n', '\n\n' ]},
        { chunkId: 'chunk-0002', sourceText: '# H2\n\nContent 2', separators: [ '\n\n' ]},
      ]);
    });

    it('should hard-cut text without any break points', () => {
      const chunks = plan('x'.repeat(1000), 100);

      expect(chunks.length).toBe(10);
      expect(chunks.every((chunk) => chunk.sourceText.length === 100)).toBe(true);
      expect(chunks[9].chunkId).toBe('chunk-0010');
    });

    it('should prefer sentence ends, then newlines, then spaces', () => {
      expect(plan('One. Two. Three.', 10).map((chunk) => chunk.sourceText)).toEqual([ 'One. Two. ', 'Three.' ]);
      expect(plan('aaaa\nbbbbbbb', 8).map((chunk) => chunk.sourceText)).toEqual([ 'aaaa', '\nbbbbbbb' ]);
      expect(plan('aaa bbb ccc', 6).map((chunk) => chunk.sourceText)).toEqual([ 'aaa', ' bbb', ' ccc' ]);
    });

    it('should not cut between the halves of a surrogate pair', () => {
      expect(plan('a😀b', 2).map((chunk) => chunk.sourceText)).toEqual([ 'a', '😀', 'b' ]);
    });

    it('should ignore heading lines inside fenced code', () => {
      const chunks = plan('```\n# not\n```\n# Real\ntext', 100);

      expect(chunks.map((chunk) => chunk.sourceText)).toEqual([ '```\n# not\n```\n', '# Real\ntext' ]);
    });

    it('should not split at blank lines inside fenced code', () => {
      const chunks = plan('```\na\n\nb\n```\n\nafter', 100);

      expect(chunks.length).toBe(1);
      expect(chunks[0].separators).toEqual([]);
    });

    it('should give an overflowing separator its own chunk', () => {
      expect(plan('abc\n\ndef', 4)).toEqual([
        { chunkId: 'chunk-0001', sourceText: 'abc', separators: []},
        { chunkId: 'chunk-0002', sourceText: '\n\n', separators: [ '\n\n' ]},
        { chunkId: 'chunk-0003', sourceText: 'def', separators: []},
      ]);
    });

    it('should reject a separator longer than the limit', () => {
      expect(() => plan('a\n\n\n\n\nb', 3)).toThrow(ConfigurationError);
    });

    it('should widen chunk ids past 9999 chunks', () => {
      const chunks = plan('x'.repeat(10000), 1);

      expect(chunks[0].chunkId).toBe('chunk-00001');
      expect(chunks[9999].chunkId).toBe('chunk-10000');
    });

    it.each([ 3, 7, 16, 50, 1000 ])('should reconstruct the mixed document exactly with limit %i', (limit) => {
      const chunks = plan(MIXED_DOCUMENT, limit);

      expect(reconstruct(chunks)).toBe(MIXED_DOCUMENT);
      expect(chunks.every((chunk) => chunk.sourceText.length <= limit)).toBe(true);
    });
  });

  describe('chunk records', () => {
    it('should round-trip through the serializable form', () => {
      const chunks = plan('# H1\n\nContent 1\n\n# H2\n\nContent 2', 50);
      const records = toChunkRecords(chunks);

      expect(records[0]).toEqual({
        chunk_id: 'chunk-0001',
        source_text: '# H1\n\nContent 1\n\n',
        separators: [ '\n\n', '\n\n' ],
      });
      expect(fromChunkRecords(JSON.parse(JSON.stringify(records)))).toEqual(chunks);
    });

    it('should default missing separators to an empty list', () => {
      expect(fromChunkRecords([{ chunk_id: 'chunk-0001', source_text: 'a' }]))
        .toEqual([{ chunkId: 'chunk-0001', sourceText: 'a', separators: []}]);
    });

    it('should reject malformed records', () => {
      expect(() => fromChunkRecords({})).toThrow('chunks must be an array');
      expect(() => fromChunkRecords([{ chunk_id: 1, source_text: 'a' }])).toThrow('chunks[0].chunk_id must be a string');
    });
  });
});

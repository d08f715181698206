import { describe, it, expect } from 'vitest';
import { DocumentPipeline } from '../../src/pipeline/DocumentPipeline';
import type { TextTransformer } from '../../src/pipeline/TextTransformer';

const identity: TextTransformer = {
  transform: async (text: string): Promise<string> => text,
};

describe('DocumentPipeline', () => {
  it('should clean reader artifacts and reassemble the document', async () => {
    const pipeline = new DocumentPipeline(identity);

    const result = await pipeline.run('[](https://a.io/#x)# Title\n\nBody `code`.\n');

    expect(result.output).toBe('# Title\n\nBody `code`.\n');
    expect(result.chunks).toHaveLength(1);
    expect(result.warnings).toEqual([]);
  });

  it('should pass through inline code glued to bold underscore text', async () => {
    const pipeline = new DocumentPipeline(identity);

    const result = await pipeline.run('# T\n\n__WARNING__`rm -rf /`\n');

    expect(result.output).toBe('# T\n\n__WARNING__`rm -rf /`\n');
    expect(result.warnings).toEqual([]);
  });

  it('should keep artifacts when cleanup is disabled', async () => {
    const pipeline = new DocumentPipeline(identity, { cleanArtifacts: false });

    const result = await pipeline.run('[](https://a.io/#x) text');

    expect(result.output).toBe('[](https://a.io/#x) text');
  });

  it('should prefix chunk warnings with their chunk id', async () => {
    const appendDollar: TextTransformer = {
      transform: async (text: string): Promise<string> => `${text} $`,
    };
    const pipeline = new DocumentPipeline(appendDollar, { maxChunkChars: 20, concurrency: 2 });

    const result = await pipeline.run('# A\n\nalpha\n\n# B\n\nbeta');

    expect(result.output).toBe('# A\n\nalpha\n\n $# B\n\nbeta $');
    expect(result.warnings).toEqual([
      'chunk-0001: QA warning: math delimiter count mismatch: $ expected 0, found 1',
      'chunk-0002: QA warning: math delimiter count mismatch: $ expected 0, found 1',
    ]);
  });
});

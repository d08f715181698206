import { ConfigurationError } from '../util/errors';
import { SchemaAssert } from '../util/SchemaAssert';
import type { ChunkPlanEntry, ChunkRecord } from './ChunkPlanner';

const assert = new SchemaAssert((message): Error => new ConfigurationError(message));

export function reconstruct(entries: readonly ChunkPlanEntry[]): string {
  return entries.map((entry): string => entry.sourceText).join('');
}

export function toChunkRecords(entries: readonly ChunkPlanEntry[]): ChunkRecord[] {
  return entries.map((entry): ChunkRecord => ({
    chunk_id: entry.chunkId,
    source_text: entry.sourceText,
    separators: [ ...entry.separators ],
  }));
}

/**
 * Reads chunk records back, e.g. from a JSON plan file.
 * A missing `separators` field reads as an empty list.
 */
export function fromChunkRecords(value: unknown): ChunkPlanEntry[] {
  return assert.list(value, 'chunks').map((item, index): ChunkPlanEntry => {
    const label = `chunks[${index}]`;
    const record = assert.record(item, label);
    return {
      chunkId: assert.string(record.chunk_id, `${label}.chunk_id`),
      sourceText: assert.string(record.source_text, `${label}.source_text`),
      separators: assert.stringList(record.separators, `${label}.separators`, { allowMissing: true }),
    };
  });
}

/**
 * ChunkPlanner - splits a document into size-bounded chunks that concatenate back
 * to the exact original text.
 */

/**
 * One planned chunk.
 */
export interface ChunkPlanEntry {
  /** `chunk-0001`, `chunk-0002`, ... */
  chunkId: string;

  /** Exact slice of the original, including the separators it owns. */
  sourceText: string;

  /** Non-empty blank-line separators folded into this chunk, in order. */
  separators: string[];
}

/**
 * Serializable form of {@link ChunkPlanEntry}.
 */
export interface ChunkRecord {
  chunk_id: string;
  source_text: string;
  separators: string[];
}

export interface ChunkPlanner {
  /**
   * @returns the chunks in document order; empty for empty text
   */
  plan(text: string): ChunkPlanEntry[];
}

import { getLoggerFor } from 'global-logger-factory';
import type { ChunkPlanner } from '../document/ChunkPlanner';
import { MarkdownChunkPlanner } from '../document/MarkdownChunkPlanner';
import { cleanReaderArtifacts } from '../document/ReaderArtifacts';
import type { ChunkTransformOptions, ChunkTransformResult } from './ChunkTransformRunner';
import { ChunkTransformRunner } from './ChunkTransformRunner';
import type { TextTransformer } from './TextTransformer';

export interface DocumentPipelineOptions extends ChunkTransformOptions {
  maxChunkChars?: number;
  /** Run {@link cleanReaderArtifacts} on the input first. Defaults to `true`. */
  cleanArtifacts?: boolean;
}

export interface DocumentResult {
  /** Transformed chunks joined in plan order. */
  output: string;
  chunks: ChunkTransformResult[];
  /** Every chunk warning, prefixed with its chunk id. */
  warnings: string[];
}

/**
 * Whole-document flow: artifact cleanup, planning, per-chunk transform, assembly.
 */
export class DocumentPipeline {
  protected readonly logger = getLoggerFor(this);

  private readonly planner: ChunkPlanner;
  private readonly runner: ChunkTransformRunner;
  private readonly cleanArtifacts: boolean;

  public constructor(transformer: TextTransformer, options: DocumentPipelineOptions = {}) {
    this.planner = new MarkdownChunkPlanner(options.maxChunkChars ?? 8000);
    this.runner = new ChunkTransformRunner(transformer, options);
    this.cleanArtifacts = options.cleanArtifacts ?? true;
  }

  public async run(text: string): Promise<DocumentResult> {
    const source = this.cleanArtifacts ? cleanReaderArtifacts(text) : text;
    const plan = this.planner.plan(source);
    const chunks = await this.runner.run(plan);

    const warnings = chunks.flatMap((chunk): string[] =>
      chunk.warnings.map((warning): string => `${chunk.chunkId}: ${warning}`));
    this.logger.info(`Assembled ${chunks.length} chunks with ${warnings.length} warnings`);

    return {
      output: chunks.map((chunk): string => chunk.text).join(''),
      chunks,
      warnings,
    };
  }
}

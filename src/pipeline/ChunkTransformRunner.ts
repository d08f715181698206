/**
 * ChunkTransformRunner - protect → transform → restore for every planned chunk.
 *
 * Chunks run on a fixed-size worker pool and results come back in plan order.
 * One failing chunk fails the whole run.
 */

import { getLoggerFor } from 'global-logger-factory';
import type { ChunkPlanEntry } from '../document/ChunkPlanner';
import { logContext } from '../logging/LogContext';
import type { GlossaryEntry, GlossaryMode } from '../preservation/Glossary';
import { DEFAULT_GLOSSARY_LIMITS, selectGlossaryEntries } from '../preservation/Glossary';
import { PreservationEngine } from '../preservation/PreservationEngine';
import type { ProtectResult } from '../preservation/PreservationEngine';
import { collectQaWarnings } from '../preservation/QaValidators';
import { ConfigurationError, errorMessage, GuardError, TransformError } from '../util/errors';
import { runPool } from '../util/WorkerPool';
import { fixHeadingCollisions, stripPromptMarkers, stripUnknownPlaceholders } from './OutputCleanup';
import type { TextTransformer } from './TextTransformer';

export interface ChunkTransformOptions {
  /** Chunks in flight at once. */
  concurrency?: number;
  /** Transformer calls per chunk while placeholders keep going missing. */
  maxAttempts?: number;
  /** Above this many placeholders, inline code is left unprotected. */
  inlineCodeLimit?: number;
  /** Terms to hand the transformer. Defaults to none. */
  glossary?: readonly GlossaryEntry[];
  /** Defaults to `filtered`. */
  glossaryMode?: GlossaryMode;
  /** Glossary entries sent with one chunk in `filtered` mode. */
  glossaryMaxTerms?: number;
  /** Character budget for the glossary entries of one chunk in `filtered` mode. */
  glossaryMaxChars?: number;
}

export interface ChunkTransformResult {
  chunkId: string;
  index: number;
  text: string;
  warnings: string[];
}

export class ChunkTransformRunner {
  protected readonly logger = getLoggerFor(this);

  private readonly transformer: TextTransformer;
  private readonly engine: PreservationEngine;
  private readonly concurrency: number;
  private readonly maxAttempts: number;
  private readonly inlineCodeLimit: number;
  private readonly glossary: readonly GlossaryEntry[];
  private readonly glossaryMode: GlossaryMode;
  private readonly glossaryMaxTerms: number;
  private readonly glossaryMaxChars: number;

  public constructor(transformer: TextTransformer, options: ChunkTransformOptions = {}, engine = new PreservationEngine()) {
    this.transformer = transformer;
    this.engine = engine;
    this.concurrency = positive('concurrency', options.concurrency ?? 3);
    this.maxAttempts = positive('maxAttempts', options.maxAttempts ?? 3);
    this.inlineCodeLimit = positive('inlineCodeLimit', options.inlineCodeLimit ?? 30);
    this.glossary = options.glossary ?? [];
    this.glossaryMode = options.glossaryMode ?? 'filtered';
    this.glossaryMaxTerms = positive('glossaryMaxTerms', options.glossaryMaxTerms ?? DEFAULT_GLOSSARY_LIMITS.maxTerms);
    this.glossaryMaxChars = positive('glossaryMaxChars', options.glossaryMaxChars ?? DEFAULT_GLOSSARY_LIMITS.maxChars);
  }

  public async run(chunks: readonly ChunkPlanEntry[]): Promise<ChunkTransformResult[]> {
    if (chunks.length === 0) {
      return [];
    }
    this.logger.info(`Transforming ${chunks.length} chunks with concurrency ${this.concurrency}`);
    return runPool(chunks, this.concurrency, async (chunk, index): Promise<ChunkTransformResult> =>
      logContext.run({ chunkId: chunk.chunkId }, async (): Promise<ChunkTransformResult> => this.transformChunk(chunk, index)));
  }

  public async transformChunk(chunk: ChunkPlanEntry, index: number): Promise<ChunkTransformResult> {
    const { chunkId, sourceText } = chunk;
    if (!sourceText) {
      return { chunkId, index, text: '', warnings: []};
    }

    const glossary = this.glossaryFor(sourceText);
    const { protectedText, restorationMap } = this.protectChunk(sourceText);
    const expected = Object.keys(restorationMap).sort();
    const output = await this.transformWithAttempts(chunkId, protectedText, expected, glossary);

    let restored: string;
    try {
      restored = this.engine.restore(stripUnknownPlaceholders(output, restorationMap), restorationMap, { strict: false });
    } catch (error: unknown) {
      throw new TransformError(`restore failed: ${errorMessage(error)}`, chunkId);
    }

    const text = fixHeadingCollisions(stripPromptMarkers(restored));
    const warnings = collectQaWarnings(sourceText, text, glossary);
    for (const warning of warnings) {
      this.logger.warn(warning);
    }
    return { chunkId, index, text, warnings };
  }

  private glossaryFor(sourceText: string): readonly GlossaryEntry[] {
    if (this.glossaryMode === 'full') {
      return this.glossary;
    }
    return selectGlossaryEntries(this.glossary, sourceText, {
      maxTerms: this.glossaryMaxTerms,
      maxChars: this.glossaryMaxChars,
    });
  }

  private protectChunk(sourceText: string): ProtectResult {
    const result = this.engine.protect(sourceText);
    const count = Object.keys(result.restorationMap).length;
    if (count <= this.inlineCodeLimit) {
      return result;
    }
    this.logger.debug(`${count} placeholders exceed ${this.inlineCodeLimit}, leaving inline code unprotected`);
    return this.engine.protect(sourceText, { skipInlineCode: true });
  }

  /**
   * Keeps the output missing the fewest placeholders. An output that lost all of
   * them is never accepted.
   */
  private async transformWithAttempts(
    chunkId: string,
    protectedText: string,
    expected: string[],
    glossary: readonly GlossaryEntry[],
  ): Promise<string> {
    if (expected.length === 0) {
      return this.callTransformer(chunkId, protectedText, expected, glossary);
    }

    let best: string | undefined;
    let bestMissing = expected.length;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const output = await this.callTransformer(chunkId, protectedText, expected, glossary);
      const missing = expected.filter((token): boolean => !output.includes(token)).length;
      if (missing === 0) {
        return output;
      }
      this.logger.warn(`Attempt ${attempt}/${this.maxAttempts} lost ${missing} of ${expected.length} placeholders`);
      if (missing < bestMissing) {
        bestMissing = missing;
        best = output;
      }
    }

    if (best === undefined) {
      throw new TransformError(`transform lost every placeholder in ${this.maxAttempts} attempts`, chunkId);
    }
    return best;
  }

  private async callTransformer(
    chunkId: string,
    text: string,
    expected: string[],
    glossary: readonly GlossaryEntry[],
  ): Promise<string> {
    try {
      return await this.transformer.transform(text, expected, glossary);
    } catch (error: unknown) {
      if (error instanceof GuardError) {
        throw error;
      }
      throw new TransformError(`transformer failed: ${errorMessage(error)}`, chunkId);
    }
  }
}

function positive(label: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw ConfigurationError.nonPositive(label, value);
  }
  return value;
}

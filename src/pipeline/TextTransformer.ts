import type { GlossaryEntry } from '../preservation/Glossary';

/**
 * The external rewriting step (translation, paraphrasing, ...).
 *
 * Output is never trusted: placeholders may be dropped, duplicated or invented,
 * and every result is validated before it is restored.
 */
export interface TextTransformer {
  /**
   * @param text - protected chunk text
   * @param expectedPlaceholders - tokens the output must keep verbatim, sorted
   * @param glossary - terms selected for this chunk; the rewrite should use their target forms
   */
  transform(text: string, expectedPlaceholders: readonly string[], glossary: readonly GlossaryEntry[]): Promise<string>;
}

/**
 * Glossary terms handed to the transformer with each chunk, and the check that
 * their target forms made it into the rewrite.
 */

import { ConfigurationError } from '../util/errors';
import { escapeRegExp } from '../util/escapeRegExp';
import { SchemaAssert } from '../util/SchemaAssert';

export interface GlossaryEntry {
  /** Term as it appears in the source text. */
  term: string;
  /** Form the rewrite should use. */
  translation: string;
  note?: string;
}

/**
 * `filtered` sends only the entries relevant to a chunk; `full` sends all of them.
 */
export type GlossaryMode = 'filtered' | 'full';

export interface GlossaryLimits {
  /** Entries per chunk. */
  maxTerms: number;
  /** Summed length of term, translation and note per chunk. */
  maxChars: number;
}

export const DEFAULT_GLOSSARY_LIMITS: GlossaryLimits = {
  maxTerms: 30,
  maxChars: 2000,
};

/** Exact phrase, then single word on a word boundary, then partial token overlap. */
type MatchTier = 1 | 2 | 3;

interface Candidate {
  tier: MatchTier;
  index: number;
  entry: GlossaryEntry;
  chars: number;
}

const assert = new SchemaAssert((message): Error => new ConfigurationError(message));

export function parseGlossary(value: unknown): GlossaryEntry[] {
  return assert.list(value, 'glossary').map((item, index): GlossaryEntry => {
    const label = `glossary[${index}]`;
    const record = assert.record(item, label);
    const entry: GlossaryEntry = {
      term: assert.string(record.term, `${label}.term`),
      translation: assert.string(record.translation, `${label}.translation`),
    };
    if (record.note !== undefined) {
      entry.note = assert.string(record.note, `${label}.note`);
    }
    return entry;
  });
}

export function normalizeGlossaryText(value: string): string {
  return value.toLowerCase().replace(/-/g, ' ').replace(/\s+/g, ' ').trim();
}

export function tokenizeGlossaryText(value: string): string[] {
  return normalizeGlossaryText(value).match(/[a-z0-9]+/g) ?? [];
}

/**
 * Picks the entries worth sending with `chunkText`, best tier first and then in
 * glossary order. An entry that would overflow `maxChars` is skipped and smaller
 * ones after it may still fit.
 */
export function selectGlossaryEntries(
  glossary: readonly GlossaryEntry[],
  chunkText: string,
  limits: GlossaryLimits = DEFAULT_GLOSSARY_LIMITS,
): GlossaryEntry[] {
  const chunk = normalizeGlossaryText(chunkText);
  if (glossary.length === 0 || !chunk) {
    return [];
  }
  const chunkTokens = new Set(chunk.match(/[a-z0-9]+/g) ?? []);

  const candidates: Candidate[] = [];
  glossary.forEach((entry, index): void => {
    const tier = matchTier(entry.term, chunk, chunkTokens);
    if (tier !== undefined) {
      const chars = entry.term.length + entry.translation.length + (entry.note?.length ?? 0);
      candidates.push({ tier, index, entry, chars });
    }
  });
  candidates.sort((a, b): number => a.tier - b.tier || a.index - b.index);

  const selected: GlossaryEntry[] = [];
  let totalChars = 0;
  for (const candidate of candidates) {
    if (selected.length >= limits.maxTerms) {
      break;
    }
    if (totalChars + candidate.chars > limits.maxChars) {
      continue;
    }
    selected.push(candidate.entry);
    totalChars += candidate.chars;
  }
  return selected;
}

/**
 * One warning per entry whose source term survived into `restored` while its
 * target form did not.
 */
export function collectGlossaryWarnings(restored: string, glossary: readonly GlossaryEntry[]): string[] {
  return glossary
    .filter((entry): boolean => restored.includes(entry.term) && !restored.includes(entry.translation))
    .map((entry): string => `glossary term '${entry.term}' missing target form '${entry.translation}'`);
}

function matchTier(term: string, chunk: string, chunkTokens: ReadonlySet<string>): MatchTier | undefined {
  const normalized = normalizeGlossaryText(term);
  if (!normalized) {
    return undefined;
  }
  const termTokens = new Set(tokenizeGlossaryText(term));

  if (termTokens.size >= 2) {
    if (chunk.includes(normalized)) {
      return 1;
    }
    const overlap = [ ...termTokens ].filter((token): boolean => chunkTokens.has(token)).length;
    return overlap / termTokens.size >= 0.5 ? 3 : undefined;
  }
  return hasWholeWord(normalized, chunk) ? 2 : undefined;
}

function hasWholeWord(term: string, chunk: string): boolean {
  // Terms with punctuation have no meaningful word edges
  if (/[^\p{L}\p{N}_\s]/u.test(term)) {
    return chunk.includes(term);
  }
  return new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(term)}(?![\\p{L}\\p{N}_])`, 'u').test(chunk);
}

/**
 * Structural checks between an original unit and its restored rewrite. They look
 * only at the two texts, never at a restoration map, so they can run after a
 * best-effort restore.
 */

import { findProtectedSpans, isEscaped } from '../document/SpanDetector';
import {
  FenceCountMismatchError,
  MathDelimiterMismatchError,
  QaError,
  UrlTargetMismatchError,
} from '../util/errors';
import type { GlossaryEntry } from './Glossary';
import { collectGlossaryWarnings } from './Glossary';
import { firstPlaceholder } from './Placeholder';

const FENCE_LINE = /^[ \t]*(`{3,}|~{3,})/gm;

export function countFenceLines(text: string): number {
  return Array.from(text.matchAll(FENCE_LINE)).length;
}

export function validateFenceCounts(original: string, restored: string): void {
  const expected = countFenceLines(original);
  const actual = countFenceLines(restored);
  if (expected !== actual) {
    throw new FenceCountMismatchError(expected, actual);
  }
}

interface DollarCounts {
  single: number;
  double: number;
}

function countDollars(text: string): DollarCounts {
  const counts: DollarCounts = { single: 0, double: 0 };
  let index = 0;
  while (index < text.length) {
    if (text[index] !== '$' || isEscaped(text, index)) {
      index += 1;
    } else if (text[index + 1] === '$') {
      counts.double += 1;
      index += 2;
    } else {
      counts.single += 1;
      index += 1;
    }
  }
  return counts;
}

function countUnescaped(text: string, pattern: RegExp): number {
  let count = 0;
  for (const match of text.matchAll(pattern)) {
    if (!isEscaped(text, match.index ?? 0)) {
      count += 1;
    }
  }
  return count;
}

/**
 * Counts per delimiter, in the order they are compared.
 */
export function countMathDelimiters(text: string): [string, number][] {
  const dollars = countDollars(text);
  return [
    [ '$$', dollars.double ],
    [ '$', dollars.single ],
    [ '\\(', countUnescaped(text, /\\\(/g) ],
    [ '\\)', countUnescaped(text, /\\\)/g) ],
    [ '\\[', countUnescaped(text, /\\\[/g) ],
    [ '\\]', countUnescaped(text, /\\\]/g) ],
    [ '\\begin', countUnescaped(text, /\\begin\{[^}]+\}/g) ],
    [ '\\end', countUnescaped(text, /\\end\{[^}]+\}/g) ],
  ];
}

export function validateMathDelimiters(original: string, restored: string): void {
  const actual = new Map(countMathDelimiters(restored));
  for (const [ delimiter, expected ] of countMathDelimiters(original)) {
    const found = actual.get(delimiter) ?? 0;
    if (found !== expected) {
      throw new MathDelimiterMismatchError(delimiter, expected, found);
    }
  }
}

/**
 * Link and reference destinations in document order.
 */
export function extractUrlTargets(text: string): string[] {
  return findProtectedSpans(text)
    .filter((span): boolean => span.kind === 'URL')
    .map((span): string => text.slice(span.start, span.end));
}

export function validateUrlTargets(original: string, restored: string): void {
  const expected = extractUrlTargets(original);
  const actual = extractUrlTargets(restored);
  const length = Math.max(expected.length, actual.length);
  for (let position = 0; position < length; position++) {
    const want: string | undefined = expected[position];
    const got: string | undefined = actual[position];
    if (want !== got) {
      throw new UrlTargetMismatchError(position, want, got);
    }
  }
}

/**
 * Runs every QA check and reports failures as warning lines instead of throwing.
 * Glossary warnings for the entries sent with the unit come last.
 */
export function collectQaWarnings(original: string, restored: string, glossary: readonly GlossaryEntry[] = []): string[] {
  const warnings: string[] = [];
  for (const check of [ validateFenceCounts, validateMathDelimiters, validateUrlTargets ]) {
    try {
      check(original, restored);
    } catch (error: unknown) {
      if (!(error instanceof QaError)) {
        throw error;
      }
      warnings.push(`QA warning: ${error.message}`);
    }
  }

  const leftover = firstPlaceholder(restored);
  if (leftover) {
    warnings.push(`QA warning: leftover placeholder ${leftover}`);
  }
  return [ ...warnings, ...collectGlossaryWarnings(restored, glossary) ];
}

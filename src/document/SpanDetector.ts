/**
 * SpanDetector - finds the parts of a Markdown document that must never be rewritten.
 *
 * Pure functions, no I/O. Detection is heuristic on purpose: it understands enough
 * Markdown and LaTeX to keep code, math, link destinations and raw HTML intact,
 * and nothing more.
 */

import { placeholderPattern } from '../preservation/Placeholder';
import type { ProtectedSpan, SpanKind } from './ProtectedSpan';
import { compareSpans, SpanSet } from './ProtectedSpan';

export type SpanScanner = (text: string) => ProtectedSpan[];

export interface DetectionPass {
  kind: SpanKind;
  scanners: SpanScanner[];
}

// ============================================
// Text helpers
// ============================================

/**
 * A character is escaped when an odd number of backslashes precede it.
 */
export function isEscaped(text: string, index: number): boolean {
  let backslashes = 0;
  for (let cursor = index - 1; cursor >= 0 && text[cursor] === '\\'; cursor--) {
    backslashes += 1;
  }
  return backslashes % 2 === 1;
}

/**
 * Splits into lines that keep their terminators, so the pieces join back to `text`.
 */
export function splitLinesKeepEnds(text: string): string[] {
  return text.match(/[^\r\n]*(?:\r\n|\r|\n)|[^\r\n]+$/g) ?? [];
}

function isWhitespace(char: string | undefined): boolean {
  return char !== undefined && /\s/.test(char);
}

function isDigit(char: string | undefined): boolean {
  return char !== undefined && /\d/.test(char);
}

function countRun(text: string, index: number, char: string): number {
  let count = 0;
  while (text[index + count] === char) {
    count += 1;
  }
  return count;
}

function span(start: number, end: number, kind: SpanKind): ProtectedSpan {
  return { start, end, kind };
}

/**
 * Finds the next unescaped `\<char>` pair at or after `from`.
 * With `singleLine` the search gives up at the first line break.
 */
function findBackslashPair(text: string, char: string, from: number, singleLine: boolean): number {
  for (let index = from; index < text.length - 1; index++) {
    if (singleLine && text[index] === '\n') {
      return -1;
    }
    if (text[index] === '\\' && text[index + 1] === char && !isEscaped(text, index)) {
      return index;
    }
  }
  return -1;
}

// ============================================
// Fenced code
// ============================================

const FENCE_OPEN = /^[ \t]*(`{3,}|~{3,})/;

function closesFence(line: string, char: string, length: number): boolean {
  const body = line.replace(/[\r\n]+$/, '').replace(/^[ \t]+|[ \t]+$/g, '');
  return body.length >= length && body === char.repeat(body.length);
}

export function findFencedCodeSpans(text: string): ProtectedSpan[] {
  const spans: ProtectedSpan[] = [];
  let open: { char: string; length: number; start: number } | undefined;
  let offset = 0;

  for (const line of splitLinesKeepEnds(text)) {
    if (open) {
      if (closesFence(line, open.char, open.length)) {
        spans.push(span(open.start, offset + line.length, 'CODE_BLOCK'));
        open = undefined;
      }
    } else {
      const match = FENCE_OPEN.exec(line);
      if (match) {
        open = { char: match[1][0], length: match[1].length, start: offset };
      }
    }
    offset += line.length;
  }

  // Unterminated fences run to the end of the document
  if (open) {
    spans.push(span(open.start, text.length, 'CODE_BLOCK'));
  }
  return spans;
}

// ============================================
// Display math
// ============================================

/**
 * `$$` delimiters pair up in order of appearance.
 */
export function findDisplayDollarMathSpans(text: string): ProtectedSpan[] {
  const spans: ProtectedSpan[] = [];
  let start: number | undefined;
  let index = 0;

  while (index < text.length - 1) {
    if (text[index] === '$' && text[index + 1] === '$' && !isEscaped(text, index)) {
      if (start === undefined) {
        start = index;
      } else {
        spans.push(span(start, index + 2, 'MATH_BLOCK'));
        start = undefined;
      }
      index += 2;
      continue;
    }
    index += 1;
  }

  if (start !== undefined) {
    spans.push(span(start, text.length, 'MATH_BLOCK'));
  }
  return spans;
}

export function findBracketDisplayMathSpans(text: string): ProtectedSpan[] {
  const spans: ProtectedSpan[] = [];
  let index = 0;

  while (index < text.length - 1) {
    if (text[index] === '\\' && text[index + 1] === '[' && !isEscaped(text, index)) {
      const close = findBackslashPair(text, ']', index + 2, false);
      const end = close === -1 ? text.length : close + 2;
      spans.push(span(index, end, 'MATH_BLOCK'));
      index = end;
      continue;
    }
    index += 1;
  }
  return spans;
}

/**
 * `\begin{env}` ... `\end{env}` with the same literal environment name.
 * An environment that never closes is left alone.
 */
export function findEnvironmentMathSpans(text: string): ProtectedSpan[] {
  const spans: ProtectedSpan[] = [];
  const beginPattern = /\\begin\{([^}]+)\}/g;
  let match: RegExpExecArray | null;

  while ((match = beginPattern.exec(text)) !== null) {
    const start = match.index;
    if (isEscaped(text, start)) {
      continue;
    }
    const closeToken = `\\end{${match[1]}}`;
    const close = text.indexOf(closeToken, start + match[0].length);
    if (close !== -1) {
      spans.push(span(start, close + closeToken.length, 'MATH_BLOCK'));
    }
  }
  return spans;
}

// ============================================
// Inline math
// ============================================

/**
 * `\(` ... `\)` on a single line.
 */
export function findParenInlineMathSpans(text: string): ProtectedSpan[] {
  const spans: ProtectedSpan[] = [];
  let index = 0;

  while (index < text.length - 1) {
    if (text[index] === '\\' && text[index + 1] === '(' && !isEscaped(text, index)) {
      const close = findBackslashPair(text, ')', index + 2, true);
      if (close === -1) {
        index += 2;
        continue;
      }
      spans.push(span(index, close + 2, 'MATH_INLINE'));
      index = close + 2;
      continue;
    }
    index += 1;
  }
  return spans;
}

/**
 * Content between single dollars counts as math only if it carries a LaTeX-ish
 * symbol or a letter. Bare numbers (prices) do not.
 */
export function looksLikeMath(content: string): boolean {
  const stripped = content.trim();
  if (!stripped) {
    return false;
  }
  return /[\\^_=\{\}\[\]<>+\-*/]/.test(stripped) || /[A-Za-z]/.test(stripped);
}

/**
 * Single-dollar inline math, with the currency guards:
 * - the opener must not be followed by whitespace
 * - the closer must not follow whitespace nor precede a digit
 * - the content must pass {@link looksLikeMath}
 * A candidate that fails the content test abandons this opener.
 */
export function findDollarInlineMathSpans(text: string): ProtectedSpan[] {
  const spans: ProtectedSpan[] = [];
  let index = 0;

  while (index < text.length) {
    if (text[index] !== '$' || isEscaped(text, index)) {
      index += 1;
      continue;
    }
    if (text[index + 1] === '$') {
      index += 2;
      continue;
    }
    if (index + 1 >= text.length || isWhitespace(text[index + 1])) {
      index += 1;
      continue;
    }

    let found = false;
    let search = index + 1;
    while (search < text.length) {
      if (text[search] === '\n') {
        break;
      }
      if (text[search] !== '$' || isEscaped(text, search)) {
        search += 1;
        continue;
      }
      if (text[search + 1] === '$') {
        search += 2;
        continue;
      }
      if (isWhitespace(text[search - 1]) || isDigit(text[search + 1])) {
        search += 1;
        continue;
      }
      if (!looksLikeMath(text.slice(index + 1, search))) {
        break;
      }
      spans.push(span(index, search + 1, 'MATH_INLINE'));
      index = search + 1;
      found = true;
      break;
    }

    if (!found) {
      index += 1;
    }
  }
  return spans;
}

// ============================================
// Inline code
// ============================================

function findClosingRun(text: string, from: number, length: number): number {
  let index = from;
  while (index < text.length) {
    if (text[index] !== '`' || isEscaped(text, index)) {
      index += 1;
      continue;
    }
    const run = countRun(text, index, '`');
    if (run === length) {
      return index;
    }
    index += run;
  }
  return -1;
}

/**
 * A run of N backticks is closed by the next run of exactly N. An opener without a
 * closer, or one whose span would swallow a placeholder token, is skipped.
 */
export function findInlineCodeSpans(text: string): ProtectedSpan[] {
  const spans: ProtectedSpan[] = [];
  let index = 0;

  while (index < text.length) {
    if (text[index] !== '`' || isEscaped(text, index)) {
      index += 1;
      continue;
    }
    const ticks = countRun(text, index, '`');
    const close = findClosingRun(text, index + ticks, ticks);
    if (close === -1 || placeholderPattern().test(text.slice(index, close + ticks))) {
      index += ticks;
      continue;
    }
    spans.push(span(index, close + ticks, 'INLINE_CODE'));
    index = close + ticks;
  }
  return spans;
}

// ============================================
// Link destinations
// ============================================

function findMatchingBracket(text: string, start: number): number {
  let depth = 0;
  for (let index = start; index < text.length; index++) {
    if (text[index] === '[' && !isEscaped(text, index)) {
      depth += 1;
    } else if (text[index] === ']' && !isEscaped(text, index)) {
      depth -= 1;
      if (depth === 0) {
        return index;
      }
    }
  }
  return -1;
}

function findMatchingParen(text: string, start: number): number {
  let depth = 0;
  let index = start;
  while (index < text.length) {
    const char = text[index];
    if (char === '\n') {
      return -1;
    }
    if (char === '\\') {
      index += 2;
      continue;
    }
    if (char === '(') {
      depth += 1;
    } else if (char === ')') {
      if (depth === 0) {
        return index;
      }
      depth -= 1;
    }
    index += 1;
  }
  return -1;
}

/**
 * Locates the URL inside a link destination (which may be followed by a title).
 * Returns offsets relative to `destination`.
 */
export function parseLinkDestination(destination: string): { start: number; end: number } | undefined {
  let index = 0;
  while (index < destination.length && isWhitespace(destination[index])) {
    index += 1;
  }
  if (index >= destination.length) {
    return undefined;
  }

  if (destination[index] === '<') {
    const end = destination.indexOf('>', index + 1);
    return end === -1 ? undefined : { start: index + 1, end };
  }

  const start = index;
  let depth = 0;
  while (index < destination.length) {
    const char = destination[index];
    if (char === '\n') {
      break;
    }
    if (char === '\\') {
      index += 2;
      continue;
    }
    if (char === '(') {
      depth += 1;
    } else if (char === ')') {
      if (depth === 0) {
        break;
      }
      depth -= 1;
    } else if (depth === 0 && isWhitespace(char)) {
      break;
    }
    index += 1;
  }

  const end = Math.min(index, destination.length);
  return end > start ? { start, end } : undefined;
}

/**
 * Destinations of `[label](dest)` and `![alt](dest)`. Labels are scanned too, so
 * an image nested in a link yields both targets.
 */
export function findInlineLinkUrlSpans(text: string): ProtectedSpan[] {
  const spans: ProtectedSpan[] = [];
  // destination start -> first index after its closing paren
  const destinations = new Map<number, number>();
  let index = 0;

  while (index < text.length) {
    const skipTo = destinations.get(index);
    if (skipTo !== undefined) {
      index = skipTo;
      continue;
    }

    let bracket: number;
    if (text[index] === '!' && text[index + 1] === '[') {
      bracket = index + 1;
    } else if (text[index] === '[') {
      bracket = index;
    } else {
      index += 1;
      continue;
    }
    if (isEscaped(text, bracket)) {
      index += 1;
      continue;
    }

    const labelEnd = findMatchingBracket(text, bracket);
    if (labelEnd === -1) {
      index += 1;
      continue;
    }

    let cursor = labelEnd + 1;
    while (cursor < text.length && text[cursor] !== '\r' && text[cursor] !== '\n' && isWhitespace(text[cursor])) {
      cursor += 1;
    }
    if (text[cursor] !== '(') {
      index = labelEnd + 1;
      continue;
    }

    const destStart = cursor + 1;
    const destEnd = findMatchingParen(text, destStart);
    if (destEnd === -1) {
      index = labelEnd + 1;
      continue;
    }

    const range = parseLinkDestination(text.slice(destStart, destEnd));
    if (range) {
      spans.push(span(destStart + range.start, destStart + range.end, 'URL'));
    }
    destinations.set(destStart, destEnd + 1);
    index = bracket + 1;
  }
  return spans;
}

const REFERENCE_DEFINITION = /^[ \t]*\[[^\]]+\]:[ \t]*/;

/**
 * Destinations of reference definitions: `[label]: dest "title"`.
 */
export function findReferenceUrlSpans(text: string): ProtectedSpan[] {
  const spans: ProtectedSpan[] = [];
  let offset = 0;

  for (const line of splitLinesKeepEnds(text)) {
    const match = REFERENCE_DEFINITION.exec(line);
    if (match) {
      const base = offset + match[0].length;
      const range = parseLinkDestination(line.slice(match[0].length));
      if (range) {
        spans.push(span(base + range.start, base + range.end, 'URL'));
      }
    }
    offset += line.length;
  }
  return spans;
}

export function findUrlSpans(text: string): ProtectedSpan[] {
  return [ ...findInlineLinkUrlSpans(text), ...findReferenceUrlSpans(text) ].sort(compareSpans);
}

// ============================================
// Raw HTML
// ============================================

export function findHtmlSpans(text: string): ProtectedSpan[] {
  const spans: ProtectedSpan[] = [];
  const tagPattern = /<(?:!--[\s\S]*?--|!DOCTYPE[^<>]*|\/?[A-Za-z][A-Za-z0-9:-]*(?:\s[^<>]*?)?\/?)>/g;
  let match: RegExpExecArray | null;

  while ((match = tagPattern.exec(text)) !== null) {
    if (!isEscaped(text, match.index)) {
      spans.push(span(match.index, match.index + match[0].length, 'HTML'));
    }
  }
  return spans;
}

// ============================================
// Detection
// ============================================

/**
 * Passes from highest to lowest priority. Shared with the preservation engine so
 * both agree on what wins an overlap.
 */
export const DETECTION_PASSES: readonly DetectionPass[] = [
  { kind: 'CODE_BLOCK', scanners: [ findFencedCodeSpans ]},
  { kind: 'MATH_BLOCK', scanners: [ findDisplayDollarMathSpans, findBracketDisplayMathSpans, findEnvironmentMathSpans ]},
  { kind: 'MATH_INLINE', scanners: [ findParenInlineMathSpans, findDollarInlineMathSpans ]},
  { kind: 'INLINE_CODE', scanners: [ findInlineCodeSpans ]},
  { kind: 'URL', scanners: [ findUrlSpans ]},
  { kind: 'HTML', scanners: [ findHtmlSpans ]},
];

/**
 * All protected spans of `text`, pairwise non-overlapping, sorted by `(start, end)`.
 */
export function findProtectedSpans(text: string): ProtectedSpan[] {
  return detectSpanSet(text).toArray();
}

export function detectSpanSet(text: string): SpanSet {
  return SpanSet.accepting(DETECTION_PASSES.flatMap((pass): ProtectedSpan[] =>
    pass.scanners.flatMap((scan): ProtectedSpan[] => scan(text).sort(compareSpans))));
}

/**
 * PreservationEngine - swaps protected spans for inert placeholder tokens before
 * text leaves the process, and swaps them back afterwards.
 *
 * Every protect call gets its own {@link PlaceholderRegistry}, so tokens are
 * numbered per call and per kind, in document order.
 */

import { getLoggerFor } from 'global-logger-factory';
import { DETECTION_PASSES } from '../document/SpanDetector';
import type { DetectionPass } from '../document/SpanDetector';
import type { ProtectedSpan } from '../document/ProtectedSpan';
import { compareSpans, SpanSet } from '../document/ProtectedSpan';
import { DetectionError, RestorationError } from '../util/errors';
import { escapeRegExp } from '../util/escapeRegExp';
import { countOccurrences, findPlaceholders, firstPlaceholder, isPlaceholder, PlaceholderRegistry } from './Placeholder';
import type { RestorationMap } from './RestorationMap';

export interface ProtectOptions {
  /** Leave inline code as plain text. */
  skipInlineCode?: boolean;
}

export interface ProtectResult {
  protectedText: string;
  restorationMap: RestorationMap;
}

export interface RestoreOptions {
  /**
   * Fail unless every key occurs exactly once and no unknown token is present.
   * Defaults to `true`.
   */
  strict?: boolean;
}

/**
 * Each key must occur in `protectedText` exactly once, and every placeholder-shaped
 * token in it must be a key.
 */
export function validateRestoration(protectedText: string, map: RestorationMap): void {
  for (const key of Object.keys(map)) {
    if (!isPlaceholder(key)) {
      throw RestorationError.invalidKey(key);
    }
    const count = countOccurrences(protectedText, key);
    if (count === 0) {
      throw RestorationError.missing(key);
    }
    if (count > 1) {
      throw RestorationError.duplicated(key, count);
    }
  }

  for (const token of findPlaceholders(protectedText)) {
    if (!Object.prototype.hasOwnProperty.call(map, token)) {
      throw RestorationError.unknown(token);
    }
  }
}

export class PreservationEngine {
  protected readonly logger = getLoggerFor(this);

  public protect(text: string, options: ProtectOptions = {}): ProtectResult {
    const existing = firstPlaceholder(text);
    if (existing) {
      throw DetectionError.preexistingToken(existing);
    }

    const registry = new PlaceholderRegistry();
    let current = text;
    for (const pass of DETECTION_PASSES) {
      if (options.skipInlineCode && pass.kind === 'INLINE_CODE') {
        continue;
      }
      current = this.substitute(current, this.collect(current, pass, registry), registry);
    }

    const restorationMap = registry.toMap();
    validateRestoration(current, restorationMap);
    this.logger.debug(`Protected ${registry.size} spans in ${text.length} characters`);
    return { protectedText: current, restorationMap };
  }

  public restore(protectedText: string, map: RestorationMap, options: RestoreOptions = {}): string {
    const keys = Object.keys(map);
    for (const key of keys) {
      if (!isPlaceholder(key)) {
        throw RestorationError.invalidKey(key);
      }
    }
    if (options.strict ?? true) {
      validateRestoration(protectedText, map);
    }

    const present = keys
      .filter((key): boolean => protectedText.includes(key))
      .sort((a, b): number => b.length - a.length);
    let restored = protectedText;
    if (present.length > 0) {
      const lookup = new Map(Object.entries(map));
      const pattern = new RegExp(present.map(escapeRegExp).join('|'), 'g');
      restored = protectedText.replace(pattern, (token): string => lookup.get(token) ?? token);
    }

    const leftover = firstPlaceholder(restored);
    if (leftover) {
      throw RestorationError.leftover(leftover);
    }
    return restored;
  }

  /**
   * Candidates of one pass over the current text. Within a pass the scanners are in
   * priority order. Spans that would swallow an earlier placeholder are dropped, and
   * so are spans whose token would merge with a preceding `__WORD` run into one
   * longer placeholder-shaped token.
   */
  private collect(text: string, pass: DetectionPass, registry: PlaceholderRegistry): ProtectedSpan[] {
    const accepted = new SpanSet();
    for (const scan of pass.scanners) {
      for (const candidate of scan(text).sort(compareSpans)) {
        if (registry.swallows(text.slice(candidate.start, candidate.end)) || gluesToPrefix(text, candidate.start)) {
          continue;
        }
        accepted.tryAdd(candidate);
      }
    }
    return accepted.toArray();
  }

  private substitute(text: string, spans: ProtectedSpan[], registry: PlaceholderRegistry): string {
    if (spans.length === 0) {
      return text;
    }
    const parts: string[] = [];
    let cursor = 0;
    for (const span of spans) {
      parts.push(text.slice(cursor, span.start), registry.register(span.kind, text.slice(span.start, span.end)));
      cursor = span.end;
    }
    parts.push(text.slice(cursor));
    return parts.join('');
  }
}

const defaultEngine = new PreservationEngine();

export function protect(text: string, options?: ProtectOptions): ProtectResult {
  return defaultEngine.protect(text, options);
}

export function restore(protectedText: string, map: RestorationMap, options?: RestoreOptions): string {
  return defaultEngine.restore(protectedText, map, options);
}

const GLUED_PREFIX = /(?<![_A-Za-z0-9])__[A-Z][A-Z_]*$/;

/**
 * True when a token placed at `start` would read as part of a token opened by the
 * uppercase run right before it, e.g. `__NOTE__` + `__INLINE_CODE_001__`.
 */
function gluesToPrefix(text: string, start: number): boolean {
  let runStart = start;
  while (runStart > 0 && /[A-Z_]/.test(text.charAt(runStart - 1))) {
    runStart -= 1;
  }
  if (runStart === start) {
    return false;
  }
  return GLUED_PREFIX.test(text.slice(Math.max(0, runStart - 1), start));
}

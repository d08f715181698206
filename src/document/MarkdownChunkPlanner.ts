/**
 * MarkdownChunkPlanner - heading and paragraph aware chunk planning
 *
 * Sections start at heading lines, sections split into paragraphs at blank-line
 * runs, and paragraphs are packed greedily into chunks of at most `maxChunkChars`
 * UTF-16 code units. Nothing is trimmed or normalized: the chunks always join back
 * to the input.
 */

import { getLoggerFor } from 'global-logger-factory';
import { ConfigurationError, PlanInvariantError } from '../util/errors';
import type { ChunkPlanEntry, ChunkPlanner } from './ChunkPlanner';
import type { SpanSet } from './ProtectedSpan';
import { detectSpanSet, splitLinesKeepEnds } from './SpanDetector';

const HEADING = /^[ \t]{0,3}#{1,6}[ \t]+/;
const BLANK_LINES = /(?:\r?\n[ \t]*){2,}/g;
const SENTENCE_END = /(?<=[.!?。！？])\s+/g;

/**
 * Smallest packable piece: paragraph text plus the separator that followed it.
 */
interface Unit {
  text: string;
  separator: string;
}

interface Draft {
  sourceText: string;
  separators: string[];
}

/**
 * True when cutting at `offset` would land strictly inside a protected span.
 */
type CutGuard = (offset: number) => boolean;

export class MarkdownChunkPlanner implements ChunkPlanner {
  protected readonly logger = getLoggerFor(this);

  private readonly maxChunkChars: number;

  public constructor(maxChunkChars: number) {
    if (!Number.isInteger(maxChunkChars) || maxChunkChars <= 0) {
      throw ConfigurationError.nonPositive('maxChunkChars', maxChunkChars);
    }
    this.maxChunkChars = maxChunkChars;
  }

  public plan(text: string): ChunkPlanEntry[] {
    if (!text) {
      return [];
    }

    const spans = detectSpanSet(text);
    const drafts: Draft[] = [];
    for (const [ start, end ] of this.splitByHeadings(text, spans)) {
      drafts.push(...this.pack(this.splitSection(text, start, end, spans)));
    }

    const entries = this.assignIds(drafts);
    this.logger.debug(`Planned ${entries.length} chunks from ${text.length} characters (limit ${this.maxChunkChars})`);
    return entries;
  }

  /**
   * Section boundaries as `[start, end)` pairs. Heading-shaped lines inside a
   * protected span (e.g. a `#` comment in a code block) do not count.
   */
  private splitByHeadings(text: string, spans: SpanSet): [number, number][] {
    const boundaries = [ 0 ];
    let offset = 0;
    for (const line of splitLinesKeepEnds(text)) {
      if (offset > 0 && HEADING.test(line) && !spans.containing(offset)) {
        boundaries.push(offset);
      }
      offset += line.length;
    }
    boundaries.push(text.length);

    const sections: [number, number][] = [];
    for (let index = 1; index < boundaries.length; index++) {
      sections.push([ boundaries[index - 1], boundaries[index] ]);
    }
    return sections;
  }

  private splitSection(text: string, start: number, end: number, spans: SpanSet): Unit[] {
    const section = text.slice(start, end);
    const guard: CutGuard = (offset): boolean => {
      const span = spans.containing(offset);
      return span !== undefined && span.start < offset;
    };
    const units: Unit[] = [];
    let last = 0;

    for (const match of section.matchAll(BLANK_LINES)) {
      const sepStart = match.index ?? 0;
      const sepEnd = sepStart + match[0].length;
      if (spans.overlaps(start + sepStart, start + sepEnd)) {
        continue;
      }
      const partStart = last;
      units.push(...this.expand(section.slice(partStart, sepStart), match[0], (offset): boolean => guard(start + partStart + offset)));
      last = sepEnd;
    }

    const tailStart = last;
    units.push(...this.expand(section.slice(tailStart), '', (offset): boolean => guard(start + tailStart + offset)));
    return units;
  }

  private expand(text: string, separator: string, guard: CutGuard): Unit[] {
    if (!text && !separator) {
      return [];
    }
    const fragments = text.length > this.maxChunkChars ? this.forceSplit(text, guard) : [ text ];
    const units: Unit[] = fragments.slice(0, -1).map((fragment): Unit => ({ text: fragment, separator: '' }));
    const last = fragments[fragments.length - 1];

    if (last.length + separator.length <= this.maxChunkChars) {
      units.push({ text: last, separator });
      return units;
    }
    if (separator.length > this.maxChunkChars) {
      throw new ConfigurationError(
        `blank-line separator of ${separator.length} characters exceeds maxChunkChars (${this.maxChunkChars})`,
      );
    }
    if (last) {
      units.push({ text: last, separator: '' });
    }
    units.push({ text: '', separator });
    return units;
  }

  /**
   * Cuts over-long text at the last sentence end, else the last newline, else the
   * last space, else hard at the limit. Cut points inside a protected span are
   * passed over.
   */
  private forceSplit(text: string, guard: CutGuard): string[] {
    const fragments: string[] = [];
    let remaining = text;
    let base = 0;

    while (remaining.length > this.maxChunkChars) {
      const offset = base;
      const cut = this.findCut(remaining, (position): boolean => guard(offset + position));
      fragments.push(remaining.slice(0, cut));
      remaining = remaining.slice(cut);
      base += cut;
    }

    fragments.push(remaining);
    return fragments;
  }

  private findCut(remaining: string, guard: CutGuard): number {
    const limit = this.maxChunkChars;
    const window = remaining.slice(0, limit);

    let best = -1;
    for (const match of window.matchAll(SENTENCE_END)) {
      const end = (match.index ?? 0) + match[0].length;
      if (!guard(end)) {
        best = end;
      }
    }
    if (best <= 0) {
      best = lastUnguarded(window, '\n', guard);
    }
    if (best <= 0) {
      best = lastUnguarded(window, ' ', guard);
    }
    if (best <= 0) {
      best = limit;
      // Keep surrogate pairs together
      if (limit > 1 && isHighSurrogate(remaining.charCodeAt(limit - 1)) && isLowSurrogate(remaining.charCodeAt(limit))) {
        best = limit - 1;
      }
    }
    return best;
  }

  private pack(units: Unit[]): Draft[] {
    const drafts: Draft[] = [];
    let parts: string[] = [];
    let separators: string[] = [];
    let length = 0;

    const flush = (): void => {
      drafts.push({ sourceText: parts.join(''), separators });
      parts = [];
      separators = [];
      length = 0;
    };

    for (const unit of units) {
      const unitLength = unit.text.length + unit.separator.length;
      if (unitLength > this.maxChunkChars) {
        throw new PlanInvariantError(`unit of ${unitLength} characters exceeds maxChunkChars (${this.maxChunkChars})`);
      }
      if (length > 0 && length + unitLength > this.maxChunkChars) {
        flush();
      }
      parts.push(unit.text, unit.separator);
      if (unit.separator) {
        separators.push(unit.separator);
      }
      length += unitLength;
    }

    if (length > 0) {
      flush();
    }
    return drafts;
  }

  private assignIds(drafts: Draft[]): ChunkPlanEntry[] {
    const width = Math.max(4, String(drafts.length).length);
    return drafts.map((draft, index): ChunkPlanEntry => ({
      chunkId: `chunk-${String(index + 1).padStart(width, '0')}`,
      sourceText: draft.sourceText,
      separators: draft.separators,
    }));
  }
}

/**
 * Plans `text` with a one-off planner.
 */
export function plan(text: string, maxChunkChars: number): ChunkPlanEntry[] {
  return new MarkdownChunkPlanner(maxChunkChars).plan(text);
}

function lastUnguarded(window: string, char: string, guard: CutGuard): number {
  let index = window.lastIndexOf(char);
  while (index > 0 && guard(index)) {
    index = window.lastIndexOf(char, index - 1);
  }
  return index;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xD800 && code <= 0xDBFF;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xDC00 && code <= 0xDFFF;
}

/**
 * Character ranges that must pass unchanged through chunking and rewriting.
 */

export type SpanKind = 'CODE_BLOCK' | 'MATH_BLOCK' | 'MATH_INLINE' | 'INLINE_CODE' | 'URL' | 'HTML';

export interface ProtectedSpan {
  /** Inclusive start offset. */
  start: number;
  /** Exclusive end offset. */
  end: number;
  kind: SpanKind;
}

export function compareSpans(a: ProtectedSpan, b: ProtectedSpan): number {
  return a.start - b.start || a.end - b.end;
}

/**
 * Sorted set of pairwise non-overlapping, non-empty spans.
 * Since no two spans overlap, ends are sorted too, which keeps lookups logarithmic.
 */
export class SpanSet {
  private readonly spans: ProtectedSpan[] = [];

  /**
   * Builds a set from candidates in the given order, dropping every candidate that
   * overlaps one accepted before it.
   */
  public static accepting(candidates: Iterable<ProtectedSpan>): SpanSet {
    const set = new SpanSet();
    for (const span of candidates) {
      set.tryAdd(span);
    }
    return set;
  }

  public get size(): number {
    return this.spans.length;
  }

  public toArray(): ProtectedSpan[] {
    return [ ...this.spans ];
  }

  /**
   * Adds the span unless it is empty or overlaps a member. Losers are dropped whole.
   */
  public tryAdd(span: ProtectedSpan): boolean {
    if (span.end <= span.start || this.overlaps(span.start, span.end)) {
      return false;
    }
    let low = 0;
    let high = this.spans.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.spans[mid].start < span.start) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    this.spans.splice(low, 0, span);
    return true;
  }

  public overlaps(start: number, end: number): boolean {
    const index = this.firstEndingAfter(start);
    return index < this.spans.length && this.spans[index].start < end;
  }

  public containing(position: number): ProtectedSpan | undefined {
    const span = this.spans[this.firstEndingAfter(position)];
    return span && span.start <= position ? span : undefined;
  }

  private firstEndingAfter(position: number): number {
    let low = 0;
    let high = this.spans.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.spans[mid].end <= position) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }
}

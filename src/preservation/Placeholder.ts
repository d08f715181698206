import { DetectionError } from '../util/errors';

const TOKEN_SOURCE = '__([A-Z][A-Z_]*)_[0-9]{3}__';

/**
 * Placeholder tokens look like `__CODE_BLOCK_001__`. A token glued to a preceding
 * letter, digit or underscore is not a token.
 */
export function placeholderPattern(): RegExp {
  return new RegExp(`(?<![_A-Za-z0-9])${TOKEN_SOURCE}`, 'g');
}

const FULL_TOKEN = new RegExp(`^${TOKEN_SOURCE}$`);

export const MAX_PLACEHOLDERS_PER_KIND = 999;

export function isPlaceholder(value: string): boolean {
  return FULL_TOKEN.test(value);
}

export function findPlaceholders(text: string): string[] {
  return Array.from(text.matchAll(placeholderPattern()), (match) => match[0]);
}

export function firstPlaceholder(text: string): string | undefined {
  return placeholderPattern().exec(text)?.[0];
}

export function countOccurrences(text: string, token: string): number {
  if (!token) {
    return 0;
  }
  let count = 0;
  let index = text.indexOf(token);
  while (index !== -1) {
    count += 1;
    index = text.indexOf(token, index + token.length);
  }
  return count;
}

/**
 * Hands out placeholders and remembers what each one replaced.
 * One registry lives for exactly one `protect` call.
 */
export class PlaceholderRegistry {
  private readonly counters = new Map<string, number>();
  private readonly entries = new Map<string, string>();

  public register(kind: string, original: string): string {
    const count = (this.counters.get(kind) ?? 0) + 1;
    if (count > MAX_PLACEHOLDERS_PER_KIND) {
      throw DetectionError.counterOverflow(kind);
    }
    this.counters.set(kind, count);
    const token = `__${kind}_${String(count).padStart(3, '0')}__`;
    this.entries.set(token, original);
    return token;
  }

  /**
   * True when the slice holds any token registered so far.
   */
  public swallows(slice: string): boolean {
    if (!slice.includes('__')) {
      return false;
    }
    for (const token of this.entries.keys()) {
      if (slice.includes(token)) {
        return true;
      }
    }
    return false;
  }

  public get size(): number {
    return this.entries.size;
  }

  public toMap(): Record<string, string> {
    return Object.fromEntries(this.entries);
  }
}

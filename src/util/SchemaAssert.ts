/**
 * Small runtime shape checks for values coming from JSON, env files or callers
 * outside the type system. Every failure is raised through the error factory the
 * instance was built with, so each caller keeps its own error kind.
 */

export type ErrorFactory = (message: string) => Error;

export interface StringListOptions {
  /** Treat `undefined`/`null` as an empty list. */
  allowMissing?: boolean;
  /** Accept a single string as a one-element list (blank → empty list). */
  allowString?: boolean;
}

export class SchemaAssert {
  private readonly createError: ErrorFactory;

  public constructor(createError: ErrorFactory) {
    this.createError = createError;
  }

  public record(value: unknown, label: string): Record<string, unknown> {
    if (!isRecord(value)) {
      throw this.createError(`${label} must be an object`);
    }
    return value;
  }

  public list(value: unknown, label: string): unknown[] {
    if (!Array.isArray(value)) {
      throw this.createError(`${label} must be an array`);
    }
    return value;
  }

  public string(value: unknown, label: string): string {
    if (typeof value !== 'string') {
      throw this.createError(`${label} must be a string`);
    }
    return value;
  }

  public integer(value: unknown, label: string): number {
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw this.createError(`${label} must be an integer`);
    }
    return value;
  }

  public boolean(value: unknown, label: string): boolean {
    if (typeof value !== 'boolean') {
      throw this.createError(`${label} must be a boolean`);
    }
    return value;
  }

  public stringList(value: unknown, label: string, options: StringListOptions = {}): string[] {
    if (options.allowMissing && (value === undefined || value === null)) {
      return [];
    }
    if (options.allowString && typeof value === 'string') {
      return value.trim() ? [ value ] : [];
    }
    return this.list(value, label).map((item, index) => this.string(item, `${label}[${index}]`));
  }

  /**
   * A flat object whose values are all strings.
   */
  public stringRecord(value: unknown, label: string): Record<string, string> {
    const source = this.record(value, label);
    const result: Record<string, string> = {};
    for (const [ key, item ] of Object.entries(source)) {
      result[key] = this.string(item, `${label}.${key}`);
    }
    return result;
  }

  /**
   * Integer parsed from its decimal string form, as found in env files.
   */
  public integerString(value: string, label: string): number {
    const trimmed = value.trim();
    if (!/^-?\d+$/.test(trimmed)) {
      throw this.createError(`${label} must be an integer, got "${value}"`);
    }
    return Number.parseInt(trimmed, 10);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

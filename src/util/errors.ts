export type GuardErrorKind =
  | 'CONFIGURATION'
  | 'DETECTION'
  | 'RESTORATION'
  | 'QA'
  | 'INVARIANT'
  | 'TRANSFORM';

/**
 * Base class of every error raised by this package.
 */
export class GuardError extends Error {
  public constructor(
    public readonly kind: GuardErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'GuardError';
  }
}

/**
 * Invalid limits, config values or chunk records. Raised before any work starts.
 */
export class ConfigurationError extends GuardError {
  public constructor(message: string) {
    super('CONFIGURATION', message);
    this.name = 'ConfigurationError';
  }

  public static nonPositive(label: string, value: number): ConfigurationError {
    return new ConfigurationError(`${label} must be a positive integer, got ${value}`);
  }
}

/**
 * `protect` refused its input.
 */
export class DetectionError extends GuardError {
  public constructor(
    message: string,
    public readonly token: string,
  ) {
    super('DETECTION', message);
    this.name = 'DetectionError';
  }

  public static preexistingToken(token: string, label = 'input text'): DetectionError {
    return new DetectionError(`${label} contains placeholder-like token: ${token}`, token);
  }

  public static counterOverflow(kind: string): DetectionError {
    return new DetectionError(`too many placeholders for ${kind} (limit 999)`, kind);
  }
}

export type RestorationFailure = 'grammar' | 'missing' | 'duplicated' | 'unknown' | 'leftover' | 'shape';

export class RestorationError extends GuardError {
  public constructor(
    public readonly reason: RestorationFailure,
    message: string,
    public readonly token?: string,
  ) {
    super('RESTORATION', message);
    this.name = 'RestorationError';
  }

  public static invalidKey(key: string): RestorationError {
    return new RestorationError('grammar', `invalid placeholder format: ${key}`, key);
  }

  public static missing(token: string): RestorationError {
    return new RestorationError('missing', `placeholder missing: ${token}`, token);
  }

  public static duplicated(token: string, count: number): RestorationError {
    return new RestorationError('duplicated', `placeholder duplicated: ${token} (count=${count})`, token);
  }

  public static unknown(token: string): RestorationError {
    return new RestorationError('unknown', `unknown placeholder found: ${token}`, token);
  }

  public static leftover(token: string): RestorationError {
    return new RestorationError('leftover', `restored text contains placeholder-like token: ${token}`, token);
  }
}

export type QaCheck = 'fence' | 'math' | 'url';

/**
 * A structural difference between an original unit and its restored rewrite.
 */
export class QaError extends GuardError {
  public constructor(
    public readonly check: QaCheck,
    message: string,
  ) {
    super('QA', message);
    this.name = 'QaError';
  }
}

export class FenceCountMismatchError extends QaError {
  public constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super('fence', `code fence count mismatch: expected ${expected}, found ${actual}`);
    this.name = 'FenceCountMismatchError';
  }
}

export class MathDelimiterMismatchError extends QaError {
  public constructor(
    public readonly delimiter: string,
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super('math', `math delimiter count mismatch: ${delimiter} expected ${expected}, found ${actual}`);
    this.name = 'MathDelimiterMismatchError';
  }
}

export class UrlTargetMismatchError extends QaError {
  public constructor(
    public readonly position: number,
    public readonly expected: string | undefined,
    public readonly actual: string | undefined,
  ) {
    super(
      'url',
      `URL target mismatch at #${position + 1}: expected ${expected ?? '<none>'}, found ${actual ?? '<none>'}`,
    );
    this.name = 'UrlTargetMismatchError';
  }
}

/**
 * Planner bookkeeping went wrong; unreachable for valid limits.
 */
export class PlanInvariantError extends GuardError {
  public constructor(message: string) {
    super('INVARIANT', message);
    this.name = 'PlanInvariantError';
  }
}

export class TransformError extends GuardError {
  public constructor(
    message: string,
    public readonly chunkId: string,
  ) {
    super('TRANSFORM', message);
    this.name = 'TransformError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Error stack and result type shared by every component
// ============================================================================

export type ErrorReason =
  | 'nullInput'
  | 'allocationFailure'
  | 'doubleInitialization'
  | 'outOfRange'
  | 'ioFailure'
  | 'malformedContainer'
  | 'imageSemantic'
  | 'unrecognizedValue'
  | 'internalInconsistency'
  | 'delegatedFailure';

export type ErrorSource = 'global' | 'bitmap' | 'canvas' | 'locator' | 'ocr' | 'palettes' | 'thermal';

export interface ErrorEntry {
  reason: ErrorReason;
  source: ErrorSource;
}

/** Number of entries a stack keeps before it drops the oldest one */
export const ERROR_STACK_CAPACITY = 4;

export const REASON_NAMES: Readonly<Record<ErrorReason, string>> = {
  nullInput: 'missing input',
  allocationFailure: 'allocation failed',
  doubleInitialization: 'resource leak avoided',
  outOfRange: 'invalid argument range',
  ioFailure: 'I/O operation failed',
  malformedContainer: 'file format error',
  imageSemantic: 'image size or feature error',
  unrecognizedValue: 'unknown value',
  internalInconsistency: 'assertion failed',
  delegatedFailure: 'callee error',
};

export const SOURCE_NAMES: Readonly<Record<ErrorSource, string>> = {
  global: 'global',
  bitmap: 'bitmap',
  canvas: 'canvas',
  locator: 'locator',
  ocr: 'OCR',
  palettes: 'palettes',
  thermal: 'thermal',
};

/**
 * Bounded stack of failure entries, newest last.
 *
 * A component that fails because something it called failed pushes its own
 * `delegatedFailure` entry on top of the callee's stack, so the origin stays
 * visible at the bottom.
 */
export class ErrorStack {
  private readonly entries: ErrorEntry[] = [];

  constructor(entries: readonly ErrorEntry[] = []) {
    for (const entry of entries) this.push(entry.reason, entry.source);
  }

  get size(): number {
    return this.entries.length;
  }

  push(reason: ErrorReason, source: ErrorSource): this {
    this.entries.push({ reason, source });
    if (this.entries.length > ERROR_STACK_CAPACITY) this.entries.shift();
    return this;
  }

  pop(): ErrorEntry | undefined {
    return this.entries.pop();
  }

  /** Most recently pushed entry */
  latest(): ErrorEntry | undefined {
    return this.entries[this.entries.length - 1];
  }

  /** Oldest entry still held, i.e. the closest known origin of the failure */
  first(): ErrorEntry | undefined {
    return this.entries[0];
  }

  /** Copy of this stack with one more entry on top */
  wrap(reason: ErrorReason, source: ErrorSource): ErrorStack {
    return new ErrorStack(this.entries).push(reason, source);
  }

  has(reason: ErrorReason): boolean {
    return this.entries.some((entry) => entry.reason === reason);
  }

  toArray(): ErrorEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  /** Newest first, e.g. `thermal: callee error <- palettes: image size or feature error` */
  describe(): string {
    if (this.entries.length === 0) return 'no error';
    return [...this.entries]
      .reverse()
      .map(({ reason, source }) => `${SOURCE_NAMES[source]}: ${REASON_NAMES[reason]}`)
      .join(' <- ');
  }

  toString(): string {
    return this.describe();
  }
}

// ============================================================================
// Result
// ============================================================================

export type Result<T> = { ok: true; value: T } | { ok: false; error: ErrorStack };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(reason: ErrorReason, source: ErrorSource): Result<T> {
  return { ok: false, error: new ErrorStack().push(reason, source) };
}

/**
 * Wrap a callee's failure for the calling component. Assertion failures are
 * passed through untouched so they surface at the top level as they were
 * raised.
 */
export function delegate<T = never>(source: ErrorSource, cause: ErrorStack): Result<T> {
  if (cause.latest()?.reason === 'internalInconsistency') return { ok: false, error: cause };
  return { ok: false, error: cause.wrap('delegatedFailure', source) };
}

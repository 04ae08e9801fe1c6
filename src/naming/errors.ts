import type { NameErrorKind, NameErrorReason } from './types.js';

// ============================================================================
// Name Errors
// ============================================================================

/**
 * Details attached to a rejected name, namespace or sub namespace.
 */
export interface NameErrorDetails {
  /** The full string the caller supplied. */
  value: string;
  /** The rule that was violated. */
  reason: NameErrorReason;
  /** The offending segment, when the value is a path. */
  segment?: string;
  /** Index of the first offending character within `value`. */
  index?: number;
}

const REASON_TEXT: Record<NameErrorReason, string> = {
  'empty': 'must not be empty',
  'starts-with-number': 'must not start with a number',
  'invalid-character': 'must only contain alphanumerics and underscores',
  'trailing-separator': 'must not end with a separator',
  'empty-segment': 'must not contain repeated separators',
  'private-prefix': "must not start with '~'",
  'absolute-path': 'must be relative (no leading separator)',
};

const KIND_SUBJECT: Record<NameErrorKind, string> = {
  InvalidName: 'name',
  InvalidNodeName: 'node name',
  InvalidNamespace: 'namespace',
  NameValidationError: 'sub namespace',
};

/**
 * Error raised (or returned inside a NameResult) when a name is rejected.
 *
 * A single class tagged by `kind`; use `isNameError(err, kind)` to narrow.
 */
export class NameError extends Error {
  override name = 'NameError' as const;

  readonly kind: NameErrorKind;
  readonly value: string;
  readonly reason: NameErrorReason;
  readonly segment?: string;
  readonly index?: number;

  constructor(kind: NameErrorKind, details: NameErrorDetails) {
    super(formatNameError(kind, details));
    this.kind = kind;
    this.value = details.value;
    this.reason = details.reason;
    this.segment = details.segment;
    this.index = details.index;
  }

  /**
   * Copy this error under another kind, keeping its details.
   * Used when a bare token failure is reported as a node name or namespace error.
   */
  retag(kind: NameErrorKind, value: string = this.value): NameError {
    return new NameError(kind, {
      value,
      reason: this.reason,
      segment: this.segment,
      index: this.index,
    });
  }
}

/**
 * Narrow an unknown thrown value to a NameError, optionally of a given kind.
 */
export function isNameError(err: unknown, kind?: NameErrorKind): err is NameError {
  if (!(err instanceof NameError)) return false;
  return kind === undefined || err.kind === kind;
}

function formatNameError(kind: NameErrorKind, details: NameErrorDetails): string {
  const subject = KIND_SUBJECT[kind];
  let message = `Invalid ${subject} "${details.value}": ${subject} ${REASON_TEXT[details.reason]}`;
  if (details.segment !== undefined && details.segment !== details.value) {
    message += ` (segment "${details.segment}")`;
  }
  if (details.index !== undefined) {
    message += ` at index ${details.index}`;
  }
  return message;
}

// Namespace normalization and path helpers

import { NameError } from './errors.js';
import { validateToken } from './token.js';
import { ROOT_NAMESPACE, SEPARATOR, type Namespace, type NameResult } from './types.js';

/**
 * Normalize a raw namespace into canonical absolute form.
 *
 * - "" becomes the root namespace "/"
 * - a missing leading separator is added ("ns" and "/ns" are equivalent)
 * - a trailing separator is rejected, never stripped
 * - empty segments (doubled separators) are rejected
 * - every segment must satisfy the token grammar
 *
 * Failures are reported as `InvalidNamespace` carrying the raw value, the
 * offending segment and the character index within the raw value.
 */
export function normalizeNamespace(raw: string): NameResult<Namespace> {
  if (raw.length === 0) {
    return { valid: true, value: ROOT_NAMESPACE };
  }

  // Characters added in front of `raw`; subtracted when reporting an index.
  const shift = raw.startsWith(SEPARATOR) ? 0 : 1;
  const absolute = shift === 0 ? raw : SEPARATOR + raw;

  if (absolute === ROOT_NAMESPACE) {
    return { valid: true, value: ROOT_NAMESPACE };
  }

  if (absolute.endsWith(SEPARATOR)) {
    return {
      valid: false,
      error: new NameError('InvalidNamespace', {
        value: raw,
        reason: 'trailing-separator',
        index: raw.length - 1,
      }),
    };
  }

  const segments = absolute.slice(1).split(SEPARATOR);
  let offset = 1;
  for (const segment of segments) {
    if (segment.length === 0) {
      return {
        valid: false,
        error: new NameError('InvalidNamespace', {
          value: raw,
          reason: 'empty-segment',
          index: offset - shift,
        }),
      };
    }

    const result = validateToken(segment);
    if (!result.valid) {
      return {
        valid: false,
        error: new NameError('InvalidNamespace', {
          value: raw,
          reason: result.error.reason,
          segment,
          index: offset + (result.error.index ?? 0) - shift,
        }),
      };
    }

    offset += segment.length + 1;
  }

  return { valid: true, value: `/${segments.join(SEPARATOR)}` };
}

/**
 * True when `value` is already in canonical form.
 */
export function isCanonicalNamespace(value: string): value is Namespace {
  const result = normalizeNamespace(value);
  return result.valid && result.value === value;
}

/**
 * Split a canonical namespace into its tokens. The root has none.
 */
export function namespaceSegments(namespace: Namespace): string[] {
  if (namespace === ROOT_NAMESPACE) return [];
  return namespace.slice(1).split(SEPARATOR);
}

/**
 * Append an already-validated relative path to a canonical namespace.
 */
export function joinNamespace(namespace: Namespace, relative: string): Namespace {
  if (namespace === ROOT_NAMESPACE) {
    return `/${relative}`;
  }
  return `${namespace}/${relative}`;
}

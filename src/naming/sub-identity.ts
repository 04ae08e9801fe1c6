// Sub namespaces: relative extensions of an identity that stay off the graph

import { NameError } from './errors.js';
import type { NodeIdentity } from './identity.js';
import { joinNamespace } from './namespace.js';
import { validateToken } from './token.js';
import {
  PRIVATE_NAMESPACE_PREFIX,
  SEPARATOR,
  type FullyQualifiedName,
  type Namespace,
  type NameResult,
} from './types.js';

/**
 * A node identity extended by a relative sub namespace.
 *
 * Reports the root identity's name, namespace and fully-qualified name
 * unchanged at any depth; only `subNamespace` and `effectiveNamespace`
 * differ. Chaining appends one validated segment to the parent's path.
 */
export class SubIdentity {
  readonly root: NodeIdentity;
  readonly subNamespace: string;
  readonly effectiveNamespace: Namespace;

  private constructor(root: NodeIdentity, subNamespace: string) {
    this.root = root;
    this.subNamespace = subNamespace;
    this.effectiveNamespace = joinNamespace(root.namespace, subNamespace);
    Object.freeze(this);
  }

  get name(): string {
    return this.root.name;
  }

  get namespace(): Namespace {
    return this.root.namespace;
  }

  get fullyQualifiedName(): FullyQualifiedName {
    return this.root.fullyQualifiedName;
  }

  tryCreateSub(subNamespace: string): NameResult<SubIdentity> {
    return tryCreateSubIdentity(this, subNamespace);
  }

  /**
   * @throws {NameError} kind `NameValidationError` or `InvalidNamespace`
   */
  createSub(subNamespace: string): SubIdentity {
    return createSubIdentity(this, subNamespace);
  }

  toString(): string {
    return this.effectiveNamespace;
  }

  /**
   * Validate `subNamespace` and extend `base` with it.
   *
   * Only the new argument is validated; a parent SubIdentity's path was
   * checked when it was built and is reused as-is.
   */
  static tryCreate(base: NodeIdentity | SubIdentity, subNamespace: string): NameResult<SubIdentity> {
    const result = validateSubNamespace(subNamespace);
    if (!result.valid) return result;
    if (base instanceof SubIdentity) {
      return {
        valid: true,
        value: new SubIdentity(base.root, `${base.subNamespace}${SEPARATOR}${result.value}`),
      };
    }
    return { valid: true, value: new SubIdentity(base, result.value) };
  }
}

/**
 * Validate a relative sub namespace argument.
 *
 * A leading separator is the wrong shape of input altogether and yields
 * `NameValidationError` before any grammar check. Everything else that is
 * malformed yields `InvalidNamespace`: empty input, a trailing separator,
 * an empty segment, a segment starting with '~', or a segment failing the
 * token grammar.
 */
export function validateSubNamespace(subNamespace: string): NameResult<string> {
  if (subNamespace.startsWith(SEPARATOR)) {
    return {
      valid: false,
      error: new NameError('NameValidationError', { value: subNamespace, reason: 'absolute-path', index: 0 }),
    };
  }

  if (subNamespace.length === 0) {
    return { valid: false, error: new NameError('InvalidNamespace', { value: subNamespace, reason: 'empty' }) };
  }

  if (subNamespace.endsWith(SEPARATOR)) {
    return {
      valid: false,
      error: new NameError('InvalidNamespace', {
        value: subNamespace,
        reason: 'trailing-separator',
        index: subNamespace.length - 1,
      }),
    };
  }

  let offset = 0;
  for (const segment of subNamespace.split(SEPARATOR)) {
    if (segment.length === 0) {
      return {
        valid: false,
        error: new NameError('InvalidNamespace', { value: subNamespace, reason: 'empty-segment', index: offset }),
      };
    }

    if (segment.startsWith(PRIVATE_NAMESPACE_PREFIX)) {
      return {
        valid: false,
        error: new NameError('InvalidNamespace', {
          value: subNamespace,
          reason: 'private-prefix',
          segment,
          index: offset,
        }),
      };
    }

    const result = validateToken(segment);
    if (!result.valid) {
      return {
        valid: false,
        error: new NameError('InvalidNamespace', {
          value: subNamespace,
          reason: result.error.reason,
          segment,
          index: offset + (result.error.index ?? 0),
        }),
      };
    }

    offset += segment.length + 1;
  }

  return { valid: true, value: subNamespace };
}

/**
 * Extend `base` with a relative sub namespace. Same as `SubIdentity.tryCreate`.
 */
export function tryCreateSubIdentity(
  base: NodeIdentity | SubIdentity,
  subNamespace: string,
): NameResult<SubIdentity> {
  return SubIdentity.tryCreate(base, subNamespace);
}

/**
 * Throwing form of `tryCreateSubIdentity`.
 *
 * @throws {NameError} kind `NameValidationError` or `InvalidNamespace`
 */
export function createSubIdentity(base: NodeIdentity | SubIdentity, subNamespace: string): SubIdentity {
  const result = tryCreateSubIdentity(base, subNamespace);
  if (!result.valid) throw result.error;
  return result.value;
}

// Name and namespace types for graph node identities

import type { NameError } from './errors.js';

/**
 * Path separator used by namespaces and fully-qualified names.
 */
export const SEPARATOR = '/';

/**
 * The root namespace. Nodes constructed without a namespace live here.
 */
export const ROOT_NAMESPACE = '/';

/**
 * Prefix reserved for private-namespace resolution. Sub namespaces may not
 * start a segment with it.
 */
export const PRIVATE_NAMESPACE_PREFIX = '~';

/**
 * Grammar for a single token: node names and every namespace segment.
 */
export const TOKEN_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Canonical absolute namespace, e.g. "/" or "/my/ns".
 */
export type Namespace = `/${string}`;

/**
 * Namespace joined with the local node name, e.g. "/my/ns/my_node".
 */
export type FullyQualifiedName = `/${string}`;

/**
 * Error kinds surfaced by the naming engine.
 *
 * - InvalidName: bare token failure, before the caller re-tags it
 * - InvalidNodeName: the local node name fails the token grammar
 * - InvalidNamespace: a namespace or sub namespace is malformed
 * - NameValidationError: an absolute path was given where a relative one is required
 */
export type NameErrorKind =
  | 'InvalidName'
  | 'InvalidNodeName'
  | 'InvalidNamespace'
  | 'NameValidationError';

/**
 * The rule a rejected value violated.
 */
export type NameErrorReason =
  | 'empty'
  | 'starts-with-number'
  | 'invalid-character'
  | 'trailing-separator'
  | 'empty-segment'
  | 'private-prefix'
  | 'absolute-path';

/**
 * Outcome of a validating operation.
 */
export type NameResult<T> =
  | { valid: true; value: T }
  | { valid: false; error: NameError };

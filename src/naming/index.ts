// Barrel exports for naming module

export type {
  Namespace,
  FullyQualifiedName,
  NameErrorKind,
  NameErrorReason,
  NameResult,
} from './types.js';
export { SEPARATOR, ROOT_NAMESPACE, PRIVATE_NAMESPACE_PREFIX, TOKEN_PATTERN } from './types.js';
export type { NameErrorDetails } from './errors.js';
export { NameError, isNameError } from './errors.js';
export { validateToken, isValidToken } from './token.js';
export { normalizeNamespace, isCanonicalNamespace, namespaceSegments, joinNamespace } from './namespace.js';
export { NodeIdentity } from './identity.js';
export {
  SubIdentity,
  validateSubNamespace,
  tryCreateSubIdentity,
  createSubIdentity,
} from './sub-identity.js';
export { loggerName } from './logger-name.js';

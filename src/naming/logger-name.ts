// Dotted logger names derived from fully-qualified node names

import type { NodeIdentity } from './identity.js';
import type { SubIdentity } from './sub-identity.js';
import { SEPARATOR } from './types.js';

/**
 * Map an identity to its logger name.
 *
 * The leading separator of the fully-qualified name is dropped and the
 * remaining separators become dots: "/my/ns/my_node" -> "my.ns.my_node".
 * A sub identity maps to its root's logger name.
 */
export function loggerName(identity: NodeIdentity | SubIdentity): string {
  const fqn = identity.fullyQualifiedName;
  const relative = fqn.startsWith(SEPARATOR) ? fqn.slice(SEPARATOR.length) : fqn;
  return relative.split(SEPARATOR).join('.');
}

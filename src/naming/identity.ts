// Immutable node identity: validated name plus canonical namespace

import { normalizeNamespace, joinNamespace } from './namespace.js';
import { tryCreateSubIdentity, type SubIdentity } from './sub-identity.js';
import { validateToken } from './token.js';
import type { FullyQualifiedName, Namespace, NameResult } from './types.js';

/**
 * Identity of a node in the graph.
 *
 * Built once through `create` / `tryCreate`, which perform all validation;
 * the instance is frozen afterwards and can be shared freely.
 *
 * @example
 * ```ts
 * const id = NodeIdentity.create('my_node', 'my/ns');
 * id.namespace;          // '/my/ns'
 * id.fullyQualifiedName; // '/my/ns/my_node'
 * ```
 */
export class NodeIdentity {
  readonly name: string;
  readonly namespace: Namespace;
  readonly fullyQualifiedName: FullyQualifiedName;

  private constructor(name: string, namespace: Namespace) {
    this.name = name;
    this.namespace = namespace;
    this.fullyQualifiedName = joinNamespace(namespace, name);
    Object.freeze(this);
  }

  /**
   * Validate and build an identity.
   *
   * A defined `namespaceOverride` (from remapping) replaces `namespace`
   * entirely. The name is checked before the namespace, so an invalid name
   * is reported even when the namespace is also invalid.
   */
  static tryCreate(
    name: string,
    namespace: string = '',
    namespaceOverride?: string,
  ): NameResult<NodeIdentity> {
    const rawNamespace = namespaceOverride ?? namespace;

    const nameResult = validateToken(name);
    if (!nameResult.valid) {
      return { valid: false, error: nameResult.error.retag('InvalidNodeName') };
    }

    const namespaceResult = normalizeNamespace(rawNamespace);
    if (!namespaceResult.valid) {
      return namespaceResult;
    }

    return { valid: true, value: new NodeIdentity(nameResult.value, namespaceResult.value) };
  }

  /**
   * Throwing form of `tryCreate`.
   *
   * @throws {NameError} kind `InvalidNodeName` or `InvalidNamespace`
   */
  static create(name: string, namespace: string = '', namespaceOverride?: string): NodeIdentity {
    const result = NodeIdentity.tryCreate(name, namespace, namespaceOverride);
    if (!result.valid) throw result.error;
    return result.value;
  }

  tryCreateSub(subNamespace: string): NameResult<SubIdentity> {
    return tryCreateSubIdentity(this, subNamespace);
  }

  /**
   * @throws {NameError} kind `NameValidationError` or `InvalidNamespace`
   */
  createSub(subNamespace: string): SubIdentity {
    const result = this.tryCreateSub(subNamespace);
    if (!result.valid) throw result.error;
    return result.value;
  }

  toString(): string {
    return this.fullyQualifiedName;
  }
}

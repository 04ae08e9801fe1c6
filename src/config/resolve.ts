/**
 * Build identities for every node declared in a manifest.
 *
 * @module config/resolve
 */

import type { NameError } from '../naming/errors.js';
import { NodeIdentity } from '../naming/identity.js';
import type { SubIdentity } from '../naming/sub-identity.js';
import type { NodeEntry, NodeManifest } from './schema.js';

/**
 * Outcome for one manifest entry. `identity` is absent when the name or
 * namespace was rejected; sub namespaces are then not evaluated.
 */
export interface ResolvedNodeEntry {
  index: number;
  entry: NodeEntry;
  identity?: NodeIdentity;
  subIdentities: SubIdentity[];
  errors: NameError[];
}

export interface ManifestResolution {
  valid: boolean;
  entries: ResolvedNodeEntry[];
}

export function resolveNodeEntry(entry: NodeEntry, index: number): ResolvedNodeEntry {
  const resolved: ResolvedNodeEntry = { index, entry, subIdentities: [], errors: [] };

  const identityResult = NodeIdentity.tryCreate(entry.name, entry.namespace, entry.namespaceOverride);
  if (!identityResult.valid) {
    resolved.errors.push(identityResult.error);
    return resolved;
  }

  resolved.identity = identityResult.value;
  for (const subNamespace of entry.subNamespaces) {
    const subResult = identityResult.value.tryCreateSub(subNamespace);
    if (subResult.valid) {
      resolved.subIdentities.push(subResult.value);
    } else {
      resolved.errors.push(subResult.error);
    }
  }

  return resolved;
}

/**
 * Resolve every entry; `valid` is false when any entry produced an error.
 */
export function resolveNodeManifest(manifest: NodeManifest): ManifestResolution {
  const entries = manifest.nodes.map((entry, index) => resolveNodeEntry(entry, index));
  return {
    valid: entries.every((e) => e.errors.length === 0),
    entries,
  };
}

// Barrel exports for config module

export type { NodeEntry, NodeManifest } from './schema.js';
export { NodeEntrySchema, NodeManifestSchema, DEFAULT_NODE_MANIFEST } from './schema.js';
export { DEFAULT_MANIFEST_PATH, NodeManifestError, readNodeManifest, validateNodeManifest } from './reader.js';
export type { ResolvedNodeEntry, ManifestResolution } from './resolve.js';
export { resolveNodeEntry, resolveNodeManifest } from './resolve.js';

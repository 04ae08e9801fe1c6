/**
 * Zod schema for the node manifest file.
 *
 * Every field has a default so that `NodeManifestSchema.parse({})` yields
 * an empty, fully populated manifest. Names and namespaces are plain
 * strings here; their grammar is checked by the naming engine so that
 * failures carry a NameError kind.
 *
 * @module config/schema
 */

import { z } from 'zod';

/**
 * One node declaration.
 * Each entry of `subNamespaces` extends the node itself, not the previous entry.
 */
export const NodeEntrySchema = z.object({
  name: z.string(),
  namespace: z.string().default(''),
  namespaceOverride: z.string().optional(),
  subNamespaces: z.array(z.string()).default([]),
});

export const NodeManifestSchema = z.object({
  nodes: z.array(NodeEntrySchema).default([]),
});

export type NodeEntry = z.infer<typeof NodeEntrySchema>;
export type NodeManifest = z.infer<typeof NodeManifestSchema>;

/** Manifest used when no file exists. */
export const DEFAULT_NODE_MANIFEST: NodeManifest = NodeManifestSchema.parse({});

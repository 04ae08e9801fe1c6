/**
 * Node manifest reader with Zod validation.
 *
 * Missing file = empty manifest. Invalid JSON or schema failures raise a
 * NodeManifestError naming the first offending field.
 *
 * @module config/reader
 */

import { readFile } from 'fs/promises';
import { NodeManifestSchema, type NodeManifest } from './schema.js';

// ============================================================================
// Constants
// ============================================================================

/** Default path for the node manifest file. */
export const DEFAULT_MANIFEST_PATH = '.graph/nodes.json';

// ============================================================================
// Error type
// ============================================================================

export class NodeManifestError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'NodeManifestError';
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Read and validate the node manifest from disk.
 *
 * @param manifestPath - Path to the manifest (default: `.graph/nodes.json`)
 * @throws {NodeManifestError} On invalid JSON or validation failure
 */
export async function readNodeManifest(
  manifestPath: string = DEFAULT_MANIFEST_PATH,
): Promise<NodeManifest> {
  let content: string;

  try {
    content = await readFile(manifestPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return NodeManifestSchema.parse({});
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new NodeManifestError(`Invalid JSON in manifest file: ${manifestPath}`);
  }

  const result = validateNodeManifest(raw);
  if (!result.valid) {
    throw new NodeManifestError(
      `Manifest validation failed:\n${result.errors.join('\n')}`,
      result.field,
    );
  }

  return result.manifest;
}

/**
 * Validate raw input against the manifest schema (no I/O).
 */
export function validateNodeManifest(
  raw: unknown,
): { valid: true; manifest: NodeManifest } | { valid: false; errors: string[]; field?: string } {
  const result = NodeManifestSchema.safeParse(raw);

  if (result.success) {
    return { valid: true, manifest: result.data };
  }

  const errors = result.error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `${path}: ${issue.message}`;
  });

  return { valid: false, errors, field: result.error.issues[0]?.path.join('.') };
}

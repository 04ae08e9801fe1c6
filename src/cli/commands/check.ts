/**
 * CLI command: `graph-naming check`
 *
 * Reads the node manifest, builds every declared identity and its sub
 * namespaces, and reports each entry.
 *
 * Exit codes:
 * - 0: Every entry is valid (or the manifest is missing)
 * - 1: A manifest error or any rejected name
 *
 * @module cli/commands/check
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { DEFAULT_MANIFEST_PATH, NodeManifestError, readNodeManifest } from '../../config/reader.js';
import { resolveNodeManifest, type ManifestResolution } from '../../config/resolve.js';
import type { NodeManifest } from '../../config/schema.js';
import { nameErrorToJson } from './resolve.js';

/**
 * Execute the `check` CLI command.
 *
 * @param args - CLI arguments after `check`
 * @returns Exit code
 */
export async function checkCommand(args: string[]): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    showHelp();
    return 0;
  }

  const jsonMode = args.includes('--json');
  const configArg = args.find((a) => a.startsWith('--config='));
  const manifestPath = configArg ? configArg.slice('--config='.length) : DEFAULT_MANIFEST_PATH;

  let manifest: NodeManifest;
  try {
    manifest = await readNodeManifest(manifestPath);
  } catch (err) {
    if (!(err instanceof NodeManifestError)) throw err;
    if (jsonMode) {
      console.log(JSON.stringify({
        valid: false,
        errors: [{ field: err.field ?? '(file)', message: err.message }],
        nodes: [],
      }, null, 2));
    } else {
      p.log.error(err.message);
    }
    return 1;
  }

  const resolution = resolveNodeManifest(manifest);

  if (jsonMode) {
    console.log(JSON.stringify({
      valid: resolution.valid,
      errors: [],
      nodes: resolution.entries.map((e) => ({
        index: e.index,
        name: e.entry.name,
        fullyQualifiedName: e.identity?.fullyQualifiedName ?? null,
        effectiveNamespaces: e.subIdentities.map((sub) => sub.effectiveNamespace),
        errors: e.errors.map(nameErrorToJson),
      })),
    }, null, 2));
  } else {
    displayReport(resolution, manifestPath);
  }

  return resolution.valid ? 0 : 1;
}

function displayReport(resolution: ManifestResolution, manifestPath: string): void {
  p.intro(pc.bgCyan(pc.black(' Node Manifest Check ')));
  p.log.message(`Source: ${manifestPath}`);

  if (resolution.entries.length === 0) {
    p.outro(pc.yellow('No nodes declared.'));
    return;
  }

  for (const entry of resolution.entries) {
    const label = entry.identity?.fullyQualifiedName ?? entry.entry.name;
    if (entry.errors.length === 0) {
      p.log.message(`  ${pc.green('ok')} ${label}`);
    } else {
      p.log.message(`  ${pc.red('x')} ${label}`);
    }
    for (const sub of entry.subIdentities) {
      p.log.message(`    ${pc.dim(sub.effectiveNamespace)}`);
    }
    for (const error of entry.errors) {
      p.log.message(`    ${pc.red(error.kind)}: ${error.message}`);
    }
  }

  const failed = resolution.entries.filter((e) => e.errors.length > 0).length;
  if (failed === 0) {
    p.outro(pc.green(`All ${resolution.entries.length} node(s) valid.`));
  } else {
    p.outro(pc.red(`${failed} of ${resolution.entries.length} node(s) rejected.`));
  }
}

function showHelp(): void {
  console.log(`
graph-naming check - Validate the nodes declared in a manifest

Usage:
  graph-naming check [options]

Options:
  --config=PATH   Path to the manifest (default: ${DEFAULT_MANIFEST_PATH})
  --json          Output results as JSON
  --help, -h      Show this help message
`);
}

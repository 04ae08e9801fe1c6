/**
 * CLI command: `graph-naming resolve <name>`
 *
 * Builds a node identity from a name, an optional namespace and an optional
 * namespace override, then chains any `--sub` sub namespaces in order and
 * prints the result.
 *
 * Exit codes:
 * - 0: Identity built
 * - 1: Missing name or a NameError
 *
 * @module cli/commands/resolve
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { isNameError, type NameError } from '../../naming/errors.js';
import { NodeIdentity } from '../../naming/identity.js';
import { loggerName } from '../../naming/logger-name.js';
import type { SubIdentity } from '../../naming/sub-identity.js';

export interface ResolveArgs {
  name?: string;
  namespace: string;
  namespaceOverride?: string;
  subNamespaces: string[];
  json: boolean;
  unknownFlags: string[];
}

/**
 * Parse `resolve` arguments. Flags take the `--flag=value` form. Any other
 * argument starting with '--' is collected as unknown; the first remaining
 * argument is the node name, even one starting with a single '-'.
 */
export function parseResolveArgs(args: string[]): ResolveArgs {
  const parsed: ResolveArgs = { namespace: '', subNamespaces: [], json: false, unknownFlags: [] };

  for (const arg of args) {
    if (arg === '--json') {
      parsed.json = true;
    } else if (arg.startsWith('--namespace=')) {
      parsed.namespace = arg.slice('--namespace='.length);
    } else if (arg.startsWith('--ns-override=')) {
      parsed.namespaceOverride = arg.slice('--ns-override='.length);
    } else if (arg.startsWith('--sub=')) {
      parsed.subNamespaces.push(arg.slice('--sub='.length));
    } else if (arg.startsWith('--')) {
      parsed.unknownFlags.push(arg);
    } else if (parsed.name === undefined) {
      parsed.name = arg;
    }
  }

  return parsed;
}

/**
 * Execute the `resolve` CLI command.
 *
 * @param args - CLI arguments after `resolve`
 * @returns Exit code
 */
export async function resolveCommand(args: string[]): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    showHelp();
    return 0;
  }

  const parsed = parseResolveArgs(args);
  if (parsed.unknownFlags.length > 0) {
    p.log.error(`Unknown option: ${parsed.unknownFlags[0]}`);
    return 1;
  }
  if (parsed.name === undefined) {
    p.log.error('Usage: graph-naming resolve <name> [--namespace=NS] [--ns-override=NS] [--sub=SEG]');
    return 1;
  }

  let identity: NodeIdentity;
  const chain: SubIdentity[] = [];
  try {
    identity = NodeIdentity.create(parsed.name, parsed.namespace, parsed.namespaceOverride);
    for (const subNamespace of parsed.subNamespaces) {
      const base = chain.length > 0 ? chain[chain.length - 1] : identity;
      chain.push(base.createSub(subNamespace));
    }
  } catch (err) {
    if (!isNameError(err)) throw err;
    reportError(err, parsed.json);
    return 1;
  }

  if (parsed.json) {
    console.log(JSON.stringify({
      valid: true,
      name: identity.name,
      namespace: identity.namespace,
      fullyQualifiedName: identity.fullyQualifiedName,
      loggerName: loggerName(identity),
      subNamespaces: chain.map((sub) => ({
        subNamespace: sub.subNamespace,
        effectiveNamespace: sub.effectiveNamespace,
      })),
    }, null, 2));
    return 0;
  }

  p.log.message(pc.bold(`Node: ${identity.fullyQualifiedName}`));
  p.log.message(`  name:                 ${identity.name}`);
  p.log.message(`  namespace:            ${identity.namespace}`);
  p.log.message(`  fully-qualified name: ${identity.fullyQualifiedName}`);
  p.log.message(`  logger:               ${loggerName(identity)}`);
  for (const sub of chain) {
    p.log.message(pc.dim(`  sub ${sub.subNamespace} -> ${sub.effectiveNamespace}`));
  }
  return 0;
}

/**
 * JSON shape of a NameError, shared by the CLI commands.
 */
export function nameErrorToJson(err: NameError): Record<string, unknown> {
  return {
    kind: err.kind,
    reason: err.reason,
    value: err.value,
    segment: err.segment,
    index: err.index,
    message: err.message,
  };
}

function reportError(err: NameError, json: boolean): void {
  if (json) {
    console.log(JSON.stringify({ valid: false, error: nameErrorToJson(err) }, null, 2));
    return;
  }
  p.log.error(`${pc.red(err.kind)}: ${err.message}`);
}

function showHelp(): void {
  console.log(`
graph-naming resolve - Build and print a node identity

Usage:
  graph-naming resolve <name> [options]

Options:
  --namespace=NS     Namespace (default: root "/")
  --ns-override=NS   Remapped namespace; replaces --namespace
  --sub=SEG          Sub namespace; repeat to chain
  --json             Output as JSON
  --help, -h         Show this help message

Examples:
  graph-naming resolve my_node --namespace=my/ns
  graph-naming resolve my_node --sub=camera --sub=left --json
`);
}

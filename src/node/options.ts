/**
 * Construction options for graph nodes.
 *
 * Serializable settings are validated through a Zod schema with defaults;
 * the clock and log sink are passed alongside as live objects.
 *
 * @module node/options
 */

import { z } from 'zod';
import { CLOCK_TYPES, type Clock } from '../clock/clock.js';
import { LOG_SEVERITIES, type LogSink } from '../logging/node-logger.js';

// ============================================================================
// Schema
// ============================================================================

export const NodeOptionsSchema = z.object({
  /** Replacement namespace supplied by remapping; supersedes the namespace argument. */
  namespaceOverride: z.string().optional(),
  logLevel: z.enum(LOG_SEVERITIES).default('info'),
  clockType: z.enum(CLOCK_TYPES).default('graph'),
});

export type NodeSettings = z.infer<typeof NodeOptionsSchema>;

/**
 * Options accepted by `GraphNode.create`.
 */
export type NodeOptions = z.input<typeof NodeOptionsSchema> & {
  /** Clock to share with the node; defaults to a SystemClock of `clockType`. */
  clock?: Clock;
  /** Destination for the node's log records; defaults to the console. */
  sink?: LogSink;
};

// ============================================================================
// Error type
// ============================================================================

export class NodeOptionsError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'NodeOptionsError';
  }
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Validate the serializable part of `options` and fill defaults.
 *
 * @throws {NodeOptionsError} listing each invalid field
 */
export function parseNodeOptions(options: NodeOptions = {}): NodeSettings {
  const result = NodeOptionsSchema.safeParse({
    namespaceOverride: options.namespaceOverride,
    logLevel: options.logLevel,
    clockType: options.clockType,
  });

  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new NodeOptionsError(
      `Invalid node options:\n${errors.join('\n')}`,
      result.error.issues[0]?.path.join('.'),
    );
  }

  return result.data;
}

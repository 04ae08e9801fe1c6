/**
 * Graph node facade: an identity together with the logger and clock the
 * node owns.
 *
 * Sub nodes share their parent's logger and clock and report the parent's
 * name and namespace; only the sub namespace and effective namespace differ.
 *
 * @module node/graph-node
 */

import { SystemClock, type Clock, type Time } from '../clock/clock.js';
import { NodeLogger } from '../logging/node-logger.js';
import { NodeIdentity } from '../naming/identity.js';
import { loggerName } from '../naming/logger-name.js';
import { SubIdentity, createSubIdentity } from '../naming/sub-identity.js';
import type { FullyQualifiedName, Namespace } from '../naming/types.js';
import { parseNodeOptions, type NodeOptions } from './options.js';

export class GraphNode {
  private readonly identity: NodeIdentity | SubIdentity;
  private readonly logger: NodeLogger;
  private readonly clock: Clock;

  private constructor(identity: NodeIdentity | SubIdentity, logger: NodeLogger, clock: Clock) {
    this.identity = identity;
    this.logger = logger;
    this.clock = clock;
  }

  /**
   * Build a node, validating its name and namespace.
   *
   * @throws {NameError} kind `InvalidNodeName` or `InvalidNamespace`
   * @throws {NodeOptionsError} when the options fail validation
   */
  static create(name: string, namespace: string = '', options: NodeOptions = {}): GraphNode {
    const settings = parseNodeOptions(options);
    const identity = NodeIdentity.create(name, namespace, settings.namespaceOverride);
    const clock = options.clock ?? new SystemClock(settings.clockType);
    const logger = new NodeLogger(loggerName(identity), {
      level: settings.logLevel,
      sink: options.sink,
      clock,
    });

    logger.debug(`Created node ${identity.fullyQualifiedName}`);
    return new GraphNode(identity, logger, clock);
  }

  getName(): string {
    return this.identity.name;
  }

  getNamespace(): Namespace {
    return this.identity.namespace;
  }

  getFullyQualifiedName(): FullyQualifiedName {
    return this.identity.fullyQualifiedName;
  }

  /** Relative path of a sub node; "" for a top-level node. */
  getSubNamespace(): string {
    return this.identity instanceof SubIdentity ? this.identity.subNamespace : '';
  }

  /** Namespace seen by resources the node owns. */
  getEffectiveNamespace(): Namespace {
    return this.identity instanceof SubIdentity ? this.identity.effectiveNamespace : this.identity.namespace;
  }

  getIdentity(): NodeIdentity | SubIdentity {
    return this.identity;
  }

  getLogger(): NodeLogger {
    return this.logger;
  }

  getClock(): Clock {
    return this.clock;
  }

  now(): Time {
    return this.clock.now();
  }

  /**
   * Create a sub node extending this node's sub namespace.
   *
   * @throws {NameError} kind `NameValidationError` or `InvalidNamespace`
   */
  createSubNode(subNamespace: string): GraphNode {
    const identity = createSubIdentity(this.identity, subNamespace);
    this.logger.debug(`Created sub node ${identity.effectiveNamespace}`);
    return new GraphNode(identity, this.logger, this.clock);
  }
}

// Barrel exports for node module

export type { NodeOptions, NodeSettings } from './options.js';
export { NodeOptionsSchema, NodeOptionsError, parseNodeOptions } from './options.js';
export { GraphNode } from './graph-node.js';

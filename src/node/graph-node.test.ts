import { describe, it, expect } from 'vitest';
import { Time, SystemClock, type Clock } from '../clock/clock.js';
import type { LogRecord } from '../logging/node-logger.js';
import { NameError } from '../naming/errors.js';
import { GraphNode } from './graph-node.js';
import { NodeOptionsError, NodeOptionsSchema, parseNodeOptions } from './options.js';

function counterClock(): Clock {
  let ticks = 0n;
  return {
    type: 'graph',
    now: () => {
      ticks += 1n;
      return new Time(ticks * 1_000n, 'graph');
    },
  };
}

const silent = () => {};

describe('GraphNode', () => {
  it('exposes the identity names', () => {
    const node = GraphNode.create('my_node', '/ns', { sink: silent });
    expect(node.getName()).toBe('my_node');
    expect(node.getNamespace()).toBe('/ns');
    expect(node.getFullyQualifiedName()).toBe('/ns/my_node');
    expect(node.getSubNamespace()).toBe('');
    expect(node.getEffectiveNamespace()).toBe('/ns');
  });

  it('applies the namespace override from options', () => {
    const node = GraphNode.create('my_node', '/ns', { namespaceOverride: '/another_ns', sink: silent });
    expect(node.getNamespace()).toBe('/another_ns');
    expect(node.getFullyQualifiedName()).toBe('/another_ns/my_node');
  });

  it('names the logger after the fully-qualified name', () => {
    expect(GraphNode.create('my_node', '', { sink: silent }).getLogger().name).toBe('my_node');
    expect(GraphNode.create('my_node', 'my/ns', { sink: silent }).getLogger().name).toBe('my.ns.my_node');
  });

  it('propagates name errors', () => {
    expect(() => GraphNode.create('invalid_node?', '/ns')).toThrow(NameError);
    expect(() => GraphNode.create('my_node', '/invalid_ns?')).toThrow('Invalid namespace "/invalid_ns?"');
  });

  it('logs its creation at debug level', () => {
    const records: LogRecord[] = [];
    GraphNode.create('my_node', '/ns', { logLevel: 'debug', sink: (r) => { records.push(r); }, clock: counterClock() });
    expect(records).toHaveLength(1);
    expect(records[0].message).toBe('Created node /ns/my_node');
    expect(records[0].name).toBe('ns.my_node');
  });

  it('does not log creation at the default level', () => {
    const records: LogRecord[] = [];
    GraphNode.create('my_node', '/ns', { sink: (r) => { records.push(r); } });
    expect(records).toHaveLength(0);
  });

  describe('clock', () => {
    it('uses the supplied clock for now()', () => {
      const clock = counterClock();
      const node = GraphNode.create('my_node', '/ns', { clock, sink: silent });
      expect(node.getClock()).toBe(clock);
      expect(node.now().nanoseconds).toBe(1_000n);
      expect(node.now().nanoseconds).toBe(2_000n);
    });

    it('defaults to a graph system clock', () => {
      const clock = GraphNode.create('my_node', '/ns', { sink: silent }).getClock();
      expect(clock).toBeInstanceOf(SystemClock);
      expect(clock.type).toBe('graph');
    });

    it('honors the clock type option', () => {
      const node = GraphNode.create('my_node', '/ns', { clockType: 'steady', sink: silent });
      expect(node.getClock().type).toBe('steady');
    });

    it('reads time close to the clock', () => {
      const node = GraphNode.create('my_node', '/ns', { sink: silent });
      const builtin = node.now().nanoseconds;
      const external = node.getClock().now().nanoseconds;
      expect(external >= builtin).toBe(true);
      expect(external - builtin < 5_000_000_000n).toBe(true);
    });
  });

  describe('createSubNode', () => {
    it('shares logger and clock with the parent', () => {
      const node = GraphNode.create('my_node', '/ns', { sink: silent });
      const sub = node.createSubNode('sub_ns');
      expect(sub.getLogger()).toBe(node.getLogger());
      expect(sub.getClock()).toBe(node.getClock());
    });

    it('reports parent names and its own namespaces', () => {
      const sub = GraphNode.create('my_node', 'ns', { sink: silent }).createSubNode('sub_ns');
      expect(sub.getName()).toBe('my_node');
      expect(sub.getNamespace()).toBe('/ns');
      expect(sub.getFullyQualifiedName()).toBe('/ns/my_node');
      expect(sub.getSubNamespace()).toBe('sub_ns');
      expect(sub.getEffectiveNamespace()).toBe('/ns/sub_ns');
    });

    it('chains', () => {
      const sub2 = GraphNode.create('my_node', '', { sink: silent }).createSubNode('sub_ns').createSubNode('sub_ns2');
      expect(sub2.getNamespace()).toBe('/');
      expect(sub2.getSubNamespace()).toBe('sub_ns/sub_ns2');
      expect(sub2.getEffectiveNamespace()).toBe('/sub_ns/sub_ns2');
    });

    it('rejects absolute and private sub namespaces', () => {
      const node = GraphNode.create('my_node', '/ns', { sink: silent });
      expect(() => node.createSubNode('/sub_ns')).toThrow('Invalid sub namespace "/sub_ns"');
      expect(() => node.createSubNode('~sub_ns')).toThrow('Invalid namespace "~sub_ns"');
      expect(() => node.createSubNode('invalid_ns?')).toThrow('Invalid namespace "invalid_ns?"');
    });

    it('logs sub node creation at debug level', () => {
      const records: LogRecord[] = [];
      const node = GraphNode.create('my_node', '/ns', { logLevel: 'debug', sink: (r) => { records.push(r); } });
      node.createSubNode('sub_ns');
      expect(records.map((r) => r.message)).toEqual(['Created node /ns/my_node', 'Created sub node /ns/sub_ns']);
    });
  });
});

describe('parseNodeOptions', () => {
  it('fills defaults', () => {
    expect(parseNodeOptions()).toEqual({ logLevel: 'info', clockType: 'graph' });
  });

  it('keeps the override', () => {
    expect(parseNodeOptions({ namespaceOverride: '/x' }).namespaceOverride).toBe('/x');
  });

  it('rejects unknown levels and clock types in the schema', () => {
    expect(NodeOptionsSchema.safeParse({ logLevel: 'verbose' }).success).toBe(false);
    expect(NodeOptionsSchema.safeParse({ clockType: 'lunar' }).success).toBe(false);
  });
});

describe('NodeOptionsError', () => {
  it('carries the offending field', () => {
    const err = new NodeOptionsError('Invalid node options', 'logLevel');
    expect(err.name).toBe('NodeOptionsError');
    expect(err.field).toBe('logLevel');
  });
});

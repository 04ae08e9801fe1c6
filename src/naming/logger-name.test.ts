import { describe, it, expect } from 'vitest';
import { NodeIdentity } from './identity.js';
import { loggerName } from './logger-name.js';

describe('loggerName', () => {
  it.each([
    ['', 'my_node'],
    ['/ns', 'ns.my_node'],
    ['ns', 'ns.my_node'],
    ['/my/ns', 'my.ns.my_node'],
    ['my/ns', 'my.ns.my_node'],
  ])('namespace %j maps to %s', (namespace, expected) => {
    expect(loggerName(NodeIdentity.create('my_node', namespace))).toBe(expected);
  });

  it('contains no separators and mirrors the fully-qualified name', () => {
    for (const ns of ['', 'a', 'a/b', '/x/y/z']) {
      const id = NodeIdentity.create('n', ns);
      const name = loggerName(id);
      expect(name.includes('/')).toBe(false);
      expect(name).toBe(id.fullyQualifiedName.slice(1).split('/').join('.'));
    }
  });

  it('maps a sub identity to its root logger name', () => {
    const sub = NodeIdentity.create('my_node', '/ns').createSub('a').createSub('b');
    expect(loggerName(sub)).toBe('ns.my_node');
  });
});

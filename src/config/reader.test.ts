import { describe, it, expect, vi, beforeEach } from 'vitest';
import { readNodeManifest, validateNodeManifest, NodeManifestError, DEFAULT_MANIFEST_PATH } from './reader.js';
import { DEFAULT_NODE_MANIFEST } from './schema.js';

vi.mock('fs/promises', () => ({
  readFile: vi.fn(),
}));

import { readFile } from 'fs/promises';

const mockReadFile = vi.mocked(readFile);

function enoent(): Error {
  return Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' });
}

describe('readNodeManifest', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns the default manifest when the file is missing', async () => {
    mockReadFile.mockRejectedValue(enoent());
    await expect(readNodeManifest()).resolves.toEqual({ nodes: [] });
    expect(mockReadFile).toHaveBeenCalledWith(DEFAULT_MANIFEST_PATH, 'utf-8');
  });

  it('returns a fresh manifest for each missing file', async () => {
    mockReadFile.mockRejectedValue(enoent());
    const first = await readNodeManifest();
    first.nodes.push({ name: 'added', namespace: '', subNamespaces: [] });

    const second = await readNodeManifest();
    expect(second).toEqual({ nodes: [] });
    expect(second).not.toBe(first);
    expect(DEFAULT_NODE_MANIFEST).toEqual({ nodes: [] });
  });

  it('reads from a custom path', async () => {
    mockReadFile.mockResolvedValue('{}');
    await readNodeManifest('/tmp/custom.json');
    expect(mockReadFile).toHaveBeenCalledWith('/tmp/custom.json', 'utf-8');
  });

  it('rethrows other read errors', async () => {
    mockReadFile.mockRejectedValue(Object.assign(new Error('EACCES'), { code: 'EACCES' }));
    await expect(readNodeManifest()).rejects.toThrow('EACCES');
  });

  it('throws NodeManifestError on invalid JSON', async () => {
    mockReadFile.mockResolvedValue('not json {');
    await expect(readNodeManifest('nodes.json')).rejects.toThrow('Invalid JSON in manifest file: nodes.json');
    await expect(readNodeManifest('nodes.json')).rejects.toBeInstanceOf(NodeManifestError);
  });

  it('fills entry defaults', async () => {
    mockReadFile.mockResolvedValue(JSON.stringify({ nodes: [{ name: 'talker' }] }));
    const manifest = await readNodeManifest();
    expect(manifest.nodes).toEqual([{ name: 'talker', namespace: '', subNamespaces: [] }]);
  });

  it('names the failing field on schema errors', async () => {
    mockReadFile.mockResolvedValue(JSON.stringify({ nodes: [{ name: 42 }] }));
    try {
      await readNodeManifest();
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(NodeManifestError);
      if (!(err instanceof NodeManifestError)) return;
      expect(err.field).toBe('nodes.0.name');
      expect(err.message.startsWith('Manifest validation failed:\nnodes.0.name: ')).toBe(true);
    }
  });
});

describe('validateNodeManifest', () => {
  it('accepts an empty object', () => {
    expect(validateNodeManifest({})).toEqual({ valid: true, manifest: DEFAULT_NODE_MANIFEST });
  });

  it('does not check name grammar', () => {
    const result = validateNodeManifest({ nodes: [{ name: 'bad?', namespace: 'ns/' }] });
    expect(result.valid).toBe(true);
  });

  it('rejects a non-array sub namespace list', () => {
    const result = validateNodeManifest({ nodes: [{ name: 'n', subNamespaces: 'a' }] });
    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.field).toBe('nodes.0.subNamespaces');
    expect(result.errors).toHaveLength(1);
  });
});

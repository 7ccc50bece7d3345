import fs from 'fs';
import path from 'path';
import { afterEach, describe, it, expect } from 'vitest';
import { walkFileStructure } from '../filesystem-walker.js';
import { NodeRegistry } from '../../graph/node-registry.js';
import { ROOT_DIRECTORY, fileNode } from '../../types/graph.js';
import { edgeSignatures, makeTree, mockLogger, nodeSignatures, removeTree } from '../../__tests__/fixtures.js';

describe('Filesystem Walker', () => {
  let root = '';

  afterEach(() => {
    if (root) removeTree(root);
    root = '';
  });

  it('links every entry to its parent and skips tag files', () => {
    root = makeTree({
      'a.txt': '',
      'sub/b.txt': '',
      'sub/b.tags': 'x\n',
      'sub/dir.tags': '',
      'notes.tags/inner.txt': '',
    });
    const registry = new NodeRegistry();

    const result = walkFileStructure(root, registry);

    expect(edgeSignatures(root, registry)).toEqual(
      [
        'ROOT_DIR CHILD dir:.',
        'dir:. PARENT ROOT_DIR',
        'dir:. CHILD file:a.txt',
        'file:a.txt PARENT dir:.',
        'dir:. CHILD dir:sub',
        'dir:sub PARENT dir:.',
        'dir:sub CHILD file:sub/b.txt',
        'file:sub/b.txt PARENT dir:sub',
      ].sort()
    );
    expect(nodeSignatures(root, registry)).toEqual(
      ['ROOT_DIR', 'dir:.', 'dir:sub', 'file:a.txt', 'file:sub/b.txt'].sort()
    );
    expect(result).toEqual({ entriesVisited: 4, entriesSkipped: 0, warnings: [] });
  });

  it('wires only the root to the root directory anchor', () => {
    root = makeTree({ 'a/b/c.txt': '' });
    const registry = new NodeRegistry();

    walkFileStructure(root, registry);

    const anchor = registry.lookup(ROOT_DIRECTORY);
    expect(anchor).toBeDefined();
    if (anchor === undefined) return;
    expect(registry.graph.outEdges(anchor)).toEqual([
      { source: anchor, target: registry.lookup({ type: 'directory', path: root }), relation: 'CHILD' },
    ]);
    expect(registry.graph.inEdges(anchor)).toHaveLength(1);
    expect(registry.graph.inEdges(anchor)[0].relation).toBe('PARENT');
  });

  it('accepts a file as the root', () => {
    root = makeTree({ 'only.txt': '' });
    const registry = new NodeRegistry();

    walkFileStructure(path.join(root, 'only.txt'), registry);

    expect(edgeSignatures(root, registry)).toEqual(['ROOT_DIR CHILD file:only.txt', 'file:only.txt PARENT ROOT_DIR']);
  });

  it('registers symbolic links under their target without descending', () => {
    root = makeTree({ 'real/f.txt': '' });
    fs.symlinkSync(path.join(root, 'real'), path.join(root, 'link'));
    const registry = new NodeRegistry();

    const result = walkFileStructure(root, registry);

    expect(edgeSignatures(root, registry)).toEqual(
      [
        'ROOT_DIR CHILD dir:.',
        'dir:. PARENT ROOT_DIR',
        'dir:. CHILD dir:real',
        'dir:real PARENT dir:.',
        'dir:real CHILD file:real/f.txt',
        'file:real/f.txt PARENT dir:real',
      ].sort()
    );
    expect(result.entriesVisited).toBe(4);
  });

  it('skips links that resolve to a tag file', () => {
    root = makeTree({ 'bar.tags': 'x\n' });
    fs.symlinkSync(path.join(root, 'bar.tags'), path.join(root, 'foo'));
    const registry = new NodeRegistry();

    const result = walkFileStructure(root, registry);

    expect(edgeSignatures(root, registry)).toEqual(['ROOT_DIR CHILD dir:.', 'dir:. PARENT ROOT_DIR']);
    expect(result).toEqual({ entriesVisited: 1, entriesSkipped: 0, warnings: [] });
  });

  it('logs and skips entries that fail, then finishes the walk', () => {
    root = makeTree({ 'good.txt': '', 'sub/more.txt': '' });
    const broken = path.join(root, 'broken');
    fs.symlinkSync(path.join(root, 'nowhere'), broken);
    const registry = new NodeRegistry();
    const logger = mockLogger();

    const result = walkFileStructure(root, registry, { logger });

    expect(result.entriesVisited).toBe(4);
    expect(result.entriesSkipped).toBe(1);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toContain(`Skipped ${broken}: Failed to canonicalize ${broken}`);
    expect(logger.error).toHaveBeenCalledWith(
      'Error when walking file structure',
      expect.objectContaining({ path: broken })
    );
    expect(registry.lookup(fileNode(path.join(root, 'sub/more.txt')))).toBeDefined();
    expect(registry.lookup(fileNode(broken))).toBeUndefined();
  });
});

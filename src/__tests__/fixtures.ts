/**
 * Shared helpers for tests that need a real directory tree
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { vi } from 'vitest';
import type { NodeRegistry } from '../graph/node-registry.js';
import type { TagGraphNode } from '../types/graph.js';
import type { Logger } from '../utils/logger.js';

/**
 * Create a temporary tree and return its canonical root.
 * Keys are relative paths; a null value creates a directory.
 */
export function makeTree(entries: Record<string, string | Buffer | null>): string {
  const root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'taggraph-')));
  for (const [relative, content] of Object.entries(entries)) {
    const full = path.join(root, relative);
    if (content === null) {
      fs.mkdirSync(full, { recursive: true });
      continue;
    }
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content);
  }
  return root;
}

export function removeTree(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}

export function mockLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Readable, handle-independent name of a node relative to `root` */
export function describeNode(root: string, node: Readonly<TagGraphNode> | undefined): string {
  if (!node) return '?';
  switch (node.type) {
    case 'file':
      return `file:${path.relative(root, node.path) || '.'}`;
    case 'directory':
      return `dir:${path.relative(root, node.path) || '.'}`;
    case 'tag':
      return `tag:${node.name}`;
    case 'root-directory':
      return 'ROOT_DIR';
    case 'root-tag':
      return 'ROOT_TAG';
  }
}

/** Every edge as "source RELATION target", sorted */
export function edgeSignatures(root: string, registry: NodeRegistry): string[] {
  return registry.graph
    .edges()
    .map(
      (edge) =>
        `${describeNode(root, registry.resolve(edge.source))} ${edge.relation} ${describeNode(root, registry.resolve(edge.target))}`
    )
    .sort();
}

export function nodeSignatures(root: string, registry: NodeRegistry): string[] {
  return registry.graph
    .nodes()
    .map(({ node }) => describeNode(root, node))
    .sort();
}

/** Run `fn` and return what it throws */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}

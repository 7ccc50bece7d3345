/**
 * Tag queries over a built graph
 *
 * "What tags apply to P" follows HAS_TAG (and PARENT for inherited tags),
 * "what is tagged X" follows TAG_ASSIGNED_TO (and CHILD for everything below
 * a tagged directory).
 */

import type { TagGraphBuild } from '../ingestion/graph-assembler.js';
import { ROOT_TAG, directoryNode, fileNode, isPathNode, tagNode } from '../types/graph.js';
import type { NodeHandle, Relation } from '../types/graph.js';
import { IndexError, IndexErrorCode } from '../utils/errors.js';
import { canonicalize, compareNames } from '../utils/path-utils.js';

export interface TagsForPathOptions {
  /** Include tags of containing directories (default: true) */
  inherited?: boolean;
}

export interface PathsForTagOptions {
  /** Include everything below tagged directories (default: false) */
  recursive?: boolean;
}

export interface TagSummary {
  name: string;
  /** Entries the tag is directly assigned to */
  assignments: number;
}

function findPathNode(build: TagGraphBuild, target: string): NodeHandle {
  const canonicalPath = canonicalize(target);
  const handle =
    build.registry.lookup(fileNode(canonicalPath)) ?? build.registry.lookup(directoryNode(canonicalPath));
  if (handle === undefined) {
    throw new IndexError(
      IndexErrorCode.NOT_FOUND,
      `Path ${canonicalPath} is not part of the graph rooted at ${build.root}`,
      canonicalPath
    );
  }
  return handle;
}

export function tagsForPath(build: TagGraphBuild, target: string, options: TagsForPathOptions = {}): string[] {
  const start = findPathNode(build, target);
  const follow: Relation[] = options.inherited === false ? ['HAS_TAG'] : ['HAS_TAG', 'PARENT'];

  const names = new Set<string>();
  for (const handle of build.graph.traverse(start, follow)) {
    const node = build.graph.node(handle);
    if (node?.type === 'tag') names.add(node.name);
  }
  return [...names].sort(compareNames);
}

export function pathsForTag(build: TagGraphBuild, tag: string, options: PathsForTagOptions = {}): string[] {
  const handle = build.registry.lookup(tagNode(tag));
  if (handle === undefined) return [];

  const paths = new Set<string>();
  for (const edge of build.graph.outEdges(handle, ['TAG_ASSIGNED_TO'])) {
    const reached = options.recursive ? build.graph.traverse(edge.target, ['CHILD']) : [edge.target];
    for (const target of reached) {
      const node = build.graph.node(target);
      if (node && isPathNode(node)) paths.add(node.path);
    }
  }
  return [...paths].sort(compareNames);
}

export function listTags(build: TagGraphBuild): TagSummary[] {
  const rootTag = build.registry.lookup(ROOT_TAG);
  if (rootTag === undefined) return [];

  const summaries: TagSummary[] = [];
  for (const edge of build.graph.outEdges(rootTag, ['HAS_TAG'])) {
    const node = build.graph.node(edge.target);
    if (node?.type !== 'tag') continue;
    summaries.push({
      name: node.name,
      assignments: build.graph.outEdges(edge.target, ['TAG_ASSIGNED_TO']).length,
    });
  }
  return summaries.sort((a, b) => compareNames(a.name, b.name));
}

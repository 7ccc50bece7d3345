/**
 * Tag graph data model
 *
 * Nodes are plain values compared by content: two file nodes with the same
 * canonical path are the same node, two tag nodes with the same name are the
 * same node. Use nodeKey() wherever identity is needed.
 */

// ============================================
// Nodes
// ============================================

export interface FileNode {
  type: 'file';
  /** Absolute, canonical path */
  path: string;
}

export interface DirectoryNode {
  type: 'directory';
  /** Absolute, canonical path */
  path: string;
}

export interface RootDirectoryNode {
  type: 'root-directory';
}

export interface RootTagNode {
  type: 'root-tag';
}

export interface TagNode {
  type: 'tag';
  name: string;
}

export type TagGraphNode = FileNode | DirectoryNode | RootDirectoryNode | RootTagNode | TagNode;

export type TagGraphNodeType = TagGraphNode['type'];

export type PathNode = FileNode | DirectoryNode;

/** Stable integer handle of a node inside one registry */
export type NodeHandle = number;

export const ROOT_DIRECTORY: Readonly<RootDirectoryNode> = Object.freeze({ type: 'root-directory' });
export const ROOT_TAG: Readonly<RootTagNode> = Object.freeze({ type: 'root-tag' });

export function fileNode(path: string): FileNode {
  return { type: 'file', path };
}

export function directoryNode(path: string): DirectoryNode {
  return { type: 'directory', path };
}

export function tagNode(name: string): TagNode {
  return { type: 'tag', name };
}

export function isPathNode(node: TagGraphNode): node is PathNode {
  return node.type === 'file' || node.type === 'directory';
}

/**
 * Identity key of a node. Injective over the union: equal keys mean
 * value-equal nodes.
 */
export function nodeKey(node: Readonly<TagGraphNode>): string {
  switch (node.type) {
    case 'file':
    case 'directory':
      return JSON.stringify([node.type, node.path]);
    case 'tag':
      return JSON.stringify([node.type, node.name]);
    case 'root-directory':
    case 'root-tag':
      return JSON.stringify([node.type]);
  }
}

/** Copy of a node value that shares nothing with the original */
export function cloneNode(node: Readonly<TagGraphNode>): TagGraphNode {
  switch (node.type) {
    case 'file':
      return fileNode(node.path);
    case 'directory':
      return directoryNode(node.path);
    case 'tag':
      return tagNode(node.name);
    case 'root-directory':
      return { type: 'root-directory' };
    case 'root-tag':
      return { type: 'root-tag' };
  }
}

// ============================================
// Relations
// ============================================

export const RELATIONS = ['PARENT', 'CHILD', 'HAS_TAG', 'TAG_ASSIGNED_TO'] as const;

/**
 * Edge labels:
 * - PARENT: entity -> containing directory
 * - CHILD: directory -> contained entity
 * - HAS_TAG: owner (root tag, file, directory) -> tag
 * - TAG_ASSIGNED_TO: tag -> entity it was assigned to
 */
export type Relation = (typeof RELATIONS)[number];

export interface TagGraphEdge {
  source: NodeHandle;
  target: NodeHandle;
  relation: Relation;
}

/** Restricts traversal to a subset of edges */
export type RelationFilter = readonly Relation[] | ((relation: Relation) => boolean);

export function matchesRelation(filter: RelationFilter | undefined, relation: Relation): boolean {
  if (filter === undefined) return true;
  if (typeof filter === 'function') return filter(relation);
  return filter.includes(relation);
}

/**
 * Read-only view over a built tag graph.
 *
 * This is what consumers traverse: node and edge enumeration, relation
 * filtered neighbourhoods and breadth-first traversal, plus a JSON export for
 * visualizers.
 */

import path from 'path';
import { matchesRelation } from '../types/graph.js';
import type {
  NodeHandle,
  Relation,
  RelationFilter,
  TagGraphEdge,
  TagGraphNode,
  TagGraphNodeType,
} from '../types/graph.js';
import type { EdgeAttributes, TagMultiGraph } from './node-registry.js';

export interface HandleNode {
  handle: NodeHandle;
  node: Readonly<TagGraphNode>;
}

export interface SerializedTagGraph {
  nodes: Array<{
    id: NodeHandle;
    type: TagGraphNodeType;
    label: string;
    path?: string;
    name?: string;
  }>;
  edges: Array<{ source: NodeHandle; target: NodeHandle; relation: Relation }>;
}

/**
 * Display label of a node
 *
 * @example
 * formatNodeLabel(fileNode('/data/img.png'))    // 'img.png'
 * formatNodeLabel(directoryNode('/data/photos')) // 'photos/'
 * formatNodeLabel(tagNode('red'))                // '[red]'
 */
export function formatNodeLabel(node: Readonly<TagGraphNode>): string {
  switch (node.type) {
    case 'file':
      return path.basename(node.path);
    case 'directory':
      return `${path.basename(node.path)}/`;
    case 'root-directory':
      return 'ROOT_DIR';
    case 'root-tag':
      return 'ROOT_TAG';
    case 'tag':
      return `[${node.name}]`;
  }
}

function toEdge(attributes: EdgeAttributes, source: string, target: string): TagGraphEdge {
  return { source: Number(source), target: Number(target), relation: attributes.relation };
}

export class TagGraph {
  constructor(
    private readonly backing: TagMultiGraph,
    private readonly resolveNode: (handle: NodeHandle) => Readonly<TagGraphNode> | undefined
  ) {}

  get order(): number {
    return this.backing.order;
  }

  get size(): number {
    return this.backing.size;
  }

  node(handle: NodeHandle): Readonly<TagGraphNode> | undefined {
    return this.resolveNode(handle);
  }

  hasNode(handle: NodeHandle): boolean {
    return this.backing.hasNode(String(handle));
  }

  /** All nodes in handle order */
  nodes(): HandleNode[] {
    const result: HandleNode[] = [];
    this.backing.forEachNode((_key, attributes) => {
      const node = this.resolveNode(attributes.handle);
      if (node) result.push({ handle: attributes.handle, node });
    });
    return result.sort((a, b) => a.handle - b.handle);
  }

  /** All edges in insertion order, optionally restricted by relation */
  edges(filter?: RelationFilter): TagGraphEdge[] {
    const result: TagGraphEdge[] = [];
    this.backing.forEachEdge((_key, attributes, source, target) => {
      if (matchesRelation(filter, attributes.relation)) {
        result.push(toEdge(attributes, source, target));
      }
    });
    return result;
  }

  outEdges(handle: NodeHandle, filter?: RelationFilter): TagGraphEdge[] {
    if (!this.hasNode(handle)) return [];
    const result: TagGraphEdge[] = [];
    this.backing.forEachOutEdge(String(handle), (_key, attributes, source, target) => {
      if (matchesRelation(filter, attributes.relation)) {
        result.push(toEdge(attributes, source, target));
      }
    });
    return result;
  }

  inEdges(handle: NodeHandle, filter?: RelationFilter): TagGraphEdge[] {
    if (!this.hasNode(handle)) return [];
    const result: TagGraphEdge[] = [];
    this.backing.forEachInEdge(String(handle), (_key, attributes, source, target) => {
      if (matchesRelation(filter, attributes.relation)) {
        result.push(toEdge(attributes, source, target));
      }
    });
    return result;
  }

  /**
   * Breadth-first walk over out-edges accepted by `filter`.
   * Returns every reached handle once, `start` first.
   */
  traverse(start: NodeHandle, filter: RelationFilter): NodeHandle[] {
    if (!this.hasNode(start)) return [];

    const visited = new Set<NodeHandle>([start]);
    const order: NodeHandle[] = [start];
    for (let i = 0; i < order.length; i++) {
      for (const edge of this.outEdges(order[i], filter)) {
        if (!visited.has(edge.target)) {
          visited.add(edge.target);
          order.push(edge.target);
        }
      }
    }
    return order;
  }

  toJSON(): SerializedTagGraph {
    return {
      nodes: this.nodes().map(({ handle, node }) => ({
        id: handle,
        type: node.type,
        label: formatNodeLabel(node),
        ...(node.type === 'file' || node.type === 'directory' ? { path: node.path } : {}),
        ...(node.type === 'tag' ? { name: node.name } : {}),
      })),
      edges: this.edges(),
    };
  }
}

/**
 * Node Registry
 *
 * Deduplicating store mapping node values to stable integer handles.
 * Identity lives in an explicit key -> handle map over an arena of node
 * values; the graphology multigraph underneath only holds topology, keyed by
 * the handle. Edges are keyed by (source, target, relation), so two different
 * relations between the same ordered pair are two edges.
 */

import { MultiDirectedGraph } from 'graphology';
import { cloneNode, nodeKey } from '../types/graph.js';
import type { NodeHandle, Relation, TagGraphNode } from '../types/graph.js';
import { IndexError, IndexErrorCode } from '../utils/errors.js';
import { TagGraph } from './tag-graph.js';

export type NodeAttributes = {
  handle: NodeHandle;
};

export type EdgeAttributes = {
  relation: Relation;
};

export type TagMultiGraph = MultiDirectedGraph<NodeAttributes, EdgeAttributes>;

export function edgeKey(source: NodeHandle, target: NodeHandle, relation: Relation): string {
  return `${source}-${relation}->${target}`;
}

export class NodeRegistry {
  private readonly backing: TagMultiGraph = new MultiDirectedGraph<NodeAttributes, EdgeAttributes>();
  private readonly arena: Readonly<TagGraphNode>[] = [];
  private readonly handles = new Map<string, NodeHandle>();
  private readonly view: TagGraph;
  private isSealed = false;

  constructor() {
    this.view = new TagGraph(this.backing, (handle) => this.resolve(handle));
  }

  /** Read-only view over the nodes and edges registered so far */
  get graph(): TagGraph {
    return this.view;
  }

  /** Number of nodes */
  get order(): number {
    return this.arena.length;
  }

  /** Number of edges */
  get size(): number {
    return this.backing.size;
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  /** Reject any further node or edge creation. Lookups keep working. */
  seal(): void {
    this.isSealed = true;
  }

  /**
   * Handle of a value-equal node, registering a copy of the value if none
   * exists. The caller keeps ownership of its object.
   */
  getOrCreate(node: Readonly<TagGraphNode>): NodeHandle {
    return this.lookupOrInsert(node, () => cloneNode(node));
  }

  /**
   * Same lookup as getOrCreate(), but a new node is stored as the given
   * object itself, which gets frozen.
   */
  intern(node: TagGraphNode): NodeHandle {
    return this.lookupOrInsert(node, () => Object.freeze(node));
  }

  lookup(node: Readonly<TagGraphNode>): NodeHandle | undefined {
    return this.handles.get(nodeKey(node));
  }

  resolve(handle: NodeHandle): Readonly<TagGraphNode> | undefined {
    return this.arena[handle];
  }

  /**
   * Add the `relation` edge a -> b unless it exists, creating either endpoint
   * if needed. Returns true when a new edge was added.
   */
  connect(a: Readonly<TagGraphNode>, b: Readonly<TagGraphNode>, relation: Relation): boolean {
    return this.link(this.getOrCreate(a), this.getOrCreate(b), relation);
  }

  /** connect() on handles */
  link(source: NodeHandle, target: NodeHandle, relation: Relation): boolean {
    if (this.resolve(source) === undefined || this.resolve(target) === undefined) {
      throw new IndexError(
        IndexErrorCode.INVALID_ARGUMENT,
        `Cannot link unknown handles ${source} -> ${target}`
      );
    }

    const key = edgeKey(source, target, relation);
    if (this.backing.hasEdge(key)) {
      return false;
    }

    this.assertWritable(`add ${relation} edge ${source} -> ${target}`);
    this.backing.addDirectedEdgeWithKey(key, String(source), String(target), { relation });
    return true;
  }

  private lookupOrInsert(node: Readonly<TagGraphNode>, own: () => Readonly<TagGraphNode>): NodeHandle {
    const key = nodeKey(node);
    const existing = this.handles.get(key);
    if (existing !== undefined) {
      return existing;
    }

    this.assertWritable(`register node ${key}`);
    const handle = this.arena.length;
    this.arena.push(own());
    this.handles.set(key, handle);
    this.backing.addNode(String(handle), { handle });
    return handle;
  }

  private assertWritable(action: string): void {
    if (this.isSealed) {
      throw new IndexError(IndexErrorCode.GRAPH_SEALED, `Cannot ${action}: the graph is sealed`);
    }
  }
}

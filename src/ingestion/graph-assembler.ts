/**
 * Graph Assembler - public build entry point
 *
 * Runs the tag-file scan to completion, then the filesystem walk, against one
 * shared registry. Both passes key path nodes by the canonical path, so an
 * entity reached from either pass ends up as one node.
 *
 * The build either returns a complete, sealed graph or throws one IndexError.
 */

import type { TagGraph } from '../graph/tag-graph.js';
import { NodeRegistry } from '../graph/node-registry.js';
import { ROOT_TAG } from '../types/graph.js';
import { DEFAULT_CONVENTIONS } from '../types/config.js';
import type { TagFileConventions } from '../types/config.js';
import { IndexError, IndexErrorCode } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { canonicalize } from '../utils/path-utils.js';
import { scanTagFiles } from './tag-file-scanner.js';
import { walkFileStructure } from './filesystem-walker.js';

export interface BuildOptions {
  conventions?: Partial<TagFileConventions>;
  /** Logger shared by both passes (default: scoped console loggers) */
  logger?: Logger;
}

export interface BuildStats {
  tagFiles: number;
  /** Distinct tags */
  tags: number;
  entriesVisited: number;
  entriesSkipped: number;
  /** Zero-match tag files and skipped walk entries */
  warnings: string[];
  durationMs: number;
}

export interface TagGraphBuild {
  /** Canonical root */
  root: string;
  graph: TagGraph;
  /** Maps node values to handles and back */
  registry: NodeRegistry;
  stats: BuildStats;
}

export function buildTagGraph(root: string, options: BuildOptions = {}): TagGraphBuild {
  if (typeof root !== 'string' || root.length === 0) {
    throw new IndexError(IndexErrorCode.INVALID_ARGUMENT, 'Root path must be a non-empty string');
  }

  const startTime = Date.now();
  const conventions: TagFileConventions = { ...DEFAULT_CONVENTIONS, ...options.conventions };
  const logger = options.logger ?? createLogger('TagGraph');
  const canonicalRoot = canonicalize(root);
  const registry = new NodeRegistry();

  logger.info('Building tag graph', { root: canonicalRoot });

  const scan = scanTagFiles(canonicalRoot, registry, { conventions, logger: options.logger });
  const walk = walkFileStructure(canonicalRoot, registry, { conventions, logger: options.logger });

  registry.seal();

  const rootTag = registry.lookup(ROOT_TAG);
  const stats: BuildStats = {
    tagFiles: scan.tagFiles.length,
    tags: rootTag === undefined ? 0 : registry.graph.outEdges(rootTag, ['HAS_TAG']).length,
    entriesVisited: walk.entriesVisited,
    entriesSkipped: walk.entriesSkipped,
    warnings: [...scan.warnings, ...walk.warnings],
    durationMs: Date.now() - startTime,
  };

  logger.info('Tag graph built', {
    nodes: registry.order,
    edges: registry.size,
    tagFiles: stats.tagFiles,
    warnings: stats.warnings.length,
  });

  return { root: canonicalRoot, graph: registry.graph, registry, stats };
}

/**
 * Build CLI - index a root and print a summary or the graph as JSON
 *
 * Usage:
 *   taggraph build ./photos           # Node/edge counts and warnings
 *   taggraph build ./photos --json    # Full graph for a visualizer
 */

import { RELATIONS } from '../../src/types/graph.js';
import type { Relation, TagGraphNodeType } from '../../src/types/graph.js';
import type { TagGraphBuild } from '../../src/ingestion/graph-assembler.js';
import { IndexError, IndexErrorCode } from '../../src/utils/errors.js';
import { loadGraph, requireValue } from '../utils/load-graph.js';

export interface BuildCommandOptions {
  root?: string;
  json?: boolean;
  configPath?: string;
  verbose?: boolean;
}

export function printBuildHelp(): void {
  console.log(`
Usage: taggraph build <root> [options]

Options:
  --json               Print the whole graph (nodes and edges) as JSON
  --config <file>      Config file (default: <root>/.taggraph.yaml if present)
  --verbose            Log every visited tag file and entry
  -h, --help           Show this help

Examples:
  taggraph build ./photos
  taggraph build ./photos --json > graph.json
`);
}

export function parseBuildOptions(args: string[]): BuildCommandOptions {
  const options: BuildCommandOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--json':
        options.json = true;
        break;
      case '--config':
        options.configPath = requireValue(args, ++i, arg);
        break;
      case '--verbose':
        options.verbose = true;
        break;
      case '-h':
      case '--help':
        printBuildHelp();
        process.exit(0);
      default:
        if (arg.startsWith('-')) {
          throw new IndexError(IndexErrorCode.INVALID_ARGUMENT, `Unknown option "${arg}"`);
        }
        options.root = arg;
    }
  }

  return options;
}

/** Summary lines for a finished build */
export function formatBuildSummary(build: TagGraphBuild): string[] {
  const nodeCounts: Record<TagGraphNodeType, number> = {
    file: 0,
    directory: 0,
    'root-directory': 0,
    'root-tag': 0,
    tag: 0,
  };
  for (const { node } of build.graph.nodes()) {
    nodeCounts[node.type]++;
  }

  const edgeCounts: Record<Relation, number> = { PARENT: 0, CHILD: 0, HAS_TAG: 0, TAG_ASSIGNED_TO: 0 };
  for (const edge of build.graph.edges()) {
    edgeCounts[edge.relation]++;
  }

  const lines = [
    `Root: ${build.root}`,
    `Nodes: ${build.graph.order} (files: ${nodeCounts.file}, directories: ${nodeCounts.directory}, tags: ${nodeCounts.tag})`,
    `Edges: ${build.graph.size} (${RELATIONS.map((relation) => `${relation}: ${edgeCounts[relation]}`).join(', ')})`,
    `Tag files: ${build.stats.tagFiles}`,
  ];
  if (build.stats.warnings.length > 0) {
    lines.push(`Warnings (${build.stats.warnings.length}):`);
    for (const warning of build.stats.warnings) {
      lines.push(`  ${warning}`);
    }
  }
  return lines;
}

export async function runBuild(options: BuildCommandOptions): Promise<void> {
  const build = await loadGraph(options);

  if (options.json) {
    console.log(JSON.stringify(build.graph.toJSON(), null, 2));
    return;
  }

  for (const line of formatBuildSummary(build)) {
    console.log(line);
  }
}

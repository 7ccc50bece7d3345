/**
 * Query CLI - answer tag questions against a freshly built graph
 *
 * Usage:
 *   taggraph tags <root> <path>        # Tags that apply to a path
 *   taggraph tagged <root> <tag>       # Paths a tag is assigned to
 *   taggraph list <root>               # Every tag with its assignment count
 */

import { listTags, pathsForTag, tagsForPath } from '../../src/query/tag-query.js';
import { IndexError, IndexErrorCode } from '../../src/utils/errors.js';
import { loadGraph, requireValue } from '../utils/load-graph.js';

export type QueryCommand = 'tags' | 'tagged' | 'list';

export interface QueryOptions {
  command: QueryCommand;
  root?: string;
  /** Path for `tags`, tag name for `tagged` */
  subject?: string;
  /** `tags`: only tags attached to the path itself */
  direct?: boolean;
  /** `tagged`: include entries below tagged directories */
  recursive?: boolean;
  configPath?: string;
  verbose?: boolean;
}

export function printQueryHelp(): void {
  console.log(`
Usage:
  taggraph tags <root> <path> [--direct]       Tags that apply to <path>
  taggraph tagged <root> <tag> [--recursive]   Paths tagged with <tag>
  taggraph list <root>                         All tags and how often they are assigned

Options:
  --direct             (tags) Skip tags inherited from containing directories
  --recursive          (tagged) Include everything below tagged directories
  --config <file>      Config file (default: <root>/.taggraph.yaml if present)
  --verbose            Log every visited tag file and entry
  -h, --help           Show this help

Examples:
  taggraph tags ./photos ./photos/2024/img.png
  taggraph tagged ./photos favorite --recursive
`);
}

export function parseQueryOptions(command: QueryCommand, args: string[]): QueryOptions {
  const options: QueryOptions = { command };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--direct':
        options.direct = true;
        break;
      case '--recursive':
        options.recursive = true;
        break;
      case '--config':
        options.configPath = requireValue(args, ++i, arg);
        break;
      case '--verbose':
        options.verbose = true;
        break;
      case '-h':
      case '--help':
        printQueryHelp();
        process.exit(0);
      case '--':
        positional.push(...args.slice(i + 1));
        i = args.length;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new IndexError(IndexErrorCode.INVALID_ARGUMENT, `Unknown option "${arg}"`);
        }
        positional.push(arg);
    }
  }

  [options.root, options.subject] = positional;
  return options;
}

function requireSubject(options: QueryOptions, what: string): string {
  if (options.subject === undefined) {
    throw new IndexError(IndexErrorCode.INVALID_ARGUMENT, `Missing ${what} argument`);
  }
  return options.subject;
}

export async function runQuery(options: QueryOptions): Promise<void> {
  switch (options.command) {
    case 'tags': {
      const target = requireSubject(options, '<path>');
      const build = await loadGraph(options);
      for (const tag of tagsForPath(build, target, { inherited: !options.direct })) {
        console.log(tag);
      }
      return;
    }

    case 'tagged': {
      const tag = requireSubject(options, '<tag>');
      const build = await loadGraph(options);
      for (const taggedPath of pathsForTag(build, tag, { recursive: options.recursive })) {
        console.log(taggedPath);
      }
      return;
    }

    case 'list': {
      const build = await loadGraph(options);
      for (const tag of listTags(build)) {
        console.log(`${tag.name}\t${tag.assignments}`);
      }
      return;
    }
  }
}

#!/usr/bin/env node
/**
 * taggraph CLI entry point.
 *
 * Every command rebuilds the graph from the filesystem; nothing is stored
 * between runs.
 */

import process from 'process';
import { parseBuildOptions, runBuild, printBuildHelp } from './commands/build.js';
import { parseQueryOptions, runQuery, printQueryHelp } from './commands/query.js';
import { getErrorMessage } from '../src/utils/errors.js';

import { VERSION } from './version.js';

function printRootHelp(): void {
  console.log(`taggraph v${VERSION}

Index files, directories and sidecar .tags files as one graph.

Usage:
  taggraph build <root> [options]     Build the graph, print a summary or JSON
  taggraph tags <root> <path>         Tags that apply to a path
  taggraph tagged <root> <tag>        Paths a tag is assigned to
  taggraph list <root>                All tags with assignment counts
  taggraph help <command>             Show help for a command

Global options:
  -h, --help       Show this message
  -v, --version    Show CLI version

Tag files:
  <name>.tags      One tag per line, attached to every sibling named <name>
                   or with stem <name> (img.tags -> img.png, img.jpg, img/)
  dir.tags         One tag per line, attached to the containing directory
`);
}

function printVersion(): void {
  console.log(VERSION);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printRootHelp();
    return;
  }

  const [command, ...rest] = args;

  try {
    switch (command) {
      case '-h':
      case '--help':
        printRootHelp();
        return;

      case '-v':
      case '--version':
        printVersion();
        return;

      case 'help':
        switch (rest[0]) {
          case 'build':
            printBuildHelp();
            break;
          case 'tags':
          case 'tagged':
          case 'list':
            printQueryHelp();
            break;
          default:
            printRootHelp();
        }
        return;

      case 'build': {
        const options = parseBuildOptions(rest);
        await runBuild(options);
        return;
      }

      case 'tags':
      case 'tagged':
      case 'list': {
        const options = parseQueryOptions(command, rest);
        await runQuery(options);
        return;
      }

      default:
        console.error(`Unknown command "${command}".`);
        printRootHelp();
        process.exitCode = 1;
        return;
    }
  } catch (error) {
    console.error('Error:', getErrorMessage(error));
    process.exitCode = 1;
  }
}

main().catch(error => {
  console.error('Unexpected error:', error instanceof Error ? error.stack || error.message : error);
  process.exitCode = 1;
});

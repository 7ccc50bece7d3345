/**
 * Filesystem Walker
 *
 * Second build pass. Visits every entry under the root (the root included)
 * with an explicit stack and records structure:
 *
 *   parent --CHILD--> entry
 *   entry  --PARENT--> parent
 *
 * where the root's parent is the ROOT_DIRECTORY anchor. Tag files are not
 * part of the structure. Symbolic links are registered under their target
 * and not descended into.
 *
 * Errors on a single entry are logged and the entry skipped; the walk
 * always runs to completion.
 */

import fs from 'fs';
import path from 'path';
import type { NodeRegistry } from '../graph/node-registry.js';
import { ROOT_DIRECTORY, directoryNode, fileNode } from '../types/graph.js';
import type { NodeHandle } from '../types/graph.js';
import { DEFAULT_CONVENTIONS } from '../types/config.js';
import type { TagFileConventions } from '../types/config.js';
import { getErrorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { canonicalize, compareNames, getFileName, isTagFileName } from '../utils/path-utils.js';

export interface WalkOptions {
  conventions?: TagFileConventions;
  logger?: Logger;
}

export interface WalkResult {
  /** Entries registered in the graph */
  entriesVisited: number;
  /** Entries dropped because of an error */
  entriesSkipped: number;
  warnings: string[];
}

interface PendingEntry {
  /** Path as listed (not canonical) */
  path: string;
  /** Handle of the containing directory, absent for the root */
  parent?: NodeHandle;
}

export function walkFileStructure(
  root: string,
  registry: NodeRegistry,
  options: WalkOptions = {}
): WalkResult {
  const conventions = options.conventions ?? DEFAULT_CONVENTIONS;
  const logger = options.logger ?? createLogger('FilesystemWalker');
  const rootDirectory = registry.getOrCreate(ROOT_DIRECTORY);
  const result: WalkResult = { entriesVisited: 0, entriesSkipped: 0, warnings: [] };

  const fail = (message: string, entryPath: string, error: unknown): void => {
    const warning = `${message} ${entryPath}: ${getErrorMessage(error)}`;
    logger.error('Error when walking file structure', { path: entryPath, error: getErrorMessage(error) });
    result.warnings.push(warning);
  };

  const stack: PendingEntry[] = [{ path: root }];
  for (let entry = stack.pop(); entry !== undefined; entry = stack.pop()) {
    if (isTagFileName(getFileName(entry.path), conventions.tagExtension)) {
      logger.debug('Skipping tag file', { path: entry.path });
      continue;
    }

    let canonicalPath: string;
    let stats: fs.Stats;
    let linkStats: fs.Stats;
    try {
      linkStats = fs.lstatSync(entry.path);
      canonicalPath = canonicalize(entry.path);
      stats = fs.statSync(canonicalPath);
    } catch (error) {
      fail('Skipped', entry.path, error);
      result.entriesSkipped++;
      continue;
    }

    if (isTagFileName(getFileName(canonicalPath), conventions.tagExtension)) {
      logger.debug('Skipping link to tag file', { path: entry.path, target: canonicalPath });
      continue;
    }

    const node = stats.isDirectory()
      ? registry.intern(directoryNode(canonicalPath))
      : registry.intern(fileNode(canonicalPath));
    const parent = entry.parent ?? rootDirectory;
    registry.link(parent, node, 'CHILD');
    registry.link(node, parent, 'PARENT');
    result.entriesVisited++;

    if (!linkStats.isDirectory()) continue;

    let children: fs.Dirent[];
    try {
      children = fs.readdirSync(entry.path, { withFileTypes: true });
    } catch (error) {
      fail('Could not list', entry.path, error);
      continue;
    }

    // Reverse order so that children pop off the stack sorted by name
    children.sort((a, b) => compareNames(b.name, a.name));
    for (const child of children) {
      stack.push({ path: path.join(entry.path, child.name), parent: node });
    }
  }

  logger.debug(`Walked ${result.entriesVisited} entries`, { root, skipped: result.entriesSkipped });
  return result;
}

/**
 * Tag-File Scanner
 *
 * First build pass. Finds every sidecar tag file under the root, works out
 * which entries it is attached to and records tag membership:
 *
 *   ROOT_TAG --HAS_TAG--> tag
 *   target   --HAS_TAG--> tag
 *   tag      --TAG_ASSIGNED_TO--> target
 *
 * Any canonicalization, listing or read failure aborts the scan. A tag file
 * that matches no sibling entry is only a warning.
 */

import fs from 'fs';
import path from 'path';
import fg from 'fast-glob';
import type { NodeRegistry } from '../graph/node-registry.js';
import { ROOT_TAG, directoryNode, fileNode, tagNode } from '../types/graph.js';
import type { NodeHandle } from '../types/graph.js';
import { DEFAULT_CONVENTIONS } from '../types/config.js';
import type { TagFileConventions } from '../types/config.js';
import { ioError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { canonicalize, compareNames, getFileName, getStem, isTagFileName } from '../utils/path-utils.js';
import { readTagFile } from './tag-file-reader.js';

export interface TagScanOptions {
  conventions?: TagFileConventions;
  logger?: Logger;
}

export interface TagScanResult {
  /** Tag files processed, in processing order */
  tagFiles: string[];
  /** Tag files that matched no entry */
  warnings: string[];
}

/**
 * Find tag files under `root`, sorted by path.
 * Dotfiles are included; symbolic links are not followed, same as the walk.
 * A root that is not a directory has no tag files.
 */
export function findTagFiles(root: string, conventions: TagFileConventions = DEFAULT_CONVENTIONS): string[] {
  if (!isDirectory(root)) return [];

  const pattern = `**/*.${fg.escapePath(conventions.tagExtension)}`;

  let matches: string[];
  try {
    matches = fg.sync(pattern, {
      cwd: root,
      absolute: true,
      onlyFiles: true,
      dot: true,
      followSymbolicLinks: false,
    });
  } catch (error) {
    throw ioError(root, 'search for tag files in', error);
  }

  return matches
    .filter((file) => isTagFileName(getFileName(file), conventions.tagExtension))
    .map((file) => path.normalize(file))
    .sort(compareNames);
}

function isDirectory(canonicalPath: string): boolean {
  try {
    return fs.statSync(canonicalPath).isDirectory();
  } catch (error) {
    throw ioError(canonicalPath, 'stat', error);
  }
}

/**
 * Entries of `dirPath` a `<stem>.<ext>` tag file attaches to: every sibling
 * whose name or own stem equals the stem, tag files excluded.
 * Returned paths are canonical.
 */
export function matchTagTargets(
  dirPath: string,
  tagFileName: string,
  conventions: TagFileConventions = DEFAULT_CONVENTIONS
): Array<{ path: string; isDirectory: boolean }> {
  const stem = tagFileName.slice(0, -(conventions.tagExtension.length + 1));

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dirPath, { withFileTypes: true });
  } catch (error) {
    throw ioError(dirPath, 'list directory', error);
  }

  const targets: Array<{ path: string; isDirectory: boolean }> = [];
  for (const entry of entries.sort((a, b) => compareNames(a.name, b.name))) {
    if (isTagFileName(entry.name, conventions.tagExtension)) continue;
    if (entry.name !== stem && getStem(entry.name) !== stem) continue;

    const targetPath = canonicalize(path.join(dirPath, entry.name));
    if (isTagFileName(getFileName(targetPath), conventions.tagExtension)) continue;
    targets.push({ path: targetPath, isDirectory: isDirectory(targetPath) });
  }
  return targets;
}

export function scanTagFiles(
  root: string,
  registry: NodeRegistry,
  options: TagScanOptions = {}
): TagScanResult {
  const conventions = options.conventions ?? DEFAULT_CONVENTIONS;
  const logger = options.logger ?? createLogger('TagFileScanner');
  const rootTag = registry.getOrCreate(ROOT_TAG);
  const warnings: string[] = [];

  const tagFiles = findTagFiles(root, conventions);
  logger.debug(`Found ${tagFiles.length} tag files`, { root });

  for (const tagFile of tagFiles) {
    logger.debug('Visiting tag file', { tagFile });

    const dirPath = canonicalize(path.dirname(tagFile));
    const dir = registry.intern(directoryNode(dirPath));
    const name = getFileName(tagFile);

    const targets: NodeHandle[] = [];
    if (name === conventions.directoryTagFile) {
      targets.push(dir);
    } else {
      for (const target of matchTagTargets(dirPath, name, conventions)) {
        targets.push(registry.intern(target.isDirectory ? directoryNode(target.path) : fileNode(target.path)));
      }
      if (targets.length === 0) {
        const warning = `Tag file ${tagFile} has no associated files`;
        logger.warn(warning);
        warnings.push(warning);
      }
    }

    for (const tag of readTagFile(tagFile)) {
      const tagHandle = registry.intern(tagNode(tag));
      registry.link(rootTag, tagHandle, 'HAS_TAG');
      for (const target of targets) {
        registry.link(target, tagHandle, 'HAS_TAG');
        registry.link(tagHandle, target, 'TAG_ASSIGNED_TO');
      }
    }
  }

  return { tagFiles, warnings };
}

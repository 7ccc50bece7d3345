/**
 * Path utilities for tag files and canonical node paths
 *
 * Extension and stem follow path.extname() semantics: the extension is the
 * part after the last dot, and a leading dot does not start an extension.
 */

import fs from 'fs';
import path from 'path';
import { ioError } from './errors.js';

/**
 * Resolve a path to its absolute, symlink-free form.
 * This is the identity key of file and directory nodes.
 *
 * @throws IndexError (IO_FAILURE) when the path cannot be resolved
 */
export function canonicalize(p: string): string {
  try {
    return fs.realpathSync(path.resolve(p));
  } catch (error) {
    throw ioError(p, 'canonicalize', error);
  }
}

/**
 * Get the file name from a path
 *
 * @example
 * getFileName('/data/photos/img.png') // 'img.png'
 */
export function getFileName(p: string): string {
  return path.basename(p);
}

/**
 * Extension without the dot, or '' when there is none
 *
 * @example
 * getExtension('img.png')        // 'png'
 * getExtension('archive.tar.gz') // 'gz'
 * getExtension('.tags')          // ''
 * getExtension('img')            // ''
 */
export function getExtension(name: string): string {
  return path.extname(name).slice(1);
}

/**
 * Name without its last extension
 *
 * @example
 * getStem('img.png')        // 'img'
 * getStem('archive.tar.gz') // 'archive.tar'
 * getStem('img')            // 'img'
 * getStem('.tags')          // '.tags'
 */
export function getStem(name: string): string {
  const ext = path.extname(name);
  return ext ? name.slice(0, -ext.length) : name;
}

/**
 * Locale-independent ordering of names (UTF-16 code units)
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Whether a file or directory name carries the tag-file extension
 *
 * @example
 * isTagFileName('img.tags', 'tags')  // true
 * isTagFileName('dir.tags', 'tags')  // true
 * isTagFileName('.tags', 'tags')     // false
 * isTagFileName('tags.txt', 'tags')  // false
 */
export function isTagFileName(name: string, tagExtension: string): boolean {
  return getExtension(name) === tagExtension;
}

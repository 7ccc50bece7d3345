/**
 * Tag file parsing
 *
 * A tag file is UTF-8 text where each line is one tag, taken verbatim:
 * no trimming, no comments, no escaping, duplicates kept in file order.
 */

import fs from 'fs';
import { ioError } from '../utils/errors.js';

/**
 * Split tag file content into tags.
 * Lines end with \n or \r\n; a final terminator does not open another line.
 *
 * @example
 * splitTagLines('red\nblue\n')  // ['red', 'blue']
 * splitTagLines('a\r\n\r\nb')   // ['a', '', 'b']
 * splitTagLines('')             // []
 */
export function splitTagLines(content: string): string[] {
  if (content.length === 0) return [];

  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

/**
 * Read and parse a tag file.
 *
 * @throws IndexError (IO_FAILURE) when the file cannot be read or is not valid UTF-8
 */
export function readTagFile(filePath: string): string[] {
  let content: string;
  try {
    const bytes = fs.readFileSync(filePath);
    content = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch (error) {
    throw ioError(filePath, 'read tag file', error);
  }
  return splitTagLines(content);
}

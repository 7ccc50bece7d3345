import path from 'path';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { buildTagGraph } from '../../ingestion/graph-assembler.js';
import type { TagGraphBuild } from '../../ingestion/graph-assembler.js';
import { listTags, pathsForTag, tagsForPath } from '../tag-query.js';
import { IndexErrorCode } from '../../utils/errors.js';
import { captureError, makeTree, mockLogger, removeTree } from '../../__tests__/fixtures.js';

describe('Tag queries', () => {
  let root = '';
  let build: TagGraphBuild;

  beforeAll(() => {
    root = makeTree({
      'photos/dir.tags': 'album\n',
      'photos/2024/img.png': '',
      'photos/2024/img.tags': 'red\n',
      'photos/2024/other.png': '',
      'notes.txt': '',
      'notes.tags': 'red\n',
      'plain.txt': '',
    });
    build = buildTagGraph(root, { logger: mockLogger() });
  });

  afterAll(() => {
    removeTree(root);
  });

  describe('tagsForPath', () => {
    it('includes tags inherited from containing directories', () => {
      expect(tagsForPath(build, path.join(root, 'photos/2024/img.png'))).toEqual(['album', 'red']);
      expect(tagsForPath(build, path.join(root, 'photos/2024/other.png'))).toEqual(['album']);
    });

    it('returns only directly attached tags when inheritance is off', () => {
      expect(tagsForPath(build, path.join(root, 'photos/2024/img.png'), { inherited: false })).toEqual(['red']);
      expect(tagsForPath(build, path.join(root, 'photos/2024/other.png'), { inherited: false })).toEqual([]);
    });

    it('answers for directories and untagged files', () => {
      expect(tagsForPath(build, path.join(root, 'photos'))).toEqual(['album']);
      expect(tagsForPath(build, path.join(root, 'plain.txt'))).toEqual([]);
    });

    it('reports paths that are not nodes of the graph', () => {
      const tagFile = path.join(root, 'photos/dir.tags');

      expect(captureError(() => tagsForPath(build, tagFile))).toMatchObject({
        code: IndexErrorCode.NOT_FOUND,
        path: tagFile,
      });
      expect(captureError(() => tagsForPath(build, path.join(root, 'missing.txt')))).toMatchObject({
        code: IndexErrorCode.IO_FAILURE,
      });
    });
  });

  describe('pathsForTag', () => {
    it('returns the entries a tag is assigned to', () => {
      expect(pathsForTag(build, 'red')).toEqual([path.join(root, 'notes.txt'), path.join(root, 'photos/2024/img.png')]);
      expect(pathsForTag(build, 'album')).toEqual([path.join(root, 'photos')]);
    });

    it('expands tagged directories when recursive', () => {
      expect(pathsForTag(build, 'album', { recursive: true })).toEqual([
        path.join(root, 'photos'),
        path.join(root, 'photos/2024'),
        path.join(root, 'photos/2024/img.png'),
        path.join(root, 'photos/2024/other.png'),
      ]);
    });

    it('returns nothing for an unknown tag', () => {
      expect(pathsForTag(build, 'missing')).toEqual([]);
    });
  });

  describe('listTags', () => {
    it('lists every tag with its assignment count', () => {
      expect(listTags(build)).toEqual([
        { name: 'album', assignments: 1 },
        { name: 'red', assignments: 2 },
      ]);
    });
  });
});

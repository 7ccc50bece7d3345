import path from 'path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { formatBuildSummary, parseBuildOptions, runBuild } from '../commands/build.js';
import { parseQueryOptions, runQuery } from '../commands/query.js';
import { buildTagGraph } from '../../src/ingestion/graph-assembler.js';
import { IndexErrorCode } from '../../src/utils/errors.js';
import { setLogLevel } from '../../src/utils/logger.js';
import { makeTree, mockLogger, removeTree } from '../../src/__tests__/fixtures.js';

describe('parseBuildOptions', () => {
  it('reads flags and the root', () => {
    expect(parseBuildOptions(['./photos', '--json', '--config', 'tg.yaml', '--verbose'])).toEqual({
      root: './photos',
      json: true,
      configPath: 'tg.yaml',
      verbose: true,
    });
  });

  it('rejects unknown options and missing values', () => {
    expect(() => parseBuildOptions(['--fast'])).toThrow('Unknown option "--fast"');
    expect(() => parseBuildOptions(['./photos', '--config'])).toThrow('Option --config requires a value');
  });
});

describe('parseQueryOptions', () => {
  it('takes the root and subject from positionals', () => {
    expect(parseQueryOptions('tags', ['./photos', './photos/img.png', '--direct'])).toEqual({
      command: 'tags',
      root: './photos',
      subject: './photos/img.png',
      direct: true,
    });
  });

  it('stops option parsing after --', () => {
    expect(parseQueryOptions('tagged', ['--recursive', './photos', '--', '-odd-tag'])).toEqual({
      command: 'tagged',
      root: './photos',
      subject: '-odd-tag',
      recursive: true,
    });
  });
});

describe('CLI output', () => {
  let root = '';

  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel('warn');
    if (root) removeTree(root);
    root = '';
  });

  it('summarizes a build', () => {
    root = makeTree({ 'img.png': '', 'img.tags': 'red\n', 'orphan.tags': 'x\n' });
    const build = buildTagGraph(root, { logger: mockLogger() });

    expect(formatBuildSummary(build)).toEqual([
      `Root: ${root}`,
      'Nodes: 6 (files: 1, directories: 1, tags: 2)',
      'Edges: 8 (PARENT: 2, CHILD: 2, HAS_TAG: 3, TAG_ASSIGNED_TO: 1)',
      'Tag files: 2',
      'Warnings (1):',
      `  Tag file ${path.join(root, 'orphan.tags')} has no associated files`,
    ]);
  });

  it('prints the graph as JSON', async () => {
    root = makeTree({ 'a.txt': '' });
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await runBuild({ root, json: true });

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual({
      nodes: [
        { id: 0, type: 'root-tag', label: 'ROOT_TAG' },
        { id: 1, type: 'root-directory', label: 'ROOT_DIR' },
        { id: 2, type: 'directory', label: `${path.basename(root)}/`, path: root },
        { id: 3, type: 'file', label: 'a.txt', path: path.join(root, 'a.txt') },
      ],
      edges: [
        { source: 1, target: 2, relation: 'CHILD' },
        { source: 2, target: 1, relation: 'PARENT' },
        { source: 2, target: 3, relation: 'CHILD' },
        { source: 3, target: 2, relation: 'PARENT' },
      ],
    });
  });

  it('prints one line per query result', async () => {
    root = makeTree({ 'dir.tags': 'top\n', 'img.png': '', 'img.tags': 'red\nblue\n' });
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await runQuery({ command: 'tags', root, subject: path.join(root, 'img.png') });
    await runQuery({ command: 'list', root });

    expect(log.mock.calls.map((call) => call[0])).toEqual(['blue', 'red', 'top', 'blue\t1', 'red\t1', 'top\t1']);
  });

  it('requires the query subject', async () => {
    await expect(runQuery({ command: 'tagged', root: '.' })).rejects.toMatchObject({
      code: IndexErrorCode.INVALID_ARGUMENT,
      message: 'Missing <tag> argument',
    });
  });
});

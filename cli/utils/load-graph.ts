import { loadConfig } from '../../src/config/loader.js';
import { buildTagGraph } from '../../src/ingestion/graph-assembler.js';
import type { TagGraphBuild } from '../../src/ingestion/graph-assembler.js';
import { IndexError, IndexErrorCode } from '../../src/utils/errors.js';
import { setLogLevel } from '../../src/utils/logger.js';

export interface GraphSourceOptions {
  root?: string;
  configPath?: string;
  verbose?: boolean;
}

/** Load config for the root, apply its log level and build the graph */
export async function loadGraph(options: GraphSourceOptions): Promise<TagGraphBuild> {
  if (!options.root) {
    throw new IndexError(IndexErrorCode.INVALID_ARGUMENT, 'Missing <root> argument');
  }

  const config = await loadConfig({ root: options.root, configPath: options.configPath });
  setLogLevel(options.verbose ? 'debug' : config.logLevel);

  return buildTagGraph(options.root, {
    conventions: {
      tagExtension: config.tagExtension,
      directoryTagFile: config.directoryTagFile,
    },
  });
}

export function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('-')) {
    throw new IndexError(IndexErrorCode.INVALID_ARGUMENT, `Option ${flag} requires a value`);
  }
  return value;
}

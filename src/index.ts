/**
 * taggraph - index files, directories and sidecar tags as one graph
 */

export * from './types/graph.js';
export * from './types/config.js';

export { NodeRegistry, edgeKey } from './graph/node-registry.js';
export type { NodeAttributes, EdgeAttributes, TagMultiGraph } from './graph/node-registry.js';
export { TagGraph, formatNodeLabel } from './graph/tag-graph.js';
export type { HandleNode, SerializedTagGraph } from './graph/tag-graph.js';

export { buildTagGraph } from './ingestion/graph-assembler.js';
export type { BuildOptions, BuildStats, TagGraphBuild } from './ingestion/graph-assembler.js';
export { scanTagFiles, findTagFiles, matchTagTargets } from './ingestion/tag-file-scanner.js';
export type { TagScanOptions, TagScanResult } from './ingestion/tag-file-scanner.js';
export { walkFileStructure } from './ingestion/filesystem-walker.js';
export type { WalkOptions, WalkResult } from './ingestion/filesystem-walker.js';
export { readTagFile, splitTagLines } from './ingestion/tag-file-reader.js';

export { tagsForPath, pathsForTag, listTags } from './query/tag-query.js';
export type { TagsForPathOptions, PathsForTagOptions, TagSummary } from './query/tag-query.js';

export { loadConfig, validateConfig, deepMerge, CONFIG_FILENAME } from './config/loader.js';
export type { LoadConfigOptions } from './config/loader.js';

export { IndexError, IndexErrorCode, ioError, getErrorMessage } from './utils/errors.js';
export { createLogger, setLogLevel, getLogLevel, LOG_LEVELS } from './utils/logger.js';
export type { Logger, LogLevel, LogMeta } from './utils/logger.js';

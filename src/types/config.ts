/**
 * Configuration types
 */

import type { LogLevel } from '../utils/logger.js';

/** Naming of sidecar tag files */
export interface TagFileConventions {
  /** Tag file extension without the dot (default: tags) */
  tagExtension: string;
  /** Tag file whose tags go to its containing directory (default: dir.tags) */
  directoryTagFile: string;
}

export interface TagGraphConfig extends TagFileConventions {
  logLevel: LogLevel;
}

export const DEFAULT_CONVENTIONS: Readonly<TagFileConventions> = Object.freeze({
  tagExtension: 'tags',
  directoryTagFile: 'dir.tags',
});

export const DEFAULT_CONFIG: Readonly<TagGraphConfig> = Object.freeze({
  ...DEFAULT_CONVENTIONS,
  logLevel: 'warn',
});

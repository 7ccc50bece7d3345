/**
 * Configuration Loader
 *
 * Reads an optional YAML config and merges it over the built-in defaults.
 * Lookup order: explicit path, then `<root>/.taggraph.yaml`, then defaults
 * only. TAGGRAPH_LOG_LEVEL overrides the configured log level.
 */

import { promises as fs } from 'fs';
import path from 'path';
import YAML from 'yaml';
import { DEFAULT_CONFIG } from '../types/config.js';
import type { TagGraphConfig } from '../types/config.js';
import { IndexError, IndexErrorCode, getErrorCode, getErrorMessage, ioError } from '../utils/errors.js';
import { isLogLevel } from '../utils/logger.js';

export const CONFIG_FILENAME = '.taggraph.yaml';

export interface LoadConfigOptions {
  /** Root being indexed, searched for CONFIG_FILENAME */
  root?: string;
  /** Explicit config file; must exist */
  configPath?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

type ConfigObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with user values taking precedence.
 * Arrays and scalars replace; undefined user values are skipped.
 */
export function deepMerge(defaults: ConfigObject, userConfig: ConfigObject): ConfigObject {
  const result: ConfigObject = { ...defaults };

  for (const [key, userValue] of Object.entries(userConfig)) {
    if (userValue === undefined) continue;

    const defaultValue = defaults[key];
    if (isPlainObject(defaultValue) && isPlainObject(userValue)) {
      result[key] = deepMerge(defaultValue, userValue);
    } else {
      result[key] = userValue;
    }
  }

  return result;
}

async function readYamlFile(filePath: string, required: boolean): Promise<ConfigObject> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (!required && getErrorCode(error) === 'ENOENT') {
      return {};
    }
    throw ioError(filePath, 'read config file', error);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (error) {
    throw new IndexError(
      IndexErrorCode.INVALID_CONFIG,
      `Invalid YAML in ${filePath}: ${getErrorMessage(error)}`,
      filePath,
      error
    );
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new IndexError(IndexErrorCode.INVALID_CONFIG, `Config ${filePath} must be a mapping`, filePath);
  }
  return parsed;
}

function invalid(message: string, source?: string): IndexError {
  return new IndexError(IndexErrorCode.INVALID_CONFIG, source ? `${message} (${source})` : message, source);
}

/**
 * Check a merged config object and narrow it to TagGraphConfig
 */
export function validateConfig(merged: ConfigObject, source?: string): TagGraphConfig {
  const { tagExtension, directoryTagFile, logLevel } = merged;

  if (typeof tagExtension !== 'string' || !/^[A-Za-z0-9_-]+$/.test(tagExtension)) {
    throw invalid(`"tagExtension" must be a non-empty name of letters, digits, "_" or "-"`, source);
  }
  if (
    typeof directoryTagFile !== 'string' ||
    /[\\/]/.test(directoryTagFile) ||
    path.extname(directoryTagFile) !== `.${tagExtension}`
  ) {
    throw invalid(`"directoryTagFile" must be a file name ending in ".${tagExtension}"`, source);
  }
  if (!isLogLevel(logLevel)) {
    throw invalid(`"logLevel" must be one of debug, info, warn, error, silent`, source);
  }

  return { tagExtension, directoryTagFile, logLevel };
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<TagGraphConfig> {
  const env = options.env ?? process.env;

  let source: string | undefined;
  let userConfig: ConfigObject = {};
  if (options.configPath) {
    source = path.resolve(options.configPath);
    userConfig = await readYamlFile(source, true);
  } else if (options.root) {
    source = path.join(path.resolve(options.root), CONFIG_FILENAME);
    userConfig = await readYamlFile(source, false);
  }

  const merged = deepMerge({ ...DEFAULT_CONFIG }, userConfig);
  const envLevel = env.TAGGRAPH_LOG_LEVEL;
  if (envLevel !== undefined && envLevel !== '') {
    merged.logLevel = envLevel;
  }

  return validateConfig(merged, source);
}

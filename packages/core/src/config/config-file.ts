import fs from 'fs';
import path from 'path';
import { parse } from 'yaml';

import { getErrorMessage, isPlainObject } from '../utils/common';
import { ConfigurationError } from '../utils/errors';

const FILE_ENCODING_UTF8 = 'utf-8';

/** Locations searched, in order, when no config file is named explicitly. */
export const DEFAULT_CONFIG_CANDIDATES = ['config.yml', 'config.yaml', path.join('..', 'config.yml')] as const;

export interface LoadedConfigFile {
  /** Absolute path of the file that was read; undefined when defaults apply. */
  path?: string;
  data: Record<string, unknown>;
}

/**
 * Parses YAML text into a config document. An empty document yields an empty object.
 *
 * @throws {ConfigurationError} On invalid YAML or when the document root is not a mapping.
 */
export function parseConfigText(text: string, sourcePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parse(text);
  } catch (error: unknown) {
    throw new ConfigurationError(`Invalid YAML in config file ${sourcePath}: ${getErrorMessage(error)}`, { cause: error });
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file ${sourcePath} must contain a mapping at the top level`);
  }
  return parsed;
}

function findDefaultConfig(baseDir: string): string | undefined {
  return DEFAULT_CONFIG_CANDIDATES
    .map((candidate) => path.resolve(baseDir, candidate))
    .find((candidatePath) => fs.existsSync(candidatePath) && fs.statSync(candidatePath).isFile());
}

/**
 * Loads the YAML config file.
 *
 * An explicitly named file must exist. Without a name, the default locations are
 * searched and finding none yields an empty document.
 *
 * @param configPath - Optional path to the config file, relative to `baseDir`.
 * @param baseDir - Directory relative paths are resolved against.
 * @throws {ConfigurationError} If the named file is missing, is not a file, cannot be read or is not valid YAML.
 */
export async function loadConfigFile(configPath?: string, baseDir: string = process.cwd()): Promise<LoadedConfigFile> {
  let resolvedPath: string;
  if (configPath) {
    resolvedPath = path.resolve(baseDir, configPath);
    if (!fs.existsSync(resolvedPath)) {
      throw new ConfigurationError(`Config file not found: ${resolvedPath}`);
    }
    if (!fs.statSync(resolvedPath).isFile()) {
      throw new ConfigurationError(`Config path is not a file: ${resolvedPath}`);
    }
  } else {
    const found = findDefaultConfig(baseDir);
    if (!found) {
      return { data: {} };
    }
    resolvedPath = found;
  }

  let text: string;
  try {
    text = await fs.promises.readFile(resolvedPath, FILE_ENCODING_UTF8);
  } catch (error: unknown) {
    throw new ConfigurationError(`Failed to read config file ${resolvedPath}: ${getErrorMessage(error)}`, { cause: error });
  }

  return { path: resolvedPath, data: parseConfigText(text, resolvedPath) };
}

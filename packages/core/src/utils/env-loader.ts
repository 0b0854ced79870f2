import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

import { writeStderr } from './console';
import { ConfigurationError } from './errors';

const DEFAULT_ENV_FILENAME = '.env';
const WARN_DEFAULT_ENV_MISSING = 'No .env file found at';

/**
 * Loads environment variables from a .env file using the dotenv library.
 * Variables already present in the process environment are left untouched, so a
 * real environment variable still outranks the file.
 *
 * A missing default `.env` is tolerated (reported only in verbose mode); a missing
 * explicitly named file is a configuration error.
 *
 * @param envFilePath - Optional path to a custom .env file, relative to the invocation directory.
 * @param verbose - Whether to report a missing default file on stderr.
 * @returns The absolute path of the loaded file, or undefined when none was loaded.
 * @throws {ConfigurationError} If an explicitly named file is missing or dotenv fails to parse it.
 */
export function loadEnvironmentFile(envFilePath?: string, verbose?: boolean): string | undefined {
  const fileName = envFilePath || DEFAULT_ENV_FILENAME;
  const baseDir = process.env.INIT_CWD || process.cwd();
  const resolvedPath = path.resolve(baseDir, fileName);

  if (!fs.existsSync(resolvedPath)) {
    if (envFilePath) {
      throw new ConfigurationError(`Environment file not found: ${resolvedPath}`);
    }
    if (verbose === true) {
      writeStderr(`${WARN_DEFAULT_ENV_MISSING} ${resolvedPath}. Continuing without loading environment variables.\n`);
    }
    return undefined;
  }

  const result = dotenv.config({ path: resolvedPath });
  if (result.error) {
    throw new ConfigurationError(`Failed to load environment file ${resolvedPath}: ${result.error.message}`, { cause: result.error });
  }
  return resolvedPath;
}

#!/usr/bin/env node
import { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { EXIT_GENERAL_ERROR, getErrorCode, isPlainObject } from '@triad/core';

import { debateCommand } from './commands/debate';

export const PROGRAM_NAME = 'triad';

/**
 * Gets the package version from package.json.
 *
 * @returns The version string from package.json, or 'unknown' if not found.
 */
function getPackageVersion(): string {
  // Sources live in src/ and compiled files in dist/cli/src/; try both layouts.
  const packageJsonPath = [join(__dirname, '../package.json'), join(__dirname, '../../../package.json')]
    .find((candidate) => existsSync(candidate));
  if (!packageJsonPath) {
    return 'unknown';
  }
  const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  return isPlainObject(packageJson) && typeof packageJson.version === 'string' ? packageJson.version : 'unknown';
}

/**
 * Runs the CLI for the three-role debate.
 *
 * @param argv - The command-line arguments to parse (excluding 'node' and script name).
 * @throws Any error encountered during parsing or the debate run, carrying a numeric `code`.
 */
export async function runCli(argv: string[]): Promise<void> {
  const program = new Command();
  program
    .name(PROGRAM_NAME)
    .description('Scripted three-role debate (Pro, Con, Mediator) with a Markdown transcript')
    .version(getPackageVersion(), '-V, --version');

  debateCommand(program);

  await program.parseAsync(['node', PROGRAM_NAME, ...argv]);
}

// If called directly from node
if (require.main === module) {
  runCli(process.argv.slice(2)).catch((err: unknown) => {
    process.exit(getErrorCode(err) ?? EXIT_GENERAL_ERROR);
  });
}

export { DebateProgressUI } from './utils/progress-ui';
export { formatConfigSummary, printConfigSummary } from './utils/config-summary';

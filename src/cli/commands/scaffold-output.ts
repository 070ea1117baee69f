/**
 * Shared option handling and console output for the create subcommands.
 */
import * as path from 'node:path';
import chalk from 'chalk';
import { loadConfig } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { describeMiss } from '../../core/registry/patcher.js';
import type { PatchOutcome } from '../../core/registry/types.js';
import type { ScaffoldResult } from '../../core/scaffold/types.js';
import { logger as log } from '../../utils/logger.js';

export interface CommonOptions {
  cwd?: string;
  overwrite?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  json?: boolean;
}

/**
 * Resolve the project root and load its configuration.
 */
export async function prepare(options: CommonOptions): Promise<{ projectRoot: string; config: Config }> {
  if (options.verbose) {
    log.setLevel('debug');
  }
  const projectRoot = path.resolve(options.cwd ?? process.cwd());
  const config = await loadConfig(projectRoot);
  log.debug(`Project root: ${projectRoot}`);
  return { projectRoot, config };
}

/**
 * Print the files of a scaffold run and, when present, its registry outcome.
 * Returns false when any file could not be written.
 */
export function printScaffoldResult(kind: string, result: ScaffoldResult, options: CommonOptions): boolean {
  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return result.success;
  }

  console.log();
  if (options.dryRun) {
    console.log(chalk.bold(`Dry Run - ${kind} "${result.name}" would create:`));
  } else {
    console.log(chalk.bold(`${kind} "${result.name}"`));
  }
  console.log();

  for (const file of result.files) {
    if (file.success) {
      console.log(`  ${chalk.green('+')} ${file.path} ${chalk.dim(`(${file.role})`)}`);
    } else {
      console.log(`  ${chalk.red('✗')} ${file.path} ${chalk.dim(`- ${file.error ?? 'failed'}`)}`);
    }
  }

  if (result.registry) {
    console.log();
    printRegistryOutcome(result.registry);
  }

  console.log();
  if (result.success) {
    log.success(options.dryRun ? `${kind} "${result.name}" can be created` : `${kind} "${result.name}" created`);
  } else {
    log.fail(result.error ?? `${kind} "${result.name}" was not fully created`);
  }

  return result.success;
}

export function printRegistryOutcome(outcome: PatchOutcome): void {
  const registry = chalk.cyan(outcome.registryPath);
  switch (outcome.detail) {
    case 'full':
      console.log(
        outcome.applied
          ? `  ${chalk.green('✓')} Route registered in ${registry} ${chalk.dim(`(${outcome.inserted.join(', ')})`)}`
          : `  ${chalk.green('✓')} Route already registered in ${registry}`
      );
      return;
    case 'skipped-no-registry':
      console.log(`  ${chalk.yellow('!')} No route registry at ${registry}; route not registered`);
      return;
    default: {
      const reason = outcome.missingAnchor ? describeMiss(outcome.missingAnchor) : outcome.detail;
      const added = outcome.inserted.length > 0 ? ` (added: ${outcome.inserted.join(', ')})` : '';
      console.log(`  ${chalk.yellow('!')} Route ${outcome.detail} in ${registry}: ${reason}${added}`);
    }
  }
}

/**
 * Log an error raised by a command action and exit.
 */
export function exitWithError(error: unknown): never {
  log.error(error instanceof Error ? error.message : 'Unknown error');
  process.exit(1);
}

/**
 * CLI command for project creation.
 * Runs `flutter create`, adds the package set to pubspec.yaml and writes the
 * boilerplate, including the route registry.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { ProjectEngine } from '../../../core/scaffold/project-engine.js';
import { logger as log } from '../../../utils/logger.js';
import { exitWithError, prepare, type CommonOptions } from '../scaffold-output.js';

interface ProjectOptions extends CommonOptions {
  org?: string;
  skipFlutter?: boolean;
}

/**
 * Create the `create project` command.
 */
export function createProjectCommand(): Command {
  return new Command('project')
    .description('Create a complete Flutter project with pre-configured packages')
    .argument('<name>', 'Name of the Flutter project')
    .option('-o, --org <org>', 'Organization/package name (e.g., com.example)')
    .option('-C, --cwd <dir>', 'Directory to create the project in (defaults to the current directory)')
    .option('--skip-flutter', 'Do not run flutter create; only write the boilerplate')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Show debug output')
    .action(async (name: string, options: ProjectOptions) => {
      try {
        await runProject(name, options);
      } catch (error) {
        exitWithError(error);
      }
    });
}

async function runProject(name: string, options: ProjectOptions): Promise<void> {
  const { projectRoot: parentDir, config } = await prepare(options);
  const engine = new ProjectEngine(parentDir, config);

  const result = await engine.createProject(name, {
    org: options.org,
    skipFlutter: options.skipFlutter,
  });

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  const relativeDir = path.relative(parentDir, result.projectDir) || '.';

  console.log();
  log.success(`Flutter project "${name}" created in ${relativeDir}`);
  if (result.dependenciesAdded) {
    log.success('Dependencies added to pubspec.yaml');
  }
  log.success(`${result.directories.length} directories and ${result.files.length} files generated`);

  console.log();
  console.log(chalk.dim('Next steps:'));
  console.log(`  1. ${chalk.cyan(`cd ${relativeDir}`)}`);
  console.log(`  2. ${chalk.cyan('flutter pub get')}`);
  console.log(`  3. ${chalk.cyan('flutter run')}`);
}

/**
 * CLI command for feature module scaffolding.
 * Generates the data, domain and presentation layers and registers the
 * feature page in the route registry.
 */
import { Command } from 'commander';
import { FeatureEngine } from '../../../core/scaffold/feature-engine.js';
import { exitWithError, prepare, printScaffoldResult, type CommonOptions } from '../scaffold-output.js';

/**
 * Create the `create feature` command.
 */
export function createFeatureCommand(): Command {
  return new Command('feature')
    .description('Create a feature module with clean architecture')
    .argument('<name>', 'Name of the feature (e.g., product_catalog)')
    .option('-C, --cwd <dir>', 'Project root (defaults to the current directory)')
    .option('--overwrite', 'Overwrite existing files')
    .option('--dry-run', 'Show what would be generated without writing')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Show debug output')
    .action(async (name: string, options: CommonOptions) => {
      try {
        await runFeature(name, options);
      } catch (error) {
        exitWithError(error);
      }
    });
}

async function runFeature(name: string, options: CommonOptions): Promise<void> {
  const { projectRoot, config } = await prepare(options);
  const engine = new FeatureEngine(projectRoot, config);

  const result = await engine.scaffoldFeature(name, {
    overwrite: options.overwrite,
    dryRun: options.dryRun,
  });

  if (!printScaffoldResult('Feature', result, options)) {
    process.exit(1);
  }
}

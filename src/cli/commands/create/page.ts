/**
 * CLI command for page scaffolding.
 */
import { Command } from 'commander';
import { ScaffoldEngine } from '../../../core/scaffold/engine.js';
import { exitWithError, prepare, printScaffoldResult, type CommonOptions } from '../scaffold-output.js';

interface PageOptions extends CommonOptions {
  route?: boolean;
}

/**
 * Create the `create page` command.
 */
export function createPageCommand(): Command {
  return new Command('page')
    .description('Create a Flutter screen with Riverpod integration')
    .argument('<name>', 'Name of the page (e.g., settings)')
    .option('-C, --cwd <dir>', 'Project root (defaults to the current directory)')
    .option('--route', 'Also register the page in the route registry')
    .option('--overwrite', 'Overwrite existing files')
    .option('--dry-run', 'Show what would be generated without writing')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Show debug output')
    .action(async (name: string, options: PageOptions) => {
      try {
        await runPage(name, options);
      } catch (error) {
        exitWithError(error);
      }
    });
}

async function runPage(name: string, options: PageOptions): Promise<void> {
  const { projectRoot, config } = await prepare(options);
  const engine = new ScaffoldEngine(projectRoot, config);

  const result = await engine.createPage(name, {
    overwrite: options.overwrite,
    dryRun: options.dryRun,
    route: options.route,
  });

  if (!printScaffoldResult('Page', result, options)) {
    process.exit(1);
  }
}

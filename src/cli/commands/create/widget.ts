import { Command } from 'commander';
import { ScaffoldEngine } from '../../../core/scaffold/engine.js';
import { exitWithError, prepare, printScaffoldResult, type CommonOptions } from '../scaffold-output.js';

/**
 * Create the `create widget` command.
 */
export function createWidgetCommand(): Command {
  return new Command('widget')
    .description('Create a ConsumerWidget with Riverpod integration')
    .argument('<name>', 'Name of the widget (e.g., user_avatar)')
    .option('-C, --cwd <dir>', 'Project root (defaults to the current directory)')
    .option('--overwrite', 'Overwrite existing files')
    .option('--dry-run', 'Show what would be generated without writing')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Show debug output')
    .action(async (name: string, options: CommonOptions) => {
      try {
        const { projectRoot, config } = await prepare(options);
        const result = await new ScaffoldEngine(projectRoot, config).createWidget(name, {
          overwrite: options.overwrite,
          dryRun: options.dryRun,
        });
        if (!printScaffoldResult('Widget', result, options)) {
          process.exit(1);
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}

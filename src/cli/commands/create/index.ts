/**
 * The `create` command group.
 */
import { Command } from 'commander';
import { createProjectCommand } from './project.js';
import { createFeatureCommand } from './feature.js';
import { createWidgetCommand } from './widget.js';
import { createPageCommand } from './page.js';
import { createProviderCommand } from './provider.js';

export function createCreateCommand(): Command {
  const cmd = new Command('create').description(
    'Create Flutter projects, features, widgets, pages, and providers'
  );

  [createProjectCommand, createFeatureCommand, createWidgetCommand, createPageCommand, createProviderCommand].forEach(
    (sub) => cmd.addCommand(sub())
  );

  return cmd;
}

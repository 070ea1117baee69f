/**
 * Single-file generators (widget, page, provider) and the shared plumbing
 * used by the feature and project generators: writing files, creating
 * directories and registering routes.
 */
import * as path from 'node:path';
import { getDefaultConfig } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import { validateName, type NameForms } from '../naming/names.js';
import { patchRegistry, describeRoute } from '../registry/patcher.js';
import type { PatchOutcome } from '../registry/types.js';
import { pageTemplate, providerTemplate, widgetTemplate } from '../templates/shared-templates.js';
import { ensureDir, fileExists, writeFile } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import type {
  FileResult,
  GeneratedFile,
  PageScaffoldOptions,
  ScaffoldOptions,
  ScaffoldResult,
} from './types.js';

export class ScaffoldEngine {
  protected readonly projectRoot: string;
  protected readonly config: Config;

  constructor(projectRoot: string, config: Config = getDefaultConfig()) {
    this.projectRoot = projectRoot;
    this.config = config;
  }

  /**
   * Generate a ConsumerWidget under the shared widgets directory.
   */
  async createWidget(name: string, options: ScaffoldOptions = {}): Promise<ScaffoldResult> {
    const names = validateName(name);
    const file: GeneratedFile = {
      role: 'widget',
      path: path.posix.join(this.config.layout.shared_widgets_dir, `${names.snake}_widget.dart`),
      content: widgetTemplate(names),
    };
    return this.finish(name, await this.writeFiles([file], options));
  }

  /**
   * Generate a screen under the shared widgets directory, optionally
   * registering it as a route.
   */
  async createPage(name: string, options: PageScaffoldOptions = {}): Promise<ScaffoldResult> {
    const names = validateName(name);
    const file: GeneratedFile = {
      role: 'page',
      path: path.posix.join(this.config.layout.shared_widgets_dir, `${names.snake}_page.dart`),
      content: pageTemplate(names),
    };
    const files = await this.writeFiles([file], options);

    const registry = options.route
      ? await this.registerRoute(names, `${names.pascal}Page`, file.path, options)
      : undefined;

    return this.finish(name, files, [], registry);
  }

  /**
   * Generate a StateProvider and helper class under the shared providers directory.
   */
  async createProvider(name: string, options: ScaffoldOptions = {}): Promise<ScaffoldResult> {
    const names = validateName(name);
    const file: GeneratedFile = {
      role: 'provider',
      path: path.posix.join(this.config.layout.shared_providers_dir, `${names.snake}_provider.dart`),
      content: providerTemplate(names),
    };
    return this.finish(name, await this.writeFiles([file], options));
  }

  /**
   * Write generated files. Existing files are kept unless `overwrite` is set.
   */
  async writeFiles(files: GeneratedFile[], options: ScaffoldOptions = {}): Promise<FileResult[]> {
    const results: FileResult[] = [];

    for (const file of files) {
      const fullPath = this.resolve(file.path);
      const exists = await fileExists(fullPath);

      if (exists && !options.overwrite) {
        results.push({ role: file.role, path: file.path, success: false, error: 'File already exists' });
        continue;
      }

      if (!options.dryRun) {
        await writeFile(fullPath, file.content);
        log.debug(`Wrote ${file.path}`);
      }
      results.push({ role: file.role, path: file.path, success: true });
    }

    return results;
  }

  /**
   * Create project-relative directories.
   */
  async createDirectories(directories: readonly string[], options: ScaffoldOptions = {}): Promise<string[]> {
    if (!options.dryRun) {
      for (const dir of directories) {
        await ensureDir(this.resolve(dir));
      }
    }
    return [...directories];
  }

  /**
   * Register `widgetTypeName`, defined in the project-relative `widgetPath`,
   * in the route registry.
   */
  async registerRoute(
    names: NameForms,
    widgetTypeName: string,
    widgetPath: string,
    options: ScaffoldOptions = {}
  ): Promise<PatchOutcome> {
    const registry = this.config.registry;
    const importPath = path.posix.relative(path.posix.dirname(registry.path), widgetPath);

    return patchRegistry(
      this.resolve(registry.path),
      { ...describeRoute(names, widgetTypeName), importPath },
      {
        container: registry.container,
        listOpen: registry.list_open,
        mode: registry.apply,
        dryRun: options.dryRun,
      }
    );
  }

  protected resolve(relativePath: string): string {
    return path.resolve(this.projectRoot, relativePath);
  }

  protected finish(
    name: string,
    files: FileResult[],
    directories: string[] = [],
    registry?: PatchOutcome
  ): ScaffoldResult {
    const success = files.every((f) => f.success);
    return {
      name,
      success,
      files,
      directories,
      ...(registry !== undefined && { registry }),
      ...(!success && { error: 'One or more files already exist (use --overwrite to replace them)' }),
    };
  }
}

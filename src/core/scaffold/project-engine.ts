/**
 * Creates a Flutter project and writes the routesmith boilerplate into it,
 * including the route registry later patched by feature generation.
 */
import * as path from 'node:path';
import { getDefaultConfig } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import { validateName } from '../naming/names.js';
import {
  AUTH_INTERCEPTOR_TEMPLATE,
  DIO_CLIENT_TEMPLATE,
  FAILURES_TEMPLATE,
  LOGGING_INTERCEPTOR_TEMPLATE,
  PROJECT_DIRECTORIES,
  PUBSPEC_DEPENDENCIES,
  TOKEN_MANAGER_TEMPLATE,
  appRouterTemplate,
  examplePageTemplate,
  mainTemplate,
} from '../templates/project-templates.js';
import { GenerationError, ValidationError, ErrorCodes } from '../../utils/errors.js';
import { fileExists, readFile, writeFile } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import { runCommand } from '../../utils/process.js';
import { ScaffoldEngine } from './engine.js';
import type { GeneratedFile, ScaffoldResult } from './types.js';

/** Reverse-domain identifier accepted by `flutter create --org`. */
const ORG_PATTERN = /^[A-Za-z][A-Za-z0-9_]*(\.[A-Za-z][A-Za-z0-9_]*)+$/;

const DEPENDENCIES_LINE = /^dependencies:[ \t]*\r?\n/m;

export interface ProjectScaffoldOptions {
  /** Organization in reverse-domain form, e.g. "com.example" */
  org?: string;
  /** Skip `flutter create` and only write the boilerplate */
  skipFlutter?: boolean;
}

export interface ProjectScaffoldResult extends ScaffoldResult {
  /** Absolute path of the project directory */
  projectDir: string;
  /** Whether dependencies were added to pubspec.yaml */
  dependenciesAdded: boolean;
}

export class ProjectEngine {
  private readonly parentDir: string;
  private readonly config: Config;

  constructor(parentDir: string, config: Config = getDefaultConfig()) {
    this.parentDir = parentDir;
    this.config = config;
  }

  /**
   * Create the project `name` inside the parent directory.
   *
   * @throws ValidationError for an invalid name or a missing/invalid org
   * @throws GenerationError when `flutter create` fails
   */
  async createProject(name: string, options: ProjectScaffoldOptions = {}): Promise<ProjectScaffoldResult> {
    const names = validateName(name);
    const org = options.org ?? this.config.project.org;
    if (!org) {
      throw new ValidationError(ErrorCodes.MISSING_ORG, 'Organization is required (e.g. --org com.example)');
    }
    if (!ORG_PATTERN.test(org)) {
      throw new ValidationError(ErrorCodes.INVALID_ORG, `Invalid organization "${org}" (expected e.g. com.example)`, {
        org,
      });
    }

    const projectDir = path.resolve(this.parentDir, names.snake);

    if (!options.skipFlutter) {
      await this.runFlutterCreate(names.snake, org);
    }

    const dependenciesAdded = await this.addDependencies(projectDir);

    const engine = new ScaffoldEngine(projectDir, this.config);
    const libDir = this.config.layout.lib_dir;
    const directories = await engine.createDirectories(PROJECT_DIRECTORIES.map((dir) => path.posix.join(libDir, dir)));
    const files = await engine.writeFiles(this.renderFiles(), { overwrite: true });

    return {
      name,
      success: files.every((f) => f.success),
      files,
      directories,
      projectDir,
      dependenciesAdded,
    };
  }

  /**
   * Render the boilerplate files, paths relative to the project directory.
   */
  renderFiles(): GeneratedFile[] {
    const lib = this.config.layout.lib_dir;
    const registryPath = this.config.registry.path;
    const loginPage = path.posix.join(lib, 'features/auth/presentation/pages/login_page.dart');
    const homePage = path.posix.join(lib, 'features/home/presentation/pages/home_page.dart');
    const mainPath = path.posix.join(lib, 'main.dart');
    const fromRegistry = (target: string) => path.posix.relative(path.posix.dirname(registryPath), target);

    return [
      { role: 'http-client', path: path.posix.join(lib, 'core/network/dio_client.dart'), content: DIO_CLIENT_TEMPLATE },
      {
        role: 'auth-interceptor',
        path: path.posix.join(lib, 'core/network/interceptors/auth_interceptor.dart'),
        content: AUTH_INTERCEPTOR_TEMPLATE,
      },
      {
        role: 'logging-interceptor',
        path: path.posix.join(lib, 'core/network/interceptors/logging_interceptor.dart'),
        content: LOGGING_INTERCEPTOR_TEMPLATE,
      },
      {
        role: 'token-manager',
        path: path.posix.join(lib, 'core/storage/token_manager.dart'),
        content: TOKEN_MANAGER_TEMPLATE,
      },
      { role: 'failures', path: path.posix.join(lib, 'core/error/failures.dart'), content: FAILURES_TEMPLATE },
      { role: 'registry', path: registryPath, content: appRouterTemplate(fromRegistry(loginPage), fromRegistry(homePage)) },
      {
        role: 'main',
        path: mainPath,
        content: mainTemplate(path.posix.relative(path.posix.dirname(mainPath), registryPath)),
      },
      { role: 'login-page', path: loginPage, content: examplePageTemplate('LoginPage', 'Login') },
      { role: 'home-page', path: homePage, content: examplePageTemplate('HomePage', 'Home') },
    ];
  }

  private async runFlutterCreate(projectName: string, org: string): Promise<void> {
    const flutter = this.config.project.flutter_bin;
    log.info(`Running ${flutter} create ${projectName} --org ${org}`);

    const result = await runCommand(flutter, ['create', projectName, '--org', org], this.parentDir);
    if (result.exitCode !== 0) {
      throw new GenerationError(
        ErrorCodes.EXTERNAL_TOOL_FAILED,
        `Failed to create Flutter project: ${result.stderr.trim() || `exit code ${result.exitCode}`}`,
        { exitCode: result.exitCode }
      );
    }
  }

  /**
   * Insert the dependency block under `dependencies:` in pubspec.yaml.
   * Returns false when there is no pubspec, no dependencies section, or the
   * block is already present.
   */
  private async addDependencies(projectDir: string): Promise<boolean> {
    const pubspecPath = path.join(projectDir, 'pubspec.yaml');
    if (!(await fileExists(pubspecPath))) {
      log.warn('pubspec.yaml not found. Skipping dependency setup.');
      return false;
    }

    const pubspec = await readFile(pubspecPath);
    if (pubspec.includes('flutter_riverpod:')) {
      log.debug('pubspec.yaml already lists flutter_riverpod');
      return false;
    }

    const match = DEPENDENCIES_LINE.exec(pubspec);
    if (!match) {
      log.warn('No dependencies section in pubspec.yaml. Skipping dependency setup.');
      return false;
    }

    const insertAt = match.index + match[0].length;
    await writeFile(pubspecPath, pubspec.slice(0, insertAt) + PUBSPEC_DEPENDENCIES + pubspec.slice(insertAt));
    return true;
  }
}

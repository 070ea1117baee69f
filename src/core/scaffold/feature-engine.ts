/**
 * Feature engine for multi-file scaffolding.
 * Generates the data, domain and presentation layers of a feature module
 * and registers its page in the route registry.
 */
import * as path from 'node:path';
import { validateName, type NameForms } from '../naming/names.js';
import {
  entityTemplate,
  featurePageTemplate,
  featureProviderTemplate,
  modelTemplate,
  repositoryImplTemplate,
  repositoryTemplate,
  useCaseTemplate,
} from '../templates/feature-templates.js';
import { ScaffoldEngine } from './engine.js';
import type { GeneratedFile, ScaffoldOptions, ScaffoldResult } from './types.js';

/** Layer directories created inside every feature. */
export const FEATURE_DIRECTORIES = [
  'data/models',
  'data/repositories',
  'data/datasources',
  'domain/entities',
  'domain/usecases',
  'domain/repositories',
  'presentation/pages',
  'presentation/providers',
  'presentation/widgets',
] as const;

/**
 * One file of a feature: role, path inside the feature directory, body.
 */
interface FeatureComponent {
  role: string;
  path: (n: NameForms) => string;
  render: (n: NameForms) => string;
}

const COMPONENTS: FeatureComponent[] = [
  { role: 'entity', path: (n) => `domain/entities/${n.snake}_entity.dart`, render: entityTemplate },
  { role: 'model', path: (n) => `data/models/${n.snake}_model.dart`, render: modelTemplate },
  { role: 'repository', path: (n) => `domain/repositories/${n.snake}_repository.dart`, render: repositoryTemplate },
  {
    role: 'repository-impl',
    path: (n) => `data/repositories/${n.snake}_repository_impl.dart`,
    render: repositoryImplTemplate,
  },
  { role: 'usecase', path: (n) => `domain/usecases/get_${n.snake}s_usecase.dart`, render: useCaseTemplate },
  { role: 'provider', path: (n) => `presentation/providers/${n.snake}_provider.dart`, render: featureProviderTemplate },
  { role: 'page', path: (n) => `presentation/pages/${n.snake}_page.dart`, render: featurePageTemplate },
];

export class FeatureEngine extends ScaffoldEngine {
  /**
   * Scaffold all layers of a feature and register its page route.
   */
  async scaffoldFeature(name: string, options: ScaffoldOptions = {}): Promise<ScaffoldResult> {
    const names = validateName(name);
    const featureDir = this.featureDir(names);

    const directories = await this.createDirectories(
      FEATURE_DIRECTORIES.map((dir) => path.posix.join(featureDir, dir)),
      options
    );
    const files = await this.writeFiles(this.renderFiles(names), options);

    const pagePath = path.posix.join(featureDir, `presentation/pages/${names.snake}_page.dart`);
    const registry = await this.registerRoute(names, `${names.pascal}Page`, pagePath, options);

    return this.finish(name, files, directories, registry);
  }

  /**
   * Render every file of the feature without writing anything.
   */
  renderFiles(names: NameForms): GeneratedFile[] {
    const featureDir = this.featureDir(names);
    return COMPONENTS.map((component) => ({
      role: component.role,
      path: path.posix.join(featureDir, component.path(names)),
      content: component.render(names),
    }));
  }

  private featureDir(names: NameForms): string {
    return path.posix.join(this.config.layout.features_dir, names.snake);
  }
}

/**
 * Scaffold engine exports barrel file.
 */
export { ScaffoldEngine } from './engine.js';
export { FeatureEngine, FEATURE_DIRECTORIES } from './feature-engine.js';
export { ProjectEngine } from './project-engine.js';
export type { ProjectScaffoldOptions, ProjectScaffoldResult } from './project-engine.js';
export type {
  GeneratedFile,
  ScaffoldOptions,
  PageScaffoldOptions,
  FileResult,
  ScaffoldResult,
} from './types.js';

export * from './feature-templates.js';
export * from './shared-templates.js';
export * from './project-templates.js';

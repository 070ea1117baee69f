/**
 * routesmith - Flutter scaffolding with incremental route registration.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Name derivation
export * from './core/naming/index.js';

// Route registry patching
export * from './core/registry/index.js';

// Generators
export * from './core/scaffold/index.js';

// Dart file templates
export * from './core/templates/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';

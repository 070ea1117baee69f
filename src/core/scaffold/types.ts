/**
 * Scaffold type definitions.
 */
import type { PatchOutcome } from '../registry/types.js';

/**
 * A file body ready to be written, addressed relative to the project root.
 */
export interface GeneratedFile {
  /** Role within the generated unit (e.g. "entity", "page") */
  role: string;
  /** Project-relative path with forward slashes */
  path: string;
  content: string;
}

/**
 * Options shared by every generator.
 */
export interface ScaffoldOptions {
  /** Replace files that already exist */
  overwrite?: boolean;
  /** Report what would be written without touching the disk */
  dryRun?: boolean;
}

export interface PageScaffoldOptions extends ScaffoldOptions {
  /** Also register the page in the route registry */
  route?: boolean;
}

/**
 * Result for a single generated file.
 */
export interface FileResult {
  role: string;
  path: string;
  success: boolean;
  /** Set when the file already existed and was left alone */
  error?: string;
}

/**
 * Result of one generator run.
 */
export interface ScaffoldResult {
  /** Name as given by the user */
  name: string;
  /** True when every file was written (or would be, in a dry run) */
  success: boolean;
  files: FileResult[];
  /** Directories created, project-relative */
  directories: string[];
  /** Registry outcome, when the generator registers a route */
  registry?: PatchOutcome;
  error?: string;
}

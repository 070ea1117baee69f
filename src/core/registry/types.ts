/**
 * Route registry type definitions.
 */
import type { ApplyMode } from '../config/schema.js';

/**
 * Everything needed to register one route. Derived from a name, never persisted.
 */
export interface RouteDescriptor {
  /** Identifier used as the constant stem, e.g. "userProfile" */
  symbolicName: string;
  /** Route path with a leading slash, e.g. "/user_profile" */
  displayPath: string;
  /** go_router route name, e.g. "user_profile" */
  routeName: string;
  /** Widget class built by the route, e.g. "UserProfilePage" */
  widgetTypeName: string;
}

/**
 * A descriptor plus the import that brings its widget into the registry.
 */
export interface RegistryRequest extends RouteDescriptor {
  /** Import URI as written in the registry, e.g. "../../features/x/x_page.dart" */
  importPath: string;
}

/** The three independent parts of one registration. */
export type RegistryPart = 'import' | 'constants' | 'route';

/** Why an anchor could not be located. */
export type AnchorMiss =
  | 'no-imports'
  | 'no-container'
  | 'container-empty'
  | 'no-list'
  | 'list-unterminated';

export type ImportAnchor =
  | { found: true; offset: number }
  | { found: false; reason: AnchorMiss };

export type ConstantAnchor =
  | {
      found: true;
      /** Offset of the container signature */
      containerOffset: number;
      /** End of the last constant-pair line */
      offset: number;
      /** Leading whitespace of the last constant-pair line */
      indent: string;
    }
  | { found: false; reason: AnchorMiss };

export type ListAnchor =
  | {
      found: true;
      /** Offset of the list-opening token */
      openOffset: number;
      /** Offset of the bracket that closes the list */
      closeOffset: number;
      /** Leading whitespace of the line holding the opening token */
      indent: string;
    }
  | { found: false; reason: AnchorMiss };

export interface AnchorScan {
  imports: ImportAnchor;
  constants: ConstantAnchor;
  list: ListAnchor;
}

export interface ScanOptions {
  /** Literal opening the constant container */
  container: string;
  /** Literal opening the route list; must contain "[" */
  listOpen: string;
}

/**
 * Text to splice into the document at an offset of the unmodified text.
 */
export interface Insertion {
  part: RegistryPart;
  offset: number;
  text: string;
}

export type MergeResult =
  | { kind: 'insert'; insertions: Insertion[] }
  | { kind: 'noop'; part: RegistryPart }
  | { kind: 'missing-anchor'; part: RegistryPart; reason: AnchorMiss };

export type PatchDetail =
  | 'full'
  | 'partial-import-only'
  | 'partial-import-and-constants'
  | 'skipped-no-registry'
  | 'skipped-no-anchor';

export interface MissingAnchor {
  part: RegistryPart;
  reason: AnchorMiss;
}

/**
 * Result of patching registry text, without any I/O.
 */
export interface TextPatchResult {
  detail: PatchDetail;
  /** Parts inserted by this patch, in document order */
  inserted: RegistryPart[];
  missingAnchor?: MissingAnchor;
  /** Resulting text; identical to the input when nothing was inserted */
  content: string;
}

/**
 * Outcome reported to generators.
 */
export interface PatchOutcome extends TextPatchResult {
  /** True when at least one insertion was made */
  applied: boolean;
  registryPath: string;
}

export interface PatchOptions extends Partial<ScanOptions> {
  mode?: ApplyMode;
  /** Compute the outcome without writing */
  dryRun?: boolean;
}

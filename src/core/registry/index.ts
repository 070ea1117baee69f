/**
 * Route registry patch engine exports barrel file.
 */
export {
  scanAnchors,
  findImportAnchor,
  findConstantAnchor,
  findListAnchor,
  findMatchingClose,
  findLineComment,
  DEFAULT_SCAN_OPTIONS,
} from './anchor-scanner.js';
export {
  mergeImport,
  mergeConstants,
  mergeRouteEntry,
  applyInsertions,
  renderImportLine,
  renderConstantPair,
  renderRouteEntry,
} from './declaration-merger.js';
export { patchRegistry, patchRegistryText, describeRoute, describeMiss } from './patcher.js';
export type {
  RouteDescriptor,
  RegistryRequest,
  RegistryPart,
  AnchorMiss,
  AnchorScan,
  ImportAnchor,
  ConstantAnchor,
  ListAnchor,
  ScanOptions,
  Insertion,
  MergeResult,
  PatchDetail,
  MissingAnchor,
  TextPatchResult,
  PatchOutcome,
  PatchOptions,
} from './types.js';

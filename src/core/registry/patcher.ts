/**
 * Registers routes in the route registry file.
 *
 * One call is one read-modify-write cycle: load, scan, plan the import,
 * constant and route insertions against the same text, write once.
 * Missing anchors are soft failures reported in the outcome; only read and
 * write errors throw.
 */
import type { NameForms } from '../naming/names.js';
import { scanAnchors, DEFAULT_SCAN_OPTIONS } from './anchor-scanner.js';
import { applyInsertions, mergeConstants, mergeImport, mergeRouteEntry } from './declaration-merger.js';
import type {
  Insertion,
  MergeResult,
  MissingAnchor,
  PatchDetail,
  PatchOptions,
  PatchOutcome,
  RegistryRequest,
  RouteDescriptor,
  TextPatchResult,
} from './types.js';
import { fileExists, readFile, writeFile } from '../../utils/file-system.js';
import { RegistryIOError, ErrorCodes } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

/** Outcome when the first missing anchor belongs to the given part. */
const PARTIAL_DETAIL: Record<MissingAnchor['part'], PatchDetail> = {
  import: 'skipped-no-anchor',
  constants: 'partial-import-only',
  route: 'partial-import-and-constants',
};

/**
 * Build the descriptor for a widget named after `names`.
 */
export function describeRoute(names: NameForms, widgetTypeName: string): RouteDescriptor {
  return {
    symbolicName: names.identifier,
    displayPath: names.path,
    routeName: names.routeName,
    widgetTypeName,
  };
}

/**
 * Patch registry text in memory.
 *
 * In `atomic` mode (the default) any missing anchor leaves the text untouched.
 * In `incremental` mode parts are merged in order (import, constants, route)
 * until the first missing anchor, keeping what came before it.
 */
export function patchRegistryText(
  text: string,
  request: RegistryRequest,
  options: PatchOptions = {}
): TextPatchResult {
  const container = options.container ?? DEFAULT_SCAN_OPTIONS.container;
  const scan = scanAnchors(text, { container, listOpen: options.listOpen });

  const plans: MergeResult[] = [
    mergeImport(text, scan.imports, request),
    mergeConstants(text, scan.constants, request),
    mergeRouteEntry(text, scan.list, request, containerName(container)),
  ];

  const accepted: Insertion[] = [];
  for (const plan of plans) {
    if (plan.kind === 'missing-anchor') {
      const missingAnchor: MissingAnchor = { part: plan.part, reason: plan.reason };
      if ((options.mode ?? 'atomic') === 'atomic') {
        return { detail: 'skipped-no-anchor', inserted: [], missingAnchor, content: text };
      }
      return finish(text, accepted, PARTIAL_DETAIL[plan.part], missingAnchor);
    }
    if (plan.kind === 'insert') {
      accepted.push(...plan.insertions);
    }
  }

  return finish(text, accepted, 'full');
}

/**
 * Patch the registry file at `registryPath`.
 *
 * @throws RegistryIOError when the file exists but cannot be read or written
 */
export async function patchRegistry(
  registryPath: string,
  request: RegistryRequest,
  options: PatchOptions = {}
): Promise<PatchOutcome> {
  if (!(await fileExists(registryPath))) {
    log.warn(`Route registry not found at ${registryPath}. Skipping route registration.`);
    return {
      applied: false,
      detail: 'skipped-no-registry',
      inserted: [],
      content: '',
      registryPath,
    };
  }

  let original: string;
  try {
    original = await readFile(registryPath);
  } catch (error) {
    throw new RegistryIOError(
      ErrorCodes.REGISTRY_READ,
      `Failed to read route registry ${registryPath}: ${error instanceof Error ? error.message : String(error)}`,
      { registryPath }
    );
  }

  const result = patchRegistryText(original, request, options);
  log.debug(`Registry patch for ${request.symbolicName}: ${result.detail}`, {
    inserted: result.inserted,
    missingAnchor: result.missingAnchor,
  });

  if (result.missingAnchor) {
    log.warn(
      `Could not fully register route "${request.symbolicName}": ${describeMiss(result.missingAnchor)} (${result.detail})`
    );
  }

  const applied = result.inserted.length > 0;
  if (applied && !options.dryRun) {
    try {
      await writeFile(registryPath, result.content);
    } catch (error) {
      throw new RegistryIOError(
        ErrorCodes.REGISTRY_WRITE,
        `Failed to write route registry ${registryPath}: ${error instanceof Error ? error.message : String(error)}`,
        { registryPath }
      );
    }
  }

  return { ...result, applied, registryPath };
}

export function describeMiss(miss: MissingAnchor): string {
  switch (miss.reason) {
    case 'no-imports':
      return 'no import statements to anchor the new import';
    case 'no-container':
      return 'constant container not found';
    case 'container-empty':
      return 'constant container has no existing route constants';
    case 'no-list':
      return 'route list not found';
    case 'list-unterminated':
      return 'route list is not closed';
  }
}

function finish(
  text: string,
  insertions: Insertion[],
  detail: PatchDetail,
  missingAnchor?: MissingAnchor
): TextPatchResult {
  return {
    detail,
    inserted: [...new Set(insertions.map((i) => i.part))],
    ...(missingAnchor !== undefined && { missingAnchor }),
    content: applyInsertions(text, insertions),
  };
}

/** Class name declared by a container signature such as "class Router {". */
function containerName(container: string): string {
  const match = /class\s+(\w+)/.exec(container);
  return match ? match[1] : 'Router';
}

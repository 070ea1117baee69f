/**
 * Computes the insertion for each part of a route registration.
 *
 * Every merge first searches the whole document for the exact text it would
 * insert; if that text is already present the merge is a no-op. Offsets refer
 * to the unmodified document.
 */
import type {
  ConstantAnchor,
  ImportAnchor,
  Insertion,
  ListAnchor,
  MergeResult,
  RegistryRequest,
  RouteDescriptor,
} from './types.js';
import { findLineComment } from './anchor-scanner.js';

const INDENT_UNIT = '  ';

export function renderImportLine(importPath: string): string {
  return `import '${importPath}';`;
}

/**
 * Path and name constants sharing the symbolic name as stem.
 * The first line carries no indentation so the result can be searched for
 * wherever the pair starts.
 */
export function renderConstantPair(descriptor: RouteDescriptor, indent: string): string {
  const { symbolicName, displayPath, routeName } = descriptor;
  return [
    `static const String ${symbolicName} = '${displayPath}';`,
    `${indent}static const String ${symbolicName}Name = '${routeName}';`,
  ].join('\n');
}

/**
 * A GoRoute entry referencing the Router constants and the widget type.
 * The first line carries no indentation.
 */
export function renderRouteEntry(descriptor: RouteDescriptor, indent: string, container = 'Router'): string {
  const { symbolicName, widgetTypeName } = descriptor;
  return [
    'GoRoute(',
    `${indent}${INDENT_UNIT}path: ${container}.${symbolicName},`,
    `${indent}${INDENT_UNIT}name: ${container}.${symbolicName}Name,`,
    `${indent}${INDENT_UNIT}builder: (context, state) => const ${widgetTypeName}(),`,
    `${indent}),`,
  ].join('\n');
}

export function mergeImport(text: string, anchor: ImportAnchor, request: RegistryRequest): MergeResult {
  const line = renderImportLine(request.importPath);
  if (text.includes(line)) {
    return { kind: 'noop', part: 'import' };
  }
  if (!anchor.found) {
    return { kind: 'missing-anchor', part: 'import', reason: anchor.reason };
  }
  return insert({ part: 'import', offset: anchor.offset, text: `\n${line}` });
}

export function mergeConstants(text: string, anchor: ConstantAnchor, descriptor: RouteDescriptor): MergeResult {
  if (!anchor.found) {
    // Without an anchor there is no indentation to render with; look for the
    // pair at the conventional indentation before giving up.
    return text.includes(renderConstantPair(descriptor, INDENT_UNIT))
      ? { kind: 'noop', part: 'constants' }
      : { kind: 'missing-anchor', part: 'constants', reason: anchor.reason };
  }

  const pair = renderConstantPair(descriptor, anchor.indent);
  if (text.includes(pair)) {
    return { kind: 'noop', part: 'constants' };
  }
  return insert({ part: 'constants', offset: anchor.offset, text: `\n${anchor.indent}${pair}` });
}

/**
 * The entry goes right after the last non-blank character before the closing
 * bracket, so the whitespace in front of the bracket stays where it is. A
 * missing separator goes after the last code character, ahead of any trailing
 * line comment.
 */
export function mergeRouteEntry(
  text: string,
  anchor: ListAnchor,
  descriptor: RouteDescriptor,
  container = 'Router'
): MergeResult {
  if (!anchor.found) {
    return text.includes(renderRouteEntry(descriptor, INDENT_UNIT.repeat(3), container))
      ? { kind: 'noop', part: 'route' }
      : { kind: 'missing-anchor', part: 'route', reason: anchor.reason };
  }

  const entryIndent = anchor.indent + INDENT_UNIT;
  const entry = renderRouteEntry(descriptor, entryIndent, container);
  if (text.includes(entry)) {
    return { kind: 'noop', part: 'route' };
  }

  const last = skipBackWhitespace(text, anchor.closeOffset - 1, anchor.openOffset);
  const offset = last + 1;
  const codeEnd = lastCodeOffset(text, last, anchor.openOffset);
  const needsSeparator = text[codeEnd] !== ',' && text[codeEnd] !== '[';
  const trailing = text.slice(offset, anchor.closeOffset).includes('\n') ? '' : `\n${anchor.indent}`;
  const entryText = `\n${entryIndent}${entry}${trailing}`;

  if (needsSeparator && codeEnd !== last) {
    return {
      kind: 'insert',
      insertions: [
        { part: 'route', offset: codeEnd + 1, text: ',' },
        { part: 'route', offset, text: entryText },
      ],
    };
  }
  return insert({ part: 'route', offset, text: `${needsSeparator ? ',' : ''}${entryText}` });
}

function skipBackWhitespace(text: string, from: number, floor: number): number {
  let i = from;
  while (i > floor && /\s/.test(text[i])) {
    i--;
  }
  return i;
}

/**
 * Last character at or before `from` that is neither whitespace nor part of a
 * line comment.
 */
function lastCodeOffset(text: string, from: number, floor: number): number {
  let last = from;
  while (last > floor) {
    const lineStart = Math.max(text.lastIndexOf('\n', last) + 1, floor);
    const comment = findLineComment(text, lineStart, last + 1);
    if (comment === -1) return last;
    last = skipBackWhitespace(text, comment - 1, floor);
  }
  return last;
}

/**
 * Apply insertions computed against the same text. Splices run from the
 * highest offset down so no splice moves the offset of another.
 */
export function applyInsertions(text: string, insertions: Insertion[]): string {
  const ordered = [...insertions].sort((a, b) => b.offset - a.offset);
  let result = text;
  for (const { offset, text: inserted } of ordered) {
    result = result.slice(0, offset) + inserted + result.slice(offset);
  }
  return result;
}

function insert(insertion: Insertion): MergeResult {
  return { kind: 'insert', insertions: [insertion] };
}

/**
 * Locates the insertion anchors of a route registry in raw text.
 *
 * The scanner recognizes a fixed anchor grammar (import lines, the constant
 * container with its constant pairs, the route list) and treats everything
 * else as opaque. It never modifies the text.
 */
import type {
  AnchorScan,
  ConstantAnchor,
  ImportAnchor,
  ListAnchor,
  ScanOptions,
} from './types.js';

export const DEFAULT_SCAN_OPTIONS: ScanOptions = {
  container: 'class Router {',
  listOpen: 'routes: [',
};

const IMPORT_LINE = /^[ \t]*import[ \t]+'[^'\n]+'[^;\n]*;/gm;
const CONSTANT_PAIR = /static const String \w+Name = '[^'\n]*';/g;

/**
 * Scan a registry document for all three insertion anchors.
 */
export function scanAnchors(text: string, options: Partial<ScanOptions> = {}): AnchorScan {
  const container = options.container ?? DEFAULT_SCAN_OPTIONS.container;
  const listOpen = options.listOpen ?? DEFAULT_SCAN_OPTIONS.listOpen;
  return {
    imports: findImportAnchor(text),
    constants: findConstantAnchor(text, container),
    list: findListAnchor(text, listOpen),
  };
}

/**
 * End of the line holding the last import statement.
 */
export function findImportAnchor(text: string): ImportAnchor {
  let lastEnd = -1;
  for (const match of text.matchAll(IMPORT_LINE)) {
    lastEnd = (match.index ?? 0) + match[0].length;
  }
  if (lastEnd === -1) {
    return { found: false, reason: 'no-imports' };
  }
  return { found: true, offset: lineEnd(text, lastEnd) };
}

/**
 * End of the line holding the last constant pair inside the container.
 * A container without any pair is reported as not found.
 */
export function findConstantAnchor(text: string, container: string): ConstantAnchor {
  const containerOffset = text.indexOf(container);
  if (containerOffset === -1) {
    return { found: false, reason: 'no-container' };
  }

  const braceOffset = text.indexOf('{', containerOffset);
  const bodyEnd = braceOffset === -1 ? -1 : findMatchingClose(text, braceOffset);
  const body = text.slice(containerOffset, bodyEnd === -1 ? text.length : bodyEnd);

  let lastStart = -1;
  let lastEnd = -1;
  for (const match of body.matchAll(CONSTANT_PAIR)) {
    lastStart = containerOffset + (match.index ?? 0);
    lastEnd = lastStart + match[0].length;
  }
  if (lastEnd === -1) {
    return { found: false, reason: 'container-empty' };
  }

  return {
    found: true,
    containerOffset,
    offset: lineEnd(text, lastEnd),
    indent: lineIndent(text, lastStart),
  };
}

/**
 * The first list-opening token and the bracket that closes it.
 * Nested brackets, string literals and comments inside the list are skipped.
 */
export function findListAnchor(text: string, listOpen: string): ListAnchor {
  const openOffset = text.indexOf(listOpen);
  if (openOffset === -1) {
    return { found: false, reason: 'no-list' };
  }

  const bracketOffset = text.indexOf('[', openOffset);
  const closeOffset = bracketOffset === -1 ? -1 : findMatchingClose(text, bracketOffset);
  if (closeOffset === -1) {
    return { found: false, reason: 'list-unterminated' };
  }

  return {
    found: true,
    openOffset,
    closeOffset,
    indent: lineIndent(text, openOffset),
  };
}

const CLOSERS: Record<string, string> = { '[': ']', '{': '}', '(': ')' };

/**
 * Offset of the bracket closing the one at `openOffset`, or -1.
 * Tracks depth for the opening bracket's kind only; skips Dart string
 * literals (single, double, triple-quoted, raw) and comments.
 */
export function findMatchingClose(text: string, openOffset: number): number {
  const open = text[openOffset];
  const close = CLOSERS[open];
  if (close === undefined) return -1;

  let depth = 0;
  let i = openOffset;
  while (i < text.length) {
    const ch = text[i];

    if (ch === '/' && text[i + 1] === '/') {
      const nl = text.indexOf('\n', i);
      i = nl === -1 ? text.length : nl + 1;
      continue;
    }
    if (ch === '/' && text[i + 1] === '*') {
      const end = text.indexOf('*/', i + 2);
      i = end === -1 ? text.length : end + 2;
      continue;
    }
    if (ch === "'" || ch === '"') {
      i = skipString(text, i);
      continue;
    }

    if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth === 0) return i;
    }
    i++;
  }
  return -1;
}

/**
 * Offset of the `//` comment starting in `text[start, end)`, or -1.
 * Strings and block comments in the range are skipped.
 */
export function findLineComment(text: string, start: number, end: number): number {
  let i = start;
  while (i < end) {
    const ch = text[i];
    if (ch === '/' && text[i + 1] === '/') return i;
    if (ch === '/' && text[i + 1] === '*') {
      const close = text.indexOf('*/', i + 2);
      i = close === -1 ? end : close + 2;
      continue;
    }
    if (ch === "'" || ch === '"') {
      i = skipString(text, i);
      continue;
    }
    i++;
  }
  return -1;
}

/**
 * Offset just past the string literal starting at `start`.
 * `${...}` interpolations are skipped as nested code, so quotes inside them
 * do not end the literal.
 */
function skipString(text: string, start: number): number {
  const quote = text[start];
  const raw = start > 0 && text[start - 1] === 'r';
  const triple = text.startsWith(quote.repeat(3), start);
  const terminator = triple ? quote.repeat(3) : quote;

  let i = start + terminator.length;
  while (i < text.length) {
    if (!raw && text[i] === '\\') {
      i += 2;
      continue;
    }
    if (!raw && text.startsWith('${', i)) {
      i = skipInterpolation(text, i + 2);
      continue;
    }
    if (!triple && text[i] === '\n') {
      // Unterminated single-line literal; resume after the line break.
      return i + 1;
    }
    if (text.startsWith(terminator, i)) {
      return i + terminator.length;
    }
    i++;
  }
  return text.length;
}

/**
 * Offset just past the `}` closing an interpolation whose body starts at `start`.
 */
function skipInterpolation(text: string, start: number): number {
  let depth = 1;
  let i = start;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "'" || ch === '"') {
      i = skipString(text, i);
      continue;
    }
    if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i + 1;
    }
    i++;
  }
  return text.length;
}

function lineEnd(text: string, offset: number): number {
  const nl = text.indexOf('\n', offset);
  if (nl === -1) return text.length;
  return text[nl - 1] === '\r' ? nl - 1 : nl;
}

export function lineIndent(text: string, offset: number): string {
  const lineStart = text.lastIndexOf('\n', offset - 1) + 1;
  const match = /^[ \t]*/.exec(text.slice(lineStart, offset));
  return match ? match[0] : '';
}

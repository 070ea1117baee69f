/**
 * Tests for per-part registry merges.
 */
import { describe, it, expect } from 'vitest';
import {
  renderImportLine,
  renderConstantPair,
  renderRouteEntry,
  mergeImport,
  mergeConstants,
  mergeRouteEntry,
  applyInsertions,
} from '../../../../src/core/registry/declaration-merger.js';
import { findConstantAnchor, findImportAnchor, findListAnchor } from '../../../../src/core/registry/anchor-scanner.js';
import type { RegistryRequest } from '../../../../src/core/registry/types.js';

const settings: RegistryRequest = {
  symbolicName: 'settings',
  displayPath: '/settings',
  routeName: 'settings',
  widgetTypeName: 'SettingsPage',
  importPath: '../../features/settings/presentation/pages/settings_page.dart',
};

function registry(routes: string): string {
  return [
    "import 'package:go_router/go_router.dart';",
    '',
    'class Router {',
    "  static const String homeName = 'home';",
    '}',
    '',
    'final router = GoRouter(',
    routes,
    ');',
    '',
  ].join('\n');
}

describe('declaration merger', () => {
  describe('rendering', () => {
    it('should render an import line', () => {
      expect(renderImportLine('a/b.dart')).toBe("import 'a/b.dart';");
    });

    it('should render a constant pair with the second line indented', () => {
      expect(renderConstantPair(settings, '  ')).toBe(
        "static const String settings = '/settings';\n  static const String settingsName = 'settings';"
      );
    });

    it('should render a route entry referencing the container constants', () => {
      expect(renderRouteEntry(settings, '    ', 'Paths')).toBe(
        [
          'GoRoute(',
          '      path: Paths.settings,',
          '      name: Paths.settingsName,',
          '      builder: (context, state) => const SettingsPage(),',
          '    ),',
        ].join('\n')
      );
    });
  });

  describe('mergeImport', () => {
    it('should insert after the last import', () => {
      const text = registry('  routes: [],');

      const result = mergeImport(text, findImportAnchor(text), settings);

      expect(result).toEqual({
        kind: 'insert',
        insertions: [
          {
            part: 'import',
            offset: "import 'package:go_router/go_router.dart';".length,
            text: `\nimport '${settings.importPath}';`,
          },
        ],
      });
    });

    it('should be a no-op when the import is already present', () => {
      const text = `import '${settings.importPath}';\n`;

      expect(mergeImport(text, findImportAnchor(text), settings)).toEqual({ kind: 'noop', part: 'import' });
    });

    it('should report a missing anchor', () => {
      const text = 'class Router {}\n';

      expect(mergeImport(text, findImportAnchor(text), settings)).toEqual({
        kind: 'missing-anchor',
        part: 'import',
        reason: 'no-imports',
      });
    });
  });

  describe('mergeConstants', () => {
    it('should insert the pair after the last pair at its indentation', () => {
      const text = registry('  routes: [],');
      const anchor = findConstantAnchor(text, 'class Router {');

      const result = mergeConstants(text, anchor, settings);

      expect(result.kind).toBe('insert');
      if (result.kind === 'insert') {
        expect(applyInsertions(text, result.insertions)).toContain(
          [
            "  static const String homeName = 'home';",
            "  static const String settings = '/settings';",
            "  static const String settingsName = 'settings';",
            '}',
          ].join('\n')
        );
      }
    });

    it('should be a no-op when the pair already exists without an anchor', () => {
      const text = "const x = 1;\n  static const String settings = '/settings';\n  static const String settingsName = 'settings';\n";

      expect(mergeConstants(text, findConstantAnchor(text, 'class Router {'), settings)).toEqual({
        kind: 'noop',
        part: 'constants',
      });
    });

    it('should report a container without pairs', () => {
      const text = 'class Router {\n}\n';

      expect(mergeConstants(text, findConstantAnchor(text, 'class Router {'), settings)).toEqual({
        kind: 'missing-anchor',
        part: 'constants',
        reason: 'container-empty',
      });
    });
  });

  describe('mergeRouteEntry', () => {
    it('should open an inline empty list onto separate lines', () => {
      const text = registry('  routes: [],');

      const result = mergeRouteEntry(text, findListAnchor(text, 'routes: ['), settings);

      expect(result.kind).toBe('insert');
      if (result.kind === 'insert') {
        expect(applyInsertions(text, result.insertions)).toBe(
          registry(
            [
              '  routes: [',
              '    GoRoute(',
              '      path: Router.settings,',
              '      name: Router.settingsName,',
              '      builder: (context, state) => const SettingsPage(),',
              '    ),',
              '  ],',
            ].join('\n')
          )
        );
      }
    });

    it('should add a comma after a last entry without one', () => {
      const text = registry(["  routes: [", "    GoRoute(path: '/a')", '  ],'].join('\n'));

      const result = mergeRouteEntry(text, findListAnchor(text, 'routes: ['), settings);

      expect(result.kind).toBe('insert');
      if (result.kind === 'insert') {
        expect(applyInsertions(text, result.insertions)).toBe(
          registry(
            [
              '  routes: [',
              "    GoRoute(path: '/a'),",
              '    GoRoute(',
              '      path: Router.settings,',
              '      name: Router.settingsName,',
              '      builder: (context, state) => const SettingsPage(),',
              '    ),',
              '  ],',
            ].join('\n')
          )
        );
      }
    });

    it('should put the comma before a trailing line comment', () => {
      const text = registry(['  routes: [', '    GoRoute(path: Router.a) // main', '  ],'].join('\n'));

      const result = mergeRouteEntry(text, findListAnchor(text, 'routes: ['), settings);

      expect(result.kind).toBe('insert');
      if (result.kind === 'insert') {
        expect(result.insertions).toHaveLength(2);
        expect(applyInsertions(text, result.insertions)).toBe(
          registry(
            [
              '  routes: [',
              '    GoRoute(path: Router.a), // main',
              '    GoRoute(',
              '      path: Router.settings,',
              '      name: Router.settingsName,',
              '      builder: (context, state) => const SettingsPage(),',
              '    ),',
              '  ],',
            ].join('\n')
          )
        );
      }
    });

    it('should not add a comma when the commented entry already has one', () => {
      const text = registry(["  routes: [", "    GoRoute(path: '/a'), // 'quoted' // twice", '  ],'].join('\n'));

      const result = mergeRouteEntry(text, findListAnchor(text, 'routes: ['), settings);

      expect(result.kind).toBe('insert');
      if (result.kind === 'insert') {
        expect(applyInsertions(text, result.insertions)).toContain(
          "    GoRoute(path: '/a'), // 'quoted' // twice\n    GoRoute(\n"
        );
      }
    });

    it('should be a no-op when the entry already exists', () => {
      const text = registry(
        [
          '  routes: [',
          '    GoRoute(',
          '      path: Router.settings,',
          '      name: Router.settingsName,',
          '      builder: (context, state) => const SettingsPage(),',
          '    ),',
          '  ],',
        ].join('\n')
      );

      expect(mergeRouteEntry(text, findListAnchor(text, 'routes: ['), settings)).toEqual({
        kind: 'noop',
        part: 'route',
      });
    });

    it('should report a missing list', () => {
      const text = registry('  initialLocation: "/",');

      expect(mergeRouteEntry(text, findListAnchor(text, 'routes: ['), settings)).toEqual({
        kind: 'missing-anchor',
        part: 'route',
        reason: 'no-list',
      });
    });
  });

  describe('applyInsertions', () => {
    it('should apply insertions against offsets of the original text', () => {
      const result = applyInsertions('abc', [
        { part: 'import', offset: 1, text: 'X' },
        { part: 'route', offset: 3, text: 'Z' },
        { part: 'constants', offset: 2, text: 'Y' },
      ]);

      expect(result).toBe('aXbYcZ');
    });

    it('should return the text unchanged without insertions', () => {
      expect(applyInsertions('abc', [])).toBe('abc');
    });
  });
});

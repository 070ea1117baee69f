/**
 * Tests for the create feature command.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createFeatureCommand } from '../../../../../src/cli/commands/create/feature.js';
import type { ScaffoldResult } from '../../../../../src/core/scaffold/types.js';
import { ValidationError } from '../../../../../src/utils/errors.js';

const mockConfig = { registry: { path: 'lib/core/router/app_router.dart' } };
let mockScaffoldResult: ScaffoldResult;
let mockScaffoldError: Error | undefined;
let mockScaffoldFeature: ReturnType<typeof vi.fn> | undefined;

vi.mock('../../../../../src/core/config/loader.js', () => ({
  loadConfig: vi.fn().mockImplementation(async () => mockConfig),
}));

vi.mock('../../../../../src/core/scaffold/feature-engine.js', () => ({
  FeatureEngine: vi.fn(function () {
    mockScaffoldFeature = vi.fn().mockImplementation(async () => {
      if (mockScaffoldError) throw mockScaffoldError;
      return mockScaffoldResult;
    });
    return { scaffoldFeature: mockScaffoldFeature };
  }),
}));

vi.mock('../../../../../src/utils/logger.js', () => ({
  logger: {
    setLevel: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    success: vi.fn(),
    fail: vi.fn(),
  },
}));

vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    cyan: (s: string) => s,
    yellow: (s: string) => s,
    green: (s: string) => s,
    red: (s: string) => s,
    dim: (s: string) => s,
  },
}));

const PAGE_PATH = 'lib/features/user_profile/presentation/pages/user_profile_page.dart';

describe('create feature command', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.clearAllMocks();
    mockScaffoldError = undefined;
    mockScaffoldResult = {
      name: 'user_profile',
      success: true,
      files: [{ role: 'page', path: PAGE_PATH, success: true }],
      directories: [],
      registry: {
        applied: true,
        detail: 'full',
        inserted: ['import', 'constants', 'route'],
        content: '',
        registryPath: '/work/app/lib/core/router/app_router.dart',
      },
    };
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  describe('createFeatureCommand', () => {
    it('should create a command with correct name', () => {
      expect(createFeatureCommand().name()).toBe('feature');
    });

    it('should require a name argument', () => {
      const args = createFeatureCommand().registeredArguments;

      expect(args.length).toBe(1);
      expect(args[0].name()).toBe('name');
      expect(args[0].required).toBe(true);
    });

    it('should have the generator options', () => {
      const optionNames = createFeatureCommand().options.map((opt) => opt.long);

      expect(optionNames).toEqual(['--cwd', '--overwrite', '--dry-run', '--json', '--verbose']);
    });
  });

  describe('execution', () => {
    it('should scaffold the feature in the given project', async () => {
      const { FeatureEngine } = await import('../../../../../src/core/scaffold/feature-engine.js');

      await createFeatureCommand().parseAsync(['node', 'test', 'user_profile', '--cwd', '/work/app', '--overwrite']);

      expect(FeatureEngine).toHaveBeenCalledWith('/work/app', mockConfig);
      expect(mockScaffoldFeature).toHaveBeenCalledWith('user_profile', { overwrite: true, dryRun: undefined });
    });

    it('should list generated files and the registry outcome', async () => {
      await createFeatureCommand().parseAsync(['node', 'test', 'user_profile']);

      expect(consoleLogSpy).toHaveBeenCalledWith('Feature "user_profile"');
      expect(consoleLogSpy).toHaveBeenCalledWith(`  + ${PAGE_PATH} (page)`);
      expect(consoleLogSpy).toHaveBeenCalledWith(
        '  ✓ Route registered in /work/app/lib/core/router/app_router.dart (import, constants, route)'
      );
      const { logger } = await import('../../../../../src/utils/logger.js');
      expect(logger.success).toHaveBeenCalledWith('Feature "user_profile" created');
    });

    it('should announce a dry run', async () => {
      await createFeatureCommand().parseAsync(['node', 'test', 'user_profile', '--dry-run']);

      expect(consoleLogSpy).toHaveBeenCalledWith('Dry Run - Feature "user_profile" would create:');
      const { logger } = await import('../../../../../src/utils/logger.js');
      expect(logger.success).toHaveBeenCalledWith('Feature "user_profile" can be created');
    });

    it('should output JSON with --json', async () => {
      await createFeatureCommand().parseAsync(['node', 'test', 'user_profile', '--json']);

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toEqual(mockScaffoldResult);
    });

    it('should enable debug output with --verbose', async () => {
      await createFeatureCommand().parseAsync(['node', 'test', 'user_profile', '--verbose']);

      const { logger } = await import('../../../../../src/utils/logger.js');
      expect(logger.setLevel).toHaveBeenCalledWith('debug');
    });

    it('should exit with an error when files already exist', async () => {
      mockScaffoldResult = {
        name: 'user_profile',
        success: false,
        files: [{ role: 'page', path: PAGE_PATH, success: false, error: 'File already exists' }],
        directories: [],
        error: 'One or more files already exist (use --overwrite to replace them)',
      };

      await expect(createFeatureCommand().parseAsync(['node', 'test', 'user_profile'])).rejects.toThrow(
        'process.exit called'
      );

      expect(consoleLogSpy).toHaveBeenCalledWith(`  ✗ ${PAGE_PATH} - File already exists`);
      const { logger } = await import('../../../../../src/utils/logger.js');
      expect(logger.fail).toHaveBeenCalledWith('One or more files already exist (use --overwrite to replace them)');
    });

    it('should log the error for an invalid name', async () => {
      mockScaffoldError = new ValidationError('V001', 'Name "9" does not produce a valid identifier (got "9")');

      await expect(createFeatureCommand().parseAsync(['node', 'test', '9'])).rejects.toThrow('process.exit called');

      const { logger } = await import('../../../../../src/utils/logger.js');
      expect(logger.error).toHaveBeenCalledWith('Name "9" does not produce a valid identifier (got "9")');
    });
  });
});

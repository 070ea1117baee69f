/**
 * Tests for file system helpers.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, stat, readFile as fsReadFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  readFile,
  writeFile,
  fileExists,
  ensureDir,
} from '../../../src/utils/file-system.js';

describe('file system utilities', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'routesmith-fs-test-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should create parent directories when writing', async () => {
    const filePath = join(testDir, 'lib', 'core', 'a.dart');

    await writeFile(filePath, 'class A {}\n');

    expect(await fsReadFile(filePath, 'utf-8')).toBe('class A {}\n');
    expect(await readFile(filePath)).toBe('class A {}\n');
  });

  it('should report existing files', async () => {
    const filePath = join(testDir, 'a.dart');
    await writeFile(filePath, '');

    expect(await fileExists(filePath)).toBe(true);
    expect(await fileExists(join(testDir, 'b.dart'))).toBe(false);
    expect(await fileExists(testDir)).toBe(true);
  });

  it('should create nested directories', async () => {
    await ensureDir(join(testDir, 'a', 'b'));
    await ensureDir(join(testDir, 'a', 'b'));

    expect((await stat(join(testDir, 'a', 'b'))).isDirectory()).toBe(true);
  });
});

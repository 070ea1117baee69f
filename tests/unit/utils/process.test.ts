/**
 * Tests for external command execution.
 */
import { describe, it, expect } from 'vitest';
import { tmpdir } from 'os';
import { runCommand } from '../../../src/utils/process.js';

describe('runCommand', () => {
  it('should capture stdout of a successful command', async () => {
    const result = await runCommand(process.execPath, ['-e', 'process.stdout.write("ok")'], tmpdir());

    expect(result).toEqual({ exitCode: 0, stdout: 'ok', stderr: '' });
  });

  it('should report a non-zero exit instead of throwing', async () => {
    const result = await runCommand(
      process.execPath,
      ['-e', 'process.stderr.write("failed"); process.exit(3)'],
      tmpdir()
    );

    expect(result.exitCode).toBe(3);
    expect(result.stderr).toBe('failed');
  });

  it('should report a missing executable', async () => {
    const result = await runCommand('routesmith-missing-executable', [], tmpdir());

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain('ENOENT');
  });
});

/**
 * Tests for the file scanner when directories cannot be read
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('node:fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs')>();
  return {
    ...actual,
    promises: { ...actual.promises, readdir: vi.fn(actual.promises.readdir) },
  };
});

import { promises as fs } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { scanProjectFiles } from '../../src/analyzer/scanner.js';

function permissionDenied(dir: string): Error {
  return Object.assign(new Error(`EACCES: permission denied, scandir '${dir}'`), { code: 'EACCES' });
}

describe('scanProjectFiles with unreadable directories', () => {
  let tmpDir: string;

  beforeEach(async () => {
    vi.mocked(fs.readdir).mockClear();
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'deploy-studio-unreadable-'));
    await fs.writeFile(path.join(tmpDir, 'index.html'), '<h1>hi</h1>\n');
    await fs.mkdir(path.join(tmpDir, 'locked'));
    await fs.writeFile(path.join(tmpDir, 'locked', 'secret.py'), 'x = 1\n');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('skips a subdirectory it cannot read', async () => {
    const { promises: realFs } = await vi.importActual<typeof import('node:fs')>('node:fs');
    vi.mocked(fs.readdir)
      .mockImplementationOnce(realFs.readdir)
      .mockRejectedValueOnce(permissionDenied(path.join(tmpDir, 'locked')));

    expect(await scanProjectFiles(tmpDir)).toEqual(['index.html']);
    expect(fs.readdir).toHaveBeenCalledTimes(2);
  });

  it('rejects when the root itself cannot be read', async () => {
    vi.mocked(fs.readdir).mockRejectedValueOnce(permissionDenied(tmpDir));

    await expect(scanProjectFiles(tmpDir)).rejects.toThrow('EACCES: permission denied');
  });
});

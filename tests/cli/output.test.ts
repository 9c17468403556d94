/**
 * Tests for CLI output helpers
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { isVerbose, printDebug, printWriteResults, setVerbose } from '../../src/cli/output.js';

describe('printDebug', () => {
  afterEach(() => {
    setVerbose(false);
    vi.restoreAllMocks();
  });

  it('is silent by default', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    printDebug('hidden');

    expect(isVerbose()).toBe(false);
    expect(log).not.toHaveBeenCalled();
  });

  it('prints when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    setVerbose(true);

    printDebug('GET /api/check-cli');

    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0][0])).toContain('[DEBUG] GET /api/check-cli');
  });
});

describe('printWriteResults', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints one line per file', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    printWriteResults([
      { file: 'netlify.toml', status: 'written' },
      { file: '.gitignore', status: 'skipped' },
    ]);

    const lines = log.mock.calls.map((call) => String(call[0]));
    expect(lines.some((line) => line.includes('Wrote netlify.toml'))).toBe(true);
    expect(lines.some((line) => line.includes('Skipped .gitignore (already exists)'))).toBe(true);
  });
});

/**
 * Tests for environment variable detection
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import {
  detectEnvVarsInText,
  detectRequiredEnvVars,
  isSourceFile,
  readSourceText,
} from '../../src/analyzer/env-detector.js';

describe('detectEnvVarsInText', () => {
  it('maps keywords to variable names ignoring case', () => {
    expect(detectEnvVarsInText('from OpenAI import Client')).toEqual(['OPENAI_API_KEY']);
  });

  it('returns names in table order', () => {
    expect(detectEnvVarsInText('jwt session; postgres; claude; gemini; gpt')).toEqual([
      'OPENAI_API_KEY',
      'GOOGLE_API_KEY',
      'ANTHROPIC_API_KEY',
      'DATABASE_URL',
      'SECRET_KEY',
    ]);
  });

  it('returns nothing for unrelated text', () => {
    expect(detectEnvVarsInText('print("hello")')).toEqual([]);
  });
});

describe('isSourceFile', () => {
  it('accepts the scanned extensions in any case', () => {
    expect(isSourceFile('api/handler.PY')).toBe(true);
    expect(isSourceFile('src/App.tsx')).toBe(true);
  });

  it('skips other files', () => {
    expect(isSourceFile('README.md')).toBe(false);
    expect(isSourceFile('.env')).toBe(false);
  });
});

describe('detectRequiredEnvVars', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'deploy-studio-env-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('collects unique names across files', async () => {
    await fs.writeFile(path.join(tmpDir, 'a.py'), 'import anthropic\nimport openai\n');
    await fs.writeFile(path.join(tmpDir, 'b.js'), 'const client = new OpenAI();\n');

    expect(await detectRequiredEnvVars(tmpDir, ['a.py', 'b.js'])).toEqual([
      'OPENAI_API_KEY',
      'ANTHROPIC_API_KEY',
    ]);
  });

  it('ignores non-source files', async () => {
    await fs.writeFile(path.join(tmpDir, 'notes.md'), 'We use OpenAI and Postgres.\n');

    expect(await detectRequiredEnvVars(tmpDir, ['notes.md'])).toEqual([]);
  });

  it('skips files that cannot be read', async () => {
    await fs.writeFile(path.join(tmpDir, 'db.py'), 'DATABASE = "sqlite"\n');

    expect(await detectRequiredEnvVars(tmpDir, ['missing.py', 'db.py'])).toEqual(['DATABASE_URL']);
  });

  it('returns null from readSourceText for a missing file', async () => {
    expect(await readSourceText(path.join(tmpDir, 'missing.py'))).toBeNull();
  });
});

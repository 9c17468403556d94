/**
 * Environment variable detection
 * Best-effort keyword scan of source files; unreadable files contribute nothing
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { EnvVarName } from '../types/project.js';

/**
 * Ordered keyword table. Order is also the display order of the result.
 */
export const ENV_VAR_KEYWORDS: ReadonlyArray<readonly [EnvVarName, readonly string[]]> = [
  ['OPENAI_API_KEY', ['openai', 'gpt', 'chatgpt']],
  ['GOOGLE_API_KEY', ['google', 'gemini', 'generativeai']],
  ['ANTHROPIC_API_KEY', ['anthropic', 'claude']],
  ['DATABASE_URL', ['database', 'postgres', 'mysql', 'mongodb']],
  ['SECRET_KEY', ['secret', 'jwt', 'session']],
];

/** Extensions whose contents are scanned */
export const SOURCE_EXTENSIONS: ReadonlySet<string> = new Set(['.py', '.js', '.ts', '.jsx', '.tsx']);

export function isSourceFile(file: string): boolean {
  return SOURCE_EXTENSIONS.has(path.extname(file).toLowerCase());
}

/**
 * Read a file as text
 *
 * @returns File contents, or null if it could not be read
 */
export async function readSourceText(filePath: string): Promise<string | null> {
  return fs.readFile(filePath, 'utf-8').catch(() => null);
}

/**
 * Variables whose keywords appear in the text (case-insensitive)
 */
export function detectEnvVarsInText(text: string): EnvVarName[] {
  const lower = text.toLowerCase();
  return ENV_VAR_KEYWORDS.filter(([, keywords]) => keywords.some((kw) => lower.includes(kw))).map(
    ([name]) => name
  );
}

/**
 * Scan every source file under the root and collect the variables they hint at
 *
 * @param root - Absolute project root
 * @param fileList - Relative paths from the scanner
 * @returns Unique names in keyword-table order
 */
export async function detectRequiredEnvVars(
  root: string,
  fileList: readonly string[]
): Promise<EnvVarName[]> {
  const found = new Set<EnvVarName>();

  for (const file of fileList) {
    if (!isSourceFile(file)) continue;

    const text = await readSourceText(path.join(root, file));
    if (text === null) continue;

    for (const name of detectEnvVarsInText(text)) {
      found.add(name);
    }
  }

  return ENV_VAR_KEYWORDS.map(([name]) => name).filter((name) => found.has(name));
}

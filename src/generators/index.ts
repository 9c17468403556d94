/**
 * Config generator module
 * Renders the deployment files and writes them into a project
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { resolveInsideRoot, resolveProjectRoot } from '../analyzer/scanner.js';
import {
  generateNetlifyToml,
  generateGitignore,
  generateEnvExample,
  generateRequirements,
} from './templates/netlify.js';

export * from './templates/netlify.js';

export type WriteStatus = 'written' | 'skipped';

/**
 * Result of writing one generated file
 */
export interface FileWriteResult {
  /** Path relative to the project root, `/`-separated */
  file: string;
  status: WriteStatus;
}

export interface WriteOptions {
  /** Overwrite without asking */
  force?: boolean;
  /** Asked before overwriting an existing file; no callback means skip */
  confirm?: (file: string) => Promise<boolean>;
}

/**
 * Options for a batch generation run. Toggles default to on.
 */
export interface GenerateOptions {
  netlifyToml?: boolean;
  gitignore?: boolean;
  envExample?: boolean;
  requirements?: boolean;
  publishDirectory?: string;
  functionsDirectory?: string;
  buildCommand?: string;
  pythonVersion?: string;
  envVars?: readonly string[];
  force?: boolean;
  confirm?: (file: string) => Promise<boolean>;
}

async function fileExists(filePath: string): Promise<boolean> {
  return fs
    .access(filePath)
    .then(() => true)
    .catch(() => false);
}

/**
 * Write one generated file, asking before overwriting unless forced
 *
 * @param root - Project root
 * @param relativePath - Destination relative to the root
 * @param content - File content
 */
export async function writeGeneratedFile(
  root: string,
  relativePath: string,
  content: string,
  options: WriteOptions = {}
): Promise<FileWriteResult> {
  const filePath = resolveInsideRoot(root, relativePath);
  const file = path.relative(root, filePath).split(path.sep).join('/');

  if (!options.force && (await fileExists(filePath))) {
    const overwrite = options.confirm ? await options.confirm(file) : false;
    if (!overwrite) {
      return { file, status: 'skipped' };
    }
  }

  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, 'utf-8');
  return { file, status: 'written' };
}

/**
 * Render and write every requested file
 *
 * `.env.example` is only written when there are variables, and
 * `requirements.txt` only when there is a functions directory.
 */
export async function generateConfigFiles(
  projectPath: string,
  options: GenerateOptions = {}
): Promise<FileWriteResult[]> {
  const root = await resolveProjectRoot(projectPath);
  const envVars = options.envVars ?? [];
  const writeOptions: WriteOptions = { force: options.force, confirm: options.confirm };
  const results: FileWriteResult[] = [];

  if (options.netlifyToml ?? true) {
    const content = generateNetlifyToml({
      publishDirectory: options.publishDirectory,
      functionsDirectory: options.functionsDirectory,
      buildCommand: options.buildCommand,
      pythonVersion: options.pythonVersion,
    });
    results.push(await writeGeneratedFile(root, 'netlify.toml', content, writeOptions));
  }

  if (options.gitignore ?? true) {
    results.push(await writeGeneratedFile(root, '.gitignore', generateGitignore(), writeOptions));
  }

  if ((options.envExample ?? true) && envVars.length > 0) {
    results.push(
      await writeGeneratedFile(root, '.env.example', generateEnvExample(envVars), writeOptions)
    );
  }

  if ((options.requirements ?? true) && options.functionsDirectory) {
    results.push(
      await writeGeneratedFile(
        root,
        path.posix.join(options.functionsDirectory, 'requirements.txt'),
        generateRequirements(envVars),
        writeOptions
      )
    );
  }

  return results;
}

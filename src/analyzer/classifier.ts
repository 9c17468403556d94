/**
 * Project classifier
 * Turns a scanned file list into artifact flags and a deployment shape.
 *
 * Classification is an ordered rule list folded over an initial `static`
 * state. Later rules override earlier ones, so the Node rule runs last and
 * wins over any Python evidence.
 */

import path from 'node:path';
import type { Classification, DetectedFileKind, DetectedFiles } from '../types/project.js';

// ─── File Detection ──────────────────────────────────────

/**
 * One artifact rule.
 * `root` rules only count files at the project root; `anywhere` rules match
 * the basename at any depth.
 */
interface FileRule {
  flag: DetectedFileKind;
  match: { extension: string } | { name: string };
  scope: 'root' | 'anywhere';
}

export const FILE_RULES: readonly FileRule[] = [
  { flag: 'html', match: { extension: '.html' }, scope: 'anywhere' },
  { flag: 'python', match: { extension: '.py' }, scope: 'anywhere' },
  { flag: 'node', match: { name: 'package.json' }, scope: 'root' },
  { flag: 'manifest', match: { name: 'netlify.toml' }, scope: 'root' },
  { flag: 'envFile', match: { name: '.env' }, scope: 'root' },
  { flag: 'envExample', match: { name: '.env.example' }, scope: 'root' },
  { flag: 'gitignore', match: { name: '.gitignore' }, scope: 'root' },
  { flag: 'requirements', match: { name: 'requirements.txt' }, scope: 'anywhere' },
];

export interface FileDetection {
  detectedFiles: DetectedFiles;
  /** Python sources in scan order */
  pythonFiles: string[];
}

function matchesRule(fileLower: string, rule: FileRule): boolean {
  if (rule.scope === 'root' && fileLower.includes('/')) {
    return false;
  }
  if ('extension' in rule.match) {
    return fileLower.endsWith(rule.match.extension);
  }
  return path.posix.basename(fileLower) === rule.match.name;
}

/**
 * Single pass over the file list; every rule is checked for every file
 */
export function detectFiles(fileList: readonly string[]): FileDetection {
  const detectedFiles: DetectedFiles = {
    html: false,
    python: false,
    node: false,
    manifest: false,
    envFile: false,
    envExample: false,
    gitignore: false,
    requirements: false,
  };
  const pythonFiles: string[] = [];

  for (const file of fileList) {
    const fileLower = file.toLowerCase();

    for (const rule of FILE_RULES) {
      if (matchesRule(fileLower, rule)) {
        detectedFiles[rule.flag] = true;
      }
    }

    if (fileLower.endsWith('.py')) {
      pythonFiles.push(file);
    }
  }

  return { detectedFiles, pythonFiles };
}

// ─── Classification Rules ────────────────────────────────

export const DEFAULT_BUILD_COMMAND = 'npm run build';

/**
 * A predicate/action pair evaluated in order
 */
export interface ClassificationRule {
  name: string;
  applies: (detection: FileDetection, current: Classification) => boolean;
  apply: (detection: FileDetection, current: Classification) => Classification;
}

/**
 * First Python file whose path mentions `functions` or `netlify`
 */
export function findFunctionsEvidence(pythonFiles: readonly string[]): string | undefined {
  return pythonFiles.find((file) => {
    const lower = file.toLowerCase();
    return lower.includes('functions') || lower.includes('netlify');
  });
}

/**
 * Path prefix up to and including the first segment containing `functions`.
 * The file name counts as a segment.
 *
 * @example functionsDirectoryOf('netlify/functions/api/handler.py') === 'netlify/functions'
 */
export function functionsDirectoryOf(file: string): string | undefined {
  const segments = file.split('/');
  const index = segments.findIndex((segment) => segment.toLowerCase().includes('functions'));

  if (index === -1) {
    return undefined;
  }
  return segments.slice(0, index + 1).join('/');
}

export const pythonFunctionsDirectoryRule: ClassificationRule = {
  name: 'python-functions-directory',
  applies: ({ pythonFiles }) => findFunctionsEvidence(pythonFiles) !== undefined,
  apply: ({ pythonFiles }, current) => {
    const evidence = findFunctionsEvidence(pythonFiles);
    const functionsDirectory = evidence ? functionsDirectoryOf(evidence) : undefined;
    return {
      ...current,
      type: 'python-functions',
      ...(functionsDirectory ? { functionsDirectory } : {}),
    };
  },
};

export const pythonPresentRule: ClassificationRule = {
  name: 'python-present',
  applies: ({ detectedFiles }, current) => detectedFiles.python && current.type === 'static',
  apply: (_detection, current) => ({ ...current, type: 'python-functions' }),
};

export const nodeProjectRule: ClassificationRule = {
  name: 'node-project',
  applies: ({ detectedFiles }) => detectedFiles.node,
  apply: (_detection, current) => ({
    type: 'node-project',
    publishDirectory: current.publishDirectory,
    buildCommand: DEFAULT_BUILD_COMMAND,
  }),
};

/**
 * Rules in precedence order (last applicable rule wins)
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  pythonFunctionsDirectoryRule,
  pythonPresentRule,
  nodeProjectRule,
];

/**
 * Classify a project from its detected artifacts
 */
export function classify(
  detection: FileDetection,
  rules: readonly ClassificationRule[] = CLASSIFICATION_RULES
): Classification {
  const initial: Classification = { type: 'static', publishDirectory: '.' };

  return rules.reduce(
    (current, rule) => (rule.applies(detection, current) ? rule.apply(detection, current) : current),
    initial
  );
}

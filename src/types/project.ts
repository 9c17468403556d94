/**
 * Project analysis type definitions
 * Describes the deployment shape inferred from a scanned project directory
 */

import { z } from 'zod';

/**
 * Deployment shapes the classifier can assign
 * - static: plain HTML/CSS/JS published as-is
 * - python-functions: Python serverless functions
 * - node-project: has a package.json and a build step
 */
export const ProjectTypeSchema = z.enum(['static', 'python-functions', 'node-project']);
export type ProjectType = z.infer<typeof ProjectTypeSchema>;

/**
 * Human-readable labels for each project type
 */
export const PROJECT_TYPE_LABELS: Record<ProjectType, string> = {
  static: 'Static site (HTML/CSS/JS)',
  'python-functions': 'Python Serverless Functions',
  'node-project': 'Node.js project',
};

/**
 * Environment variables the analyzer knows how to recognize.
 * Closed vocabulary: detection never produces a name outside this list.
 */
export const EnvVarNameSchema = z.enum([
  'OPENAI_API_KEY',
  'GOOGLE_API_KEY',
  'ANTHROPIC_API_KEY',
  'DATABASE_URL',
  'SECRET_KEY',
]);
export type EnvVarName = z.infer<typeof EnvVarNameSchema>;

/**
 * Artifact flags collected while scanning the file list
 */
export interface DetectedFiles {
  html: boolean;
  python: boolean;
  node: boolean;
  /** netlify.toml at the project root */
  manifest: boolean;
  envFile: boolean;
  envExample: boolean;
  gitignore: boolean;
  requirements: boolean;
}

export type DetectedFileKind = keyof DetectedFiles;

/**
 * Outcome of the ordered classification rules
 */
export interface Classification {
  type: ProjectType;
  publishDirectory: string;
  functionsDirectory?: string;
  buildCommand?: string;
}

/**
 * Immutable result of analyzing a project directory.
 * Recomputed on every request; never cached or patched.
 */
export interface ProjectAnalysis extends Readonly<Classification> {
  readonly root: string;
  readonly typeLabel: string;
  readonly detectedFiles: Readonly<DetectedFiles>;
  readonly pythonFiles: readonly string[];
  readonly requiredEnvVars: readonly EnvVarName[];
  readonly fileList: readonly string[];
  readonly fileCount: number;
}

/**
 * Project analyzer
 * Scan -> detect -> classify -> env inference, producing a frozen ProjectAnalysis
 */

import { PROJECT_TYPE_LABELS, type ProjectAnalysis, type ProjectType } from '../types/project.js';
import { resolveProjectRoot, scanProjectFiles } from './scanner.js';
import { classify, detectFiles } from './classifier.js';
import { detectRequiredEnvVars } from './env-detector.js';

export * from './scanner.js';
export * from './classifier.js';
export * from './env-detector.js';

export function describeProjectType(type: ProjectType): string {
  return PROJECT_TYPE_LABELS[type];
}

/**
 * Analyze a project directory
 *
 * @param projectPath - Directory to analyze (relative paths resolve against cwd)
 * @throws InvalidPathError when the directory does not exist
 */
export async function analyzeProject(projectPath: string): Promise<ProjectAnalysis> {
  const root = await resolveProjectRoot(projectPath);
  const fileList = await scanProjectFiles(root);
  const detection = detectFiles(fileList);
  const classification = classify(detection);
  const requiredEnvVars = await detectRequiredEnvVars(root, fileList);

  return Object.freeze({
    root,
    ...classification,
    typeLabel: describeProjectType(classification.type),
    detectedFiles: Object.freeze({ ...detection.detectedFiles }),
    pythonFiles: Object.freeze([...detection.pythonFiles]),
    requiredEnvVars: Object.freeze(requiredEnvVars),
    fileList: Object.freeze(fileList),
    fileCount: fileList.length,
  });
}

/**
 * One-paragraph summary used as chat context
 */
export function summarizeAnalysis(analysis: ProjectAnalysis): string {
  const parts = [
    `type=${analysis.type}`,
    `files=${analysis.fileCount}`,
    `publish=${analysis.publishDirectory}`,
  ];
  if (analysis.functionsDirectory) parts.push(`functions=${analysis.functionsDirectory}`);
  if (analysis.buildCommand) parts.push(`build=${analysis.buildCommand}`);
  if (analysis.requiredEnvVars.length > 0) parts.push(`env=${analysis.requiredEnvVars.join(',')}`);
  return parts.join('; ');
}

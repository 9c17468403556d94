/**
 * CLI output utilities
 * Handles formatted output, spinners, and progress display
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { FileWriteResult } from '../generators/index.js';
import type { DeployOutcome } from '../types/netlify.js';
import type { DetectedFileKind, ProjectAnalysis } from '../types/project.js';

/**
 * Output theme colors
 */
export const theme = {
  primary: chalk.cyan,
  secondary: chalk.gray,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  highlight: chalk.bold.white,
  dim: chalk.dim,
};

let verbose = false;

/**
 * Enable or disable debug output
 */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function isVerbose(): boolean {
  return verbose;
}

/**
 * Spinner instance for progress display
 */
let spinner: Ora | null = null;

/**
 * Start a spinner with a message
 *
 * @param message - Initial message
 * @returns Spinner instance
 */
export function startSpinner(message: string): Ora {
  if (spinner) {
    spinner.stop();
  }
  spinner = ora({
    text: message,
    spinner: 'dots',
  }).start();
  return spinner;
}

/**
 * Stop spinner without status
 */
export function stopSpinner(): void {
  if (spinner) {
    spinner.stop();
    spinner = null;
  }
}

/**
 * Print a header
 *
 * @param title - Header title
 */
export function printHeader(title: string): void {
  console.log();
  console.log(theme.primary.bold(`=== ${title} ===`));
  console.log();
}

/**
 * Print a section header
 *
 * @param title - Section title
 */
export function printSection(title: string): void {
  console.log();
  console.log(theme.highlight(`--- ${title} ---`));
}

/**
 * Print a success message
 *
 * @param message - Success message
 */
export function printSuccess(message: string): void {
  console.log(theme.success(`[OK] ${message}`));
}

/**
 * Print a warning message
 *
 * @param message - Warning message
 */
export function printWarning(message: string): void {
  console.log(theme.warning(`[WARN] ${message}`));
}

/**
 * Print an error message
 *
 * @param message - Error message
 */
export function printError(message: string): void {
  console.log(theme.error(`[ERROR] ${message}`));
}

/**
 * Print an info message
 *
 * @param message - Info message
 */
export function printInfo(message: string): void {
  console.log(theme.info(`[INFO] ${message}`));
}

/**
 * Print a debug message; silent unless verbose output is on
 *
 * @param message - Debug message
 */
export function printDebug(message: string): void {
  if (verbose) {
    console.log(theme.dim(`[DEBUG] ${message}`));
  }
}

/**
 * Print a key-value pair
 *
 * @param key - Key
 * @param value - Value
 */
export function printKeyValue(key: string, value: string | number | boolean): void {
  console.log(`  ${theme.secondary(key + ':')} ${value}`);
}

/**
 * Print a list item
 *
 * @param item - List item
 * @param indent - Indentation level
 */
export function printListItem(item: string, indent: number = 0): void {
  const prefix = '  '.repeat(indent) + '- ';
  console.log(theme.secondary(prefix) + item);
}

/**
 * Print a table
 *
 * @param headers - Table headers
 * @param rows - Table rows
 */
export function printTable(headers: string[], rows: string[][]): void {
  // Calculate column widths
  const widths = headers.map((h, i) => {
    const maxRow = Math.max(...rows.map((r) => (r[i] || '').length));
    return Math.max(h.length, maxRow);
  });

  // Print header
  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join('  ');
  console.log(theme.highlight(headerLine));
  console.log(theme.dim('-'.repeat(headerLine.length)));

  // Print rows
  for (const row of rows) {
    const rowLine = row.map((cell, i) => (cell || '').padEnd(widths[i])).join('  ');
    console.log(rowLine);
  }
}

// ─── Domain Output ───────────────────────────────────────

const DETECTED_FILE_LABELS: ReadonlyArray<readonly [DetectedFileKind, string]> = [
  ['html', 'HTML files'],
  ['python', 'Python files'],
  ['node', 'package.json'],
  ['manifest', 'netlify.toml'],
  ['envFile', '.env'],
  ['envExample', '.env.example'],
  ['gitignore', '.gitignore'],
  ['requirements', 'requirements.txt'],
];

function checkMark(present: boolean): string {
  return present ? theme.success('[x]') : theme.dim('[ ]');
}

/**
 * Print a project analysis
 */
export function printAnalysis(analysis: ProjectAnalysis): void {
  printSection('Project Analysis');
  printKeyValue('Path', analysis.root);
  printKeyValue('Type', analysis.typeLabel);
  printKeyValue('Files', analysis.fileCount);
  printKeyValue('Publish directory', analysis.publishDirectory);
  if (analysis.functionsDirectory) {
    printKeyValue('Functions directory', analysis.functionsDirectory);
  }
  if (analysis.buildCommand) {
    printKeyValue('Build command', analysis.buildCommand);
  }

  console.log();
  console.log(theme.highlight('  Detected:'));
  for (const [kind, label] of DETECTED_FILE_LABELS) {
    console.log(`    ${checkMark(analysis.detectedFiles[kind])} ${label}`);
  }

  if (analysis.requiredEnvVars.length > 0) {
    console.log();
    console.log(theme.highlight('  Environment variables needed:'));
    for (const name of analysis.requiredEnvVars) {
      printListItem(name, 2);
    }
  }
}

/**
 * Print which generated files were written or skipped
 */
export function printWriteResults(results: readonly FileWriteResult[]): void {
  for (const result of results) {
    if (result.status === 'written') {
      printSuccess(`Wrote ${result.file}`);
    } else {
      printInfo(`Skipped ${result.file} (already exists)`);
    }
  }
}

/**
 * Print indented file content for review before writing
 */
export function printPreview(content: string): void {
  for (const line of content.trimEnd().split('\n')) {
    console.log(theme.dim('    ') + line);
  }
}

/**
 * Print a deploy outcome, including CLI output when it failed
 */
export function printDeployOutcome(outcome: DeployOutcome): void {
  const label = outcome.target === 'production' ? 'Production deploy' : 'Preview deploy';

  if (!outcome.success) {
    printError(`${label} failed`);
    const detail = outcome.stderr.trim() || outcome.stdout.trim();
    if (detail) {
      console.log(theme.dim(detail));
    }
    return;
  }

  printSuccess(`${label} complete`);
  if (outcome.url) {
    printKeyValue('URL', theme.primary(outcome.url));
  } else {
    printWarning('No site URL found in the CLI output');
  }
}

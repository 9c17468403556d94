/**
 * Analyze command
 * Print how a project would be deployed
 */

import { Command } from 'commander';
import { analyzeProject } from '../../analyzer/index.js';
import { toErrorMessage } from '../../types/errors.js';
import { printAnalysis, printError, printHeader } from '../output.js';

export function createAnalyzeCommand(): Command {
  return new Command('analyze')
    .description('Detect the project type and what it needs to deploy')
    .argument('[path]', 'Project directory', '.')
    .option('--json', 'Output as JSON')
    .action(async (projectPath: string, options: { json?: boolean }) => {
      try {
        const analysis = await analyzeProject(projectPath);

        if (options.json) {
          console.log(JSON.stringify(analysis, null, 2));
          return;
        }

        printHeader('Deploy Studio');
        printAnalysis(analysis);
        console.log();
      } catch (error) {
        printError(toErrorMessage(error));
        process.exit(1);
      }
    });
}

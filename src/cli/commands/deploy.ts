/**
 * Deploy command
 * One-shot preview or production deploy of a project directory
 */

import { Command } from 'commander';
import { resolveProjectRoot } from '../../analyzer/index.js';
import { loadConfig } from '../../config/index.js';
import { INSTALL_HINT, netlifyCliFactory } from '../../deploy/index.js';
import { toErrorMessage } from '../../types/errors.js';
import {
  printDebug,
  printDeployOutcome,
  printError,
  printInfo,
  startSpinner,
  stopSpinner,
} from '../output.js';

export function createDeployCommand(): Command {
  return new Command('deploy')
    .description('Deploy a project with the Netlify CLI')
    .argument('[path]', 'Project directory', '.')
    .option('--prod', 'Deploy to production instead of a preview')
    .action(async (projectPath: string, options: { prod?: boolean }) => {
      try {
        const config = await loadConfig();
        const root = await resolveProjectRoot(projectPath);
        const cli = netlifyCliFactory(config.netlify)(root);

        if (!(await cli.isInstalled())) {
          printError('Netlify CLI not found');
          printInfo(`Install it with: ${INSTALL_HINT}`);
          process.exit(1);
        }

        const target = options.prod ? 'production' : 'preview';
        startSpinner(`Deploying ${root} (${target})...`);
        const outcome = await cli.deploy(target);
        stopSpinner();

        printDebug(outcome.stdout);
        printDeployOutcome(outcome);
        if (!outcome.success) {
          process.exit(1);
        }
      } catch (error) {
        stopSpinner();
        printError(toErrorMessage(error));
        process.exit(1);
      }
    });
}

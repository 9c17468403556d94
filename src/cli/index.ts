/**
 * CLI module index
 * Main entry point for the CLI interface
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import { loadConfig } from '../config/index.js';
import { netlifyCliFactory } from '../deploy/index.js';
import { toErrorMessage } from '../types/errors.js';
import {
  createAnalyzeCommand,
  createChatCommand,
  createConfigCommand,
  createDeployCommand,
  createGenerateCommand,
  createServeCommand,
  createSitesCommand,
  createTeamsCommand,
} from './commands/index.js';
import { runWizard } from './interactive.js';
import { printError, setVerbose } from './output.js';
import { createReadlinePrompter } from './prompts.js';

// Re-export
export * from './output.js';
export * from './prompts.js';
export * from './interactive.js';
export * from './commands/index.js';

/**
 * Package version - read from package.json
 */
const require = createRequire(import.meta.url);
const packageJson: unknown = require('../../package.json');
export const VERSION: string =
  typeof packageJson === 'object' &&
  packageJson !== null &&
  'version' in packageJson &&
  typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

async function startWizard(projectPath?: string): Promise<void> {
  const config = await loadConfig();
  const exitCode = await runWizard({
    projectPath,
    config,
    prompter: createReadlinePrompter(),
    createCli: netlifyCliFactory(config.netlify),
  });
  process.exit(exitCode);
}

/**
 * Create the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('deploy-studio')
    .description('Analyze a project, generate its Netlify config and deploy it')
    .version(VERSION)
    .option('-v, --verbose', 'Enable verbose output')
    .option('--no-color', 'Disable colored output');

  program.hook('preAction', async () => {
    const config = await loadConfig();
    setVerbose(program.opts<{ verbose?: boolean }>().verbose === true || config.output.verbose);
  });

  // Add commands
  program.addCommand(createAnalyzeCommand());
  program.addCommand(createGenerateCommand());
  program.addCommand(createDeployCommand());
  program.addCommand(createServeCommand());
  program.addCommand(createChatCommand());
  program.addCommand(createSitesCommand());
  program.addCommand(createTeamsCommand());
  program.addCommand(createConfigCommand());

  // Guided mode command
  program
    .command('wizard')
    .alias('w')
    .description('Step-by-step guided deploy')
    .argument('[path]', 'Project directory (skips the menu)')
    .action(async (projectPath?: string) => {
      await startWizard(projectPath);
    });

  // Default action (no command specified) - start the wizard
  program.action(async (_options, command: Command) => {
    if (command.args.length === 0) {
      await startWizard();
    }
  });

  return program;
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    printError(toErrorMessage(error));
    process.exit(1);
  }
}

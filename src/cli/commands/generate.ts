/**
 * Generate command
 * Write netlify.toml and the other deploy files without the wizard
 */

import { Command } from 'commander';
import { analyzeProject } from '../../analyzer/index.js';
import { loadConfig } from '../../config/index.js';
import { generateConfigFiles } from '../../generators/index.js';
import { toErrorMessage } from '../../types/errors.js';
import { printError, printHeader, printInfo, printWriteResults } from '../output.js';
import { createReadlinePrompter } from '../prompts.js';

interface GenerateCommandOptions {
  publish?: string;
  functions?: string;
  build?: string;
  gitignore: boolean;
  envExample: boolean;
  requirements: boolean;
  force?: boolean;
}

export function createGenerateCommand(): Command {
  return new Command('generate')
    .description('Generate netlify.toml, .gitignore, .env.example and requirements.txt')
    .argument('[path]', 'Project directory', '.')
    .option('-p, --publish <dir>', 'Publish directory (defaults to the detected one)')
    .option('--functions <dir>', 'Functions directory (defaults to the detected one)')
    .option('--build <command>', 'Build command (defaults to the detected one)')
    .option('--no-gitignore', 'Do not write .gitignore')
    .option('--no-env-example', 'Do not write .env.example')
    .option('--no-requirements', 'Do not write requirements.txt')
    .option('-f, --force', 'Overwrite existing files without asking')
    .action(async (projectPath: string, options: GenerateCommandOptions) => {
      try {
        const config = await loadConfig();
        const analysis = await analyzeProject(projectPath);
        const prompter = createReadlinePrompter();

        printHeader('Generate Deploy Files');
        printInfo(`Project: ${analysis.root} (${analysis.typeLabel})`);

        const results = await generateConfigFiles(analysis.root, {
          gitignore: options.gitignore,
          envExample: options.envExample,
          requirements: options.requirements,
          publishDirectory: options.publish ?? analysis.publishDirectory,
          functionsDirectory: options.functions ?? analysis.functionsDirectory,
          buildCommand: options.build ?? analysis.buildCommand,
          pythonVersion: config.netlify.python_version,
          envVars: analysis.requiredEnvVars,
          force: options.force,
          confirm: (file) => prompter.yesNo(`${file} already exists. Overwrite it?`, false),
        });

        printWriteResults(results);
      } catch (error) {
        printError(toErrorMessage(error));
        process.exit(1);
      }
    });
}

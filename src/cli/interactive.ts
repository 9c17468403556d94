/**
 * Interactive deploy wizard
 * Five steps: analyze, confirm settings, generate files, prepare the CLI, deploy
 */

import path from 'node:path';
import { analyzeProject } from '../analyzer/index.js';
import type { Config } from '../config/schema.js';
import { INSTALL_HINT, type NetlifyCli } from '../deploy/netlify-cli.js';
import {
  generateEnvExample,
  generateGitignore,
  generateNetlifyToml,
  generateRequirements,
  writeGeneratedFile,
  type FileWriteResult,
} from '../generators/index.js';
import { toErrorMessage } from '../types/errors.js';
import type { ProjectAnalysis } from '../types/project.js';
import {
  printAnalysis,
  printDeployOutcome,
  printError,
  printHeader,
  printInfo,
  printListItem,
  printPreview,
  printSuccess,
  printWarning,
  printWriteResults,
  startSpinner,
  stopSpinner,
  theme,
} from './output.js';
import { PromptCancelledError, type Prompter } from './prompts.js';

const TOTAL_STEPS = 5;

export interface WizardOptions {
  /** Skip the main menu and use this directory */
  projectPath?: string;
  config: Config;
  prompter: Prompter;
  createCli: (cwd: string) => NetlifyCli;
}

/**
 * Settings confirmed in step 2
 */
export interface DeploySettings {
  publishDirectory: string;
  functionsDirectory?: string;
  buildCommand?: string;
}

function printStep(step: number, title: string): void {
  console.log();
  console.log(theme.primary.bold(`[${step}/${TOTAL_STEPS}] ${title}`));
}

// ─── Main Menu ───────────────────────────────────────────

/**
 * Ask which directory to work on; null means the user chose to exit
 */
export async function chooseProjectPath(prompter: Prompter): Promise<string | null> {
  for (;;) {
    const action = await prompter.choice(
      'Which project do you want to deploy?',
      [
        { label: 'Enter a project path', value: 'path' },
        { label: 'Use the current directory', value: 'cwd' },
        { label: 'Browse from the current directory', value: 'browse' },
        { label: 'Exit', value: 'exit' },
      ],
      'cwd'
    );

    switch (action) {
      case 'exit':
        return null;
      case 'cwd':
        return '.';
      case 'browse': {
        const cwd = process.cwd();
        printInfo(`Current directory: ${cwd}`);
        return prompter.input('Project path', cwd);
      }
      case 'path': {
        const entered = await prompter.input('Project path');
        if (entered) {
          return entered;
        }
        printWarning('The path cannot be empty');
        break;
      }
    }
  }
}

// ─── Steps ───────────────────────────────────────────────

/**
 * Step 2: confirm publish directory, functions directory and build command
 */
export async function confirmSettings(
  analysis: ProjectAnalysis,
  prompter: Prompter,
  config: Config
): Promise<DeploySettings> {
  const { netlify } = config;
  const publishDirectory = await prompter.input(
    'Publish directory (where the static files are)',
    netlify.default_publish_dir
  );

  let functionsDirectory: string | undefined;
  if (analysis.detectedFiles.python) {
    if (analysis.functionsDirectory) {
      functionsDirectory = await prompter.input('Functions directory', analysis.functionsDirectory);
    } else if (await prompter.yesNo('Set up Python serverless functions?')) {
      functionsDirectory = await prompter.input('Functions directory', netlify.default_functions_dir);
    }
  }

  let buildCommand: string | undefined;
  if (analysis.detectedFiles.node) {
    buildCommand =
      (await prompter.input('Build command (leave empty for none)', netlify.default_build_command)) ||
      undefined;
  }

  return {
    publishDirectory,
    ...(functionsDirectory ? { functionsDirectory } : {}),
    ...(buildCommand ? { buildCommand } : {}),
  };
}

/**
 * Step 3: write the config files the project is missing
 *
 * netlify.toml is previewed and written over any existing file once the
 * user confirms; the other files are only offered when absent.
 */
export async function writeProjectFiles(
  analysis: ProjectAnalysis,
  settings: DeploySettings,
  prompter: Prompter,
  config: Config
): Promise<FileWriteResult[]> {
  const { root, detectedFiles, requiredEnvVars } = analysis;
  const results: FileWriteResult[] = [];
  const confirm = (file: string) => prompter.yesNo(`${file} already exists. Overwrite it?`, false);

  if (!detectedFiles.manifest || (await prompter.yesNo('Regenerate netlify.toml?', false))) {
    const content = generateNetlifyToml({
      ...settings,
      pythonVersion: config.netlify.python_version,
    });
    console.log();
    printInfo('netlify.toml preview:');
    printPreview(content);
    console.log();

    if (await prompter.yesNo('Write this file?')) {
      results.push(await writeGeneratedFile(root, 'netlify.toml', content, { force: true }));
    }
  }

  if (!detectedFiles.gitignore && (await prompter.yesNo('Create a .gitignore?'))) {
    results.push(await writeGeneratedFile(root, '.gitignore', generateGitignore(), { confirm }));
  }

  if (
    !detectedFiles.envExample &&
    requiredEnvVars.length > 0 &&
    (await prompter.yesNo('Create a .env.example?'))
  ) {
    results.push(
      await writeGeneratedFile(root, '.env.example', generateEnvExample(requiredEnvVars), { confirm })
    );
  }

  if (
    settings.functionsDirectory &&
    !detectedFiles.requirements &&
    (await prompter.yesNo('Create requirements.txt for the functions?'))
  ) {
    results.push(
      await writeGeneratedFile(
        root,
        path.posix.join(settings.functionsDirectory, 'requirements.txt'),
        generateRequirements(requiredEnvVars),
        { confirm }
      )
    );
  }

  printWriteResults(results);
  return results;
}

/**
 * Step 4: make sure the CLI is installed and logged in
 *
 * @returns `ready: false` when the wizard should stop, with the exit code to use
 */
export async function prepareCli(
  cli: NetlifyCli,
  prompter: Prompter
): Promise<{ ready: boolean; exitCode: number }> {
  if (!(await cli.isInstalled())) {
    printError('Netlify CLI not found');
    printInfo(`Install it with: ${INSTALL_HINT}`);
    printInfo('The config files are ready; you can deploy manually later');
    return { ready: false, exitCode: 0 };
  }
  printSuccess('Netlify CLI found');

  if (await cli.isLoggedIn()) {
    printSuccess('Logged in to Netlify');
    return { ready: true, exitCode: 0 };
  }

  printWarning('Not logged in to Netlify');
  if (await prompter.yesNo('Log in now?')) {
    printInfo('Opening a browser to log in...');
    const result = await cli.login(true);
    if (!result.success) {
      printError('Login failed');
      return { ready: false, exitCode: 1 };
    }
    printSuccess(result.message);
  }

  return { ready: true, exitCode: 0 };
}

/**
 * Step 5: optional site init and env vars, then preview and production deploys
 */
export async function runDeploySteps(
  analysis: ProjectAnalysis,
  cli: NetlifyCli,
  prompter: Prompter
): Promise<void> {
  if (!(await prompter.yesNo('Ready to deploy?'))) {
    printInfo('Deploy cancelled');
    printInfo(`You can deploy later with: ${cli.command} deploy`);
    return;
  }

  if (await prompter.yesNo('Initialize a new Netlify site?', true)) {
    const result = await cli.initSite();
    if (!result.success) {
      printWarning(result.message);
    }
  }

  if (analysis.requiredEnvVars.length > 0) {
    console.log();
    printInfo('The project needs these environment variables:');
    for (const name of analysis.requiredEnvVars) {
      printListItem(name, 2);
    }

    if (await prompter.yesNo('Set them on Netlify now?')) {
      for (const name of analysis.requiredEnvVars) {
        const value = await prompter.input(name);
        if (!value) continue;
        const result = await cli.setEnvVar(name, value);
        if (result.success) {
          printSuccess(`Set ${name}`);
        } else {
          printWarning(`Could not set ${name}; set it later in the Netlify dashboard`);
        }
      }
    }
  }

  startSpinner('Deploying preview...');
  const preview = await cli.deploy('preview');
  stopSpinner();
  printDeployOutcome(preview);
  if (!preview.success) {
    return;
  }

  if (await prompter.yesNo('Preview looks good? Deploy to production?')) {
    startSpinner('Deploying to production...');
    const production = await cli.deploy('production');
    stopSpinner();
    printDeployOutcome(production);
  }
}

// ─── Wizard ──────────────────────────────────────────────

async function runSteps(options: WizardOptions): Promise<number> {
  const { prompter, config } = options;

  const projectPath = options.projectPath ?? (await chooseProjectPath(prompter));
  if (projectPath === null) {
    printInfo('Goodbye!');
    return 0;
  }

  printStep(1, 'Analyze project');
  let analysis: ProjectAnalysis;
  try {
    analysis = await analyzeProject(projectPath);
  } catch (error) {
    printError(toErrorMessage(error));
    return 1;
  }
  printInfo(`Project path: ${analysis.root}`);
  printAnalysis(analysis);

  if (!(await prompter.yesNo('Does this look right? Continue?'))) {
    printInfo('Cancelled');
    return 0;
  }

  printStep(2, 'Confirm deploy settings');
  const settings = await confirmSettings(analysis, prompter, config);

  printStep(3, 'Generate config files');
  await writeProjectFiles(analysis, settings, prompter, config);

  printStep(4, 'Prepare deploy');
  const cli = options.createCli(analysis.root);
  const { ready, exitCode } = await prepareCli(cli, prompter);
  if (!ready) {
    return exitCode;
  }

  printStep(5, 'Deploy');
  await runDeploySteps(analysis, cli, prompter);

  printHeader('All done!');
  return 0;
}

/**
 * Run the wizard to completion
 *
 * @returns Process exit code; closing the input counts as a cancel (0)
 */
export async function runWizard(options: WizardOptions): Promise<number> {
  printHeader('Deploy Studio');

  try {
    return await runSteps(options);
  } catch (error) {
    stopSpinner();
    if (error instanceof PromptCancelledError) {
      console.log();
      printInfo('Cancelled');
      return 0;
    }
    throw error;
  }
}

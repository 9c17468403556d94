/**
 * Netlify CLI wrapper
 * Every call shells out to the configured `netlify` binary in the project directory
 */

import type { NetlifySettings } from '../config/schema.js';
import { runCommand, type CommandRunner } from './runner.js';
import {
  combinedOutput,
  interpretDeploy,
  isLoggedInOutput,
  isLoginSuccessOutput,
  isSiteCreatedOutput,
  isSiteLinkedOutput,
  isSiteUpdatedOutput,
  parseSites,
  parseTeams,
} from './output-parser.js';
import type {
  CliActionResult,
  CommandResult,
  CreateSiteOptions,
  DeployOutcome,
  DeployTarget,
  NetlifySite,
  NetlifyTeam,
} from '../types/netlify.js';

export const INSTALL_HINT = 'npm install -g netlify-cli';

export interface NetlifyCliOptions {
  /** Binary name or path */
  command?: string;
  runner?: CommandRunner;
}

function actionResult(
  success: boolean,
  message: string,
  result: CommandResult,
  extra: Partial<CliActionResult> = {}
): CliActionResult {
  return {
    success,
    message,
    stdout: result.stdout,
    stderr: result.stderr || (result.spawnError ?? ''),
    ...extra,
  };
}

export class NetlifyCli {
  readonly cwd: string;
  readonly command: string;
  private readonly runner: CommandRunner;

  constructor(cwd: string, options: NetlifyCliOptions = {}) {
    this.cwd = cwd;
    this.command = options.command ?? 'netlify';
    this.runner = options.runner ?? runCommand;
  }

  private exec(args: readonly string[], interactive = false): Promise<CommandResult> {
    return this.runner(this.command, args, { cwd: this.cwd, interactive });
  }

  /**
   * Installed CLI version string, or null when the binary is unavailable
   */
  async version(): Promise<string | null> {
    const result = await this.exec(['--version']);
    return result.exitCode === 0 ? result.stdout.trim() : null;
  }

  async isInstalled(): Promise<boolean> {
    return (await this.version()) !== null;
  }

  status(): Promise<CommandResult> {
    return this.exec(['status']);
  }

  async isLoggedIn(): Promise<boolean> {
    const result = await this.status();
    return isLoggedInOutput(result.stdout);
  }

  /**
   * Run `netlify login`. Interactive mode hands the terminal to the CLI,
   * which opens a browser for authorization.
   */
  async login(interactive = false): Promise<CliActionResult> {
    const result = await this.exec(['login'], interactive);
    const success = result.exitCode === 0 || isLoginSuccessOutput(combinedOutput(result));
    return actionResult(success, success ? 'Logged in to Netlify' : 'Login failed or was cancelled', result);
  }

  /**
   * Interactive `netlify init`, which links or creates a site through the CLI's own prompts
   */
  async initSite(): Promise<CliActionResult> {
    const result = await this.exec(['init'], true);
    const success = result.exitCode === 0;
    return actionResult(success, success ? 'Site initialized' : 'Site initialization failed', result);
  }

  /**
   * Create and link a new site unless the directory is already linked
   */
  async createSite(options: CreateSiteOptions = {}): Promise<CliActionResult> {
    const status = await this.status();
    if (isSiteLinkedOutput(status.stdout)) {
      return actionResult(true, 'Site already linked', status, { alreadyLinked: true });
    }

    const args = ['sites:create'];
    if (options.name) {
      args.push('--name', options.name);
    }
    if (options.accountSlug) {
      args.push('--account-slug', options.accountSlug);
    }

    const result = await this.exec(args);
    const success = result.exitCode === 0 || isSiteCreatedOutput(combinedOutput(result));
    return actionResult(success, success ? 'Site created and linked' : 'Failed to create site', result);
  }

  /**
   * Rename the linked site, which changes its `<name>.netlify.app` address
   */
  async updateSiteName(name: string): Promise<CliActionResult> {
    const result = await this.exec(['sites:update', '--name', name]);
    const success = result.exitCode === 0 || isSiteUpdatedOutput(result.stdout);
    return actionResult(
      success,
      success ? `Domain updated to ${name}.netlify.app` : 'Failed to update site name',
      result
    );
  }

  async setEnvVar(key: string, value: string): Promise<CliActionResult> {
    const result = await this.exec(['env:set', key, value]);
    const success = result.exitCode === 0;
    return actionResult(success, success ? `Set ${key}` : `Failed to set ${key}`, result);
  }

  async deploy(target: DeployTarget): Promise<DeployOutcome> {
    const args = target === 'production' ? ['deploy', '--prod'] : ['deploy'];
    return interpretDeploy(await this.exec(args), target);
  }

  async listTeams(): Promise<NetlifyTeam[]> {
    return parseTeams(await this.exec(['teams:list', '--json']));
  }

  async listSites(limit = 10): Promise<NetlifySite[]> {
    return parseSites(await this.exec(['sites:list', '--json']), limit);
  }

  /**
   * Pass arbitrary arguments through to the CLI. A leading `netlify` is
   * dropped so the configured binary is always the one that runs.
   */
  run(args: readonly string[]): Promise<CommandResult> {
    const rest = args[0] === 'netlify' ? args.slice(1) : args;
    return this.exec(rest);
  }
}

/**
 * Factory bound to the configured binary, for callers that work on many directories
 */
export function netlifyCliFactory(
  settings: Pick<NetlifySettings, 'command'>,
  runner?: CommandRunner
): (cwd: string) => NetlifyCli {
  return (cwd) => new NetlifyCli(cwd, { command: settings.command, runner });
}

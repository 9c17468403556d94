/**
 * Netlify CLI wrapper type definitions
 */

export type DeployTarget = 'preview' | 'production';

/**
 * Captured outcome of one CLI invocation
 */
export interface CommandResult {
  /** null when the process never started or was killed by a signal */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Set when the process could not be spawned (e.g. binary not on PATH) */
  spawnError?: string;
}

/**
 * Interpreted deploy result
 */
export interface DeployOutcome {
  success: boolean;
  target: DeployTarget;
  url?: string;
  stdout: string;
  stderr: string;
}

export interface NetlifyTeam {
  name: string;
  slug: string;
  id: string;
}

export interface NetlifySite {
  name: string;
  url: string;
  /** YYYY-MM-DD, empty when unknown */
  updated: string;
}

/**
 * Outcome of a non-deploy CLI action (login, site creation, env var)
 */
export interface CliActionResult {
  success: boolean;
  message: string;
  stdout: string;
  stderr: string;
  /** createSite found an existing link and ran nothing */
  alreadyLinked?: boolean;
}

export interface CreateSiteOptions {
  name?: string;
  /** Team slug; avoids the CLI's team prompt */
  accountSlug?: string;
}

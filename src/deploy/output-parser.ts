/**
 * Netlify CLI output interpretation
 *
 * The CLI has no stable machine-readable contract for deploy or login
 * output, so these are phrase matches against its human-readable text.
 * They are a compatibility shim tied to the CLI's wording and may need
 * updating when that wording changes.
 */

import { z } from 'zod';
import { ExternalToolError, ParseError } from '../types/errors.js';
import type {
  CommandResult,
  DeployOutcome,
  DeployTarget,
  NetlifySite,
  NetlifyTeam,
} from '../types/netlify.js';

// ─── Text Helpers ────────────────────────────────────────

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;
const NETLIFY_URL_PATTERN = /https:\/\/[^\s]+netlify[^\s]*/;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

/** stdout and stderr joined; the CLI prints some results on stderr */
export function combinedOutput(result: CommandResult): string {
  return `${result.stdout}\n${result.stderr}`;
}

/** Last whitespace-separated token on the line carrying a URL scheme */
function lastUrlToken(line: string): string | undefined {
  const tokens = line.split(/\s+/).filter(Boolean);
  for (let i = tokens.length - 1; i >= 0; i--) {
    if (/^https?:\/\//.test(tokens[i])) {
      return tokens[i];
    }
  }
  return undefined;
}

// ─── Deploy ──────────────────────────────────────────────

export interface DeployUrls {
  /** From a "Website URL" / "Website draft URL" line */
  websiteUrl?: string;
  /** From a "Deploy URL" / "Unique deploy URL" line */
  deployUrl?: string;
  /** Any other https URL mentioning netlify */
  netlifyUrl?: string;
}

/**
 * Scan output line by line; the first match of each heuristic wins
 */
export function extractDeployUrls(output: string): DeployUrls {
  const urls: DeployUrls = {};

  for (const rawLine of stripAnsi(output).split('\n')) {
    const lower = rawLine.toLowerCase();

    if (lower.includes('website') && lower.includes('url')) {
      urls.websiteUrl ??= lastUrlToken(rawLine);
    } else if (lower.includes('deploy') && lower.includes('url')) {
      urls.deployUrl ??= lastUrlToken(rawLine);
    } else if (rawLine.includes('https://') && rawLine.includes('netlify')) {
      urls.netlifyUrl ??= rawLine.match(NETLIFY_URL_PATTERN)?.[0];
    }
  }

  return urls;
}

/**
 * Preferred URL: website line, then deploy line, then any netlify link
 */
export function extractDeployUrl(output: string): string | undefined {
  const { websiteUrl, deployUrl, netlifyUrl } = extractDeployUrls(output);
  return websiteUrl ?? deployUrl ?? netlifyUrl;
}

/**
 * Decide whether a deploy worked.
 *
 * Exit code 0 is success. A recognizable URL is also success even with a
 * non-zero exit or warnings on stderr, since the CLI can exit noisily after
 * a deploy that went through.
 */
export function interpretDeploy(result: CommandResult, target: DeployTarget): DeployOutcome {
  if (result.spawnError) {
    return {
      success: false,
      target,
      stdout: result.stdout,
      stderr: result.stderr || result.spawnError,
    };
  }

  const url = extractDeployUrl(combinedOutput(result));

  return {
    success: result.exitCode === 0 || url !== undefined,
    target,
    ...(url ? { url } : {}),
    stdout: result.stdout,
    stderr: result.stderr,
  };
}

// ─── Status Phrases ──────────────────────────────────────

export function isLoggedInOutput(stdout: string): boolean {
  const lower = stripAnsi(stdout).toLowerCase();
  return lower.includes('logged in') && !lower.includes('not logged in');
}

export function isLoginSuccessOutput(output: string): boolean {
  const text = stripAnsi(output);
  return isLoggedInOutput(text) || text.includes('Successfully');
}

export function isSiteLinkedOutput(stdout: string): boolean {
  const lower = stripAnsi(stdout).toLowerCase();
  return lower.includes('current site') || lower.includes('current project');
}

const SITE_CREATED_PHRASES = ['Project Created', 'Site Created', 'Linked to'];

export function isSiteCreatedOutput(output: string): boolean {
  const text = stripAnsi(output);
  return SITE_CREATED_PHRASES.some((phrase) => text.includes(phrase));
}

const SITE_UPDATED_PHRASES = ['Site updated', 'Project updated'];

export function isSiteUpdatedOutput(output: string): boolean {
  const text = stripAnsi(output);
  return SITE_UPDATED_PHRASES.some((phrase) => text.includes(phrase));
}

// ─── JSON Listings ───────────────────────────────────────

const TeamListSchema = z.array(
  z.object({
    name: z.string().optional(),
    slug: z.string().optional(),
    id: z.string().optional(),
  })
);

const SiteListSchema = z.array(
  z.object({
    name: z.string().optional(),
    ssl_url: z.string().nullish(),
    url: z.string().nullish(),
    updated_at: z.string().nullish(),
  })
);

function parseJsonListing<T>(result: CommandResult, schema: z.ZodType<T>, what: string): T {
  if (!result.stdout.trim()) {
    throw new ExternalToolError(`Could not get ${what} from the Netlify CLI`, {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr || result.spawnError,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(result.stdout);
  } catch {
    throw new ParseError(`Failed to parse ${what}: output is not JSON`, result.stdout);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new ParseError(`Failed to parse ${what}: unexpected shape`, result.stdout);
  }
  return parsed.data;
}

/**
 * Parse `netlify teams:list --json`
 */
export function parseTeams(result: CommandResult): NetlifyTeam[] {
  return parseJsonListing(result, TeamListSchema, 'team list').map((team) => ({
    name: team.name ?? 'Unknown',
    slug: team.slug ?? '',
    id: team.id ?? '',
  }));
}

/**
 * Parse `netlify sites:list --json`, keeping the first `limit` entries
 */
export function parseSites(result: CommandResult, limit = 10): NetlifySite[] {
  return parseJsonListing(result, SiteListSchema, 'site list')
    .slice(0, limit)
    .map((site) => {
      const name = site.name ?? 'Unknown';
      return {
        name,
        url: site.ssl_url || site.url || `https://${site.name ?? ''}.netlify.app`,
        updated: site.updated_at ? site.updated_at.slice(0, 10) : '',
      };
    });
}

/**
 * JSON API route handlers for the web UI
 *
 * Each handler takes the parsed request body (or query) and resolves to a
 * `{ success, ... }` object. Handlers never throw: validation failures and
 * errors from the lower layers come back as `{ success: false, error }`.
 */

import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import type { Config } from '../config/schema.js';
import { chatSettingsFor } from '../adapters/index.js';
import {
  IGNORED_DIRS,
  findFileByName,
  resolveInsideRoot,
  resolveProjectRoot,
} from '../analyzer/scanner.js';
import type { NetlifyCli } from '../deploy/netlify-cli.js';
import type { FileWriteResult, GenerateOptions } from '../generators/index.js';
import { AIProviderSchema, type AIProvider, type ChatRequest, type ChatResult, type ChatSettings } from '../types/chat.js';
import { FileReadError, toErrorMessage } from '../types/errors.js';
import type { CommandResult } from '../types/netlify.js';
import type { ProjectAnalysis } from '../types/project.js';

/**
 * Every API response carries `success`; failures also carry `error`
 */
export interface ApiResponse {
  success: boolean;
  error?: string;
  [key: string]: unknown;
}

export type RouteHandler = (input: unknown) => Promise<ApiResponse>;

/**
 * Collaborators the handlers call; tests pass fakes
 */
export interface HandlerDeps {
  analyze: (projectPath: string) => Promise<ProjectAnalysis>;
  generate: (projectPath: string, options: GenerateOptions) => Promise<FileWriteResult[]>;
  createCli: (cwd: string) => NetlifyCli;
  chat: (request: ChatRequest, settings: ChatSettings) => Promise<ChatResult>;
  testConnection: (provider: AIProvider, apiKey: string, settings: ChatSettings) => Promise<ChatResult>;
  settings: Config;
}

export interface RouteHandlers {
  browseFolder: RouteHandler;
  analyze: RouteHandler;
  readFile: RouteHandler;
  generate: RouteHandler;
  listTeams: RouteHandler;
  listSites: RouteHandler;
  checkCli: RouteHandler;
  login: RouteHandler;
  initSite: RouteHandler;
  updateDomain: RouteHandler;
  deploy: RouteHandler;
  runCommand: RouteHandler;
  chat: RouteHandler;
  testConnection: RouteHandler;
}

// ─── Request Schemas ─────────────────────────────────────

const MISSING_PATH = 'Missing project path';
const MISSING_FILE_NAME = 'Missing file name';
const MISSING_SITE_NAME = 'Please enter a new site name';
const MISSING_COMMAND = 'No command given';

/** Messages written for end users; reported without a field prefix */
const USER_MESSAGES: ReadonlySet<string> = new Set([
  MISSING_PATH,
  MISSING_FILE_NAME,
  MISSING_SITE_NAME,
  MISSING_COMMAND,
]);

const requiredString = (message: string) =>
  z.string({ required_error: message, invalid_type_error: message }).min(1, message);

const BrowseQuerySchema = z.object({
  path: z.string().optional(),
});

const AnalyzeBodySchema = z.object({
  path: z.string().min(1).default('.'),
});

const ReadFileBodySchema = z.object({
  path: requiredString(MISSING_PATH),
  filename: requiredString(MISSING_FILE_NAME),
});

const GenerateBodySchema = z.object({
  path: requiredString(MISSING_PATH),
  config: z
    .object({
      netlify_toml: z.boolean().optional(),
      gitignore: z.boolean().optional(),
      env_example: z.boolean().optional(),
      requirements: z.boolean().optional(),
      publish_dir: z.string().optional(),
      functions_dir: z.string().nullish(),
      build_command: z.string().nullish(),
      env_vars: z.array(z.string()).optional(),
    })
    .default({}),
});

const InitSiteBodySchema = z.object({
  path: requiredString(MISSING_PATH),
  site_name: z.string().optional(),
  account_slug: z.string().optional(),
});

const UpdateDomainBodySchema = z.object({
  path: requiredString(MISSING_PATH),
  new_name: requiredString(MISSING_SITE_NAME),
});

const DeployBodySchema = z.object({
  path: requiredString(MISSING_PATH),
  type: z.enum(['preview', 'production']).default('preview'),
});

const RunCommandBodySchema = z.object({
  path: z.string().min(1).default('.'),
  command: z
    .array(z.string(), { required_error: MISSING_COMMAND })
    .min(1, MISSING_COMMAND),
});

const ChatBodySchema = z.object({
  message: z.string().default(''),
  provider: z.string().optional(),
  api_key: z.string().default(''),
  context: z.string().nullish(),
});

const TestConnectionBodySchema = z.object({
  provider: z.string().optional(),
  api_key: z.string().default(''),
});

// ─── Helpers ─────────────────────────────────────────────

function fail(error: string): ApiResponse {
  return { success: false, error };
}

function commandError(result: CommandResult): string {
  if (result.spawnError) return result.spawnError;
  return result.exitCode === null ? 'Command was terminated' : `Command exited with code ${result.exitCode}`;
}

function describeIssues(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'Invalid request';
  if (USER_MESSAGES.has(issue.message) || issue.path.length === 0) return issue.message;
  return `${issue.path.join('.')}: ${issue.message}`;
}

/**
 * Validate input against a schema and run the handler body; any throw
 * becomes a failure response
 */
function route<S extends z.ZodTypeAny>(
  schema: S,
  body: (input: z.output<S>) => Promise<ApiResponse>
): RouteHandler {
  return async (input) => {
    const parsed = schema.safeParse(input ?? {});
    if (!parsed.success) {
      return fail(describeIssues(parsed.error));
    }
    try {
      return await body(parsed.data);
    } catch (error) {
      return fail(toErrorMessage(error));
    }
  };
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

async function readTextFile(filePath: string): Promise<string> {
  const buffer = await fs.readFile(filePath);
  try {
    return utf8.decode(buffer);
  } catch {
    throw new FileReadError(filePath, 'Cannot read a binary file');
  }
}

async function isFile(filePath: string): Promise<boolean> {
  const stat = await fs.stat(filePath).catch(() => null);
  return stat?.isFile() ?? false;
}

// ─── Handlers ────────────────────────────────────────────

export function createRouteHandlers(deps: HandlerDeps): RouteHandlers {
  const { settings } = deps;

  const cliFor = async (projectPath: string): Promise<NetlifyCli> =>
    deps.createCli(await resolveProjectRoot(projectPath));

  const resolveProvider = (provider: string | undefined): AIProvider | null => {
    const parsed = AIProviderSchema.safeParse(provider ?? settings.ai.default_provider);
    return parsed.success ? parsed.data : null;
  };

  return {
    // Lists subdirectories so the page can offer a folder picker
    browseFolder: route(BrowseQuerySchema, async ({ path: requested }) => {
      const dir = await resolveProjectRoot(requested || os.homedir());
      const entries = await fs.readdir(dir, { withFileTypes: true });
      const directories = entries
        .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.') && !IGNORED_DIRS.has(entry.name))
        .map((entry) => entry.name)
        .sort((a, b) => a.localeCompare(b));
      const parent = path.dirname(dir);

      return {
        success: true,
        path: dir,
        parent: parent === dir ? null : parent,
        directories,
      };
    }),

    analyze: route(AnalyzeBodySchema, async ({ path: projectPath }) => {
      const analysis = await deps.analyze(projectPath);
      return { success: true, analysis, fileTree: analysis.fileList };
    }),

    readFile: route(ReadFileBodySchema, async ({ path: projectPath, filename }) => {
      const root = await resolveProjectRoot(projectPath);
      const direct = resolveInsideRoot(root, filename);

      let filePath: string | null = (await isFile(direct)) ? direct : null;
      if (!filePath) {
        const found = await findFileByName(root, path.basename(filename));
        filePath = found ? path.join(root, found) : null;
      }
      if (!filePath) {
        return fail(`File not found: ${filename}`);
      }

      const content = await readTextFile(filePath);
      return {
        success: true,
        file: path.relative(root, filePath).split(path.sep).join('/'),
        content,
      };
    }),

    // The page shows its own preview, so existing files are overwritten
    generate: route(GenerateBodySchema, async ({ path: projectPath, config }) => {
      const results = await deps.generate(projectPath, {
        netlifyToml: config.netlify_toml,
        gitignore: config.gitignore,
        envExample: config.env_example,
        requirements: config.requirements,
        publishDirectory: config.publish_dir ?? settings.netlify.default_publish_dir,
        functionsDirectory: config.functions_dir ?? undefined,
        buildCommand: config.build_command ?? undefined,
        pythonVersion: settings.netlify.python_version,
        envVars: config.env_vars ?? [],
        force: true,
      });
      return { success: true, results };
    }),

    listTeams: route(z.unknown(), async () => {
      const teams = await deps.createCli(process.cwd()).listTeams();
      return { success: true, teams };
    }),

    listSites: route(z.unknown(), async () => {
      const sites = await deps.createCli(process.cwd()).listSites(settings.netlify.sites_limit);
      return { success: true, sites };
    }),

    checkCli: route(z.unknown(), async () => {
      const cli = deps.createCli(process.cwd());
      const cliInstalled = await cli.isInstalled();
      const loggedIn = cliInstalled ? await cli.isLoggedIn() : false;
      return { success: true, cliInstalled, loggedIn };
    }),

    login: route(z.unknown(), async () => {
      const cli = deps.createCli(process.cwd());
      if (await cli.isLoggedIn()) {
        return { success: true, message: 'Already logged in to Netlify', stdout: '' };
      }
      const result = await cli.login();
      return result.success ? { ...result } : { ...result, error: result.message };
    }),

    initSite: route(InitSiteBodySchema, async ({ path: projectPath, site_name, account_slug }) => {
      const cli = await cliFor(projectPath);
      const result = await cli.createSite({ name: site_name, accountSlug: account_slug });
      return result.success ? { ...result } : { ...result, error: result.message };
    }),

    updateDomain: route(UpdateDomainBodySchema, async ({ path: projectPath, new_name }) => {
      const cli = await cliFor(projectPath);
      const result = await cli.updateSiteName(new_name);
      return result.success ? { ...result } : { ...result, error: result.message };
    }),

    deploy: route(DeployBodySchema, async ({ path: projectPath, type }) => {
      const cli = await cliFor(projectPath);
      const outcome = await cli.deploy(type);
      return {
        success: outcome.success,
        url: outcome.url ?? null,
        stdout: outcome.stdout,
        stderr: outcome.stderr,
        ...(outcome.success ? {} : { error: 'Deploy failed' }),
      };
    }),

    runCommand: route(RunCommandBodySchema, async ({ path: projectPath, command }) => {
      const cli = await cliFor(projectPath);
      const result = await cli.run(command);
      const success = result.exitCode === 0;
      return {
        success,
        stdout: result.stdout,
        stderr: result.stderr || (result.spawnError ?? ''),
        ...(success ? {} : { error: commandError(result) }),
      };
    }),

    chat: route(ChatBodySchema, async (body) => {
      const provider = resolveProvider(body.provider);
      if (!provider) {
        return fail(`Unsupported AI provider: ${body.provider ?? ''}`);
      }
      const result = await deps.chat(
        {
          provider,
          apiKey: body.api_key,
          message: body.message,
          ...(body.context ? { context: body.context } : {}),
        },
        chatSettingsFor(settings.ai, provider)
      );
      return { ...result };
    }),

    testConnection: route(TestConnectionBodySchema, async (body) => {
      const provider = resolveProvider(body.provider);
      if (!provider) {
        return fail(`Unsupported AI provider: ${body.provider ?? ''}`);
      }
      const result = await deps.testConnection(provider, body.api_key, chatSettingsFor(settings.ai, provider));
      return { ...result };
    }),
  };
}

/**
 * Configuration management module
 * Handles loading, merging, and validating configuration from multiple sources
 */

import { cosmiconfig } from 'cosmiconfig';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';
import { ConfigSchema, type Config } from './schema.js';
import { AIProviderSchema } from '../types/chat.js';
import {
  DEFAULT_CONFIG,
  CONFIG_FILE_NAMES,
  GLOBAL_CONFIG_DIR,
  CONFIG_FILE_NAME,
  ENV_VARS,
} from './defaults.js';

// Re-export schema types
export * from './schema.js';
export * from './defaults.js';

type ConfigTree = Record<string, unknown>;

export interface LoadConfigOptions {
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Home directory holding the global config (defaults to os.homedir()) */
  homeDir?: string;
}

/**
 * Configuration loader using cosmiconfig
 */
const explorer = cosmiconfig('deploystudio', {
  searchPlaces: CONFIG_FILE_NAMES,
  cache: false,
  loaders: {
    '.yaml': (_filepath: string, content: string) => parseYaml(content),
    '.yml': (_filepath: string, content: string) => parseYaml(content),
    noExt: (_filepath: string, content: string) => parseYaml(content),
  },
});

function isConfigTree(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load global configuration from ~/.deploy-studio/config.yaml
 */
async function loadGlobalConfig(homeDir: string): Promise<ConfigTree> {
  const globalConfigPath = path.join(homeDir, GLOBAL_CONFIG_DIR, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await fs.readFile(globalConfigPath, 'utf-8');
  } catch {
    // No global config
    return {};
  }

  const parsed: unknown = parseYaml(content);
  return isConfigTree(parsed) ? parsed : {};
}

/**
 * Load project-specific configuration
 */
async function loadProjectConfig(cwd?: string): Promise<ConfigTree> {
  const result = await explorer.search(cwd);
  if (!result || result.isEmpty) {
    return {};
  }
  const parsed: unknown = result.config;
  return isConfigTree(parsed) ? parsed : {};
}

/**
 * Load configuration overrides from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigTree {
  const server: ConfigTree = {};
  const netlify: ConfigTree = {};
  const ai: ConfigTree = {};
  const output: ConfigTree = {};

  const host = env[ENV_VARS.HOST];
  if (host) {
    server.host = host;
  }

  const port = env[ENV_VARS.PORT];
  if (port) {
    const parsed = parseInt(port, 10);
    if (!isNaN(parsed) && parsed >= 0 && parsed <= 65535) {
      server.port = parsed;
    }
  }

  const netlifyBin = env[ENV_VARS.NETLIFY_BIN];
  if (netlifyBin) {
    netlify.command = netlifyBin;
  }

  const provider = AIProviderSchema.safeParse(env[ENV_VARS.AI_PROVIDER]);
  if (provider.success) {
    ai.default_provider = provider.data;
  }

  if (env[ENV_VARS.LOG_LEVEL] === 'debug') {
    output.verbose = true;
  }

  const config: ConfigTree = {};
  if (Object.keys(server).length > 0) config.server = server;
  if (Object.keys(netlify).length > 0) config.netlify = netlify;
  if (Object.keys(ai).length > 0) config.ai = ai;
  if (Object.keys(output).length > 0) config.output = output;
  return config;
}

/**
 * Deep merge configuration objects; arrays and scalars in source replace target
 */
export function deepMerge(target: ConfigTree, source: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isConfigTree(sourceValue) && isConfigTree(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined && sourceValue !== null) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Load and merge configuration from all sources
 * Priority: env vars > project config > global config > defaults
 */
export async function loadConfig(cwd?: string, options: LoadConfigOptions = {}): Promise<Config> {
  const globalConfig = await loadGlobalConfig(options.homeDir ?? homedir());
  const projectConfig = await loadProjectConfig(cwd);
  const envConfig = loadEnvConfig(options.env);

  let merged = deepMerge(DEFAULT_CONFIG, globalConfig);
  merged = deepMerge(merged, projectConfig);
  merged = deepMerge(merged, envConfig);

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    console.warn('Configuration validation warnings:', result.error.format());
    return DEFAULT_CONFIG;
  }

  return result.data;
}

/**
 * Save configuration to file
 *
 * @returns Path of the written file
 */
export async function saveConfig(
  config: ConfigTree,
  options: { global?: boolean; cwd?: string; homeDir?: string } = {}
): Promise<string> {
  const configPath = options.global
    ? path.join(options.homeDir ?? homedir(), GLOBAL_CONFIG_DIR, CONFIG_FILE_NAME)
    : path.join(options.cwd ?? process.cwd(), GLOBAL_CONFIG_DIR, CONFIG_FILE_NAME);

  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, stringifyYaml(config), 'utf-8');

  return configPath;
}

/**
 * Get a specific config value by dotted path (e.g. `server.port`)
 */
export function getConfigValue(config: Config, keyPath: string): unknown {
  let current: unknown = config;

  for (const key of keyPath.split('.')) {
    if (!isConfigTree(current)) {
      return undefined;
    }
    current = current[key];
  }

  return current;
}

/**
 * Search for the project config file; null when only defaults apply
 */
export async function findConfigPath(cwd?: string): Promise<string | null> {
  const result = await explorer.search(cwd);
  return result?.filepath ?? null;
}

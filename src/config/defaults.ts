/**
 * Default configuration values
 */

import type { Config } from './schema.js';

/**
 * Default configuration object
 */
export const DEFAULT_CONFIG: Config = {
  server: {
    host: '127.0.0.1',
    port: 5886,
    open_browser: true,
    browser_delay_ms: 1500,
  },
  netlify: {
    command: 'netlify',
    default_publish_dir: '.',
    default_functions_dir: 'netlify/functions',
    default_build_command: 'npm run build',
    python_version: '3.10',
    sites_limit: 10,
  },
  ai: {
    default_provider: 'openai',
    timeout_ms: 30000,
    max_tokens: 1000,
    temperature: 0.7,
    models: {
      openai: 'gpt-4o-mini',
      anthropic: 'claude-3-haiku-20240307',
      google: 'gemini-2.5-flash',
    },
  },
  output: {
    verbose: false,
  },
};

/**
 * Configuration file names searched in the project directory
 */
export const CONFIG_FILE_NAMES = [
  'deploy-studio.config.yaml',
  'deploy-studio.config.yml',
  '.deploystudiorc.yaml',
  '.deploystudiorc.yml',
  '.deploystudiorc',
  '.deploy-studio/config.yaml',
  '.deploy-studio/config.yml',
];

/**
 * Global config directory, relative to the home directory
 */
export const GLOBAL_CONFIG_DIR = '.deploy-studio';

/**
 * Config file name in the config directory
 */
export const CONFIG_FILE_NAME = 'config.yaml';

/**
 * Environment variable names
 */
export const ENV_VARS = {
  HOST: 'DEPLOY_STUDIO_HOST',
  PORT: 'DEPLOY_STUDIO_PORT',
  NETLIFY_BIN: 'DEPLOY_STUDIO_NETLIFY_BIN',
  AI_PROVIDER: 'DEPLOY_STUDIO_AI_PROVIDER',
  LOG_LEVEL: 'DEPLOY_STUDIO_LOG_LEVEL',
  OPENAI_KEY: 'DEPLOY_STUDIO_OPENAI_KEY',
  ANTHROPIC_KEY: 'DEPLOY_STUDIO_ANTHROPIC_KEY',
  GOOGLE_KEY: 'DEPLOY_STUDIO_GOOGLE_KEY',
} as const;

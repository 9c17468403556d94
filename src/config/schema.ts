/**
 * Configuration schema definitions using Zod
 */

import { z } from 'zod';
import { AIProviderSchema } from '../types/chat.js';

/**
 * Local web UI settings
 */
export const ServerSettingsSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(0).max(65535).default(5886),
  open_browser: z.boolean().default(true),
  browser_delay_ms: z.number().int().min(0).default(1500),
});

/**
 * Netlify CLI and generated-config defaults
 */
export const NetlifySettingsSchema = z.object({
  command: z.string().min(1).default('netlify'),
  default_publish_dir: z.string().default('.'),
  default_functions_dir: z.string().default('netlify/functions'),
  default_build_command: z.string().default('npm run build'),
  python_version: z.string().default('3.10'),
  sites_limit: z.number().int().min(1).max(100).default(10),
});

/**
 * Model per chat provider
 */
export const AIModelsSchema = z.object({
  openai: z.string().default('gpt-4o-mini'),
  anthropic: z.string().default('claude-3-haiku-20240307'),
  google: z.string().default('gemini-2.5-flash'),
});

/**
 * Chat proxy settings
 */
export const AISettingsSchema = z.object({
  default_provider: AIProviderSchema.default('openai'),
  timeout_ms: z.number().int().min(1000).max(300000).default(30000),
  max_tokens: z.number().int().min(1).max(32000).default(1000),
  temperature: z.number().min(0).max(2).default(0.7),
  models: AIModelsSchema.default({
    openai: 'gpt-4o-mini',
    anthropic: 'claude-3-haiku-20240307',
    google: 'gemini-2.5-flash',
  }),
});

/**
 * Output settings schema
 */
export const OutputSettingsSchema = z.object({
  verbose: z.boolean().default(false),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  server: ServerSettingsSchema.default({
    host: '127.0.0.1',
    port: 5886,
    open_browser: true,
    browser_delay_ms: 1500,
  }),
  netlify: NetlifySettingsSchema.default({
    command: 'netlify',
    default_publish_dir: '.',
    default_functions_dir: 'netlify/functions',
    default_build_command: 'npm run build',
    python_version: '3.10',
    sites_limit: 10,
  }),
  ai: AISettingsSchema.default({
    default_provider: 'openai',
    timeout_ms: 30000,
    max_tokens: 1000,
    temperature: 0.7,
    models: {
      openai: 'gpt-4o-mini',
      anthropic: 'claude-3-haiku-20240307',
      google: 'gemini-2.5-flash',
    },
  }),
  output: OutputSettingsSchema.default({
    verbose: false,
  }),
});

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type ServerSettings = z.infer<typeof ServerSettingsSchema>;
export type NetlifySettings = z.infer<typeof NetlifySettingsSchema>;
export type AISettings = z.infer<typeof AISettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;

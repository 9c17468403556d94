/**
 * Chat proxy type definitions
 */

import { z } from 'zod';

/**
 * Supported AI chat providers
 */
export const AIProviderSchema = z.enum(['openai', 'anthropic', 'google']);
export type AIProvider = z.infer<typeof AIProviderSchema>;

export const AI_PROVIDERS: readonly AIProvider[] = AIProviderSchema.options;

/**
 * A single stateless chat request
 */
export interface ChatRequest {
  provider: AIProvider;
  apiKey: string;
  message: string;
  /** Free-text project information, usually a summary of the analysis */
  context?: string;
}

/**
 * Per-call tuning; normally taken from the `ai` config section
 */
export interface ChatSettings {
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

/**
 * Boundary-facing chat result
 */
export interface ChatResult {
  success: boolean;
  reply?: string;
  error?: string;
  status?: number;
}

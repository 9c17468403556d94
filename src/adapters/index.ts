/**
 * Adapters module - chat proxy over the supported AI providers
 */

import type { AISettings } from '../config/schema.js';
import type { AIProvider, ChatRequest, ChatResult, ChatSettings } from '../types/chat.js';
import { ProviderError, toErrorMessage } from '../types/errors.js';
import * as anthropic from './anthropic.js';
import * as google from './google.js';
import * as openai from './openai.js';
import { CONNECTION_TEST_MESSAGE } from './prompts.js';

export * from './prompts.js';

type ChatFn = (request: ChatRequest, settings: ChatSettings) => Promise<string>;

const PROVIDERS: Record<AIProvider, ChatFn> = {
  openai: openai.chat,
  anthropic: anthropic.chat,
  google: google.chat,
};

/**
 * Per-call settings for a provider, taken from the `ai` config section
 */
export function chatSettingsFor(ai: AISettings, provider: AIProvider): ChatSettings {
  return {
    model: ai.models[provider],
    maxTokens: ai.max_tokens,
    temperature: ai.temperature,
    timeoutMs: ai.timeout_ms,
  };
}

/**
 * Dispatch one request to its provider
 *
 * @throws ProviderError on failure
 */
export function chat(request: ChatRequest, settings: ChatSettings): Promise<string> {
  return PROVIDERS[request.provider](request, settings);
}

/**
 * Chat without throwing; failures come back as `{ success: false, error }`
 */
export async function sendChat(request: ChatRequest, settings: ChatSettings): Promise<ChatResult> {
  if (!request.message.trim()) {
    return { success: false, error: 'Please enter a message' };
  }
  if (!request.apiKey) {
    return { success: false, error: 'Please set an API key first' };
  }

  try {
    const reply = await chat(request, settings);
    return { success: true, reply };
  } catch (error) {
    if (error instanceof ProviderError) {
      return {
        success: false,
        error: error.message,
        ...(error.status !== undefined ? { status: error.status } : {}),
      };
    }
    return { success: false, error: toErrorMessage(error) };
  }
}

/**
 * Check a key by sending a fixed check message
 */
export function testConnection(
  provider: AIProvider,
  apiKey: string,
  settings: ChatSettings
): Promise<ChatResult> {
  if (!apiKey) {
    return Promise.resolve({ success: false, error: 'Please enter an API key' });
  }
  return sendChat({ provider, apiKey, message: CONNECTION_TEST_MESSAGE }, settings);
}

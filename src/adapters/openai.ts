/**
 * OpenAI chat adapter
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { ChatRequest, ChatSettings } from '../types/chat.js';
import { ProviderError } from '../types/errors.js';
import { SYSTEM_PROMPT, projectInfo } from './prompts.js';

/**
 * Create a client for one request; keys come from the caller, never from storage
 */
export function createClient(apiKey: string, settings: ChatSettings): OpenAI {
  return new OpenAI({ apiKey, timeout: settings.timeoutMs, maxRetries: 0 });
}

export function buildMessages(message: string, context?: string): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = [{ role: 'system', content: SYSTEM_PROMPT }];

  if (context) {
    messages.push({ role: 'system', content: projectInfo(context) });
  }

  messages.push({ role: 'user', content: message });
  return messages;
}

/**
 * Send one chat completion and return the reply text
 *
 * @throws ProviderError on any API or transport failure
 */
export async function chat(request: ChatRequest, settings: ChatSettings): Promise<string> {
  const client = createClient(request.apiKey, settings);

  try {
    const completion = await client.chat.completions.create({
      model: settings.model,
      messages: buildMessages(request.message, request.context),
      max_tokens: settings.maxTokens,
      temperature: settings.temperature,
    });

    const content = completion.choices[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new ProviderError('openai', JSON.stringify(completion));
    }
    return content;
  } catch (error) {
    if (error instanceof ProviderError) throw error;
    if (error instanceof OpenAI.APIError) {
      const body = error.error ? JSON.stringify(error.error) : error.message;
      throw new ProviderError('openai', body, error.status);
    }
    throw new ProviderError('openai', error instanceof Error ? error.message : String(error));
  }
}

/**
 * Anthropic chat adapter
 * Plain HTTP against the Messages endpoint
 */

import axios from 'axios';
import { z } from 'zod';
import type { ChatRequest, ChatSettings } from '../types/chat.js';
import { ProviderError } from '../types/errors.js';
import { buildSystemPrompt } from './prompts.js';

export const ANTHROPIC_MESSAGES_URL = 'https://api.anthropic.com/v1/messages';
export const ANTHROPIC_VERSION = '2023-06-01';

const MessagesResponseSchema = z.object({
  content: z
    .array(z.object({ type: z.string().optional(), text: z.string().optional() }))
    .min(1),
});

/**
 * Send one message and return the first text block of the reply
 *
 * @throws ProviderError on a non-200 status, a transport failure or an unexpected body
 */
export async function chat(request: ChatRequest, settings: ChatSettings): Promise<string> {
  let status: number;
  let body: string;

  try {
    const response = await axios.post<string>(
      ANTHROPIC_MESSAGES_URL,
      {
        model: settings.model,
        max_tokens: settings.maxTokens,
        temperature: settings.temperature,
        system: buildSystemPrompt(request.context),
        messages: [{ role: 'user', content: request.message }],
      },
      {
        headers: {
          'x-api-key': request.apiKey,
          'anthropic-version': ANTHROPIC_VERSION,
          'Content-Type': 'application/json',
        },
        timeout: settings.timeoutMs,
        responseType: 'text',
        // Status is checked below so the raw body can be reported
        validateStatus: () => true,
      }
    );
    status = response.status;
    body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
  } catch (error) {
    if (axios.isAxiosError(error)) {
      throw new ProviderError('anthropic', error.message, error.response?.status);
    }
    throw new ProviderError('anthropic', error instanceof Error ? error.message : String(error));
  }

  if (status !== 200) {
    throw new ProviderError('anthropic', body, status);
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    throw new ProviderError('anthropic', body, status);
  }

  const parsed = MessagesResponseSchema.safeParse(json);
  const text = parsed.success ? parsed.data.content[0].text : undefined;
  if (text === undefined) {
    throw new ProviderError('anthropic', body, status);
  }
  return text;
}

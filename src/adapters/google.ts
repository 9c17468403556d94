/**
 * Google Gemini chat adapter
 */

import { GoogleGenerativeAI, GoogleGenerativeAIFetchError } from '@google/generative-ai';
import type { ChatRequest, ChatSettings } from '../types/chat.js';
import { ProviderError } from '../types/errors.js';
import { buildSinglePrompt } from './prompts.js';

/**
 * Send the prompt as a single user turn and return the reply text
 *
 * @throws ProviderError on any API or transport failure, or a blocked response
 */
export async function chat(request: ChatRequest, settings: ChatSettings): Promise<string> {
  const client = new GoogleGenerativeAI(request.apiKey);
  const generativeModel = client.getGenerativeModel(
    { model: settings.model },
    { timeout: settings.timeoutMs }
  );

  try {
    const result = await generativeModel.generateContent({
      contents: [{ role: 'user', parts: [{ text: buildSinglePrompt(request.message, request.context) }] }],
      generationConfig: {
        maxOutputTokens: settings.maxTokens,
        temperature: settings.temperature,
      },
    });

    return result.response.text();
  } catch (error) {
    if (error instanceof GoogleGenerativeAIFetchError) {
      throw new ProviderError('google', error.message, error.status);
    }
    throw new ProviderError('google', error instanceof Error ? error.message : String(error));
  }
}

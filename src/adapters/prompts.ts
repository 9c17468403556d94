/**
 * Prompt text shared by every chat provider
 */

export const SYSTEM_PROMPT = `You are a Netlify deployment assistant. Your job is to:
1. Help the user solve deployment problems
2. Analyze error messages and suggest fixes
3. Recommend good Netlify practices
4. Answer questions about deploying websites

Keep answers short and clear.`;

/**
 * Fixed message used to check that a key works
 */
export const CONNECTION_TEST_MESSAGE = 'Reply with OK';

export function projectInfo(context: string): string {
  return `Project info: ${context}`;
}

/**
 * System prompt with the project context appended, for providers that
 * take a single system field
 */
export function buildSystemPrompt(context?: string): string {
  return context ? `${SYSTEM_PROMPT}\n\n${projectInfo(context)}` : SYSTEM_PROMPT;
}

/**
 * Single-turn prompt for providers without a system role
 */
export function buildSinglePrompt(message: string, context?: string): string {
  let prompt = `${SYSTEM_PROMPT}\n\n`;
  if (context) {
    prompt += `${projectInfo(context)}\n\n`;
  }
  return `${prompt}User question: ${message}`;
}

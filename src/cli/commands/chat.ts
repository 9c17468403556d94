/**
 * Chat command
 * Ask an AI provider a deployment question from the terminal
 */

import { Command } from 'commander';
import { chatSettingsFor, sendChat } from '../../adapters/index.js';
import { analyzeProject, summarizeAnalysis } from '../../analyzer/index.js';
import { ENV_VARS, loadConfig } from '../../config/index.js';
import { AIProviderSchema, type AIProvider } from '../../types/chat.js';
import { toErrorMessage } from '../../types/errors.js';
import { printDebug, printError, startSpinner, stopSpinner, theme } from '../output.js';

/** Variables each provider's own SDKs read */
const STANDARD_KEY_VARS: Record<AIProvider, readonly string[]> = {
  openai: ['OPENAI_API_KEY'],
  anthropic: ['ANTHROPIC_API_KEY'],
  google: ['GOOGLE_API_KEY', 'GEMINI_API_KEY'],
};

const TOOL_KEY_VARS: Record<AIProvider, string> = {
  openai: ENV_VARS.OPENAI_KEY,
  anthropic: ENV_VARS.ANTHROPIC_KEY,
  google: ENV_VARS.GOOGLE_KEY,
};

/**
 * Pick an API key: explicit flag, then DEPLOY_STUDIO_<PROVIDER>_KEY, then the provider's usual variable
 */
export function resolveApiKey(
  provider: AIProvider,
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  if (explicit) return explicit;
  for (const name of [TOOL_KEY_VARS[provider], ...STANDARD_KEY_VARS[provider]]) {
    const value = env[name];
    if (value) return value;
  }
  return undefined;
}

interface ChatCommandOptions {
  provider?: string;
  key?: string;
  project?: string;
}

export function createChatCommand(): Command {
  return new Command('chat')
    .description('Ask the AI assistant a deployment question')
    .argument('<message>', 'Question to ask')
    .option('-p, --provider <provider>', 'AI provider (openai, anthropic, google)')
    .option('-k, --key <key>', 'API key (otherwise read from the environment)')
    .option('--project <path>', 'Include this project\'s analysis as context')
    .action(async (message: string, options: ChatCommandOptions) => {
      try {
        const config = await loadConfig();
        const parsed = AIProviderSchema.safeParse(options.provider ?? config.ai.default_provider);
        if (!parsed.success) {
          printError(`Unsupported AI provider: ${options.provider}`);
          process.exit(1);
        }
        const provider = parsed.data;

        const apiKey = resolveApiKey(provider, options.key);
        if (!apiKey) {
          printError(`No API key for ${provider}. Pass --key or set ${TOOL_KEY_VARS[provider]}`);
          process.exit(1);
        }

        const context = options.project
          ? summarizeAnalysis(await analyzeProject(options.project))
          : undefined;
        if (context) {
          printDebug(`Context: ${context}`);
        }

        startSpinner(`Asking ${provider}...`);
        const result = await sendChat(
          { provider, apiKey, message, ...(context ? { context } : {}) },
          chatSettingsFor(config.ai, provider)
        );
        stopSpinner();

        if (!result.success) {
          printError(result.error ?? 'Chat failed');
          process.exit(1);
        }

        console.log();
        console.log(theme.primary(`${provider}:`));
        console.log(result.reply);
      } catch (error) {
        stopSpinner();
        printError(toErrorMessage(error));
        process.exit(1);
      }
    });
}

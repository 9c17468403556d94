/**
 * CLI commands index
 * Exports all command creators
 */

export { createAnalyzeCommand } from './analyze.js';
export { createGenerateCommand } from './generate.js';
export { createDeployCommand } from './deploy.js';
export { createServeCommand } from './serve.js';
export { createChatCommand, resolveApiKey } from './chat.js';
export { createSitesCommand, createTeamsCommand } from './sites.js';
export { createConfigCommand, generateYamlConfig } from './config.js';

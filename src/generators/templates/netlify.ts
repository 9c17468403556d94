/**
 * Netlify deployment templates
 * netlify.toml, .gitignore, .env.example and requirements.txt
 */

import type { EnvVarName } from '../../types/project.js';

export interface NetlifyTomlOptions {
  publishDirectory?: string;
  functionsDirectory?: string;
  buildCommand?: string;
  pythonVersion?: string;
}

/**
 * Quote a value as a TOML basic string
 */
export function tomlString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Generate netlify.toml
 *
 * A functions directory adds the Python runtime pin and an `/api/*`
 * rewrite (status 200) to the function endpoint.
 */
export function generateNetlifyToml(options: NetlifyTomlOptions = {}): string {
  const {
    publishDirectory = '.',
    functionsDirectory,
    buildCommand,
    pythonVersion = '3.10',
  } = options;

  const lines = ['[build]'];

  if (functionsDirectory) {
    lines.push(`  functions = ${tomlString(functionsDirectory)}`);
  }

  lines.push(`  publish = ${tomlString(publishDirectory)}`);

  if (buildCommand) {
    lines.push(`  command = ${tomlString(buildCommand)}`);
  }

  if (functionsDirectory) {
    lines.push(
      '',
      '[build.environment]',
      `  PYTHON_VERSION = ${tomlString(pythonVersion)}`,
      '',
      '[[redirects]]',
      '  from = "/api/*"',
      '  to = "/.netlify/functions/:splat"',
      '  status = 200'
    );
  }

  return lines.join('\n') + '\n';
}

/**
 * Generate .gitignore
 */
export function generateGitignore(): string {
  return `# Environment variables (contain secrets)
.env
.env.local
.env.production

# Netlify local cache
.netlify/

# Python
__pycache__/
*.py[cod]
*$py.class
*.egg-info/
venv/
.venv/

# Node.js
node_modules/

# OS files
.DS_Store
Thumbs.db

# IDE
.vscode/
.idea/
*.swp
*.swo
`;
}

/**
 * Comment lines written above known variables in .env.example
 */
export const ENV_VAR_DESCRIPTIONS: Partial<Record<string, string>> = {
  OPENAI_API_KEY: '# OpenAI API Key - https://platform.openai.com/api-keys',
  GOOGLE_API_KEY: '# Google API Key (Gemini) - https://aistudio.google.com/app/apikey',
  ANTHROPIC_API_KEY: '# Anthropic API Key - https://console.anthropic.com/',
  DATABASE_URL: '# Database connection string',
  SECRET_KEY: '# Application secret key',
};

/**
 * Generate .env.example
 *
 * @param envVars - Variable names in display order; unknown names get no comment
 */
export function generateEnvExample(envVars: readonly string[]): string {
  const lines = ['# Example environment variables', '# Copy this file to .env and fill in real values', ''];

  for (const name of envVars) {
    const description = ENV_VAR_DESCRIPTIONS[name];
    if (description) {
      lines.push(description);
    }
    lines.push(`${name}=your_${name.toLowerCase()}_here`);
    lines.push('');
  }

  lines.push('# Never commit the .env file to Git!');

  return lines.join('\n') + '\n';
}

/**
 * Python packages implied by detected provider credentials
 */
export const REQUIREMENT_PACKAGES: ReadonlyArray<readonly [EnvVarName, string]> = [
  ['OPENAI_API_KEY', 'openai'],
  ['GOOGLE_API_KEY', 'google-generativeai'],
  ['ANTHROPIC_API_KEY', 'anthropic'],
];

/**
 * Generate requirements.txt for the functions directory
 */
export function generateRequirements(envVars: readonly string[]): string {
  const packages = REQUIREMENT_PACKAGES.filter(([name]) => envVars.includes(name)).map(
    ([, pkg]) => pkg
  );

  if (packages.length === 0) {
    packages.push('# Add the Python packages you need here');
  }

  return packages.join('\n') + '\n';
}

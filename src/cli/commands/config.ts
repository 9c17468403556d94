/**
 * Config command
 * Manage CLI configuration
 */

import { Command } from 'commander';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { stringify as stringifyYaml } from 'yaml';
import {
  CONFIG_FILE_NAMES,
  DEFAULT_CONFIG,
  findConfigPath,
  getConfigValue,
  loadConfig,
  type Config,
} from '../../config/index.js';
import { toErrorMessage } from '../../types/errors.js';
import {
  printError,
  printHeader,
  printInfo,
  printKeyValue,
  printSection,
  printSuccess,
} from '../output.js';

const SECTION_TITLES: Record<keyof Config, string> = {
  server: 'Server',
  netlify: 'Netlify',
  ai: 'AI',
  output: 'Output',
};

/**
 * Create the config command
 */
export function createConfigCommand(): Command {
  const config = new Command('config').description('Manage CLI configuration');

  // Show current config
  config
    .command('show')
    .description('Show current configuration')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      try {
        const loadedConfig = await loadConfig();

        if (options.json) {
          console.log(JSON.stringify(loadedConfig, null, 2));
          return;
        }

        printHeader('Current Configuration');

        const configPath = await findConfigPath();
        if (configPath) {
          printInfo(`Config file: ${configPath}`);
        } else {
          printInfo('Using default configuration');
        }

        printConfig(loadedConfig);
      } catch (error) {
        printError(toErrorMessage(error));
        process.exit(1);
      }
    });

  // Show defaults
  config
    .command('defaults')
    .description('Show default configuration values')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      if (options.json) {
        console.log(JSON.stringify(DEFAULT_CONFIG, null, 2));
        return;
      }

      printHeader('Default Configuration');
      printConfig(DEFAULT_CONFIG);
    });

  // Get a specific config value
  config
    .command('get')
    .description('Get a specific configuration value')
    .argument('<key>', 'Configuration key (e.g., server.port)')
    .action(async (key: string) => {
      try {
        const loadedConfig = await loadConfig();
        const value = getConfigValue(loadedConfig, key);

        if (value === undefined) {
          printError(`Configuration key not found: ${key}`);
          process.exit(1);
        }

        if (typeof value === 'object') {
          console.log(JSON.stringify(value, null, 2));
        } else {
          console.log(String(value));
        }
      } catch (error) {
        printError(toErrorMessage(error));
        process.exit(1);
      }
    });

  // Show config file path
  config
    .command('path')
    .description('Show configuration file path')
    .action(async () => {
      const configPath = await findConfigPath();

      if (configPath) {
        console.log(configPath);
      } else {
        printInfo('No configuration file found');
        printInfo(`Create one of: ${CONFIG_FILE_NAMES.join(', ')}`);
      }
    });

  // Init config file
  config
    .command('init')
    .description('Create a configuration file in the current directory')
    .action(async () => {
      const filepath = path.join(process.cwd(), CONFIG_FILE_NAMES[0]);

      const exists = await fs
        .access(filepath)
        .then(() => true)
        .catch(() => false);
      if (exists) {
        printError(`Configuration file already exists: ${filepath}`);
        process.exit(1);
      }

      try {
        await fs.writeFile(filepath, generateYamlConfig(), 'utf-8');
        printSuccess(`Created configuration file: ${filepath}`);
      } catch (error) {
        printError(toErrorMessage(error));
        process.exit(1);
      }
    });

  return config;
}

/**
 * Print every configuration section
 */
function printConfig(config: Config): void {
  for (const [key, title] of Object.entries(SECTION_TITLES)) {
    const section = getConfigValue(config, key);
    if (typeof section === 'object' && section !== null) {
      printConfigSection(title, Object.entries(section));
    }
  }
  console.log();
}

function printConfigSection(name: string, entries: Array<[string, unknown]>): void {
  printSection(name);

  for (const [key, value] of entries) {
    if (typeof value === 'object' && value !== null) {
      console.log(`  ${key}:`);
      for (const [subKey, subValue] of Object.entries(value)) {
        printKeyValue(`    ${subKey}`, String(subValue));
      }
    } else {
      printKeyValue(`  ${key}`, String(value));
    }
  }
}

/**
 * YAML configuration file content with the defaults filled in
 */
export function generateYamlConfig(): string {
  return `# Deploy Studio configuration
# Values here override ~/.deploy-studio/config.yaml; DEPLOY_STUDIO_* variables override both

${stringifyYaml(DEFAULT_CONFIG)}`;
}

/**
 * Serve command
 * Start the local web UI
 */

import { Command } from 'commander';
import { sendChat, testConnection } from '../../adapters/index.js';
import { analyzeProject } from '../../analyzer/index.js';
import { loadConfig } from '../../config/index.js';
import { netlifyCliFactory } from '../../deploy/index.js';
import { generateConfigFiles } from '../../generators/index.js';
import { openBrowserLater, startServer } from '../../server/index.js';
import { toErrorMessage } from '../../types/errors.js';
import { printError, printHeader, printInfo, printKeyValue } from '../output.js';

interface ServeCommandOptions {
  host?: string;
  port?: string;
  open: boolean;
}

export function createServeCommand(): Command {
  return new Command('serve')
    .description('Start the web UI')
    .option('-H, --host <host>', 'Interface to listen on')
    .option('-p, --port <port>', 'Port to listen on')
    .option('--no-open', 'Do not open a browser')
    .action(async (options: ServeCommandOptions) => {
      try {
        const loaded = await loadConfig();
        const port = options.port ? parseInt(options.port, 10) : loaded.server.port;
        if (Number.isNaN(port) || port < 0 || port > 65535) {
          printError(`Invalid port: ${options.port}`);
          process.exit(1);
        }
        const config = {
          ...loaded,
          server: { ...loaded.server, host: options.host ?? loaded.server.host, port },
        };

        const running = await startServer(config, {
          analyze: analyzeProject,
          generate: generateConfigFiles,
          createCli: netlifyCliFactory(config.netlify),
          chat: sendChat,
          testConnection,
          settings: config,
        });

        printHeader('Deploy Studio');
        printKeyValue('URL', running.url);
        printInfo('Press Ctrl+C to stop the server');

        if (options.open && config.server.open_browser) {
          openBrowserLater(running.url, config.server.browser_delay_ms);
        }
      } catch (error) {
        printError(toErrorMessage(error));
        process.exit(1);
      }
    });
}

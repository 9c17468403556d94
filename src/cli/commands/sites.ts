/**
 * Sites and teams commands
 * List what the logged-in Netlify account can see
 */

import { Command } from 'commander';
import { loadConfig } from '../../config/index.js';
import { netlifyCliFactory } from '../../deploy/index.js';
import { toErrorMessage } from '../../types/errors.js';
import { printError, printHeader, printInfo, printTable } from '../output.js';

export function createSitesCommand(): Command {
  return new Command('sites')
    .description('List your Netlify sites')
    .option('-n, --limit <count>', 'Maximum number of sites to show')
    .option('--json', 'Output as JSON')
    .action(async (options: { limit?: string; json?: boolean }) => {
      try {
        const config = await loadConfig();
        const limit = options.limit ? parseInt(options.limit, 10) : config.netlify.sites_limit;
        const sites = await netlifyCliFactory(config.netlify)(process.cwd()).listSites(
          Number.isNaN(limit) ? config.netlify.sites_limit : limit
        );

        if (options.json) {
          console.log(JSON.stringify(sites, null, 2));
          return;
        }

        printHeader('Netlify Sites');
        if (sites.length === 0) {
          printInfo('No sites yet');
          return;
        }
        printTable(
          ['Name', 'URL', 'Updated'],
          sites.map((site) => [site.name, site.url, site.updated])
        );
      } catch (error) {
        printError(toErrorMessage(error));
        process.exit(1);
      }
    });
}

export function createTeamsCommand(): Command {
  return new Command('teams')
    .description('List the Netlify teams you belong to')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      try {
        const config = await loadConfig();
        const teams = await netlifyCliFactory(config.netlify)(process.cwd()).listTeams();

        if (options.json) {
          console.log(JSON.stringify(teams, null, 2));
          return;
        }

        printHeader('Netlify Teams');
        printTable(
          ['Name', 'Slug'],
          teams.map((team) => [team.name, team.slug])
        );
      } catch (error) {
        printError(toErrorMessage(error));
        process.exit(1);
      }
    });
}

/**
 * Admin CLI commands
 * config
 */

import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { reportFailure } from './core.js';

/** Options for the config command */
export interface ConfigOptions {
  json?: boolean;
}

/**
 * Register admin commands on the program
 */
export function registerAdminCommands(program: Command): void {
  program
    .command('config')
    .description('Show current configuration')
    .option('--json', 'Output as JSON')
    .action((options: ConfigOptions) => {
      try {
        const config = getConfig();
        if (options.json) {
          console.log(JSON.stringify(config, null, 2));
          return;
        }
        console.log('Configuration:');
        for (const [key, value] of Object.entries(config)) {
          console.log(`  ${key}: ${String(value)}`);
        }
      } catch (err) {
        reportFailure('Failed to load configuration', err);
      }
    });
}

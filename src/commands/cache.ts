import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync } from 'fs';
import { rm } from 'fs/promises';
import { resolve } from 'path';
import { loadConfigOrDefault } from '../utils/config-loader.js';
import { extractErrorMessage } from '../errors.js';

type GlobalOptions = {
  config?: string;
};

/**
 * Create the cache command
 *
 * Manages the directory where git, http and npm templates are materialized
 */
export function createCacheCommand(program: Command): Command {
  const cacheCommand = new Command('cache');
  cacheCommand.description('Manage the template cache directory');

  cacheCommand
    .command('path')
    .description('Print the cache directory')
    .action(async () => {
      try {
        const config = await loadConfigOrDefault(program.opts<GlobalOptions>().config);
        console.log(resolve(config.cacheDir));
      } catch (error: unknown) {
        console.error(chalk.red(`❌ ${extractErrorMessage(error)}`));
        process.exit(1);
      }
    });

  cacheCommand
    .command('clear')
    .description('Delete every materialized remote template')
    .action(async () => {
      try {
        const config = await loadConfigOrDefault(program.opts<GlobalOptions>().config);
        const cacheDir = resolve(config.cacheDir);

        if (!existsSync(cacheDir)) {
          console.log(chalk.yellow(`Cache directory ${cacheDir} does not exist`));
          return;
        }

        await rm(cacheDir, { recursive: true, force: true });
        console.log(chalk.green(`✓ Cache cleared: ${cacheDir}`));
      } catch (error: unknown) {
        console.error(chalk.red(`❌ ${extractErrorMessage(error)}`));
        process.exit(1);
      }
    });

  return cacheCommand;
}

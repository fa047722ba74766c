import { Command } from 'commander';
import { executeHandler } from '../types';

export const configCommand = new Command('config').description('Inspect merge-radar configuration');

configCommand
  .command('check')
  .description('Validate the configuration file and print the effective settings')
  .option('-c, --config <file>', 'Configuration file, relative to the repository')
  .option('-r, --repo <dir>', 'Repository root', '.')
  .action(async (options) => {
    await executeHandler('config:check', options);
  });

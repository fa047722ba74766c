import { Command } from 'commander';
import { executeHandler } from '../types';

export const decisionsCommand = new Command('decisions').description('Read and append the merge decisions log');

decisionsCommand
  .command('record')
  .description('Append a decision taken when a proposal merged')
  .requiredOption('-k, --kind <kind>', 'removal | migration | addition')
  .requiredOption('-e, --entity <name>', 'Symbol or pattern the decision is about')
  .requiredOption('-p, --proposal <id>', 'Proposal that carried the decision')
  .option('-m, --module <module>', 'Owning module of the entity')
  .option('-f, --file <glob>', 'File or glob the decision applies to')
  .option('--old-pattern <text>', 'Pattern a migration retired')
  .option('--new-pattern <text>', 'Pattern a migration introduced')
  .option('-d, --description <text>', 'Free-form description')
  .option('--timestamp <iso>', 'When the decision was made (defaults to now)')
  .option('-l, --log <file>', 'Decisions log file')
  .option('-r, --repo <dir>', 'Repository root', '.')
  .action(async (options) => {
    await executeHandler('decisions:record', options);
  });

decisionsCommand
  .command('list')
  .description('Show the most recent decisions, newest first')
  .option('-n, --depth <n>', 'How many entries', '50')
  .option('-l, --log <file>', 'Decisions log file')
  .option('-r, --repo <dir>', 'Repository root', '.')
  .action(async (options) => {
    await executeHandler('decisions:list', options);
  });

import { Command } from 'commander';
import { executeHandler } from '../types';

export const analyzeCommand = new Command('analyze')
  .description('Detect conflicts between open change proposals and score their risk')
  .option('-s, --snapshot <file>', 'Analyze a recorded snapshot (JSON) of open proposals')
  .option('-r, --repo <dir>', 'Analyze local branches of a git repository')
  .option('-c, --config <file>', 'Configuration file, relative to the repository (default .merge-radar.yml)')
  .option('-t, --target <branch>', 'Target branch the proposals merge into', 'main')
  .option('--prefix <prefix>', 'Only branches starting with this prefix are proposals', '')
  .option('--decisions <file>', 'Decisions log (JSON lines)')
  .option('--cache-dir <dir>', 'Persist symbol extraction results in this directory')
  .option('--deadline <ms>', 'Stop pairwise analysis after this many milliseconds')
  .option('--post', 'Post a comment and a status on every proposal', false)
  .action(async (options) => {
    await executeHandler('analyze', options);
  });

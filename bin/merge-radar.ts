#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { analyzeCommand } from '../src/cli/commands/analyzeCommand';
import { configCommand } from '../src/cli/commands/configCommands';
import { decisionsCommand } from '../src/cli/commands/decisionsCommands';

function findPackageJson(startDir: string): string | null {
  let dir = startDir;
  for (let i = 0; i < 10; i++) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

function readVersionFromPackageJson(): string {
  const pkgPath = findPackageJson(__dirname);
  if (!pkgPath) return '0.0.0';
  const parsed: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

async function main(): Promise<void> {
  const program = new Command();
  program
    .name('merge-radar')
    .description('merge-radar: semantic conflict detection and risk scoring across open change proposals')
    .version(readVersionFromPackageJson());

  program.addCommand(analyzeCommand);
  program.addCommand(decisionsCommand);
  program.addCommand(configCommand);
  await program.parseAsync(process.argv);
}

main().catch((e: unknown) => {
  process.stderr.write(`${e instanceof Error ? (e.stack ?? e.message) : String(e)}\n`);
  process.exitCode = 1;
});

#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { assertNoSwallowedRoot, runScan, VERSION } from './cli';
import { isScanError } from './errors';
import { ScanOptions } from './types';

function parseDepth(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return Number(value);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('vscan-backup-file-detector')
    .description('Find backup, swap and temporary files left in a directory tree')
    .version(VERSION)
    .argument('[root]', 'Directory to scan', '.')
    .option('-v, --verbose', 'Show progress and skipped paths on stderr')
    .option('-o, --output <file>', 'Write results to file instead of stdout')
    .option('-e, --extensions <suffixes...>', 'Backup suffixes to look for, replacing the defaults (e.g. .bak .old ~)')
    .option('-x, --exclude <patterns...>', 'Additional ignore patterns (on top of .backupscanignore and defaults)')
    .option('-c, --config <file>', 'YAML config file (default: <root>/.backupscanrc.yml)')
    .option('-d, --max-depth <n>', 'Limit recursion depth (0 = root directory only)', parseDepth)
    .option('-L, --follow-symlinks', 'Descend into symlinked directories')
    .option('-s, --sorted', 'Visit entries in name order')
    .option('--json', 'Write results as JSON')
    .addHelpText('after', '\nOptions taking several values read up to the next option; put ROOT first or end them with --.')
    .exitOverride()
    .action(async (root: string, options: ScanOptions, command: Command) => {
      if (command.args.length === 0) {
        assertNoSwallowedRoot(options.extensions);
      }
      await runScan(root, options);
    });

  return program;
}

/**
 * Run the CLI with `args` (without the node and script entries) and
 * resolve to the process exit code: 0 ok, 1 usage, 2 fatal I/O.
 */
export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  const program = createProgram();
  try {
    await program.parseAsync(args, { from: 'user' });
  } catch (err) {
    // help and version also arrive here, with exit code 0
    if (err instanceof CommanderError) return err.exitCode;
    if (isScanError(err)) {
      console.error(chalk.red(`Error: ${err.message}`));
      return err.exitCode;
    }
    throw err;
  }
  return 0;
}

if (require.main === module) {
  main().then(
    code => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(chalk.red('Unexpected error:'), err);
      process.exitCode = 1;
    },
  );
}

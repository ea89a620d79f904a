#!/usr/bin/env node
import { Command } from 'commander';

import { installCliCancellation } from './cancel.js';
import { runTaskfileCommand } from './commands/run.js';
import { EXIT_GENERAL_ERROR } from './exit-codes.js';
import { createRenderer, getRenderer } from './ui/renderer.js';
import { detectVersionSync } from './version.js';
import { getErrorMessage } from '../core/errors.js';

interface CliFlags {
  checkOnly?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  dry_run?: boolean;
  textOnly?: boolean;
}

export async function buildCli(argv: string[]): Promise<void> {
  const program = new Command();

  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('taskrunner')
    .description('Run the tasks of a YAML task file in order')
    .version(version, '-V, --version')
    .argument('<taskfile>', 'Path to the YAML task file')
    .option('-c, --check-only', 'Validate the task file and exit')
    .option('-v, --verbose', 'Show debug output')
    .option('-q, --quiet', 'Only report errors (JSON lines on stderr)')
    .option('-d, --dry_run', 'Show what would run without running it')
    .option('-t, --text-only', 'Show task text but not command output');

  program.hook('preAction', (thisCommand) => {
    const o = thisCommand.opts<CliFlags>();
    process.env.TASKRUNNER_VERBOSE = o.verbose ? '1' : '0';
    process.env.TASKRUNNER_QUIET = o.quiet && !o.verbose ? '1' : '0';
    createRenderer({ quiet: !!o.quiet, verbose: !!o.verbose });
  });

  program.action(async (taskfile: string, opts: CliFlags) => {
    const cancellation = installCliCancellation({
      onCancel: () => getRenderer().warn('Cancelling… press Ctrl+C again to force quit.')
    });
    try {
      const res = await runTaskfileCommand({
        taskfile,
        verbose: !!opts.verbose,
        quiet: !!opts.quiet,
        dryRun: !!opts.dry_run,
        textOnly: !!opts.textOnly,
        checkOnly: !!opts.checkOnly,
        signal: cancellation.signal,
        version
      });
      process.exitCode = res.exitCode;
    } catch (err) {
      getRenderer().error('Unexpected error', getErrorMessage(err), 'Try running with --verbose for more details.');
      process.exitCode = EXIT_GENERAL_ERROR;
    } finally {
      cancellation.dispose();
    }
  });

  await program.parseAsync(argv);
}

await buildCli(process.argv);

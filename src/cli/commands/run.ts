import { resolve } from 'node:path';

import { readTaskDocument } from '../../core/document/reader.js';
import { validateTaskDocument } from '../../core/document/validator.js';
import type { TaskDocument } from '../../core/document/types.js';
import { DocumentInvalidError, TaskFileNotFoundError, getErrorMessage } from '../../core/errors.js';
import { CommandExecutor, type Executor } from '../../core/executor/command.js';
import { TaskRunner } from '../../core/runner/task-runner.js';
import type { InputProvider, RunOutcome, TaskRunnerHooks } from '../../core/runner/types.js';
import { Logger, resolveLogLevel } from '../../utils/logger.js';
import {
  EXIT_DOCUMENT_INVALID,
  EXIT_GENERAL_ERROR,
  EXIT_SIGINT,
  EXIT_SIGTERM,
  EXIT_SUCCESS,
  EXIT_TASK_FAILED
} from '../exit-codes.js';
import { resolveShell } from '../shell.js';
import { promptInput } from '../ui/prompts.js';
import { getRenderer, type Renderer } from '../ui/renderer.js';

export interface RunCommandOptions {
  taskfile: string;
  verbose?: boolean;
  quiet?: boolean;
  dryRun?: boolean;
  textOnly?: boolean;
  checkOnly?: boolean;
  signal?: AbortSignal;
  version?: string;
  // Injection points for tests.
  executor?: Executor;
  input?: InputProvider;
  logger?: Logger;
}

export interface RunCommandResult {
  ok: boolean;
  exitCode: number;
  outcome?: RunOutcome;
  details?: unknown;
}

/**
 * `taskrunner <taskfile>`: load, validate and run a task document.
 */
export async function runTaskfileCommand(opts: RunCommandOptions): Promise<RunCommandResult> {
  const r = getRenderer();
  const logger = opts.logger ?? new Logger({ level: resolveLogLevel(opts) });
  const taskFile = resolve(opts.taskfile);

  let document: TaskDocument;
  try {
    document = await readTaskDocument(taskFile);
  } catch (err) {
    if (err instanceof TaskFileNotFoundError) {
      r.error(`${err.taskFile} doesn't exist. Aborting!`, '');
      return { ok: false, exitCode: EXIT_GENERAL_ERROR, details: err.message };
    }
    if (err instanceof DocumentInvalidError) {
      r.documentInvalid(taskFile, err.issues);
      return { ok: false, exitCode: EXIT_DOCUMENT_INVALID, details: err.issues };
    }
    r.error(`Could not read ${taskFile}`, getErrorMessage(err));
    return { ok: false, exitCode: EXIT_GENERAL_ERROR, details: getErrorMessage(err) };
  }

  const issues = validateTaskDocument(document);
  const errors = issues.filter((i) => i.severity === 'error');
  if (errors.length > 0) {
    r.documentInvalid(taskFile, errors);
    return { ok: false, exitCode: EXIT_DOCUMENT_INVALID, details: errors };
  }

  r.runHeader({
    version: opts.version ?? '0.0.0',
    taskFile,
    dryRun: !!opts.dryRun,
    ...(document.information !== undefined ? { information: document.information } : {})
  });
  r.documentSummary({
    tasks: document.tasks.length,
    variables: document.variables.length,
    helpers: document.helpers.size
  });
  for (const warning of issues.filter((i) => i.severity === 'warning')) {
    r.warn(`${warning.path}: ${warning.message}`);
  }

  if (opts.checkOnly) {
    r.success('Task file is valid.');
    return { ok: true, exitCode: EXIT_SUCCESS };
  }

  const startedAt = new Date();
  r.runStarted(startedAt);

  const executor = opts.executor ?? new CommandExecutor({ shell: resolveShell(), logger });
  const runner = new TaskRunner(
    document,
    { executor, input: opts.input ?? promptInput, logger, hooks: rendererHooks(r, { dryRun: !!opts.dryRun }) },
    { dryRun: !!opts.dryRun, textOnly: !!opts.textOnly, signal: opts.signal }
  );
  const outcome = await runner.run();

  r.runSummary({
    status: outcome.status,
    completed: outcome.reports.filter((t) => t.status === 'completed').length,
    skipped: outcome.reports.filter((t) => t.status === 'skipped').length,
    failed: outcome.reports.filter((t) => t.status === 'failed').length,
    durationMs: outcome.durationMs,
    endedAt: new Date()
  });

  switch (outcome.status) {
    case 'completed':
      return { ok: true, exitCode: EXIT_SUCCESS, outcome };
    case 'failed':
      return { ok: false, exitCode: EXIT_TASK_FAILED, outcome };
    case 'cancelled':
      return {
        ok: false,
        exitCode: opts.signal?.reason === 'SIGTERM' ? EXIT_SIGTERM : EXIT_SIGINT,
        outcome,
        details: { reason: 'cancelled' }
      };
  }
}

function rendererHooks(r: Renderer, opts: { dryRun: boolean }): TaskRunnerHooks {
  return {
    onTaskText: ({ task, text }) => r.taskText(task.name, text),
    onHelperStart: ({ helper }) => r.prerequisite(helper.name, helper.text),
    onDryRun: (info) => r.dryRun(info),
    onInputRequested: ({ prompt }) => {
      if (opts.dryRun) r.info(`Input requested: ${prompt}`);
    },
    onOutputLine: ({ line }) => r.outputLine(line),
    onCommandStart: ({ task, iteration }) => {
      const label = iteration ? `${task.name} (${iteration.index}/${iteration.total})` : task.name;
      const spinner = r.spinner(label);
      return (ok) => {
        if (!iteration) spinner.stop();
        else if (ok) spinner.succeed(label);
        else spinner.fail(label);
      };
    },
    onTaskEnd: ({ report }) => {
      if (report.status === 'completed') r.taskCompleted(report);
      else if (report.status === 'skipped') r.taskSkipped(report);
      else if (report.status === 'failed') r.taskFailed(report);
    }
  };
}

import { resolve } from 'node:path';

import { InvalidWorkingDirectoryError, UndefinedVariableError } from '../errors.js';
import type { CommandSpec, Task, TaskDocument } from '../document/types.js';
import { resolveWorkingDirectory, type Executor } from '../executor/command.js';
import { PrerequisiteChecker } from '../prerequisites/checker.js';
import { VariableStore } from '../variables/store.js';
import {
  applyPositional,
  resolveCommand,
  resolveEachItems,
  resolveTemplate,
  type ResolveOptions
} from '../variables/substitution.js';
import { expandHome } from '../../utils/fs.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type {
  InputProvider,
  RunOutcome,
  RunStatus,
  TaskReport,
  TaskRunnerHooks,
  TaskRunnerOptions,
  TaskStage
} from './types.js';

export const DEFAULT_INPUT_PROMPT = 'Press ENTER to continue.';

export interface TaskRunnerDeps {
  executor: Executor;
  input?: InputProvider;
  logger?: Logger;
  hooks?: TaskRunnerHooks;
}

type ReportFields = Omit<TaskReport, 'name' | 'stage' | 'durationMs' | 'executions'> & { executions?: number };

/**
 * Drives the tasks of a document strictly in declaration order.
 *
 * Each `run()` builds a fresh VariableStore from the document, so repeated runs
 * never see each other's outputs. A failed task stops the run; a skipped one does not.
 */
export class TaskRunner {
  private logger: Logger;
  private hooks: TaskRunnerHooks;

  constructor(
    private document: TaskDocument,
    private deps: TaskRunnerDeps,
    private options: TaskRunnerOptions = {}
  ) {
    this.logger = deps.logger ?? silentLogger();
    this.hooks = deps.hooks ?? {};
  }

  async run(): Promise<RunOutcome> {
    const startedAt = Date.now();
    const store = new VariableStore(this.document.variables);
    const reports: TaskReport[] = [];
    const total = this.document.tasks.length;
    let status: RunStatus = 'completed';

    for (const [index, task] of this.document.tasks.entries()) {
      if (this.options.signal?.aborted) {
        status = 'cancelled';
        break;
      }

      this.hooks.onTaskStart?.({ task, index, total });
      const report = await this.runTask(task, store);
      reports.push(report);
      this.hooks.onTaskEnd?.({ task, report });

      if (report.status === 'failed' || report.status === 'cancelled') {
        status = report.status;
        break;
      }
    }

    return {
      ok: status === 'completed',
      status,
      reports,
      variables: store.snapshot(),
      durationMs: Date.now() - startedAt
    };
  }

  private async runTask(task: Task, store: VariableStore): Promise<TaskReport> {
    const startedAt = Date.now();
    const dryRun = this.options.dryRun ?? false;
    const missing: ResolveOptions['missing'] = dryRun ? 'placeholder' : 'throw';
    let stage: TaskStage = 'pending';

    const finish = (fields: ReportFields): TaskReport => ({
      name: task.name,
      stage,
      durationMs: Date.now() - startedAt,
      ...fields,
      executions: fields.executions ?? 0
    });

    try {
      if (task.prerequisites.length > 0) {
        stage = 'prerequisite_check';
        const checker = new PrerequisiteChecker(this.document.helpers, this.deps.executor, {
          onHelperStart: (args) => this.hooks.onHelperStart?.({ task, ...args }),
          onDryRun: ({ helper, command }) =>
            this.hooks.onDryRun?.({ owner: helper.name, command, cwd: process.cwd(), kind: 'helper' })
        });
        const res = await checker.check(task.prerequisites, store, { dryRun, signal: this.options.signal, missing });
        if (!res.ok) {
          if (res.cancelled) return finish({ status: 'cancelled' });
          this.announce(task, store, 'placeholder');
          return finish({ status: 'skipped', skipReason: res.failure });
        }
      }

      this.announce(task, store, missing);

      let input: string | undefined;
      if (task.requireInput !== false) {
        stage = 'input_wait';
        const prompt =
          typeof task.requireInput === 'string'
            ? resolveTemplate(task.requireInput, store, { context: 'display', missing })
            : DEFAULT_INPUT_PROMPT;
        this.hooks.onInputRequested?.({ task, prompt });
        if (!dryRun) {
          const value = await this.readInput(prompt);
          if (value === null) return finish({ status: 'cancelled' });
          input = value;
          store.setText(`${task.name}_input`, value);
          store.setText(`${task.name}_output`, value);
          this.logger.debug(`Stored variables.${task.name}_output from input`);
        }
      }

      if (!task.run) {
        return finish({ status: 'completed', ...(input !== undefined ? { output: input } : {}) });
      }

      stage = 'substituting';
      const cwdTemplate = task.cwd === undefined ? undefined : resolveTemplate(task.cwd, store, { missing });
      const cwd = dryRun
        ? resolve(expandHome(cwdTemplate ?? process.cwd()))
        : await resolveWorkingDirectory(cwdTemplate);
      const base = resolveCommand(task.run, store, { missing });
      const commands: CommandSpec[] = task.each
        ? resolveEachItems(task.each, store, { missing }).map((item) => applyPositional(base, item))
        : [base];

      if (dryRun) {
        for (const command of commands) this.hooks.onDryRun?.({ owner: task.name, command, cwd, kind: 'task' });
        return finish({ status: 'completed', executions: commands.length });
      }

      stage = 'executing';
      return await this.execute(task, commands, cwd, store, finish);
    } catch (err) {
      if (err instanceof UndefinedVariableError) {
        return finish({ status: 'failed', failure: { condition: 'undefined_variable', message: err.message } });
      }
      if (err instanceof InvalidWorkingDirectoryError) {
        return finish({ status: 'failed', failure: { condition: 'invalid_working_directory', message: err.message } });
      }
      throw err;
    }
  }

  private async execute(
    task: Task,
    commands: CommandSpec[],
    cwd: string,
    store: VariableStore,
    finish: (fields: ReportFields) => TaskReport
  ): Promise<TaskReport> {
    const showOutput = task.showOutput && !this.options.textOnly;
    const logLines = this.logger.isEnabled('debug');
    const onLine =
      showOutput || logLines
        ? (line: string) => {
            if (showOutput) this.hooks.onOutputLine?.({ task, line });
            else this.logger.debug(`[${task.name}] ${line}`);
          }
        : undefined;

    const outputs: string[] = [];
    for (const [i, command] of commands.entries()) {
      const iteration = task.each ? { index: i + 1, total: commands.length } : undefined;
      const stop = showOutput ? undefined : this.hooks.onCommandStart?.({ task, command, ...(iteration ? { iteration } : {}) });
      const outcome = await this.deps.executor.execute(command, {
        cwd,
        expectedCode: task.success,
        signal: this.options.signal,
        onLine
      });
      stop?.(outcome.ok);

      if (!outcome.ok) {
        if (outcome.reason === 'cancelled') return finish({ status: 'cancelled', executions: i + 1 });
        const { result } = outcome;
        return finish({
          status: 'failed',
          executions: i + 1,
          failure: {
            condition: 'command_failed',
            message: `Command exited with ${result.exitCode}, expected ${result.expectedCode}`,
            command,
            exitCode: result.exitCode,
            expectedCode: result.expectedCode,
            output: result.stdout,
            stderr: result.stderr
          }
        });
      }
      outputs.push(outcome.result.stdout);
    }

    const output = outputs.join('\n');
    if (task.check !== undefined && !new RegExp(task.check).test(output)) {
      return finish({
        status: 'failed',
        executions: commands.length,
        failure: { condition: 'check_failed', message: `Output does not match check pattern /${task.check}/`, output }
      });
    }

    store.setText(`${task.name}_output`, output);
    this.logger.debug(`Stored variables.${task.name}_output`);
    return finish({ status: 'completed', output, executions: commands.length });
  }

  private announce(task: Task, store: VariableStore, missing: ResolveOptions['missing']): void {
    if (task.text === undefined || task.text.trim() === '') return;
    this.hooks.onTaskText?.({ task, text: resolveTemplate(task.text, store, { context: 'display', missing }) });
  }

  /** Returns null when the prompt was cancelled by the user. */
  private async readInput(prompt: string): Promise<string | null> {
    if (!this.deps.input) throw new Error('This task requires input but no input provider is configured');
    try {
      return await this.deps.input(prompt, { signal: this.options.signal });
    } catch (err) {
      if (this.options.signal?.aborted || isPromptCancellation(err)) return null;
      throw err;
    }
  }
}

function isPromptCancellation(err: unknown): boolean {
  return err instanceof Error && (err.name === 'ExitPromptError' || err.name === 'AbortPromptError');
}

import type { DocumentIssue } from '../../core/errors.js';
import { displayCommand } from '../../core/executor/command.js';
import type { CommandSpec } from '../../core/document/types.js';
import type { RunStatus, TaskReport } from '../../core/runner/types.js';
import { theme, INDENT } from './theme.js';
import { formatMs, formatTimestamp, horizontalRule, indentBlock, keyValue, plural, tailLines } from './format.js';
import { startSpinner, type SpinnerHandle } from './spinner.js';

// ── Renderer Interface ──────────────────────────────────────────────────────

export interface RunHeaderInfo {
  version: string;
  taskFile: string;
  dryRun: boolean;
  information?: string;
}

export interface DocumentCounts {
  tasks: number;
  variables: number;
  helpers: number;
}

export interface RunSummaryInfo {
  status: RunStatus;
  completed: number;
  skipped: number;
  failed: number;
  durationMs: number;
  endedAt: Date;
}

/**
 * The Renderer is the single output coordinator for the CLI.
 * All user-facing output routes through it, enabling:
 * - InteractiveRenderer for rich TTY output (colors, spinners)
 * - QuietRenderer for errors only, as JSON lines (--quiet mode)
 */
export interface Renderer {
  // ── Run chrome ──
  runHeader(info: RunHeaderInfo): void;
  documentSummary(counts: DocumentCounts): void;
  runStarted(at: Date): void;
  runSummary(info: RunSummaryInfo): void;

  // ── Tasks ──
  taskText(taskName: string, text: string): void;
  prerequisite(helperName: string, text?: string): void;
  dryRun(info: { owner: string; kind: 'task' | 'helper'; command: CommandSpec; cwd: string }): void;
  outputLine(line: string): void;
  taskCompleted(report: TaskReport): void;
  taskSkipped(report: TaskReport): void;
  taskFailed(report: TaskReport): void;

  // ── Errors ──
  documentInvalid(taskFile: string, issues: DocumentIssue[]): void;
  error(title: string, details: string, tip?: string): void;
  warn(message: string): void;

  // ── Spinners ──
  spinner(message: string): SpinnerHandle;

  // ── Generic ──
  info(message: string): void;
  success(message: string): void;
}

// ── Interactive Renderer (Rich TTY Output) ──────────────────────────────────

export class InteractiveRenderer implements Renderer {
  private writeln(msg: string = ''): void {
    process.stderr.write(msg + '\n');
  }

  runHeader(info: RunHeaderInfo): void {
    this.writeln(theme.brand(`[TaskRunner ${info.version}]`));
    this.writeln(keyValue('Task File', theme.bold(info.taskFile)));
    if (info.dryRun) this.writeln(keyValue('Dry Run', theme.bold('true')));
    if (info.information?.trim()) this.writeln(keyValue('Information', info.information.trim()));
  }

  documentSummary(counts: DocumentCounts): void {
    this.writeln(keyValue('Tasks', theme.bold(String(counts.tasks))));
    this.writeln(keyValue('Variables', theme.bold(String(counts.variables))));
    this.writeln(keyValue('Helpers', theme.bold(String(counts.helpers))));
  }

  runStarted(at: Date): void {
    this.writeln(INDENT + horizontalRule());
    this.writeln(keyValue('Started', theme.bold(formatTimestamp(at))));
    this.writeln();
  }

  runSummary(info: RunSummaryInfo): void {
    const parts = [theme.success(`${info.completed} completed`)];
    if (info.skipped > 0) parts.push(theme.warning(`${info.skipped} skipped`));
    if (info.failed > 0) parts.push(theme.error(`${info.failed} failed`));

    this.writeln();
    this.writeln(INDENT + horizontalRule());
    this.writeln(keyValue('Tasks', parts.join(theme.dim(', '))));
    this.writeln(keyValue('Duration', formatMs(info.durationMs)));
    this.writeln(keyValue('Ended', theme.bold(formatTimestamp(info.endedAt))));
    if (info.status === 'cancelled') {
      this.writeln();
      this.writeln(`${INDENT}${theme.error(theme.bold('ABORTED BY USER'))}`);
    }
  }

  taskText(taskName: string, text: string): void {
    const [first, ...rest] = text.trim().split('\n');
    this.writeln(`${theme.task.name(`Task ${taskName}`)} - ${first}`);
    for (const line of rest) this.writeln(`${INDENT}${line}`);
  }

  prerequisite(helperName: string, text?: string): void {
    const suffix = text?.trim() ? ` - ${text.trim()}` : '';
    this.writeln(`${INDENT}${theme.dim(`Prerequisite ${helperName}`)}${suffix}`);
  }

  dryRun(info: { owner: string; kind: 'task' | 'helper'; command: CommandSpec; cwd: string }): void {
    const shell = info.command.kind === 'shell';
    this.writeln(
      `${INDENT}${theme.task.dryRun(`DRY RUN ${info.owner} (Shell: ${shell}, CWD: ${info.cwd}): ${displayCommand(info.command)}`)}`
    );
  }

  outputLine(line: string): void {
    process.stdout.write(line + '\n');
  }

  taskCompleted(report: TaskReport): void {
    const iterations = report.executions > 1 ? ` ${theme.dim(`(${plural(report.executions, 'run')})`)}` : '';
    this.writeln(`${INDENT}${theme.check} ${report.name}${iterations} ${theme.dim(formatMs(report.durationMs))}`);
  }

  taskSkipped(report: TaskReport): void {
    const reason = report.skipReason;
    const detail = reason
      ? reason.reason === 'unknown_helper'
        ? `helper '${reason.helper}' is not defined`
        : `prerequisite ${reason.source} failed (exit ${reason.exitCode}, expected ${reason.expectedCode})`
      : 'prerequisite failed';
    this.writeln(`${INDENT}${theme.skip} ${report.name} ${theme.warning('skipped')} ${theme.dim(`(${detail})`)}`);
  }

  taskFailed(report: TaskReport): void {
    this.error(`Task ${report.name} failed during ${report.stage}`, describeFailure(report), failureTip(report));
  }

  documentInvalid(taskFile: string, issues: DocumentIssue[]): void {
    const details = issues.map((i) => `${theme.bullet} ${theme.bold(i.path)}: ${i.message}`).join('\n');
    this.error(`Invalid task file ${taskFile}`, details, 'Fix the listed fields and re-run with --check-only.');
  }

  error(title: string, details: string, tip?: string): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.error(theme.bold('ERROR'))}  ${title}`);
    if (details.trim()) {
      this.writeln();
      this.writeln(indentBlock(details));
    }
    if (tip) {
      this.writeln();
      this.writeln(`${INDENT}${theme.dim('Tip:')} ${tip}`);
    }
    this.writeln();
  }

  warn(message: string): void {
    this.writeln(`${INDENT}${theme.warning('⚠')} ${message}`);
  }

  spinner(message: string): SpinnerHandle {
    return startSpinner(message);
  }

  info(message: string): void {
    this.writeln(`${INDENT}${theme.info('ℹ')} ${message}`);
  }

  success(message: string): void {
    this.writeln(`${INDENT}${theme.check} ${message}`);
  }
}

// ── Quiet Renderer (errors only, JSON Lines) ────────────────────────────────

export class QuietRenderer implements Renderer {
  private emit(type: string, data: Record<string, unknown> = {}): void {
    const event = { type, timestamp: new Date().toISOString(), ...data };
    process.stderr.write(JSON.stringify(event) + '\n');
  }

  runHeader(): void { /* no-op in quiet mode */ }
  documentSummary(): void { /* no-op */ }
  runStarted(): void { /* no-op */ }
  runSummary(): void { /* no-op */ }
  taskText(_taskName: string, _text: string): void { /* no-op */ }
  prerequisite(): void { /* no-op */ }
  dryRun(): void { /* no-op */ }
  outputLine(): void { /* no-op */ }
  taskCompleted(): void { /* no-op */ }
  taskSkipped(): void { /* no-op */ }

  taskFailed(report: TaskReport): void {
    const failure = report.failure;
    this.emit('task_failed', {
      task: report.name,
      stage: report.stage,
      condition: failure?.condition,
      message: failure?.message,
      command: failure?.command ? displayCommand(failure.command) : undefined,
      exitCode: failure?.exitCode,
      expectedCode: failure?.expectedCode,
      stderr: tailOf(failure?.stderr),
      output: tailOf(failure?.output),
    });
  }

  documentInvalid(taskFile: string, issues: DocumentIssue[]): void {
    this.emit('document_invalid', { taskFile, issues });
  }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, tip });
  }

  warn(_message: string): void { /* no-op */ }

  spinner(): SpinnerHandle {
    return {
      update: () => {},
      succeed: () => {},
      fail: () => {},
      stop: () => {},
    };
  }

  info(_message: string): void { /* no-op */ }
  success(): void { /* no-op */ }
}

// ── Failure Formatting ──────────────────────────────────────────────────────

const MAX_OUTPUT_LINES = 20;

function tailOf(text: string | undefined): string | undefined {
  const trimmed = text?.trim();
  return trimmed ? tailLines(trimmed, MAX_OUTPUT_LINES) : undefined;
}

export function describeFailure(report: TaskReport): string {
  const failure = report.failure;
  if (!failure) return 'unknown failure';

  const lines = [failure.message];
  if (failure.command) lines.push(`Command: ${displayCommand(failure.command)}`);
  const stderr = failure.stderr?.trim();
  const output = failure.output?.trim();
  if (stderr) lines.push('', 'stderr:', tailLines(stderr, MAX_OUTPUT_LINES));
  if (output) lines.push('', 'output:', tailLines(output, MAX_OUTPUT_LINES));
  return lines.join('\n');
}

function failureTip(report: TaskReport): string | undefined {
  const failure = report.failure;
  if (!failure) return undefined;
  switch (failure.condition) {
    case 'undefined_variable':
      return 'Declare the variable under `variables`, or run the task that produces it earlier.';
    case 'invalid_working_directory':
      return 'Check the task `cwd`.';
    case 'command_failed':
      return failure.expectedCode !== 0
        ? undefined
        : 'Set `success` on the task if a non-zero exit code is the expected result.';
    default:
      return undefined;
  }
}

// ── Factory ─────────────────────────────────────────────────────────────────

let _instance: Renderer | null = null;

/**
 * Get the global Renderer instance.
 * Defaults to InteractiveRenderer; use `setRenderer` to override.
 */
export function getRenderer(): Renderer {
  if (!_instance) {
    _instance = process.env.TASKRUNNER_QUIET === '1'
      ? new QuietRenderer()
      : new InteractiveRenderer();
  }
  return _instance;
}

/**
 * Override the global Renderer (e.g., for testing).
 */
export function setRenderer(renderer: Renderer | null): void {
  _instance = renderer;
}

/**
 * Create the appropriate renderer based on flags.
 */
export function createRenderer(opts: { quiet?: boolean; verbose?: boolean } = {}): Renderer {
  // --verbose wins over --quiet, as it does for the log level.
  const r = opts.quiet && !opts.verbose ? new QuietRenderer() : new InteractiveRenderer();
  _instance = r;
  return r;
}

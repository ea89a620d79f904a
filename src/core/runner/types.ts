import type { CommandSpec, Helper, PrerequisiteRef, Task } from '../document/types.js';
import type { PrerequisiteFailure } from '../prerequisites/checker.js';
import type { VariableValue } from '../variables/types.js';

export type TaskStage =
  | 'pending'
  | 'prerequisite_check'
  | 'input_wait'
  | 'substituting'
  | 'executing';

export type TaskStatus = 'completed' | 'skipped' | 'failed' | 'cancelled';

export type FailureCondition =
  | 'undefined_variable'
  | 'invalid_working_directory'
  | 'command_failed'
  | 'check_failed';

export interface TaskFailure {
  condition: FailureCondition;
  message: string;
  command?: CommandSpec;
  exitCode?: number;
  expectedCode?: number;
  /** Captured stdout, when a command ran. */
  output?: string;
  stderr?: string;
}

export interface TaskReport {
  name: string;
  status: TaskStatus;
  /** Last stage the task reached. */
  stage: TaskStage;
  durationMs: number;
  /** Stored `<task>_output`, for completed tasks that produced one. */
  output?: string;
  failure?: TaskFailure;
  skipReason?: PrerequisiteFailure;
  /** Number of commands executed (or shown, in dry run). */
  executions: number;
}

export type RunStatus = 'completed' | 'failed' | 'cancelled';

export interface RunOutcome {
  ok: boolean;
  status: RunStatus;
  reports: TaskReport[];
  variables: Record<string, VariableValue>;
  durationMs: number;
}

export interface TaskRunnerOptions {
  dryRun?: boolean;
  /** Suppress command output display; text is still shown. */
  textOnly?: boolean;
  signal?: AbortSignal;
}

/** Reads one line of user input for `require_input`. */
export type InputProvider = (prompt: string, opts: { signal?: AbortSignal }) => Promise<string>;

/**
 * Display callbacks. The runner never writes to the terminal itself.
 */
export interface TaskRunnerHooks {
  onTaskStart?: (args: { task: Task; index: number; total: number }) => void;
  onTaskText?: (args: { task: Task; text: string }) => void;
  onHelperStart?: (args: { task: Task; helper: Helper; ref: PrerequisiteRef; command: CommandSpec }) => void;
  onDryRun?: (args: { owner: string; command: CommandSpec; cwd: string; kind: 'task' | 'helper' }) => void;
  onInputRequested?: (args: { task: Task; prompt: string }) => void;
  /** Lines of a running command's stdout, only when the task shows output. */
  onOutputLine?: (args: { task: Task; line: string }) => void;
  /** Called around a command that runs without visible output. Returns a stop callback. */
  onCommandStart?: (args: {
    task: Task;
    command: CommandSpec;
    iteration?: { index: number; total: number };
  }) => ((ok: boolean) => void) | undefined;
  onTaskEnd?: (args: { task: Task; report: TaskReport }) => void;
}

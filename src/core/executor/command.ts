import { execa } from 'execa';
import { resolve } from 'node:path';
import { createInterface } from 'node:readline';

import { directoryExists, expandHome } from '../../utils/fs.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type { CommandSpec } from '../document/types.js';
import { InvalidWorkingDirectoryError } from '../errors.js';

/** Conventional shell status for "command not found". */
export const EXIT_NOT_FOUND = 127;

export interface ExecuteOptions {
  /** Defaults to the process's current directory. `~` expands to the home directory. */
  cwd?: string;
  /** Exit code that counts as success. Defaults to 0. */
  expectedCode?: number;
  /** Aborting terminates the child process. */
  signal?: AbortSignal;
  /** Receives each stdout line as it arrives. */
  onLine?: (line: string) => void;
}

export interface ExecutionResult {
  command: CommandSpec;
  cwd: string;
  stdout: string;
  stderr: string;
  exitCode: number;
  expectedCode: number;
  durationMs: number;
}

export type CommandOutcome =
  | { ok: true; result: ExecutionResult }
  | { ok: false; reason: 'command_failed' | 'cancelled'; result: ExecutionResult };

export interface Executor {
  execute(command: CommandSpec, opts?: ExecuteOptions): Promise<CommandOutcome>;
}

export interface CommandExecutorOptions {
  /** `true` for the platform shell, or a path to a specific shell. */
  shell?: boolean | string;
  logger?: Logger;
}

export class CommandExecutor implements Executor {
  private logger: Logger;

  constructor(private opts: CommandExecutorOptions = {}) {
    this.logger = opts.logger ?? silentLogger();
  }

  async execute(command: CommandSpec, opts: ExecuteOptions = {}): Promise<CommandOutcome> {
    const cwd = await resolveWorkingDirectory(opts.cwd);
    const expectedCode = opts.expectedCode ?? 0;
    const start = Date.now();

    this.logger.debug(`Running (Shell: ${command.kind === 'shell'}, CWD: ${cwd}): ${displayCommand(command)}`);

    if (command.kind === 'argv' && command.argv.length === 0) {
      const result = { command, cwd, stdout: '', stderr: 'Empty command', exitCode: EXIT_NOT_FOUND, expectedCode, durationMs: 0 };
      return result.exitCode === expectedCode ? { ok: true, result } : { ok: false, reason: 'command_failed', result };
    }

    const options = {
      cwd,
      reject: false,
      stdin: 'inherit',
      stdout: 'pipe',
      stderr: 'pipe',
      ...(opts.signal ? { cancelSignal: opts.signal } : {})
    } as const;

    const child =
      command.kind === 'shell'
        ? execa(command.command, { ...options, shell: this.opts.shell ?? true })
        : execa(command.argv[0], command.argv.slice(1), options);

    const onLine = opts.onLine;
    const lines = onLine && child.stdout ? createInterface({ input: child.stdout, crlfDelay: Infinity }) : null;
    lines?.on('line', (line) => onLine?.(line));

    const res = await child;
    lines?.close();

    const spawnFailed = res.exitCode === undefined && !res.isCanceled;
    const result: ExecutionResult = {
      command,
      cwd,
      stdout: res.stdout ?? '',
      stderr: spawnFailed && !res.stderr ? `Unable to start '${displayCommand(command)}'` : (res.stderr ?? ''),
      exitCode: res.exitCode ?? EXIT_NOT_FOUND,
      expectedCode,
      durationMs: Date.now() - start
    };

    if (res.isCanceled) return { ok: false, reason: 'cancelled', result };
    if (result.exitCode !== expectedCode) {
      this.logger.debug(`Command exited with ${result.exitCode}, expected ${expectedCode}`);
      return { ok: false, reason: 'command_failed', result };
    }
    return { ok: true, result };
  }
}

/**
 * Resolve a task's working directory against the process's current directory.
 * Throws InvalidWorkingDirectoryError when it does not exist.
 */
export async function resolveWorkingDirectory(cwd?: string): Promise<string> {
  if (cwd === undefined) return process.cwd();
  const path = resolve(expandHome(cwd));
  if (!(await directoryExists(path))) throw new InvalidWorkingDirectoryError(cwd);
  return path;
}

export function displayCommand(command: CommandSpec): string {
  if (command.kind === 'shell') return command.command;
  return command.argv.map((a) => (a === '' || /[\s"'\\]/.test(a) ? JSON.stringify(a) : a)).join(' ');
}

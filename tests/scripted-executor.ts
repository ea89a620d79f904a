import type { CommandSpec } from '../src/core/document/types.js';
import { displayCommand, type CommandOutcome, type ExecuteOptions, type Executor } from '../src/core/executor/command.js';

export interface ScriptedResponse {
  stdout?: string;
  stderr?: string;
  exitCode?: number;
  cancelled?: boolean;
}

export interface RecordedCall {
  /** Command as it would be displayed, e.g. `echo hi` or `which git`. */
  text: string;
  command: CommandSpec;
  opts: ExecuteOptions;
}

/**
 * In-process Executor: answers each command from a script instead of
 * spawning it, and records what it was asked to run.
 */
export class ScriptedExecutor implements Executor {
  readonly calls: RecordedCall[] = [];

  constructor(private respond: (text: string, command: CommandSpec) => ScriptedResponse = () => ({})) {}

  async execute(command: CommandSpec, opts: ExecuteOptions = {}): Promise<CommandOutcome> {
    const text = displayCommand(command);
    this.calls.push({ text, command, opts });

    const r = this.respond(text, command);
    const result = {
      command,
      cwd: opts.cwd ?? process.cwd(),
      stdout: r.stdout ?? '',
      stderr: r.stderr ?? '',
      exitCode: r.exitCode ?? 0,
      expectedCode: opts.expectedCode ?? 0,
      durationMs: 0
    };
    if (r.stdout && opts.onLine) {
      for (const line of r.stdout.split('\n')) opts.onLine(line);
    }

    if (r.cancelled) return { ok: false, reason: 'cancelled', result };
    if (result.exitCode !== result.expectedCode) return { ok: false, reason: 'command_failed', result };
    return { ok: true, result };
  }

  get texts(): string[] {
    return this.calls.map((c) => c.text);
  }
}

/** Echo-like script: `echo <words>` prints the words. */
export function echoScript(text: string): ScriptedResponse {
  return text.startsWith('echo ') ? { stdout: text.slice('echo '.length) } : {};
}

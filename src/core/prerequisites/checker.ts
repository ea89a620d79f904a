import type { CommandSpec, Helper, PrerequisiteRef } from '../document/types.js';
import type { Executor } from '../executor/command.js';
import type { VariableStore } from '../variables/store.js';
import { applyPositional, resolveCommand, resolveTemplate, type ResolveOptions } from '../variables/substitution.js';

export interface PrerequisiteFailure {
  reason: 'helper_failed' | 'unknown_helper';
  helper: string;
  source: string;
  subject?: string;
  command?: CommandSpec;
  exitCode?: number;
  expectedCode?: number;
  output: string;
}

export type PrerequisiteResult =
  | { ok: true }
  | { ok: false; cancelled: false; failure: PrerequisiteFailure }
  | { ok: false; cancelled: true };

export interface PrerequisiteCheckerHooks {
  /** Called before a helper runs (or is shown, in dry run). */
  onHelperStart?: (args: { helper: Helper; ref: PrerequisiteRef; command: CommandSpec }) => void;
  onDryRun?: (args: { helper: Helper; command: CommandSpec }) => void;
}

export interface CheckOptions {
  dryRun?: boolean;
  signal?: AbortSignal;
  missing?: ResolveOptions['missing'];
}

export class PrerequisiteChecker {
  constructor(
    private helpers: ReadonlyMap<string, Helper>,
    private executor: Executor,
    private hooks: PrerequisiteCheckerHooks = {}
  ) {}

  /**
   * Run helpers in declaration order. The first failure short-circuits the
   * remaining checks. Throws UndefinedVariableError when a subject references
   * an unknown variable.
   */
  async check(refs: readonly PrerequisiteRef[], store: VariableStore, opts: CheckOptions = {}): Promise<PrerequisiteResult> {
    for (const ref of refs) {
      const helper = this.helpers.get(ref.helper);
      if (!helper) {
        return {
          ok: false,
          cancelled: false,
          failure: { reason: 'unknown_helper', helper: ref.helper, source: ref.source, output: `Helper '${ref.helper}' is not defined` }
        };
      }

      const subject = ref.subject === undefined ? undefined : resolveTemplate(ref.subject, store, { missing: opts.missing });
      const base = resolveCommand(helper.run, store, { missing: opts.missing });
      const command = subject === undefined ? base : applyPositional(base, subject);

      this.hooks.onHelperStart?.({ helper, ref, command });
      if (opts.dryRun) {
        this.hooks.onDryRun?.({ helper, command });
        continue;
      }

      const outcome = await this.executor.execute(command, { expectedCode: helper.success, signal: opts.signal });
      if (outcome.ok) continue;
      if (outcome.reason === 'cancelled') return { ok: false, cancelled: true };

      const { result } = outcome;
      return {
        ok: false,
        cancelled: false,
        failure: {
          reason: 'helper_failed',
          helper: helper.name,
          source: ref.source,
          ...(subject !== undefined ? { subject } : {}),
          command,
          exitCode: result.exitCode,
          expectedCode: result.expectedCode,
          output: [result.stdout, result.stderr].filter((s) => s.trim() !== '').join('\n')
        }
      };
    }

    return { ok: true };
  }
}

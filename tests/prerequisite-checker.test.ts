import { describe, expect, it } from 'vitest';

import { parseTaskDocument } from '../src/core/document/reader.js';
import type { CommandSpec } from '../src/core/document/types.js';
import { UndefinedVariableError } from '../src/core/errors.js';
import { PrerequisiteChecker } from '../src/core/prerequisites/checker.js';
import { parsePrerequisites } from '../src/core/prerequisites/parser.js';
import { VariableStore } from '../src/core/variables/store.js';
import { scalar } from '../src/core/variables/types.js';
import { ScriptedExecutor } from './scripted-executor.js';

const { helpers } = parseTaskDocument(`
helpers:
  has_cmd:
    run: which {}
  online:
    run: ping -c 1 mirror.local
  offline:
    run: ping -c 1 mirror.local
    success: 1
tasks:
  t:
    run: "true"
`);

function refs(source: string) {
  const res = parsePrerequisites(source);
  if (!res.ok) throw new Error(res.errors.join('\n'));
  return res.refs;
}

describe('PrerequisiteChecker', () => {
  it('runs each helper with its subject substituted', async () => {
    const executor = new ScriptedExecutor();
    const checker = new PrerequisiteChecker(helpers, executor);

    const res = await checker.check(refs('helpers.has_cmd(git) helpers.online'), new VariableStore());

    expect(res).toEqual({ ok: true });
    expect(executor.texts).toEqual(['which git', 'ping -c 1 mirror.local']);
    expect(executor.calls[0].opts.expectedCode).toBe(0);
  });

  it('resolves variables inside the subject', async () => {
    const executor = new ScriptedExecutor();
    const checker = new PrerequisiteChecker(helpers, executor);
    const store = new VariableStore([{ name: 'tool', value: scalar('make') }]);

    await checker.check(refs('helpers.has_cmd(variables.tool)'), store);
    expect(executor.texts).toEqual(['which make']);
  });

  it('throws when the subject references an unknown variable', async () => {
    const checker = new PrerequisiteChecker(helpers, new ScriptedExecutor());
    await expect(checker.check(refs('helpers.has_cmd(variables.tool)'), new VariableStore())).rejects.toBeInstanceOf(
      UndefinedVariableError
    );
  });

  it('stops at the first failing helper', async () => {
    const executor = new ScriptedExecutor((text) =>
      text === 'which git' ? { exitCode: 1, stderr: 'git not found' } : {}
    );
    const checker = new PrerequisiteChecker(helpers, executor);

    const res = await checker.check(refs('helpers.has_cmd(git) helpers.online'), new VariableStore());

    expect(res).toEqual({
      ok: false,
      cancelled: false,
      failure: {
        reason: 'helper_failed',
        helper: 'has_cmd',
        source: 'helpers.has_cmd(git)',
        subject: 'git',
        command: { kind: 'argv', argv: ['which', 'git'] },
        exitCode: 1,
        expectedCode: 0,
        output: 'git not found'
      }
    });
    expect(executor.texts).toEqual(['which git']);
  });

  it("uses the helper's success code", async () => {
    const executor = new ScriptedExecutor(() => ({ exitCode: 1 }));
    const checker = new PrerequisiteChecker(helpers, executor);

    expect(await checker.check(refs('helpers.offline'), new VariableStore())).toEqual({ ok: true });
    expect(executor.calls[0].opts.expectedCode).toBe(1);
  });

  it('fails on an undefined helper', async () => {
    const checker = new PrerequisiteChecker(helpers, new ScriptedExecutor());
    const res = await checker.check(refs('helpers.missing'), new VariableStore());

    expect(res).toEqual({
      ok: false,
      cancelled: false,
      failure: {
        reason: 'unknown_helper',
        helper: 'missing',
        source: 'helpers.missing',
        output: "Helper 'missing' is not defined"
      }
    });
  });

  it('reports cancellation', async () => {
    const checker = new PrerequisiteChecker(helpers, new ScriptedExecutor(() => ({ cancelled: true })));
    expect(await checker.check(refs('helpers.online'), new VariableStore())).toEqual({ ok: false, cancelled: true });
  });

  it('only shows helpers in dry run', async () => {
    const executor = new ScriptedExecutor();
    const shown: CommandSpec[] = [];
    const started: string[] = [];
    const checker = new PrerequisiteChecker(helpers, executor, {
      onHelperStart: ({ helper }) => started.push(helper.name),
      onDryRun: ({ command }) => shown.push(command)
    });

    const res = await checker.check(refs('helpers.has_cmd(variables.later) helpers.online'), new VariableStore(), {
      dryRun: true,
      missing: 'placeholder'
    });

    expect(res).toEqual({ ok: true });
    expect(executor.calls).toEqual([]);
    expect(started).toEqual(['has_cmd', 'online']);
    expect(shown).toEqual([
      { kind: 'argv', argv: ['which', '<later>'] },
      { kind: 'argv', argv: ['ping', '-c', '1', 'mirror.local'] }
    ]);
  });
});

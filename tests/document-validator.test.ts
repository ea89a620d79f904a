import { describe, expect, it } from 'vitest';

import { parseTaskDocument } from '../src/core/document/reader.js';
import { validateTaskDocument } from '../src/core/document/validator.js';

function validate(yaml: string) {
  return validateTaskDocument(parseTaskDocument(yaml));
}

describe('validateTaskDocument', () => {
  it('accepts a document whose references are all satisfied', () => {
    const issues = validate(`
variables:
  name: ada
tasks:
  first:
    run: echo variables.name
  second:
    text: "first said variables.first_output"
    run: echo done
`);
    expect(issues).toEqual([]);
  });

  it('flags a task with nothing to run or display', () => {
    expect(validate('tasks:\n  empty: {}\n')).toEqual([
      { severity: 'error', path: 'tasks.empty.run', message: "Task 'empty' has nothing to run or display" }
    ]);
  });

  it('accepts a text-only task', () => {
    expect(validate('tasks:\n  note:\n    text: Read the docs\n')).toEqual([]);
  });

  it('flags each and check without run', () => {
    expect(validate('tasks:\n  t:\n    text: hi\n    each: [a]\n    check: ok\n')).toEqual([
      { severity: 'error', path: 'tasks.t.each', message: "Task 't' uses 'each' without 'run'" },
      { severity: 'error', path: 'tasks.t.check', message: "Task 't' uses 'check' without 'run'" }
    ]);
  });

  it('warns about show_output without run', () => {
    expect(validate('tasks:\n  t:\n    text: hi\n    show_output: true\n')).toEqual([
      { severity: 'warning', path: 'tasks.t.show_output', message: "Task 't' has no command output to show" }
    ]);
  });

  it('flags an invalid check pattern', () => {
    const issues = validate('tasks:\n  t:\n    run: echo\n    check: "("\n');
    expect(issues).toHaveLength(1);
    expect(issues[0].path).toBe('tasks.t.check');
    expect(issues[0].message).toMatch(/^Invalid check pattern: /);
  });

  it('requires each to reference exactly one variable', () => {
    const issues = validate(`
variables:
  a: [1]
  b: [2]
tasks:
  t:
    run: echo {}
    each: variables.a variables.b
`);
    expect(issues).toEqual([
      {
        severity: 'error',
        path: 'tasks.t.each',
        message: "'each' must be a list or a single variables.<name> reference, got 'variables.a variables.b'"
      }
    ]);
  });

  it('flags unknown helpers', () => {
    expect(validate('tasks:\n  t:\n    run: echo\n    prerequisites: helpers.nope\n')).toEqual([
      { severity: 'error', path: 'tasks.t.prerequisites', message: "Unknown helper 'nope' in 'helpers.nope'" }
    ]);
  });

  it('checks subjects against the helper placeholder', () => {
    const issues = validate(`
helpers:
  has_cmd:
    run: which {}
  online:
    run: "true"
tasks:
  t:
    run: echo
    prerequisites: [helpers.has_cmd, helpers.online(x)]
`);
    expect(issues).toEqual([
      { severity: 'error', path: 'tasks.t.prerequisites', message: "Helper 'has_cmd' expects a subject: has_cmd(<subject>)" },
      {
        severity: 'warning',
        path: 'tasks.t.prerequisites',
        message: "Helper 'online' has no {} placeholder; subject 'x' is ignored"
      }
    ]);
  });

  it('warns about references to outputs of later or unknown tasks', () => {
    const issues = validate(`
tasks:
  early:
    run: echo variables.late_output variables.ghost
  late:
    run: echo late
`);
    expect(issues).toEqual([
      { severity: 'warning', path: 'tasks.early', message: 'variables.late_output is neither declared nor produced by an earlier task' },
      { severity: 'warning', path: 'tasks.early', message: 'variables.ghost is neither declared nor produced by an earlier task' }
    ]);
  });

  it("lets a task use its own input in its command", () => {
    expect(validate('tasks:\n  ask:\n    require_input: Name?\n    run: echo variables.ask_input\n')).toEqual([]);
  });

  it('does not count a task output as available inside the task itself', () => {
    expect(validate('tasks:\n  t:\n    run: echo variables.t_output\n')).toEqual([
      { severity: 'warning', path: 'tasks.t', message: 'variables.t_output is neither declared nor produced by an earlier task' }
    ]);
  });
});

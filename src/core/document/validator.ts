import { findReferences } from '../variables/substitution.js';
import type { CommandSpec, Task, TaskDocument } from './types.js';

export interface ValidationIssue {
  severity: 'error' | 'warning';
  path: string;
  message: string;
}

/**
 * Semantic checks that the schema cannot express. Errors make the document
 * invalid; warnings point at references that will fail at run time.
 */
export function validateTaskDocument(doc: TaskDocument): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const available = new Set(doc.variables.map((v) => v.name));

  for (const task of doc.tasks) {
    const at = `tasks.${task.name}`;

    if (!task.run) {
      if (task.text === undefined && task.requireInput === false) {
        issues.push({ severity: 'error', path: `${at}.run`, message: `Task '${task.name}' has nothing to run or display` });
      }
      if (task.each) {
        issues.push({ severity: 'error', path: `${at}.each`, message: `Task '${task.name}' uses 'each' without 'run'` });
      }
      if (task.check !== undefined) {
        issues.push({ severity: 'error', path: `${at}.check`, message: `Task '${task.name}' uses 'check' without 'run'` });
      }
      if (task.showOutput) {
        issues.push({ severity: 'warning', path: `${at}.show_output`, message: `Task '${task.name}' has no command output to show` });
      }
    }

    if (task.check !== undefined) {
      try {
        new RegExp(task.check);
      } catch (err) {
        issues.push({
          severity: 'error',
          path: `${at}.check`,
          message: `Invalid check pattern: ${err instanceof Error ? err.message : String(err)}`
        });
      }
    }

    if (task.each?.kind === 'reference' && findReferences(task.each.template).length !== 1) {
      issues.push({
        severity: 'error',
        path: `${at}.each`,
        message: `'each' must be a list or a single variables.<name> reference, got '${task.each.template}'`
      });
    }

    for (const ref of task.prerequisites) {
      const helper = doc.helpers.get(ref.helper);
      if (!helper) {
        issues.push({ severity: 'error', path: `${at}.prerequisites`, message: `Unknown helper '${ref.helper}' in '${ref.source}'` });
        continue;
      }
      const takesSubject = commandTemplates(helper.run).some((t) => t.includes('{}'));
      if (takesSubject && ref.subject === undefined) {
        issues.push({
          severity: 'error',
          path: `${at}.prerequisites`,
          message: `Helper '${ref.helper}' expects a subject: ${ref.helper}(<subject>)`
        });
      }
      if (!takesSubject && ref.subject !== undefined) {
        issues.push({
          severity: 'warning',
          path: `${at}.prerequisites`,
          message: `Helper '${ref.helper}' has no {} placeholder; subject '${ref.subject}' is ignored`
        });
      }
    }

    // Input is stored before the task's own command is resolved.
    if (task.requireInput !== false) {
      available.add(`${task.name}_output`);
      available.add(`${task.name}_input`);
    }

    for (const name of taskReferences(task)) {
      if (!available.has(name)) {
        issues.push({
          severity: 'warning',
          path: at,
          message: `variables.${name} is neither declared nor produced by an earlier task`
        });
      }
    }

    if (task.run) available.add(`${task.name}_output`);
  }

  return issues;
}

function taskReferences(task: Task): string[] {
  const templates: string[] = [];
  if (task.text !== undefined) templates.push(task.text);
  if (task.run) templates.push(...commandTemplates(task.run));
  if (task.cwd !== undefined) templates.push(task.cwd);
  if (task.each?.kind === 'reference') templates.push(task.each.template);
  if (task.each?.kind === 'items') templates.push(...task.each.items);
  for (const ref of task.prerequisites) {
    if (ref.subject !== undefined) templates.push(ref.subject);
  }
  return [...new Set(templates.flatMap((t) => findReferences(t)))];
}

function commandTemplates(spec: CommandSpec): readonly string[] {
  return spec.kind === 'shell' ? [spec.command] : spec.argv;
}

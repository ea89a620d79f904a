import { resolve } from 'node:path';
import YAML from 'yaml';

import { fileExists, readText } from '../../utils/fs.js';
import { DocumentInvalidError, TaskFileNotFoundError, type DocumentIssue } from '../errors.js';
import { parsePrerequisites } from '../prerequisites/parser.js';
import { fromString, sequence, type VariableDefinition } from '../variables/types.js';
import {
  NAME_PATTERN,
  RawTaskDocument,
  type CommandSpec,
  type EachSource,
  type Helper,
  type RawHelper,
  type RawTask,
  type Task,
  type TaskDocument
} from './types.js';

export async function readTaskDocument(taskFile: string): Promise<TaskDocument> {
  const path = resolve(taskFile);
  if (!(await fileExists(path))) throw new TaskFileNotFoundError(path);
  const raw = await readText(path);
  return parseTaskDocument(raw, path);
}

/**
 * Parse YAML text into an immutable {@link TaskDocument}.
 * Shape problems are collected and thrown together as a `DocumentInvalidError`.
 */
export function parseTaskDocument(raw: string, taskFile?: string): TaskDocument {
  const yamlDoc = YAML.parseDocument(raw);
  const [yamlError] = yamlDoc.errors;
  if (yamlError) throw new DocumentInvalidError([{ path: '(yaml)', message: yamlError.message }], taskFile);
  keepVariableLiterals(yamlDoc);
  const parsed: unknown = yamlDoc.toJS();

  if (parsed === null || parsed === undefined) {
    throw new DocumentInvalidError([{ path: '(root)', message: 'Task document is empty' }], taskFile);
  }

  const res = RawTaskDocument.safeParse(parsed);
  if (!res.success) {
    const issues = res.error.issues.map((i) => ({
      path: i.path.length > 0 ? i.path.join('.') : '(root)',
      message: i.message
    }));
    throw new DocumentInvalidError(issues, taskFile);
  }

  const issues: DocumentIssue[] = [];
  const variables = buildVariables(res.data.variables, issues);
  const helpers = new Map<string, Helper>();
  for (const [name, def] of Object.entries(res.data.helpers ?? {})) {
    checkName('helpers', name, issues);
    if (def.shell && typeof def.run !== 'string') {
      issues.push({ path: `helpers.${name}.shell`, message: `Helper '${name}' sets 'shell' but its 'run' is a list` });
    }
    helpers.set(name, buildHelper(name, def));
  }
  const tasks = Object.entries(res.data.tasks).map(([name, def]) => {
    checkName('tasks', name, issues);
    return buildTask(name, def, issues);
  });

  if (issues.length > 0) throw new DocumentInvalidError(issues, taskFile);

  return Object.freeze({
    ...(res.data.information !== undefined ? { information: res.data.information } : {}),
    tasks: Object.freeze(tasks),
    variables: Object.freeze(variables),
    helpers
  });
}

/**
 * Variable values keep the text they were written with: `3.10` stays `3.10`,
 * not the number 3.1.
 */
function keepVariableLiterals(doc: YAML.Document.Parsed): void {
  const variables = doc.get('variables', true);
  if (!YAML.isNode(variables)) return;
  YAML.visit(variables, {
    Scalar(_key, node) {
      if (typeof node.value === 'string' || node.value === null) return;
      node.value = node.source ?? String(node.value);
    }
  });
}

function buildVariables(raw: RawTaskDocument['variables'], issues: DocumentIssue[]): VariableDefinition[] {
  if (raw === undefined) return [];
  const mappings = Array.isArray(raw) ? raw : [raw];
  const seen = new Set<string>();
  const out: VariableDefinition[] = [];

  for (const mapping of mappings) {
    for (const [name, value] of Object.entries(mapping)) {
      checkName('variables', name, issues);
      if (seen.has(name)) {
        issues.push({ path: `variables.${name}`, message: `Variable '${name}' is declared more than once` });
        continue;
      }
      seen.add(name);
      out.push({ name, value: Array.isArray(value) ? sequence(value) : fromString(value) });
    }
  }
  return out;
}

function buildTask(name: string, def: RawTask, issues: DocumentIssue[]): Task {
  const prerequisites = parsePrerequisites(def.prerequisites);
  if (!prerequisites.ok) {
    for (const message of prerequisites.errors) issues.push({ path: `tasks.${name}.prerequisites`, message });
  }

  const each: EachSource | undefined =
    def.each === undefined
      ? undefined
      : typeof def.each === 'string'
        ? { kind: 'reference', template: def.each }
        : { kind: 'items', items: Object.freeze([...def.each]) };

  return Object.freeze({
    name,
    ...(def.text !== undefined ? { text: def.text } : {}),
    ...(def.run !== undefined ? { run: toTaskCommand(def.run) } : {}),
    success: def.success,
    ...(each ? { each } : {}),
    showOutput: def.show_output,
    ...(def.check !== undefined ? { check: def.check } : {}),
    // An empty prompt asks for nothing.
    requireInput: def.require_input === '' ? false : def.require_input,
    ...(def.cwd !== undefined ? { cwd: def.cwd } : {}),
    prerequisites: prerequisites.ok ? Object.freeze(prerequisites.refs) : []
  });
}

function buildHelper(name: string, def: RawHelper): Helper {
  return Object.freeze({
    name,
    run: toHelperCommand(def.run, def.shell),
    success: def.success,
    ...(def.text !== undefined ? { text: def.text } : {})
  });
}

function toTaskCommand(run: string | string[]): CommandSpec {
  return typeof run === 'string' ? { kind: 'shell', command: run } : { kind: 'argv', argv: Object.freeze([...run]) };
}

/**
 * Helpers default to direct execution: a string `run` without `shell: true`
 * is split on whitespace into argv.
 */
function toHelperCommand(run: string | string[], shell: boolean): CommandSpec {
  if (typeof run !== 'string') return { kind: 'argv', argv: Object.freeze([...run]) };
  if (shell) return { kind: 'shell', command: run };
  return { kind: 'argv', argv: Object.freeze(run.trim().split(/\s+/)) };
}

function checkName(section: string, name: string, issues: DocumentIssue[]): void {
  if (!NAME_PATTERN.test(name)) {
    issues.push({
      path: `${section}.${name}`,
      message: `Name '${name}' must start with a letter or underscore and contain only letters, digits and underscores`
    });
  }
}

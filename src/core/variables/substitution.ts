import type { CommandSpec, EachSource } from '../document/types.js';
import { UndefinedVariableError } from '../errors.js';
import type { VariableStore } from './store.js';
import { toItems, toText } from './store.js';
import type { RenderContext } from './types.js';

const REFERENCE = /variables\.([A-Za-z0-9_]+)/g;
const EXACT_REFERENCE = /^variables\.([A-Za-z0-9_]+)$/;
const POSITIONAL = '{}';

export interface ResolveOptions {
  context?: RenderContext;
  /**
   * `throw` (default) raises UndefinedVariableError; `placeholder` renders
   * `<name>` so a dry run can show commands that depend on outputs it never produced.
   */
  missing?: 'throw' | 'placeholder';
}

export function findReferences(template: string): string[] {
  return [...template.matchAll(REFERENCE)].map((m) => m[1]);
}

/**
 * Replace every `variables.<name>` with the store's current value.
 * Single pass: replaced text is never scanned again.
 */
export function resolveTemplate(template: string, store: VariableStore, opts: ResolveOptions = {}): string {
  const context = opts.context ?? 'command';
  return template.replace(REFERENCE, (_match, name: string) => {
    const value = store.get(name);
    if (value === undefined) {
      if (opts.missing === 'placeholder') return `<${name}>`;
      throw new UndefinedVariableError(name);
    }
    return toText(value, context);
  });
}

/**
 * Resolve argv elements. An element that is exactly one reference to a
 * sequence expands into one element per item.
 */
export function resolveArgv(argv: readonly string[], store: VariableStore, opts: ResolveOptions = {}): string[] {
  const out: string[] = [];
  for (const arg of argv) {
    const exact = EXACT_REFERENCE.exec(arg);
    const value = exact ? store.get(exact[1]) : undefined;
    if (value?.kind === 'sequence') {
      out.push(...value.items);
      continue;
    }
    out.push(resolveTemplate(arg, store, { ...opts, context: 'command' }));
  }
  return out;
}

export function resolveCommand(spec: CommandSpec, store: VariableStore, opts: ResolveOptions = {}): CommandSpec {
  return spec.kind === 'shell'
    ? { kind: 'shell', command: resolveTemplate(spec.command, store, { ...opts, context: 'command' }) }
    : { kind: 'argv', argv: resolveArgv(spec.argv, store, opts) };
}

/** Replace every literal `{}` with `subject`. */
export function formatPositional(template: string, subject: string): string {
  return template.split(POSITIONAL).join(subject);
}

export function applyPositional(spec: CommandSpec, subject: string): CommandSpec {
  return spec.kind === 'shell'
    ? { kind: 'shell', command: formatPositional(spec.command, subject) }
    : { kind: 'argv', argv: spec.argv.map((arg) => formatPositional(arg, subject)) };
}

export function resolveEachItems(each: EachSource, store: VariableStore, opts: ResolveOptions = {}): string[] {
  if (each.kind === 'items') {
    return each.items.map((item) => resolveTemplate(item, store, { ...opts, context: 'command' }));
  }
  const [name] = findReferences(each.template);
  if (name === undefined) return [];
  const value = store.get(name);
  if (value === undefined) {
    if (opts.missing === 'placeholder') return [`<${name}>`];
    throw new UndefinedVariableError(name);
  }
  return toItems(value);
}

import { UndefinedVariableError } from '../errors.js';
import { fromString, type RenderContext, type VariableDefinition, type VariableValue } from './types.js';

const DOTTED_PATH = /^variables\.([A-Za-z0-9_]+)$/;

/**
 * Run-scoped variable table. Seeded from the document's declared variables and
 * supplemented with `<task>_output` / `<task>_input` as tasks run.
 *
 * Only the task runner writes to it, between task boundaries.
 */
export class VariableStore {
  private values = new Map<string, VariableValue>();

  constructor(initial: Iterable<VariableDefinition> = []) {
    for (const def of initial) this.values.set(def.name, def.value);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get(name: string): VariableValue | undefined {
    return this.values.get(name);
  }

  require(name: string): VariableValue {
    const value = this.values.get(name);
    if (value === undefined) throw new UndefinedVariableError(name);
    return value;
  }

  /** Resolve `variables.<name>`; returns undefined for other paths. */
  lookup(path: string): VariableValue | undefined {
    const m = DOTTED_PATH.exec(path.trim());
    return m ? this.values.get(m[1]) : undefined;
  }

  set(name: string, value: VariableValue): void {
    this.values.set(name, value);
  }

  setText(name: string, value: string): void {
    this.values.set(name, fromString(value));
  }

  names(): string[] {
    return [...this.values.keys()];
  }

  snapshot(): Record<string, VariableValue> {
    return Object.fromEntries(this.values);
  }
}

export function toText(value: VariableValue, context: RenderContext): string {
  switch (value.kind) {
    case 'scalar':
    case 'text':
      return value.value;
    case 'sequence':
      return value.items.join(context === 'command' ? ' ' : '\n');
  }
}

/**
 * Items an `each` loop iterates: a sequence's elements, the non-empty lines of
 * a text, or a scalar as its only item.
 */
export function toItems(value: VariableValue): string[] {
  switch (value.kind) {
    case 'sequence':
      return [...value.items];
    case 'text':
      return value.value.split('\n').filter((line) => line.trim() !== '');
    case 'scalar':
      return value.value === '' ? [] : [value.value];
  }
}

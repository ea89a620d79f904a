export type VariableValue =
  | { readonly kind: 'scalar'; readonly value: string }
  | { readonly kind: 'sequence'; readonly items: readonly string[] }
  | { readonly kind: 'text'; readonly value: string };

export type VariableKind = VariableValue['kind'];

/**
 * Where a value is being rendered. Sequences join with a space inside commands
 * and with a newline inside displayed text.
 */
export type RenderContext = 'command' | 'display';

export interface VariableDefinition {
  readonly name: string;
  readonly value: VariableValue;
}

export function scalar(value: string): VariableValue {
  return { kind: 'scalar', value };
}

export function sequence(items: readonly string[]): VariableValue {
  return { kind: 'sequence', items: [...items] };
}

/** Multi-line strings become `text`, everything else `scalar`. */
export function fromString(value: string): VariableValue {
  return value.includes('\n') ? { kind: 'text', value } : { kind: 'scalar', value };
}

import { z } from 'zod';

import type { VariableDefinition } from '../variables/types.js';

// ── Raw document schema (as written in YAML) ────────────────────────────────

export const ScalarValue = z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v));

export const RawVariableValue = z.union([ScalarValue, z.array(ScalarValue)]);

/** Either an ordered mapping or a list of single-key mappings. */
export const RawVariables = z.union([
  z.record(z.string(), RawVariableValue),
  z.array(z.record(z.string(), RawVariableValue))
]);

/** A string runs through the shell; a list runs the program directly. */
export const RawCommand = z.union([z.string().min(1), z.array(ScalarValue).min(1)]);

export const RawTask = z
  .object({
    text: z.string().optional(),
    run: RawCommand.optional(),
    success: z.number().int().default(0),
    each: z.union([z.string().min(1), z.array(ScalarValue)]).optional(),
    show_output: z.boolean().default(false),
    check: z.string().min(1).optional(),
    require_input: z.union([z.boolean(), z.string()]).default(false),
    cwd: z.string().min(1).optional(),
    prerequisites: z.union([z.string(), z.array(z.string().min(1))]).optional()
  })
  .strict();

export const RawHelper = z
  .object({
    run: RawCommand,
    success: z.number().int().default(0),
    shell: z.boolean().default(false),
    text: z.string().optional()
  })
  .strict();

export const RawTaskDocument = z
  .object({
    information: z.string().optional(),
    variables: RawVariables.optional(),
    helpers: z.record(z.string(), RawHelper).optional(),
    tasks: z.record(z.string(), RawTask)
  })
  .strict();

export type RawTask = z.infer<typeof RawTask>;
export type RawHelper = z.infer<typeof RawHelper>;
export type RawTaskDocument = z.infer<typeof RawTaskDocument>;

// ── Loaded model ────────────────────────────────────────────────────────────

export interface ShellCommand {
  readonly kind: 'shell';
  readonly command: string;
}

export interface ArgvCommand {
  readonly kind: 'argv';
  readonly argv: readonly string[];
}

export type CommandSpec = ShellCommand | ArgvCommand;

export type EachSource =
  | { readonly kind: 'reference'; readonly template: string }
  | { readonly kind: 'items'; readonly items: readonly string[] };

export interface PrerequisiteRef {
  readonly helper: string;
  /** Subject passed into the helper's `{}` placeholder. */
  readonly subject?: string;
  /** The call as written, e.g. `helpers.command_exists(git)`. */
  readonly source: string;
}

export interface Task {
  readonly name: string;
  readonly text?: string;
  readonly run?: CommandSpec;
  readonly success: number;
  readonly each?: EachSource;
  readonly showOutput: boolean;
  readonly check?: string;
  /** `true` shows the default prompt, a string is the prompt itself. */
  readonly requireInput: boolean | string;
  readonly cwd?: string;
  readonly prerequisites: readonly PrerequisiteRef[];
}

export interface Helper {
  readonly name: string;
  readonly run: CommandSpec;
  readonly success: number;
  readonly text?: string;
}

export interface TaskDocument {
  readonly information?: string;
  readonly tasks: readonly Task[];
  readonly variables: readonly VariableDefinition[];
  readonly helpers: ReadonlyMap<string, Helper>;
}

/** Task, helper and variable names double as `variables.<name>` identifiers. */
export const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

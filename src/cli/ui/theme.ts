import chalk from 'chalk';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Centralized color definitions. Respects NO_COLOR / FORCE_COLOR via chalk.

export const theme = {
  // Structural
  bold: chalk.bold,
  dim: chalk.dim,

  // Semantic
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  brand: chalk.bold.cyan,

  // Symbols
  check: chalk.green('✔'),
  skip: chalk.yellow('↷'),
  bullet: chalk.dim('•'),

  // Task chrome
  task: {
    name: chalk.underline,
    dryRun: chalk.dim,
  },
} as const;

// ── Layout Constants ────────────────────────────────────────────────────────

/** Default indent for nested content (two spaces). */
export const INDENT = '  ';

/** Width used for horizontal rules. */
export const RULE_WIDTH = 56;

/** Label column width in key/value blocks. */
export const LABEL_WIDTH = 12;

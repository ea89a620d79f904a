import { theme, INDENT, LABEL_WIDTH, RULE_WIDTH } from './theme.js';

// ── Time Formatting ─────────────────────────────────────────────────────────

/**
 * Format milliseconds into a compact human-readable string.
 * Examples: "124ms", "3.2s", "1m 42s", "2h 15m"
 */
export function formatMs(ms: number): string {
  if (!Number.isFinite(ms)) return String(ms);
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) return `${totalSeconds.toFixed(1)}s`;
  const m = Math.floor(totalSeconds / 60);
  const s = Math.round(totalSeconds % 60);
  if (m < 60) return s > 0 ? `${m}m ${s}s` : `${m}m`;
  const h = Math.floor(m / 60);
  const rm = m % 60;
  return rm > 0 ? `${h}h ${rm}m` : `${h}h`;
}

/** Local wall-clock time, e.g. "2026-10-18 14:03:07". */
export function formatTimestamp(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

// ── Table Alignment ─────────────────────────────────────────────────────────

/**
 * Pad a string to a fixed width (right-pad with spaces).
 */
export function padRight(str: string, width: number): string {
  if (str.length >= width) return str;
  return str + ' '.repeat(width - str.length);
}

/**
 * Format a label-value pair with alignment:
 * "  Task File   /work/tasks.yml"
 */
export function keyValue(label: string, value: string, labelWidth: number = LABEL_WIDTH): string {
  return INDENT + theme.dim(padRight(label, labelWidth)) + value;
}

// ── Horizontal Rules ────────────────────────────────────────────────────────

/**
 * A solid dim horizontal rule: ──────────────────────
 */
export function horizontalRule(width: number = RULE_WIDTH): string {
  return theme.dim('─'.repeat(width));
}

// ── Multi-line Blocks ───────────────────────────────────────────────────────

/**
 * Indent every line of a block, keeping blank lines blank.
 */
export function indentBlock(text: string, indent: string = INDENT): string {
  return text
    .split('\n')
    .map((line) => (line.trim() === '' ? '' : indent + line))
    .join('\n');
}

/**
 * Keep the last `maxLines` lines of command output for error reports.
 */
export function tailLines(text: string, maxLines: number): string {
  const lines = text.replace(/\n$/, '').split('\n');
  if (lines.length <= maxLines) return lines.join('\n');
  return [`... (${lines.length - maxLines} earlier lines omitted)`, ...lines.slice(-maxLines)].join('\n');
}

export function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

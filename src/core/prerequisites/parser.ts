import type { PrerequisiteRef } from '../document/types.js';

const CALL_PATTERN = /^(?:helpers\.)?([A-Za-z_][A-Za-z0-9_]*)(?:\(([\s\S]*)\))?$/;

export type PrerequisiteParseResult =
  | { ok: true; refs: PrerequisiteRef[] }
  | { ok: false; errors: string[] };

/**
 * Parse the `prerequisites` field of a task.
 *
 * A string holds space-separated calls (`helpers.a(x) helpers.b`); whitespace
 * inside parentheses belongs to the subject. A list holds one call per item.
 */
export function parsePrerequisites(input: string | readonly string[] | undefined): PrerequisiteParseResult {
  if (input === undefined) return { ok: true, refs: [] };

  const tokens = typeof input === 'string' ? splitCalls(input) : input.map((s) => s.trim());
  const refs: PrerequisiteRef[] = [];
  const errors: string[] = [];

  for (const token of tokens) {
    const ref = parsePrerequisiteCall(token);
    if (ref) refs.push(ref);
    else errors.push(`Invalid prerequisite call '${token}' (expected helpers.<name> or helpers.<name>(<subject>))`);
  }

  return errors.length > 0 ? { ok: false, errors } : { ok: true, refs };
}

export function parsePrerequisiteCall(source: string): PrerequisiteRef | null {
  const m = CALL_PATTERN.exec(source.trim());
  if (!m) return null;
  const subject = m[2]?.trim();
  return subject ? { helper: m[1], subject, source: source.trim() } : { helper: m[1], source: source.trim() };
}

function splitCalls(input: string): string[] {
  const out: string[] = [];
  let current = '';
  let depth = 0;

  for (const ch of input) {
    if (ch === '(') depth += 1;
    if (ch === ')') depth = Math.max(0, depth - 1);
    if (depth === 0 && /\s/.test(ch)) {
      if (current) out.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  if (current) out.push(current);
  return out;
}

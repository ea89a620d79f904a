import { describe, expect, it } from 'vitest';

import { parsePrerequisiteCall, parsePrerequisites } from '../src/core/prerequisites/parser.js';

describe('parsePrerequisiteCall', () => {
  it('parses a bare helper', () => {
    expect(parsePrerequisiteCall('helpers.online')).toEqual({ helper: 'online', source: 'helpers.online' });
  });

  it('parses a helper with a subject, trimming it', () => {
    expect(parsePrerequisiteCall('helpers.has_cmd( git )')).toEqual({
      helper: 'has_cmd',
      subject: 'git',
      source: 'helpers.has_cmd( git )'
    });
  });

  it('accepts the helper name without the helpers. prefix', () => {
    expect(parsePrerequisiteCall('has_cmd(make)')).toEqual({ helper: 'has_cmd', subject: 'make', source: 'has_cmd(make)' });
  });

  it('treats empty parentheses as no subject', () => {
    expect(parsePrerequisiteCall('helpers.online()')).toEqual({ helper: 'online', source: 'helpers.online()' });
  });

  it('rejects malformed calls', () => {
    expect(parsePrerequisiteCall('helpers.')).toBeNull();
    expect(parsePrerequisiteCall('helpers.9lives')).toBeNull();
    expect(parsePrerequisiteCall('helpers.a(b')).toBeNull();
  });
});

describe('parsePrerequisites', () => {
  it('returns no refs when the field is absent', () => {
    expect(parsePrerequisites(undefined)).toEqual({ ok: true, refs: [] });
  });

  it('splits a string on whitespace outside parentheses', () => {
    const res = parsePrerequisites('helpers.has_cmd(docker compose)  helpers.online');
    expect(res).toEqual({
      ok: true,
      refs: [
        { helper: 'has_cmd', subject: 'docker compose', source: 'helpers.has_cmd(docker compose)' },
        { helper: 'online', source: 'helpers.online' }
      ]
    });
  });

  it('takes one call per list item', () => {
    const res = parsePrerequisites(['helpers.file_exists(my file.txt)', ' helpers.online ']);
    expect(res).toEqual({
      ok: true,
      refs: [
        { helper: 'file_exists', subject: 'my file.txt', source: 'helpers.file_exists(my file.txt)' },
        { helper: 'online', source: 'helpers.online' }
      ]
    });
  });

  it('collects an error per invalid call', () => {
    expect(parsePrerequisites('helpers.ok helpers.bad-name')).toEqual({
      ok: false,
      errors: ["Invalid prerequisite call 'helpers.bad-name' (expected helpers.<name> or helpers.<name>(<subject>))"]
    });
  });
});

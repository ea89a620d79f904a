import { afterEach, describe, expect, it } from 'vitest';

import { getActiveCancelSignal, installCliCancellation, resolveForceExitGraceMs } from '../src/cli/cancel.js';
import { EXIT_DOCUMENT_INVALID, EXIT_SIGINT, EXIT_SIGTERM, EXIT_TASK_FAILED } from '../src/cli/exit-codes.js';
import { resolveShell } from '../src/cli/shell.js';

const ENV_KEYS = ['TASKRUNNER_SHELL', 'TASKRUNNER_FORCE_EXIT_GRACE_MS'] as const;
const original = Object.fromEntries(ENV_KEYS.map((k) => [k, process.env[k]]));

afterEach(() => {
  for (const key of ENV_KEYS) {
    const value = original[key];
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
});

describe('resolveShell', () => {
  it('uses the platform shell by default', () => {
    delete process.env.TASKRUNNER_SHELL;
    expect(resolveShell()).toBe(true);
    process.env.TASKRUNNER_SHELL = '   ';
    expect(resolveShell()).toBe(true);
  });

  it('uses the configured shell', () => {
    process.env.TASKRUNNER_SHELL = ' /bin/bash ';
    expect(resolveShell()).toBe('/bin/bash');
  });
});

describe('resolveForceExitGraceMs', () => {
  it('defaults to 3 seconds', () => {
    delete process.env.TASKRUNNER_FORCE_EXIT_GRACE_MS;
    expect(resolveForceExitGraceMs()).toBe(3_000);
  });

  it('ignores invalid values', () => {
    process.env.TASKRUNNER_FORCE_EXIT_GRACE_MS = 'soon';
    expect(resolveForceExitGraceMs()).toBe(3_000);
    process.env.TASKRUNNER_FORCE_EXIT_GRACE_MS = '-5';
    expect(resolveForceExitGraceMs()).toBe(3_000);
  });

  it('floors positive values', () => {
    process.env.TASKRUNNER_FORCE_EXIT_GRACE_MS = '1500.7';
    expect(resolveForceExitGraceMs()).toBe(1_500);
  });
});

describe('installCliCancellation', () => {
  it('exposes the active signal until disposed', () => {
    const cancellation = installCliCancellation({ onForceExit: () => {} });
    expect(getActiveCancelSignal()).toBe(cancellation.signal);
    expect(cancellation.signal.aborted).toBe(false);
    expect(cancellation.count).toBe(0);
    expect(cancellation.cancelledBy).toBeNull();

    cancellation.dispose();
    expect(getActiveCancelSignal()).toBeNull();
  });
});

describe('exit codes', () => {
  it('follows the shell convention for signals', () => {
    expect(EXIT_SIGINT).toBe(130);
    expect(EXIT_SIGTERM).toBe(143);
    expect([EXIT_DOCUMENT_INVALID, EXIT_TASK_FAILED]).toEqual([2, 3]);
  });
});

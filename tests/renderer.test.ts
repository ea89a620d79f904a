import { afterEach, describe, expect, it, vi } from 'vitest';

import { InteractiveRenderer, QuietRenderer, createRenderer, setRenderer } from '../src/cli/ui/renderer.js';
import type { TaskReport } from '../src/core/runner/types.js';

afterEach(() => {
  vi.restoreAllMocks();
  setRenderer(null);
});

function captureStderr(): string[] {
  const written: string[] = [];
  vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    written.push(String(chunk));
    return true;
  });
  return written;
}

describe('QuietRenderer', () => {
  it('includes the captured output of a failed task', () => {
    const written = captureStderr();
    const report: TaskReport = {
      name: 'disk',
      status: 'failed',
      stage: 'executing',
      durationMs: 3,
      executions: 1,
      failure: {
        condition: 'check_failed',
        message: 'Output does not match check pattern /^ok/',
        output: 'ERROR: disk full\n'
      }
    };

    new QuietRenderer().taskFailed(report);

    expect(written).toHaveLength(1);
    const event: unknown = JSON.parse(written[0]);
    expect(event).toMatchObject({
      type: 'task_failed',
      task: 'disk',
      condition: 'check_failed',
      message: 'Output does not match check pattern /^ok/',
      output: 'ERROR: disk full'
    });
  });

  it('stays silent for progress', () => {
    const written = captureStderr();
    const r = new QuietRenderer();
    r.taskText('t', 'hello');
    r.info('note');
    r.warn('careful');
    expect(written).toEqual([]);
  });
});

describe('createRenderer', () => {
  it('uses the quiet renderer for --quiet', () => {
    expect(createRenderer({ quiet: true })).toBeInstanceOf(QuietRenderer);
  });

  it('lets --verbose win over --quiet', () => {
    expect(createRenderer({ quiet: true, verbose: true })).toBeInstanceOf(InteractiveRenderer);
  });
});

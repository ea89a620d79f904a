import ora, { type Ora } from 'ora';

// ── TTY-Aware Spinner ───────────────────────────────────────────────────────
// Wraps `ora` with a consistent API. Falls back to static lines in non-TTY
// contexts (CI, piped output). Writes to stderr to keep stdout for task output.

export interface SpinnerHandle {
  /** Update the spinner text while it's running. */
  update(text: string): void;
  /** Stop with a success checkmark and message. */
  succeed(text?: string): void;
  /** Stop with a failure cross and message. */
  fail(text?: string): void;
  /** Stop the spinner without a status symbol. */
  stop(): void;
}

/**
 * Create and start a spinner with the given text.
 * In non-TTY environments, prints nothing until the final status.
 */
export function startSpinner(text: string): SpinnerHandle {
  const verbose = process.env.TASKRUNNER_VERBOSE === '1';
  const quiet = process.env.TASKRUNNER_QUIET === '1';

  // Debug lines on stderr would tear an animated spinner apart.
  if (!process.stderr.isTTY || verbose || quiet) {
    return {
      update() {},
      succeed() {},
      fail() {},
      stop() {},
    };
  }

  const spinner: Ora = ora({
    text,
    stream: process.stderr,
    spinner: 'dots',
    indent: 2,
    isEnabled: true,
    // Interactive commands read the terminal; don't swallow their keystrokes.
    discardStdin: false,
  }).start();

  return {
    update(t: string) {
      spinner.text = t;
    },
    succeed(t?: string) {
      if (t) spinner.succeed(t);
      else spinner.stop();
    },
    fail(t?: string) {
      if (t) spinner.fail(t);
      else spinner.stop();
    },
    stop() {
      spinner.stop();
    },
  };
}

import { EXIT_SIGINT, EXIT_SIGTERM } from './exit-codes.js';

export type CancelSignal = 'SIGINT' | 'SIGTERM';

export interface InstalledCliCancellation {
  /** AbortSignal that flips when cancellation is requested. */
  signal: AbortSignal;
  /** Number of cancellation triggers seen (Ctrl+C presses, SIGTERM, etc). */
  count: number;
  /** Signal that triggered the first cancellation, if any. */
  cancelledBy: CancelSignal | null;
  /** Remove handlers and clear active signal. */
  dispose(): void;
}

let _activeCancelSignal: AbortSignal | null = null;

/**
 * Current active CLI cancellation signal (if a command installed one).
 * Used to abort interactive prompts.
 */
export function getActiveCancelSignal(): AbortSignal | null {
  return _activeCancelSignal;
}

const DEFAULT_FORCE_EXIT_GRACE_MS = 3_000;

export function resolveForceExitGraceMs(): number {
  const raw = Number(process.env.TASKRUNNER_FORCE_EXIT_GRACE_MS ?? '');
  return Number.isFinite(raw) && raw > 0 ? Math.floor(raw) : DEFAULT_FORCE_EXIT_GRACE_MS;
}

/**
 * First SIGINT/SIGTERM aborts the returned signal: the running child is
 * terminated and the run stops after the current task. A second trigger
 * force-exits once the grace period for `onCancel` has passed.
 */
export function installCliCancellation(opts: {
  onCancel?: (signal: CancelSignal) => void | Promise<void>;
  onForceExit?: (code: number) => void;
} = {}): InstalledCliCancellation {
  const controller = new AbortController();
  _activeCancelSignal = controller.signal;

  let count = 0;
  let disposed = false;
  let cancelledBy: CancelSignal | null = null;
  let cancelPromise: Promise<void> | null = null;
  let forceExitInProgress = false;

  const forceExit = opts.onForceExit ?? ((code: number) => process.exit(code));

  const trigger = (signal: CancelSignal) => {
    if (disposed) return;
    count += 1;

    if (count === 1) {
      cancelledBy = signal;
      controller.abort(signal);
      if (opts.onCancel) {
        cancelPromise = Promise.resolve(opts.onCancel(signal)).catch(() => {
          // never throw from the signal path
        });
      }
      return;
    }

    if (forceExitInProgress) return;
    forceExitInProgress = true;
    const code = signal === 'SIGTERM' ? EXIT_SIGTERM : EXIT_SIGINT;
    void withTimeout(cancelPromise ?? Promise.resolve(), resolveForceExitGraceMs()).then(() => forceExit(code));
  };

  const onSigint = () => trigger('SIGINT');
  const onSigterm = () => trigger('SIGTERM');

  // NOTE: use `on`, not `once`: we implement "press twice to force quit".
  process.on('SIGINT', onSigint);
  process.on('SIGTERM', onSigterm);

  const dispose = () => {
    if (disposed) return;
    disposed = true;
    process.off('SIGINT', onSigint);
    process.off('SIGTERM', onSigterm);
    if (_activeCancelSignal === controller.signal) _activeCancelSignal = null;
  };

  return {
    get signal() {
      return controller.signal;
    },
    get count() {
      return count;
    },
    get cancelledBy() {
      return cancelledBy;
    },
    dispose,
  };
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<void> {
  let timer: NodeJS.Timeout | null = null;
  try {
    await Promise.race([
      promise.then(() => undefined).catch(() => undefined),
      new Promise<void>((resolve) => {
        timer = setTimeout(() => resolve(), timeoutMs);
      })
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

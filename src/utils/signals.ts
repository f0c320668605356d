import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** Abort signal paired with the function that cancels its timer. */
export interface TimeoutSignal {
  signal: AbortSignal;
  clear: () => void;
}

/** Merged abort signal paired with the function that detaches it from its sources. */
export interface MergedSignal {
  signal: AbortSignal;
  clear: () => void;
}

/**
 * Creates an {@link AbortSignal} that will automatically abort after
 * the specified timeout with a {@link TimeoutError}.
 *
 * When `timeoutMs` is `false` or `0`, no timeout signal is created.
 * Callers must invoke `clear` once the request settles, so a finished
 * request does not keep a timer alive.
 */
export function createTimeoutSignal(timeoutMs?: number | false): TimeoutSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timeout = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );

  return {
    signal: controller.signal,
    clear: () => clearTimeout(timeout),
  };
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * - If no signals are provided, returns `null`.
 * - If a single signal is provided, it is returned as-is.
 * - Otherwise a new signal aborts as soon as any source aborts, carrying
 *   the source's `reason`, or an {@link AbortError} when it has none.
 *
 * `clear` detaches the merged signal from its sources. Call it once the
 * request settles; long-lived sources otherwise collect one listener per request.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): MergedSignal | null {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  const [first] = active;
  if (first === undefined) {
    return null;
  }

  if (active.length === 1) {
    return { signal: first, clear: () => {} };
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const clear = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };
  const abortFrom = (source: AbortSignal) => {
    clear();
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
  };

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, clear };
}

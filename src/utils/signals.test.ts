import { afterEach, describe, expect, it, vi } from 'vitest';
import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { createTimeoutSignal, mergeSignals } from './signals.js';

afterEach(() => {
  vi.restoreAllMocks();
  vi.useRealTimers();
});

describe('createTimeoutSignal', () => {
  it('returns null when disabled', () => {
    expect(createTimeoutSignal()).toBeNull();
    expect(createTimeoutSignal(0)).toBeNull();
    expect(createTimeoutSignal(false)).toBeNull();
  });

  it('aborts after the configured timeout with a TimeoutError', async () => {
    vi.useFakeTimers();
    const timeout = createTimeoutSignal(50);

    expect(timeout?.signal.aborted).toBe(false);

    await vi.advanceTimersByTimeAsync(50);

    expect(timeout?.signal.aborted).toBe(true);
    expect(timeout?.signal.reason).toBeInstanceOf(TimeoutError);
    expect(timeout?.signal.reason).toHaveProperty('message', 'error request timed out after 50ms');
  });

  it('does not abort once cleared', () => {
    vi.useFakeTimers();
    const timeout = createTimeoutSignal(50);

    timeout?.clear();
    vi.advanceTimersByTime(100);

    expect(timeout?.signal.aborted).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('creates independent signals for separate invocations', () => {
    vi.useFakeTimers();

    const first = createTimeoutSignal(10);
    const second = createTimeoutSignal(20);

    vi.advanceTimersByTime(15);

    expect(first?.signal.aborted).toBe(true);
    expect(second?.signal.aborted).toBe(false);
  });
});

describe('mergeSignals', () => {
  it('returns null when no signals are provided', () => {
    expect(mergeSignals([])).toBeNull();
    expect(mergeSignals([null, undefined])).toBeNull();
  });

  it('returns the single active signal when only one is provided', () => {
    const controller = new AbortController();
    expect(mergeSignals([controller.signal, undefined])?.signal).toBe(controller.signal);
  });

  it('propagates aborts and preserves the provided reason', () => {
    const dispose = new AbortController();
    const timeout = new AbortController();

    const merged = mergeSignals([dispose.signal, timeout.signal]);
    const reason = new TimeoutError('error request timed out after 10ms');
    timeout.abort(reason);

    expect(merged?.signal.aborted).toBe(true);
    expect(merged?.signal.reason).toBe(reason);
  });

  it('immediately aborts when merging an already-aborted signal', () => {
    const controller = new AbortController();
    const reason = new AbortError('error fetch client disposed');
    controller.abort(reason);

    const merged = mergeSignals([controller.signal, new AbortController().signal]);

    expect(merged?.signal.aborted).toBe(true);
    expect(merged?.signal.reason).toBe(reason);
  });

  it('stops listening to its sources after aborting', () => {
    const first = new AbortController();
    const second = new AbortController();
    const removeFirst = vi.spyOn(first.signal, 'removeEventListener');
    const removeSecond = vi.spyOn(second.signal, 'removeEventListener');

    mergeSignals([first.signal, second.signal]);
    first.abort(new AbortError('error fetch client disposed'));

    expect(removeFirst).toHaveBeenCalledWith('abort', expect.any(Function));
    expect(removeSecond).toHaveBeenCalledWith('abort', expect.any(Function));
  });

  it('detaches from a long-lived source once cleared', () => {
    const dispose = new AbortController();
    const add = vi.spyOn(dispose.signal, 'addEventListener');
    const remove = vi.spyOn(dispose.signal, 'removeEventListener');

    for (let i = 0; i < 20; i++) {
      mergeSignals([dispose.signal, new AbortController().signal])?.clear();
    }

    expect(add).toHaveBeenCalledTimes(20);
    expect(remove).toHaveBeenCalledTimes(20);
    expect(remove.mock.calls.map(([, listener]) => listener)).toEqual(add.mock.calls.map(([, listener]) => listener));
  });

  it('no longer follows its sources once cleared', () => {
    const dispose = new AbortController();
    const merged = mergeSignals([dispose.signal, new AbortController().signal]);

    merged?.clear();
    dispose.abort(new AbortError('error fetch client disposed'));

    expect(merged?.signal.aborted).toBe(false);
  });
});

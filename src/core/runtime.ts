import type { Mode, Result, SafeWrap } from '../utils/wrap.js';

/**
 * Capability that lets a single endpoint implementation serve both execution modes.
 *
 * - `of` lifts a settled tuple into the mode's result shape.
 * - `then` maps a result once it has settled, synchronously for `sync`
 *   and through the promise chain for `async`. A rejected promise reaches
 *   `fn` as an error tuple.
 */
export interface Runtime<M extends Mode> {
  readonly mode: M;
  of<T>(outcome: SafeWrap<Error, T>): Result<M, T>;
  then<A, B>(result: Result<M, A>, fn: (outcome: SafeWrap<Error, A>) => SafeWrap<Error, B>): Result<M, B>;
}

/** Runtime for blocking transports. */
export const syncRuntime: Runtime<'sync'> = {
  mode: 'sync',
  of: (outcome) => outcome,
  then: (result, fn) => fn(result),
};

/** Runtime for suspending transports. */
export const asyncRuntime: Runtime<'async'> = {
  mode: 'async',
  of: (outcome) => Promise.resolve(outcome),
  then: (result, fn) =>
    result.then(fn, (error: unknown) =>
      fn([error instanceof Error ? error : new Error('error non-error rejection', { cause: error }), null]),
    ),
};

/** Runtime lookup keyed by mode; indexing with a generic mode yields `Runtime<M>`. */
export const runtimes: { [K in Mode]: Runtime<K> } = {
  sync: syncRuntime,
  async: asyncRuntime,
};

/** Type guard for values coming from untyped callers. */
export function isMode(value: unknown): value is Mode {
  return value === 'sync' || value === 'async';
}

/**
 * Tuple-based result used throughout the client, `[error, data]`.
 */
export type SafeWrap<ErrorType = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/**
 * Async variant of {@link SafeWrap}.
 */
export type SafeWrapAsync<ErrorType = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/** Result shape per execution mode. */
export interface ModeResults<DataType> {
  /** Blocking calls hand the tuple back directly. */
  sync: SafeWrap<Error, DataType>;
  /** Suspending calls hand back a promise of the tuple. */
  async: SafeWrapAsync<Error, DataType>;
}

/** Execution modes a client can run in. */
export type Mode = keyof ModeResults<unknown>;

/** Result of an operation running in the given {@link Mode}. */
export type Result<M extends Mode, DataType> = ModeResults<DataType>[M];

/**
 * Gracefully handles a given Promise factory.
 * @example
 * const [error, data] = await safeWrapAsync(() => asyncAction());
 */
export async function safeWrapAsync<DataType = unknown>(
  promise: () => Promise<DataType>,
): SafeWrapAsync<Error, DataType> {
  try {
    const data = await promise();
    return [null, data];
  } catch (error) {
    return [toError(error), null];
  }
}

/**
 * Wrap a synchronous function in a tuple-style result.
 */
export function safeWrap<DataType = unknown>(fn: () => DataType): SafeWrap<Error, DataType> {
  try {
    const data = fn();
    return [null, data];
  } catch (error) {
    return [toError(error), null];
  }
}

/** Thrown values are not always errors; strings and plain objects get wrapped. */
function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }

  return new Error(typeof error === 'string' ? error : 'error non-error value thrown', { cause: error });
}

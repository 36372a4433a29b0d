import once from 'call-once-fn';
import { toError } from '../errors.ts';

export type OperationCallback<T> = (error: Error | null, result?: T) => void;

/**
 * Normalize the async contract: callbacks fire once, Promises when no
 * callback is given.
 */
export function runOperation<T>(executor: () => Promise<T>, callback?: OperationCallback<T>): Promise<T> | void {
  if (typeof callback !== 'function') return executor();

  const done = once(callback);
  executor().then(
    (value) => done(null, value),
    (err: unknown) => done(toError(err))
  );
}

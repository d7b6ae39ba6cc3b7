import { QueryCancelledError } from './errors.js';

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted === true) {
    throw new QueryCancelledError(signal.reason);
  }
}

import { CancelledError } from '@docqa/core';

export function describeAbort(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof CancelledError) {
    return reason.reason;
  }
  if (reason instanceof Error) {
    return reason.message;
  }
  return typeof reason === 'string' ? reason : 'Operation cancelled';
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError(describeAbort(signal));
  }
}

/**
 * Settles with `promise`, or rejects with `CancelledError` as soon as `signal` aborts.
 * The underlying promise keeps running; its late result is ignored.
 */
export function raceWithAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(new CancelledError(describeAbort(signal)));
    };
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Controller that also aborts when `parent` aborts, and after `timeoutMs` if given.
 * Call `dispose` once the guarded work is over.
 */
export function linkedAbort(
  parent?: AbortSignal,
  timeoutMs?: number,
  timeoutReason = 'timed out'
): { signal: AbortSignal; abort: (reason: string) => void; dispose: () => void } {
  const controller = new AbortController();
  const abort = (reason: string) => {
    if (!controller.signal.aborted) {
      controller.abort(new CancelledError(reason));
    }
  };

  const onParentAbort = () => {
    abort(parent ? describeAbort(parent) : 'Operation cancelled');
  };
  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer =
    timeoutMs !== undefined
      ? setTimeout(() => abort(`${timeoutReason} after ${timeoutMs}ms`), timeoutMs)
      : undefined;

  return {
    signal: controller.signal,
    abort,
    dispose: () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

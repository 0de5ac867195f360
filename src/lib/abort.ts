/**
 * Abort Helpers
 * Deadline and cancellation plumbing shared by the orchestrator and the
 * tool executor
 */

/**
 * Reject as soon as the signal aborts, whether or not the wrapped promise
 * honours the signal itself. The rejection reason is the signal's reason.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(toError(signal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(toError(signal.reason));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(toError(error));
      }
    );
  });
}

/**
 * A controller that aborts when any parent signal aborts, or after
 * `timeoutMs` with the given reason. Call `dispose` once the guarded work
 * has settled.
 */
export interface LinkedController {
  signal: AbortSignal;
  abort(reason: Error): void;
  dispose(): void;
}

export function linkSignals(
  parents: Array<AbortSignal | undefined>,
  timeout?: { ms: number; reason: () => Error }
): LinkedController {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  for (const parent of parents) {
    if (parent === undefined) {
      continue;
    }
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const onAbort = (): void => {
      controller.abort(parent.reason);
    };
    parent.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => parent.removeEventListener('abort', onAbort));
  }

  if (timeout !== undefined && !controller.signal.aborted) {
    const timer = setTimeout(() => {
      controller.abort(timeout.reason());
    }, timeout.ms);
    cleanups.push(() => clearTimeout(timer));
  }

  return {
    signal: controller.signal,
    abort(reason: Error): void {
      controller.abort(reason);
    },
    dispose(): void {
      for (const cleanup of cleanups) {
        cleanup();
      }
    },
  };
}

function toError(reason: unknown): Error {
  if (reason instanceof Error) {
    return reason;
  }
  return new Error(typeof reason === 'string' ? reason : 'Aborted');
}

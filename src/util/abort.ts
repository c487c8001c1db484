/**
 * AbortSignal helpers shared by the scheduler, the stage runner and the
 * deployment controller. Every wait the engine performs goes through here so
 * cancellation interrupts it.
 */

/** The signal's reason as an Error. */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason;
  return new Error(typeof reason === 'string' ? reason : 'Operation aborted');
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw abortReason(signal);
}

/** Resolve after `ms`, or reject with the abort reason as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (!signal) {
      setTimeout(resolve, ms);
      return;
    }
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    const active: AbortSignal = signal;
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(active));
    };
    const timer = setTimeout(() => {
      active.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    active.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * A controller that aborts when any of the parents aborts. Call dispose()
 * once the child is no longer needed to detach from the parents.
 */
export function linkedAbortController(...parents: Array<AbortSignal | undefined>): {
  controller: AbortController;
  dispose: () => void;
} {
  const controller = new AbortController();
  const detach: Array<() => void> = [];

  for (const parent of parents) {
    if (!parent) continue;
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const onAbort = () => controller.abort(parent.reason);
    parent.addEventListener('abort', onAbort, { once: true });
    detach.push(() => parent.removeEventListener('abort', onAbort));
  }

  return {
    controller,
    dispose: () => {
      for (const fn of detach) fn();
    },
  };
}

/** Settle with `promise`, or reject with the abort reason once `signal` aborts first. */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(abortReason(signal));
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

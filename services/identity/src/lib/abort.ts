export function abortError() {
  const error = new Error('The operation was aborted.');
  error.name = 'AbortError';
  return error;
}

export function throwIfAborted(signal: AbortSignal) {
  if (signal.aborted) {
    throw abortError();
  }
}

export interface Deadline {
  signal: AbortSignal;
  dispose(): void;
}

/** Signal that aborts after `timeoutMs` or when `parent` aborts, whichever is first. */
export function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort();

  const timer = setTimeout(() => controller.abort(), timeoutMs);
  timer.unref?.();

  if (parent) {
    if (parent.aborted) {
      controller.abort();
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    dispose() {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/** Rejects with an AbortError as soon as `signal` aborts. */
export function whenAborted(signal: AbortSignal): { promise: Promise<never>; dispose(): void } {
  let onAbort: () => void = () => {};

  const promise = new Promise<never>((_, reject) => {
    onAbort = () => reject(abortError());
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  });

  return {
    promise,
    dispose() {
      signal.removeEventListener('abort', onAbort);
    },
  };
}

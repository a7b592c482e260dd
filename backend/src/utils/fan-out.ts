export type FanOut = {
  signal: AbortSignal;
  track<T>(task: Promise<T>): Promise<T>;
  dispose(): void;
};

export function createFanOut(parent?: AbortSignal): FanOut {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    track<T>(task: Promise<T>): Promise<T> {
      return task.catch((error: unknown) => {
        if (!controller.signal.aborted) {
          controller.abort(error);
        }
        throw error;
      });
    },
    dispose() {
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

export function rejectOnAbort(signal: AbortSignal, onAbort?: () => void): { promise: Promise<never>; release(): void } {
  let listener: (() => void) | null = null;
  const promise = new Promise<never>((_resolve, reject) => {
    listener = () => {
      reject(signal.reason ?? new Error('aborted'));
      onAbort?.();
    };
    if (signal.aborted) {
      listener();
    } else {
      signal.addEventListener('abort', listener, { once: true });
    }
  });

  return {
    promise,
    release() {
      if (listener) signal.removeEventListener('abort', listener);
    },
  };
}

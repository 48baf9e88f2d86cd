export interface DebouncedPatchSaver<T extends object> {
  schedule: (patch: Partial<T>) => void;
  cancel: () => void;
  flush: () => Promise<void>;
  hasPending: () => boolean;
}

/**
 * Collects partial updates and hands them to `saver` as one merged patch once no new update has arrived
 * for `delayMs`. Later values for the same field replace earlier ones.
 */
export function createDebouncedPatchSaver<T extends object>(
  delayMs: number,
  saver: (patch: Partial<T>) => Promise<void>
): DebouncedPatchSaver<T> {
  let pending: Partial<T> = {};
  let dirty = false;
  let timer: ReturnType<typeof setTimeout> | null = null;

  const clearTimer = () => {
    if (timer) {
      clearTimeout(timer);
      timer = null;
    }
  };

  const cancel = () => {
    clearTimer();
    pending = {};
    dirty = false;
  };

  const flush = async () => {
    clearTimer();
    if (!dirty) {
      return;
    }

    const patch = pending;
    pending = {};
    dirty = false;
    await saver(patch);
  };

  const schedule = (patch: Partial<T>) => {
    pending = { ...pending, ...patch };
    dirty = true;
    clearTimer();
    timer = setTimeout(() => {
      timer = null;
      void flush();
    }, delayMs);
  };

  return { schedule, cancel, flush, hasPending: () => dirty };
}

/**
 * Pure utility functions.
 */

/**
 * Clamp a number between min and max.
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Round a positive ratio up to the next multiple of `step`.
 * Float noise is trimmed so 0.3 stays 0.3 rather than becoming 0.4.
 */
export function roundUpToStep(value: number, step: number): number {
  const steps = Math.ceil(Number((value / step).toFixed(6)));
  return Number((steps * step).toFixed(6));
}

/**
 * Reorder an array by moving an item from one index to another.
 */
export function moveItem<T>(arr: readonly T[], fromIndex: number, toIndex: number): T[] {
  const result = [...arr];
  const [item] = result.splice(fromIndex, 1);
  if (item === undefined) return result;
  result.splice(toIndex, 0, item);
  return result;
}

/**
 * Resolve after `ms`, or reject with the signal's reason once it aborts.
 */
export function abortableDelay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Abort controller that fires on its own timeout or when an outer signal aborts.
 */
export function timeoutController(
  timeout: number,
  signal?: AbortSignal,
): { controller: AbortController; dispose: () => void } {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);
  const onOuterAbort = () => controller.abort();

  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener('abort', onOuterAbort, { once: true });
  }

  return {
    controller,
    dispose: () => {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onOuterAbort);
    },
  };
}

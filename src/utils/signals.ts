import { SHUTDOWN_SIGNALS } from "../constants";

export function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

/**
 * Aborts the controller on the first shutdown signal. Returns a function that
 * removes the handlers again.
 */
export function abortOnShutdownSignals(
  controller: AbortController,
  signals: readonly NodeJS.Signals[] = SHUTDOWN_SIGNALS,
): () => void {
  const handler = (): void => {
    controller.abort();
  };
  for (const signal of signals) {
    process.once(signal, handler);
  }
  return () => {
    for (const signal of signals) {
      process.removeListener(signal, handler);
    }
  };
}

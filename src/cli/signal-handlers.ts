export type SyncAbortHandler = {
  signal: AbortSignal;
  /** Detaches the process listeners; safe to call twice. */
  dispose: () => void;
};

/**
 * Turns the first SIGINT or SIGTERM into an abort of the running sync. The
 * engine stops at its next state transition, so nothing local is written.
 */
export function createSyncAbortHandler(
  opts: { onSignal?: (signal: NodeJS.Signals) => void } = {},
): SyncAbortHandler {
  const controller = new AbortController();
  let disposed = false;

  const dispose = (): void => {
    if (disposed) return;
    disposed = true;
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  };

  function onSignal(signal: NodeJS.Signals): void {
    try {
      opts.onSignal?.(signal);
    } finally {
      controller.abort(signal);
      dispose();
    }
  }

  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  return { signal: controller.signal, dispose };
}

export async function withSyncAbort<T>(
  run: (signal: AbortSignal) => Promise<T>,
  onSignal?: (signal: NodeJS.Signals) => void,
): Promise<T> {
  const handler = createSyncAbortHandler({ onSignal });
  try {
    return await run(handler.signal);
  } finally {
    handler.dispose();
  }
}

// =============================================================================
// STOP SIGNALS
// =============================================================================

export type StopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
  isStopped: () => boolean;
};

const STOP_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export function createStepStopSignalHandler(opts: {
  onSignal?: (signal: NodeJS.Signals) => void;
} = {}): StopSignalHandler {
  const controller = new AbortController();

  const handler = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) return;
    opts.onSignal?.(signal);
    controller.abort(signal);
  };

  for (const signal of STOP_SIGNALS) {
    process.on(signal, handler);
  }

  return {
    signal: controller.signal,
    cleanup: () => {
      for (const signal of STOP_SIGNALS) {
        process.off(signal, handler);
      }
    },
    isStopped: () => controller.signal.aborted,
  };
}

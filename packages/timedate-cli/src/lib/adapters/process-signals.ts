import type { SignalHandler } from "../ports/signal-handler.js";

/**
 * Create a signal handler for process shutdown and reload signals.
 */
export function createProcessSignalHandler(
  exit: (code: number) => void = (code) => process.exit(code)
): SignalHandler {
  const shutdownHandlers: Array<() => Promise<void>> = [];
  const reloadHandlers: Array<() => void> = [];
  let isHandling = false;

  const handleShutdown = async () => {
    if (isHandling) return;
    isHandling = true;
    try {
      await Promise.all(shutdownHandlers.map((h) => h()));
      exit(0);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Shutdown failed: ${message}`);
      exit(1);
    }
  };

  const onShutdownSignal = () => {
    void handleShutdown();
  };

  const onReloadSignal = () => {
    for (const handler of reloadHandlers) {
      handler();
    }
  };

  return {
    onShutdown(callback) {
      shutdownHandlers.push(callback);
      if (shutdownHandlers.length === 1) {
        process.on("SIGTERM", onShutdownSignal);
        process.on("SIGINT", onShutdownSignal);
      }
    },
    onReload(callback) {
      reloadHandlers.push(callback);
      if (reloadHandlers.length === 1) {
        process.on("SIGHUP", onReloadSignal);
      }
    },
    removeAll() {
      shutdownHandlers.length = 0;
      reloadHandlers.length = 0;
      process.off("SIGTERM", onShutdownSignal);
      process.off("SIGINT", onShutdownSignal);
      process.off("SIGHUP", onReloadSignal);
    },
  };
}

/**
 * Abstraction for process signal handling.
 * Allows testing shutdown and reload logic without actual process signals.
 */
export interface SignalHandler {
  /** Register a callback for shutdown signals (SIGTERM, SIGINT) */
  onShutdown(callback: () => Promise<void>): void;
  /** Register a callback for the reload signal (SIGHUP) */
  onReload(callback: () => void): void;
  /** Remove all registered handlers */
  removeAll(): void;
}

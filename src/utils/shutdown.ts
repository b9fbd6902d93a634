/**
 * Graceful shutdown handler.
 * Cleanup hooks run last-registered-first, so the gateway stops taking
 * requests before the things it depends on go away. A hard cap forces the
 * process out if a hook hangs.
 */

import { createModuleLogger } from './logger.js';

const log = createModuleLogger('shutdown');

const DEFAULT_SHUTDOWN_TIMEOUT_MS = 10_000;

/** Function signature for cleanup callbacks */
export type CleanupFunction = () => Promise<void> | void;

interface CleanupEntry {
  label: string;
  fn: CleanupFunction;
}

export interface ShutdownOptions {
  /** Upper bound for the whole cleanup sequence (default: 10s) */
  timeoutMs?: number;
  /** Listen for SIGINT/SIGTERM (default: true). Tests pass false. */
  installSignalHandlers?: boolean;
}

export interface ShutdownHandler {
  register(label: string, fn: CleanupFunction): void;
  shutdown(): Promise<void>;
  isShuttingDown(): boolean;
  /** Detach the signal listeners without running cleanup */
  dispose(): void;
}

/**
 * Create a shutdown handler.
 *
 * @example
 * ```ts
 * const handler = createShutdownHandler();
 * handler.register('gateway', () => gateway.stop());
 * ```
 */
export function createShutdownHandler(options: ShutdownOptions = {}): ShutdownHandler {
  const timeoutMs = options.timeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
  const installSignals = options.installSignalHandlers ?? true;
  const hooks: CleanupEntry[] = [];
  let shuttingDown = false;

  function register(label: string, fn: CleanupFunction): void {
    hooks.push({ label, fn });
    log.debug({ label }, 'Registered cleanup hook');
  }

  async function shutdown(): Promise<void> {
    if (shuttingDown) {
      log.warn('Shutdown already in progress, ignoring');
      return;
    }
    shuttingDown = true;
    log.info({ hooks: hooks.length }, 'Shutdown initiated');

    const forceExitTimer = setTimeout(() => {
      log.error({ timeoutMs }, 'Shutdown timed out, forcing exit');
      process.exit(1);
    }, timeoutMs);
    forceExitTimer.unref();

    for (const entry of [...hooks].reverse()) {
      try {
        await entry.fn();
        log.info({ label: entry.label }, 'Cleanup completed');
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        log.error({ label: entry.label, error: message }, 'Cleanup failed');
      }
    }

    clearTimeout(forceExitTimer);
    log.info('Shutdown complete');
  }

  const onSignal = (signal: NodeJS.Signals): void => {
    log.info({ signal }, 'Signal received');
    shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        log.error({ error: message }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  if (installSignals) {
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  }

  return {
    register,
    shutdown,
    isShuttingDown: () => shuttingDown,
    dispose(): void {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    },
  };
}

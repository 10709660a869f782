/**
 * Process Error Handlers and Cleanup Management
 *
 * Graceful shutdown on signals and fatal errors. Resources register a
 * cleanup step at startup; steps run in reverse registration order.
 */

import { formatErrorForLog, wrapError } from '../errors/index.js';
import { createComponentLogger } from '../integrations/utilities/logger.js';

// =============================================================================
// CLEANUP RESOURCES
// =============================================================================

export interface CleanupResource {
  name: string;
  cleanup: () => void | Promise<void>;
}

let cleanupResources: CleanupResource[] = [];
let isCleaningUp = false;

/**
 * Run every registered cleanup step. Times out after `timeoutMs` so a
 * stuck step cannot hang the process.
 */
export async function gracefulCleanup(reason: string, timeoutMs = 5000): Promise<void> {
  if (isCleaningUp) {
    return;
  }
  isCleaningUp = true;

  const log = createComponentLogger('Shutdown');
  log.info('Starting graceful cleanup', { reason });

  const forceExitTimeout = setTimeout(() => {
    log.error('Cleanup timeout reached, forcing exit', { timeoutMs });
    process.exit(1);
  }, timeoutMs);
  forceExitTimeout.unref();

  try {
    for (const resource of [...cleanupResources].reverse()) {
      try {
        await resource.cleanup();
      } catch (error) {
        log.error('Cleanup step failed', { resource: resource.name, error: formatErrorForLog(error) });
      }
    }
    log.info('Cleanup completed');
  } finally {
    clearTimeout(forceExitTimeout);
  }
}

export function registerCleanupResource(resource: CleanupResource): void {
  cleanupResources.push(resource);
}

/**
 * Reset cleanup state - useful for testing or re-initialization.
 */
export function resetCleanupState(): void {
  cleanupResources = [];
  isCleaningUp = false;
}

// =============================================================================
// PROCESS SIGNAL HANDLERS
// =============================================================================

async function shutdown(reason: string, exitCode: number): Promise<void> {
  await gracefulCleanup(reason);
  process.exit(exitCode);
}

/**
 * Install process-level error and signal handlers.
 * Should be called once at application startup.
 */
export function installProcessHandlers(): void {
  const log = createComponentLogger('Process');

  process.on('unhandledRejection', (reason) => {
    const error = wrapError(reason);
    log.error('Unhandled promise rejection', { category: error.category, error: error.toLogString() });
    void shutdown('unhandled rejection', 1);
  });

  process.on('uncaughtException', (error, origin) => {
    const wrapped = wrapError(error, { origin });
    log.error('Uncaught exception', { category: wrapped.category, error: wrapped.toLogString() });
    void shutdown('uncaught exception', 1);
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      log.info('Received signal', { signal });
      void shutdown(signal, 0);
    });
  }
}

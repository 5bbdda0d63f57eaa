/**
 * Signal Handlers - Process signal management
 */
import type { StructuredLogger } from '../kernel/contracts.js';
import { errorMessage } from '../../errors.js';

interface SignalContext {
  stop: () => Promise<void>;
  logger: StructuredLogger;
  exit?: (code: number) => void;
}

/**
 * SIGINT/SIGTERM run `stop` once and exit; a second signal while stopping
 * exits at once.
 *
 * @returns Cleanup function to remove all signal handlers
 */
export function setupSignalHandlers(context: SignalContext): () => void {
  const exit = context.exit ?? ((code: number) => process.exit(code));
  let stopping = false;

  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) {
      context.logger.warn('Forced exit', { signal });
      exit(1);
      return;
    }
    stopping = true;
    context.logger.info('Shutting down', { signal });
    context.stop().then(
      () => exit(0),
      (error: unknown) => {
        context.logger.error('Shutdown failed', { reason: errorMessage(error) });
        exit(1);
      }
    );
  };

  const unhandledRejectionHandler = (reason: unknown): void => {
    context.logger.error('Unhandled rejection', { reason: errorMessage(reason) });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
  process.on('unhandledRejection', unhandledRejectionHandler);

  return () => {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
    process.off('unhandledRejection', unhandledRejectionHandler);
  };
}

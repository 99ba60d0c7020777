import type { EventEmitter } from 'events';
import { describeError } from '../errors.js';
import { componentLogger } from '../logger.js';

const log = componentLogger('shutdown');

export type ShutdownHooks = {
  shutdown: () => Promise<void>;
  exit?: (code: number) => void;
  target?: EventEmitter;
};

/**
 * Runs `shutdown` once on SIGINT, SIGTERM or an uncaught exception, then
 * exits 0 (1 if shutdown itself failed). The handlers stay installed, so a
 * second signal or a crash while shutting down is logged instead of killing
 * the process before open clips are closed.
 */
export function installShutdownHooks(hooks: ShutdownHooks) {
  const target: EventEmitter = hooks.target ?? process;
  const exit = hooks.exit ?? ((code: number) => process.exit(code));
  let stopping: Promise<void> | null = null;

  const stop = (reason: string) => {
    if (stopping) {
      log.warn({ reason }, 'Shutdown already in progress');
      return;
    }
    log.info({ reason }, 'Shutting down');
    stopping = hooks.shutdown().then(
      () => exit(0),
      (error: unknown) => {
        log.error({ error: describeError(error) }, 'Shutdown failed');
        exit(1);
      }
    );
  };

  const onSigint = () => stop('SIGINT');
  const onSigterm = () => stop('SIGTERM');
  const onUncaught = (error: unknown) => {
    log.fatal({ error: describeError(error) }, 'Uncaught exception');
    stop('uncaughtException');
  };

  target.on('SIGINT', onSigint);
  target.on('SIGTERM', onSigterm);
  target.on('uncaughtException', onUncaught);

  return {
    stop,
    dispose() {
      target.off('SIGINT', onSigint);
      target.off('SIGTERM', onSigterm);
      target.off('uncaughtException', onUncaught);
    }
  };
}

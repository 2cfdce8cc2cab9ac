import pino from 'pino';
import type { BackendLogger } from '@pkbridge/backend-contracts';

type Fields = Record<string, unknown>;

export interface BackendLoggerOptions {
  /**
   * pino level; defaults to `PKBRIDGE_LOG_LEVEL`, then `info`
   */
  level?: string;
  /**
   * Defaults to stderr; the daemon owns stdout
   */
  destination?: pino.DestinationStream;
}

/**
 * Root logger for the backend. Child loggers carry `{ layer, role, jobId }`
 * metadata.
 */
export function createBackendLogger(options: BackendLoggerOptions = {}): BackendLogger {
  const core = pino(
    {
      name: 'pkbridge',
      level: options.level ?? process.env.PKBRIDGE_LOG_LEVEL ?? 'info',
    },
    options.destination ?? pino.destination(2)
  );
  return wrap(core);
}

function wrap(core: pino.Logger): BackendLogger {
  return {
    debug(message: string, fields?: Fields) {
      core.debug(fields ?? {}, message);
    },
    info(message: string, fields?: Fields) {
      core.info(fields ?? {}, message);
    },
    warn(message: string, fields?: Fields) {
      core.warn(fields ?? {}, message);
    },
    error(message: string, fields?: Fields | Error) {
      if (fields instanceof Error) {
        core.error({ err: fields }, message);
        return;
      }
      core.error(fields ?? {}, message);
    },
    child(bindings: Fields) {
      return wrap(core.child(bindings));
    },
  };
}

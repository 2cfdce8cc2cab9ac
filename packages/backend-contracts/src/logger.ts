type Fields = Record<string, unknown>;

/**
 * Structured logger used across the bridge.
 */
export interface BackendLogger {
  debug(message: string, fields?: Fields): void;
  info(message: string, fields?: Fields): void;
  warn(message: string, fields?: Fields): void;
  error(message: string, fields?: Fields | Error): void;
  child(bindings: Fields): BackendLogger;
}

export const noopLogger: BackendLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return noopLogger;
  },
};

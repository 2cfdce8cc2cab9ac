import type { BackendLogger } from '@pkbridge/backend-contracts';

type Fields = Record<string, unknown>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  /**
   * Child bindings merged with the call's fields
   */
  fields: Fields;
}

/**
 * Logger that keeps every entry in memory. Children share the parent's
 * entry list.
 */
export class MemoryLogger implements BackendLogger {
  constructor(
    readonly entries: LogEntry[] = [],
    private readonly bindings: Fields = {}
  ) {}

  debug(message: string, fields?: Fields): void {
    this.push('debug', message, fields);
  }

  info(message: string, fields?: Fields): void {
    this.push('info', message, fields);
  }

  warn(message: string, fields?: Fields): void {
    this.push('warn', message, fields);
  }

  error(message: string, fields?: Fields | Error): void {
    this.push('error', message, fields instanceof Error ? { err: fields.message } : fields);
  }

  child(bindings: Fields): MemoryLogger {
    return new MemoryLogger(this.entries, { ...this.bindings, ...bindings });
  }

  /**
   * Entries at `level`, in order
   */
  at(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  private push(level: LogLevel, message: string, fields?: Fields): void {
    this.entries.push({ level, message, fields: { ...this.bindings, ...fields } });
  }
}

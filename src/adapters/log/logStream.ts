export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  timestamp: string;
  component: string;
  message: string;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(component: string): Logger;
}

export type LogSubscriber = (entry: LogEntry) => void;

const DEFAULT_HISTORY_LIMIT = 500;

/**
 * Append-only stream of log entries. Every subscriber sees every entry in
 * order; the most recent entries are kept for late subscribers.
 */
export class LogStream {
  private readonly subscribers = new Set<LogSubscriber>();
  private readonly entries: LogEntry[] = [];
  private readonly historyLimit: number;
  private readonly clock: () => Date;

  constructor(options: { historyLimit?: number; clock?: () => Date } = {}) {
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.clock = options.clock ?? (() => new Date());
  }

  subscribe(subscriber: LogSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  history(): ReadonlyArray<LogEntry> {
    return this.entries.slice();
  }

  append(level: LogLevel, component: string, message: string): void {
    const entry: LogEntry = {
      level,
      timestamp: this.clock().toISOString(),
      component,
      message
    };
    this.entries.push(entry);
    if (this.entries.length > this.historyLimit) {
      this.entries.splice(0, this.entries.length - this.historyLimit);
    }
    for (const subscriber of this.subscribers) {
      try {
        subscriber(entry);
      } catch (error) {
        console.error(`[LogStream] subscriber failed: ${(error as Error).message}`);
      }
    }
  }

  logger(component: string): Logger {
    return {
      debug: (message) => this.append("debug", component, message),
      info: (message) => this.append("info", component, message),
      warn: (message) => this.append("warn", component, message),
      error: (message) => this.append("error", component, message),
      child: (name) => this.logger(`${component}.${name}`)
    };
  }
}

/** Logger that drops everything; the default when no stream is injected. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger
};

import color from 'picocolors';
import { formatError } from '../errors';
import type { LogEntry, LogLevel, LogSink, SafeFormatter, SecurityLevel, SyncEvent, WalletLogger } from '../types';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const isLogLevel = (value: unknown): value is LogLevel => typeof value === 'string' && value in LOG_LEVELS;

type SinkFailure = { sink: LogSink; error: unknown };

export interface LoggerConfig {
  minLevel: LogLevel;
  sinks: LogSink[];
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: 'info',
  sinks: [],
};

/**
 * Logger that renders each message once per sink security level, so secrets
 * only ever reach secure sinks.
 */
export class Logger implements WalletLogger {
  private readonly config: LoggerConfig;

  constructor(
    config: Partial<LoggerConfig> = {},
    readonly name = 'node',
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  named(component: string): Logger {
    const name = component.length ? `${this.name}.${component}` : this.name;
    return new Logger(this.config, name);
  }

  debugSP(format: SafeFormatter) {
    this.log('debug', format);
  }

  infoSP(format: SafeFormatter) {
    this.log('info', format);
  }

  warnSP(format: SafeFormatter) {
    this.log('warn', format);
  }

  errorSP(format: SafeFormatter) {
    this.log('error', format);
  }

  private log(level: LogLevel, format: SafeFormatter) {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.minLevel]) return;
    const timestamp = new Date().toISOString();
    const failed = this.write(this.config.sinks, level, timestamp, format);
    if (!failed.length) return;
    // A sink failure goes to the remaining sinks once; failures while doing so are dropped.
    const healthy = this.config.sinks.filter((sink) => !failed.some((f) => f.sink === sink));
    const reason = failed.map((f) => formatError(f.error)).join('; ');
    this.write(healthy, 'debug', timestamp, () => `Log sink failed: ${reason}`);
  }

  private write(sinks: LogSink[], level: LogLevel, timestamp: string, format: SafeFormatter): SinkFailure[] {
    const rendered = new Map<SecurityLevel, string>();
    const failed: SinkFailure[] = [];
    for (const sink of sinks) {
      let message = rendered.get(sink.security);
      if (message === undefined) {
        message = format(sink.security);
        rendered.set(sink.security, message);
      }
      try {
        sink.write({ timestamp, level, name: this.name, security: sink.security, message });
      } catch (error) {
        failed.push({ sink, error });
      }
    }
    return failed;
  }
}

const paint: Record<LogLevel, (text: string) => string> = {
  debug: color.gray,
  info: color.green,
  warn: color.yellow,
  error: color.red,
};

/**
 * Public console output, level-tagged and time-prefixed.
 */
export class ConsoleSink implements LogSink {
  readonly security: SecurityLevel = 'public';

  constructor(private readonly colors = true) {}

  write(entry: LogEntry) {
    const tag = `[${entry.level.toUpperCase()}]`;
    const prefix = `[${entry.timestamp.split('T')[1]?.slice(0, 8) ?? entry.timestamp}] ${this.colors ? paint[entry.level](tag) : tag} ${entry.name}:`;
    const line = `${prefix} ${entry.message}`;
    switch (entry.level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  }
}

/**
 * Keeps entries in memory, capped at `maxEntries`.
 */
export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];

  constructor(
    readonly security: SecurityLevel = 'public',
    private readonly maxEntries = 1000,
  ) {}

  write(entry: LogEntry) {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) this.entries.shift();
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => level == null || e.level === level).map((e) => e.message);
  }
}

/**
 * Forwards entries to an event emitter as `log` events.
 */
export class EventSink implements LogSink {
  constructor(
    private readonly emit: (event: SyncEvent) => void,
    readonly security: SecurityLevel = 'public',
  ) {}

  write(entry: LogEntry) {
    this.emit({ type: 'log', payload: entry });
  }
}

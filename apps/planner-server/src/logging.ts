import type { PlannerLogger } from '@waypoint/planning-core';

export type Logger = PlannerLogger;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

const consoleSink: LogSink = (level, line) => {
  const write = level === 'error' ? console.error : console.log;
  write(line);
};

class JsonLogger implements Logger {
  constructor(
    private readonly bindings: Record<string, unknown>,
    private readonly minLevel: LogLevel,
    private readonly sink: LogSink,
  ) {}

  debug(event: string, data?: Record<string, unknown>): void {
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonLogger({ ...this.bindings, ...bindings }, this.minLevel, this.sink);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      event,
      ...this.bindings,
      ...(data ?? {}),
    };

    this.sink(level, JSON.stringify(payload, (_key, value: unknown) => serializeValue(value)));
  }
}

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack,
    };
  }
  return value;
}

export function createLogger(bindings: Record<string, unknown> = {}, options: LoggerOptions = {}): Logger {
  return new JsonLogger(bindings, options.level ?? 'info', options.sink ?? consoleSink);
}

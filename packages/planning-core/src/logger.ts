export interface PlannerLogger {
  debug(event: string, data?: Record<string, unknown>): void;
  info(event: string, data?: Record<string, unknown>): void;
  warn(event: string, data?: Record<string, unknown>): void;
  error(event: string, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): PlannerLogger;
}

class SilentLogger implements PlannerLogger {
  debug(_event: string, _data?: Record<string, unknown>): void {}

  info(_event: string, _data?: Record<string, unknown>): void {}

  warn(_event: string, _data?: Record<string, unknown>): void {}

  error(_event: string, _data?: Record<string, unknown>): void {}

  child(_bindings: Record<string, unknown>): PlannerLogger {
    return this;
  }
}

export const silentLogger: PlannerLogger = new SilentLogger();

import pino from "pino";

export type Logger = pino.Logger;

export function createLogger(options: { level?: string; name?: string } = {}): Logger {
  return pino({
    name: options.name ?? "meetings",
    level: options.level ?? "info",
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function moduleLogger(logger: Logger, moduleName: string): Logger {
  return logger.child({ module: moduleName });
}

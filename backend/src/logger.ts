import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger } from "pino";

export type LoggerConfig = {
  level?: LoggerOptions["level"];
  pretty?: boolean;
};

export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    level: config.level ?? "info",
    base: { service: "kindle-highlights" }
  };

  if (config.pretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname"
      }
    };
  }

  return pino(options);
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

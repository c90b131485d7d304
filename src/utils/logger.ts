import pino from "pino";
import { getConfig } from "../config/loader.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogFormat = "json" | "pretty";

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  destination?: string;
}

// Create logger instance
function createLogger(config: LoggerConfig): pino.Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    // Base context that will be included in every log
    base: {
      service: "fileguard",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.format === "pretty") {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: config.destination === undefined,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
          messageFormat: "{msg}",
          destination: config.destination ?? 2,
        },
      },
    });
  }

  // JSON logs go to stderr so they never mix with a caller's stdout
  return pino(options, pino.destination({ dest: config.destination ?? 2, sync: true }));
}

// Logger wrapper with an operation-level helper
export class Logger {
  private logger: pino.Logger;

  constructor(config: LoggerConfig) {
    this.logger = createLogger(config);
  }

  debug(msg: string): void;
  debug(obj: object, msg: string): void;
  debug(msgOrObj: string | object, msg?: string): void {
    if (typeof msgOrObj === "string") {
      this.logger.debug(msgOrObj);
    } else {
      this.logger.debug(msgOrObj, msg);
    }
  }

  info(msg: string): void;
  info(obj: object, msg: string): void;
  info(msgOrObj: string | object, msg?: string): void {
    if (typeof msgOrObj === "string") {
      this.logger.info(msgOrObj);
    } else {
      this.logger.info(msgOrObj, msg);
    }
  }

  warn(msg: string): void;
  warn(obj: object, msg: string): void;
  warn(msgOrObj: string | object, msg?: string): void {
    if (typeof msgOrObj === "string") {
      this.logger.warn(msgOrObj);
    } else {
      this.logger.warn(msgOrObj, msg);
    }
  }

  error(msg: string): void;
  error(obj: object, msg: string): void;
  error(msgOrObj: string | object, msg?: string): void {
    if (typeof msgOrObj === "string") {
      this.logger.error(msgOrObj);
    } else {
      this.logger.error(msgOrObj, msg);
    }
  }

  // Special method for public operation logging; failures go through logError
  operation(name: string, params: Record<string, unknown>): void {
    this.debug({ operation: name, params }, `Operation completed: ${name}`);
  }

  isLevelEnabled(level: Exclude<LogLevel, "silent">): boolean {
    return this.logger.isLevelEnabled(level);
  }
}

// Global logger instance, created from the current config on first use
let globalLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger(getConfig().logging);
  }
  return globalLogger;
}

export function resetLogger(): void {
  globalLogger = null;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogPayload = Record<string, unknown>;

interface LoggerOptions {
  level?: LogLevel;
  environment?: string;
  bindings?: LogPayload;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  switch (raw?.trim().toLowerCase()) {
    case "debug":
      return "debug";
    case "info":
      return "info";
    case "warn":
    case "warning":
      return "warn";
    case "error":
      return "error";
    default:
      return fallback;
  }
}

export class Logger {
  private readonly level: LogLevel;

  private readonly environment: string;

  private readonly bindings: LogPayload;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.environment = options.environment ?? process.env.NODE_ENV ?? "development";
    this.bindings = options.bindings ?? {};
  }

  /** Logger that stamps every entry with `bindings`, e.g. a component name. */
  child(bindings: LogPayload): Logger {
    return new Logger({
      level: this.level,
      environment: this.environment,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  debug(message: string, payload?: LogPayload): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: LogPayload): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: LogPayload): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: LogPayload): void {
    this.log("error", message, payload);
  }

  private log(level: LogLevel, message: string, payload?: LogPayload): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.level]) {
      return;
    }

    const fields = { ...this.bindings, ...(payload ?? {}) };

    if (this.environment === "development") {
      const meta = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : "";
      // eslint-disable-next-line no-console
      console.log(`[${level.toUpperCase()}] ${message}${meta}`);
      return;
    }

    const entry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...fields,
    };
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(entry));
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const logger = new Logger({ level: parseLogLevel(process.env.LOG_LEVEL) });

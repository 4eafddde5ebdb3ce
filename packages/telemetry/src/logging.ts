export const SSO_LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type SsoLogLevel = (typeof SSO_LOG_LEVELS)[number];

export type SsoLogFields = Readonly<Record<string, unknown>>;

/** Receives one serialized JSON line per accepted log call. */
export type SsoLogSink = (level: SsoLogLevel, line: string) => void;

export interface SsoLoggerOptions {
  readonly name?: string;
  readonly level?: SsoLogLevel;
  readonly fields?: SsoLogFields;
  readonly clock?: () => Date;
  readonly sink?: SsoLogSink;
}

export interface SsoLogger {
  debug(message: string, context?: SsoLogFields): void;
  info(message: string, context?: SsoLogFields): void;
  warn(message: string, context?: SsoLogFields): void;
  error(message: string, context?: SsoLogFields): void;
  child(fields: SsoLogFields): SsoLogger;
}

/**
 * Describes a thrown value for a log line without assuming it is an Error.
 */
export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const consoleSink: SsoLogSink = (level, line) => {
  switch (level) {
    case "error":
      console.error(line);
      return;
    case "warn":
      console.warn(line);
      return;
    default:
      console.log(line);
  }
};

interface LoggerSettings {
  readonly minimum: number;
  readonly clock: () => Date;
  readonly sink: SsoLogSink;
}

class JsonLineLogger implements SsoLogger {
  constructor(
    private readonly settings: LoggerSettings,
    private readonly fields: SsoLogFields,
  ) {}

  debug(message: string, context?: SsoLogFields): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: SsoLogFields): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: SsoLogFields): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: SsoLogFields): void {
    this.write("error", message, context);
  }

  child(fields: SsoLogFields): SsoLogger {
    return new JsonLineLogger(this.settings, { ...this.fields, ...fields });
  }

  private write(level: SsoLogLevel, message: string, context: SsoLogFields = {}): void {
    if (SSO_LOG_LEVELS.indexOf(level) < this.settings.minimum) {
      return;
    }
    const line = JSON.stringify({
      timestamp: this.settings.clock().toISOString(),
      level,
      message,
      ...this.fields,
      ...context,
    });
    this.settings.sink(level, line);
  }
}

/**
 * Structured logger writing one JSON object per line. Calls below `level`
 * are dropped; per-call context overrides fields set through `child`.
 */
export const createSsoLogger = (options: SsoLoggerOptions = {}): SsoLogger =>
  new JsonLineLogger(
    {
      minimum: SSO_LOG_LEVELS.indexOf(options.level ?? "info"),
      clock: options.clock ?? (() => new Date()),
      sink: options.sink ?? consoleSink,
    },
    { service: options.name ?? "sso-bridge", ...options.fields },
  );

/**
 * Structured JSON logger with per-request correlation IDs and secret masking.
 *
 * One JSON object per line. `info` goes to stdout; `debug`, `warn` and
 * `error` go to stderr. Entries below the logger's level are dropped.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: string;
  readonly [key: string]: unknown;
}

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Fields that are masked in log output. Compared case-insensitively. */
const SECRET_FIELDS = new Set([
  "token",
  "accesstoken",
  "access_token",
  "apikey",
  "api_key",
  "authorization",
  "auth",
  "secret",
  "password",
  "credential",
  "privatekey",
  "private_key",
  "subscriptionkey",
  "ocp-apim-subscription-key",
  "xi-api-key",
]);

const MASK = "********";

/** Recursively mask secret fields in an object. */
function maskSecrets(obj: unknown): unknown {
  if (obj === null || typeof obj !== "object") return obj;

  if (Array.isArray(obj)) {
    return obj.map(maskSecrets);
  }

  // Objects that know how to serialise themselves (errors, credentials) do so first.
  const toJSON: unknown = (obj as { toJSON?: unknown }).toJSON;
  if (typeof toJSON === "function") {
    return maskSecrets(toJSON.call(obj));
  }

  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SECRET_FIELDS.has(key.toLowerCase()) && value != null) {
      masked[key] = MASK;
    } else {
      masked[key] = maskSecrets(value);
    }
  }
  return masked;
}

export interface LoggerOptions {
  /** Minimum level written. Defaults to "info". */
  readonly level?: LogLevel | undefined;
}

export class Logger {
  private readonly context: Record<string, unknown>;
  private readonly level: LogLevel;

  constructor(context?: Record<string, unknown>, options?: LoggerOptions) {
    this.context = context ?? {};
    this.level = options?.level ?? "info";
  }

  /** Create a child logger with additional context (e.g., requestId). */
  child(extra: Record<string, unknown>): Logger {
    return new Logger({ ...this.context, ...extra }, { level: this.level });
  }

  /** Whether entries at `level` are written. */
  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      ...this.context,
      ...data,
      level,
      message,
      timestamp: new Date().toISOString(),
    };

    const output = JSON.stringify(maskSecrets(entry));

    if (level === "info") {
      process.stdout.write(output + "\n");
    } else {
      process.stderr.write(output + "\n");
    }
  }
}

/** Create the process root logger. */
export function createRootLogger(options?: LoggerOptions): Logger {
  return new Logger({ service: "speech-gateway" }, options);
}

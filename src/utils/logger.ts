/* tslint:disable:no-console */

type FormatString = `\x1b[${string}m`;

enum TextFormat {
  Reset = "\x1b[0m",
  Gray = "\x1b[38;5;249m",
  Timestamp = "\x1b[38;5;24m",
  Scope = "\x1b[38;5;146m",
  Error = "\x1b[38;5;1m",
  Success = "\x1b[38;5;42m",
  Warn = "\x1b[38;5;228m",
  Info = "\x1b[38;5;117m",
  Debug = "\x1b[38;5;187m",
  Init = "\x1b[38;5;75m",
}

const levels = {
  debug: {
    severity: 0,
    format: TextFormat.Debug,
  },
  info: {
    severity: 1,
    format: TextFormat.Info,
  },
  init: {
    severity: 1,
    format: TextFormat.Init,
  },
  ready: {
    severity: 1,
    format: TextFormat.Success,
  },
  warn: {
    severity: 2,
    format: TextFormat.Warn,
  },
  error: {
    severity: 3,
    format: TextFormat.Error,
  },
} as const;

export type LogLevel = keyof typeof levels;

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && value in levels;

const defaultLevel = (): LogLevel => {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(configured)) return configured;
  return process.env.NODE_ENV === "development" ? "debug" : "info";
};

export class Logger {
  /** Unset on scoped loggers until `setLevel` is called on them */
  private ownLevel: LogLevel | null;

  constructor(
    protected readonly scopeName?: string,
    private readonly parent?: Logger
  ) {
    this.ownLevel = parent ? null : defaultLevel();
  }

  get level(): LogLevel {
    return this.ownLevel ?? this.parent?.level ?? defaultLevel();
  }

  protected get timestamp() {
    const dateString = new Date().toLocaleString("en-US", {
      month: "2-digit",
      day: "2-digit",
      year: "numeric",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hour12: false,
    });
    const [day = "", time = ""] = dateString.split(", ");
    return `${day.replace(/\//g, "-")} @ ${time}`;
  }

  protected format(formatStr: FormatString, content: string) {
    return `${formatStr}${content}${TextFormat.Reset}`;
  }

  protected getPrefix(level: LogLevel) {
    const symbol = this.format.bind(this, TextFormat.Gray);

    const MAX_LEVEL_LENGTH = 5;

    const timestampStr =
      symbol("[") +
      this.format(TextFormat.Timestamp, this.timestamp) +
      symbol("]");

    const levelStr =
      symbol("[") +
      this.format(levels[level].format, level.toUpperCase()) +
      symbol("]") +
      " ".repeat(MAX_LEVEL_LENGTH - level.length) + // Padding
      symbol(":");

    const scopeStr = this.scopeName
      ? ` ${symbol("[")}${this.format(TextFormat.Scope, this.scopeName)}${symbol("]")}`
      : "";

    return `${timestampStr} ${levelStr}${scopeStr}`;
  }

  setLevel(level: LogLevel) {
    this.ownLevel = level;
  }

  isEnabled(level: LogLevel) {
    if (process.env.DISABLE_LOGGING === "true") return false;
    return levels[level].severity >= levels[this.level].severity;
  }

  /** Returns a logger that tags every line with `name` and follows this logger's level */
  scope(name: string): Logger {
    return new Logger(this.scopeName ? `${this.scopeName} > ${name}` : name, this);
  }

  protected log(level: LogLevel, ...args: unknown[]) {
    if (!this.isEnabled(level)) return;
    const message = args
      .map((arg) => {
        if (typeof arg === "string") return arg;
        if (arg instanceof Error) return arg.stack ?? arg.message;
        try {
          return JSON.stringify(arg, null, 2);
        } catch {
          return String(arg);
        }
      })
      .join(" ");
    console.log(this.getPrefix(level), message);
  }

  debug = this.log.bind(this, "debug");
  info = this.log.bind(this, "info");
  init = this.log.bind(this, "init");
  ready = this.log.bind(this, "ready");
  warn = this.log.bind(this, "warn");
  error = this.log.bind(this, "error");
}

export const logger = new Logger();

import fs from "node:fs";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

type EmittedLevel = Exclude<LogLevel, "silent">;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogFields = Record<string, unknown>;

export type LoggerOptions = {
  appName: string;
  level: LogLevel;
  path?: string;
};

type LogSink = {
  stream: fs.WriteStream | null;
};

export class Logger {
  private readonly appName: string;
  private readonly minLevel: LogLevel;
  private readonly sink: LogSink;
  private readonly bindings: LogFields;

  constructor(options: LoggerOptions, bindings: LogFields = {}, sink?: LogSink) {
    this.appName = options.appName;
    this.minLevel = options.level;
    this.bindings = bindings;

    if (sink) {
      this.sink = sink;
    } else if (options.path) {
      fs.mkdirSync(path.dirname(options.path), { recursive: true });
      this.sink = { stream: fs.createWriteStream(options.path, { flags: "a" }) };
    } else {
      this.sink = { stream: null };
    }
  }

  /** Returns a logger that adds `fields` to every entry and shares this logger's file stream. */
  child(fields: LogFields): Logger {
    return new Logger(
      { appName: this.appName, level: this.minLevel },
      { ...this.bindings, ...fields },
      this.sink,
    );
  }

  debug(event: string, fields?: LogFields): void {
    this.emit("debug", event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.emit("info", event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.emit("warn", event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.emit("error", event, fields);
  }

  close(): void {
    if (this.sink.stream) {
      this.sink.stream.end();
      this.sink.stream = null;
    }
  }

  private emit(level: EmittedLevel, event: string, fields?: LogFields): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      app: this.appName,
      event,
      ...this.bindings,
      ...fields,
    };

    const line = JSON.stringify(payload);
    if (level === "error") {
      // eslint-disable-next-line no-console
      console.error(line);
    } else {
      // eslint-disable-next-line no-console
      console.log(line);
    }

    if (this.sink.stream) {
      this.sink.stream.write(`${line}\n`);
    }
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_PRIORITY, value);
}

import { LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
  minLevel?: LogLevel;
}

export type LogWriter = (line: string, level: LogLevel) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function consoleWriter(line: string, level: LogLevel): void {
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly writer: LogWriter;

  constructor(context: LoggerContext, writer: LogWriter = consoleWriter) {
    this.context = context;
    this.writer = writer;
  }

  child(component: string): Logger {
    return new Logger({ ...this.context, component }, this.writer);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.context.minLevel ?? "info"];
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    this.writer(JSON.stringify(payload), level);
  }
}

/** Logger that drops everything; used where a caller passes none. */
export function silentLogger(component = "silent"): Logger {
  return new Logger({ component, runId: "silent" }, () => undefined);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

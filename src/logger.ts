/**
 * Process-wide logging for the pipeline.
 *
 * Components take a `Logger` bound to their own context. Where entries end
 * up is decided once, by the host: JSON lines on the console unless the CLI
 * routes them through its output sink.
 */

export enum LogLevel {
  Debug = "debug",
  Info = "info",
  Warn = "warn",
  Error = "error",
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

type Context = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: Context): void;
  info(message: string, context?: Context): void;
  warn(message: string, context?: Context): void;
  error(message: string, context?: Context): void;
  child(context: Context): Logger;
}

// Ascending severity; an entry passes when its rank is >= the threshold's.
const SEVERITY = [LogLevel.Debug, LogLevel.Info, LogLevel.Warn, LogLevel.Error];

function writeJsonLine(entry: LogEntry): void {
  const line = JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  });
  if (entry.level === LogLevel.Error) console.error(line);
  else if (entry.level === LogLevel.Warn) console.warn(line);
  else console.log(line);
}

const sinkState: { handler: LogHandler; threshold: number } = {
  handler: writeJsonLine,
  threshold: SEVERITY.indexOf(LogLevel.Info),
};

export function setLogHandler(handler: LogHandler): void {
  sinkState.handler = handler;
}

export function setLogLevel(level: LogLevel): void {
  sinkState.threshold = SEVERITY.indexOf(level);
}

export function createLogger(bound: Context = {}): Logger {
  const at =
    (level: LogLevel) =>
    (message: string, context?: Context): void => {
      if (SEVERITY.indexOf(level) < sinkState.threshold) return;
      sinkState.handler({
        level,
        message,
        context: { ...bound, ...context },
        timestamp: new Date().toISOString(),
      });
    };

  return {
    debug: at(LogLevel.Debug),
    info: at(LogLevel.Info),
    warn: at(LogLevel.Warn),
    error: at(LogLevel.Error),
    child: (extra) => createLogger({ ...bound, ...extra }),
  };
}

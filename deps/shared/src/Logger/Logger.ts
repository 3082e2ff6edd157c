export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export type LoggerLevel = LogLevel | "silent";

export const logLevelOrder: Record<LoggerLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 100,
};

export type LogContext = {
  /** 事件名稱，未指定時以 level 代替 */
  event?: string;
  /** 覆寫輸出用的 emoji */
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogMethod {
  (context: LogContext, message: string): void;
  (message: string): void;
  (context?: LogContext): TemplateLog;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  /** 建立子 logger，namespace 會接在路徑之後 (a:b:c) */
  extend(namespace: string, context?: LogContext): Logger;
  /** 只合併 context，不改變路徑 */
  append(context: LogContext): Logger;
}

export type LogRecord = {
  time: string;
  level: LogLevel;
  path: string;
  event: string;
  msg: string;
  context: Record<string, unknown>;
  err?: { name: string; message: string; stack?: string };
};

export interface LogTransport {
  write(record: LogRecord): void;
  dispose(): Promise<void>;
}

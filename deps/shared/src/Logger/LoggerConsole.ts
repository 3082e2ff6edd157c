import kleur from "kleur";

import {
  type LogContext,
  type LogLevel,
  type LogMethod,
  type LogRecord,
  type LogTransport,
  type Logger,
  type LoggerLevel,
  type TemplateLog,
  logLevelOrder,
} from "./Logger";

export type EmojiMap = Record<string, string>;

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

const RESERVED_KEYS = new Set(["event", "emoji", "error"]);

export class LoggerConsole implements Logger {
  readonly trace: LogMethod;
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;

  constructor(
    private readonly level: LoggerLevel = "info",
    private readonly path: string[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = defaultEmojiMap,
    private readonly transports: LogTransport[] = []
  ) {
    this.trace = this.buildMethod("trace");
    this.debug = this.buildMethod("debug");
    this.info = this.buildMethod("info");
    this.warn = this.buildMethod("warn");
    this.error = this.buildMethod("error");
  }

  extend(namespace: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      [...this.path, namespace],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  /** transport 由所有衍生的 logger 共用 */
  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  async dispose() {
    await Promise.all(this.transports.map((t) => t.dispose()));
    this.transports.length = 0;
  }

  private buildMethod(level: LogLevel): LogMethod {
    const write = (
      context: LogContext,
      message: string,
      callSite: Function
    ) => this.write(level, context, message, callSite);

    function log(context: LogContext, message: string): void;
    function log(message: string): void;
    function log(context?: LogContext): TemplateLog;
    function log(
      first?: LogContext | string,
      message?: string
    ): void | TemplateLog {
      if (typeof first === "string") {
        write({}, first, log);
        return;
      }
      if (message !== undefined) {
        write(first ?? {}, message, log);
        return;
      }
      const context = first ?? {};
      const template: TemplateLog = (strings, ...values) => {
        const params: Record<string, unknown> = {};
        let text = strings[0] ?? "";
        values.forEach((value, i) => {
          params[`__${i}`] = value;
          text += kleur.green(String(value)) + (strings[i + 1] ?? "");
        });
        write({ ...context, ...params }, text, template);
      };
      return template;
    }

    return log;
  }

  private write(
    level: LogLevel,
    callContext: LogContext,
    message: string,
    callSite: Function
  ) {
    if (logLevelOrder[level] < logLevelOrder[this.level]) return;

    const event = callContext.event ?? level;
    const emoji = this.pickEmoji(level, callContext);
    const label = [...this.path, event].join(":");
    const merged: Record<string, unknown> = {};
    for (const [key, value] of Object.entries({
      ...this.context,
      ...callContext,
    })) {
      if (!RESERVED_KEYS.has(key)) merged[key] = value;
    }

    const err =
      level === "error"
        ? describeError(callContext.error, message, callSite)
        : undefined;

    const json = Object.keys(merged).length > 0 ? ` ${safeJson(merged)}` : "";
    const line = `${emoji} ${label}: ${message}${json}`;

    switch (level) {
      case "trace":
        console.trace(line);
        break;
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(err?.stack ? `${line}\n${err.stack}` : line);
        break;
    }

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      path: this.path.join(":"),
      event,
      msg: message,
      context: merged,
      err,
    };
    for (const transport of this.transports) transport.write(record);
  }

  private pickEmoji(level: LogLevel, callContext: LogContext) {
    if (callContext.emoji) return callContext.emoji;
    if (callContext.event && this.emojiMap[callContext.event])
      return this.emojiMap[callContext.event];
    // warn / error 一律使用 level emoji，避免被繼承的 emoji 蓋掉
    if (level === "warn" || level === "error") {
      const levelEmoji = this.emojiMap[level];
      if (levelEmoji) return levelEmoji;
    }
    if (typeof this.context.emoji === "string") return this.context.emoji;
    return this.emojiMap[level] ?? "";
  }
}

function describeError(
  error: unknown,
  message: string,
  callSite: Function
): NonNullable<LogRecord["err"]> {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  // 沒有 error 物件時，記錄呼叫 logger 的位置
  const site = new Error(message);
  Error.captureStackTrace(site, callSite);
  return {
    name: "LogCallSite",
    message: error === undefined ? message : safeJson(error),
    stack: site.stack,
  };
}

function safeJson(value: unknown) {
  try {
    return JSON.stringify(value, (_key, v: unknown) =>
      v instanceof Error ? { name: v.name, message: v.message } : v
    );
  } catch {
    return String(value);
  }
}

import kleur from "kleur";

import type {
  EmojiMap,
  LogContext,
  LogLevel,
  LogMethod,
  LogRecord,
  LogTransport,
  Logger,
  SerializedError,
  TemplateLog,
} from "./Logger";
import { logLevels } from "./Logger";

const consoleMethods: Record<LogLevel, (...args: unknown[]) => void> = {
  trace: (...args) => console.debug(...args),
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

const reservedKeys = new Set(["emoji", "event", "error"]);

export class LoggerConsole implements Logger {
  readonly trace: LogMethod;
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;

  constructor(
    private readonly level: LogLevel,
    private readonly transports: LogTransport[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = {},
    private readonly path: string[] = []
  ) {
    this.trace = this.buildMethod("trace");
    this.debug = this.buildMethod("debug");
    this.info = this.buildMethod("info");
    this.warn = this.buildMethod("warn");
    this.error = this.buildMethod("error");
  }

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.transports,
      { ...this.context, ...context },
      this.emojiMap,
      [...this.path, name]
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.transports,
      { ...this.context, ...context },
      this.emojiMap,
      this.path
    );
  }

  /** transport 由所有 extend 出來的 logger 共用 */
  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  private enabled(level: LogLevel) {
    return logLevels.indexOf(level) >= logLevels.indexOf(this.level);
  }

  private buildMethod(level: LogLevel): LogMethod {
    const logger = this;
    function method(message: string): void;
    function method(context: LogContext, message: string): void;
    function method(context?: LogContext): TemplateLog;
    function method(
      contextOrMessage?: LogContext | string,
      message?: string
    ): TemplateLog | void {
      if (typeof contextOrMessage === "string") {
        logger.write(level, {}, contextOrMessage, method);
        return;
      }
      const context = contextOrMessage ?? {};
      if (message !== undefined) {
        logger.write(level, context, message, method);
        return;
      }
      const template: TemplateLog = (strings, ...values) => {
        if (!logger.enabled(level)) return;
        const valueContext: Record<string, unknown> = {};
        let text = strings[0] ?? "";
        values.forEach((value, i) => {
          valueContext[`__${i}`] = value;
          text += kleur.green(String(value)) + (strings[i + 1] ?? "");
        });
        logger.write(level, { ...context, ...valueContext }, text, template);
      };
      return template;
    }
    return method;
  }

  private write(
    level: LogLevel,
    callContext: LogContext,
    message: string,
    // 用於擷取 stack，讓錯誤位置指向呼叫端
    caller: Function
  ) {
    if (!this.enabled(level)) return;
    const merged: LogContext = { ...this.context, ...callContext };
    const event = callContext.event ?? this.context.event;
    const emoji = this.pickEmoji(level, callContext, event);
    const label = event ?? level;
    const prefix = this.path.length > 0 ? `${this.path.join(":")}:` : "";

    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(merged)) {
      if (!reservedKeys.has(key)) extra[key] = value;
    }
    const extraText = Object.keys(extra).length > 0 ? stringify(extra) : "";

    let err: SerializedError | undefined;
    if (merged.error !== undefined) {
      err = serializeError(merged.error);
    } else if (level === "error") {
      const holder: { stack?: string } = {};
      Error.captureStackTrace(holder, caller);
      err = { name: "Error", message, stack: holder.stack };
    }

    const line = [emoji, `${prefix}${label}: ${message}`, extraText]
      .filter((part) => part.length > 0)
      .join(" ");
    const print = consoleMethods[level];
    if (err?.stack) print(line, "\n" + kleur.gray(err.stack));
    else print(line);

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      path: this.path.join(":"),
      event,
      msg: message,
      ...extra,
      err,
    };
    for (const transport of this.transports) {
      transport.write(record);
    }
  }

  private pickEmoji(level: LogLevel, callContext: LogContext, event?: string) {
    if (callContext.emoji) return callContext.emoji;
    const byEvent = event ? this.emojiMap[event] : undefined;
    if (byEvent) return byEvent;
    // warn / error 的 emoji 優先於繼承來的 emoji
    if (level === "warn" || level === "error") {
      const byLevel = this.emojiMap[level];
      if (byLevel) return byLevel;
    }
    return this.context.emoji ?? this.emojiMap[level] ?? "";
  }
}

function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  if (typeof error === "object" && error !== null) {
    return { name: "Object", message: stringify(error) };
  }
  return { name: typeof error, message: String(error) };
}

function stringify(value: unknown) {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

import type { AsyncDisposeable } from "~shared/utils/Disposeable";

export const logLevels = ["trace", "debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof logLevels)[number];

export type LogContext = {
  emoji?: string;
  event?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
};

export type LogRecord = {
  time: string;
  level: LogLevel;
  path: string;
  event?: string;
  msg: string;
  err?: SerializedError;
  [key: string]: unknown;
};

export interface LogTransport extends AsyncDisposeable {
  write(record: LogRecord): void;
}

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

/**
 * 三種呼叫方式：
 * - `logger.info("訊息")`
 * - `logger.info({ event: "start" }, "訊息")`
 * - ``logger.info({ count })`已處理 ${count} 個檔案` ``
 */
export interface LogMethod {
  (message: string): void;
  (context: LogContext, message: string): void;
  (context?: LogContext): TemplateLog;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  /** 建立子 logger，名稱會接在 path 之後 */
  extend(name: string, context?: LogContext): Logger;
  /** 只合併 context，不改變 path */
  append(context: LogContext): Logger;
}

export type EmojiMap = Partial<Record<string, string>>;

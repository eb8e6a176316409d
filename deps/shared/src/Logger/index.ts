import { Type as t } from "@sinclair/typebox";
import path from "node:path";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

import type { EmojiMap, LogLevel, Logger } from "./Logger";
import { LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export { LoggerConsole } from "./LoggerConsole";

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Optional(
      t.Union([
        t.Literal("trace"),
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
      ])
    ),
    LOG_FILE: t.Optional(t.String()),
  })
);

export function createDefaultLoggerFromEnv(): Logger {
  const { LOG_LEVEL, LOG_FILE } = getLoggerConfig();
  const level: LogLevel = LOG_LEVEL ?? "info";
  const logger = new LoggerConsole(level, [], {}, defaultEmojiMap);
  if (LOG_FILE) {
    logger.attachTransport(
      new RfsTransport({
        filename: path.basename(LOG_FILE),
        rfs: { path: path.dirname(LOG_FILE) },
      })
    );
  }
  return logger;
}

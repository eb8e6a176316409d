import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";
import { LoggerConsole, type Logger, defaultEmojiMap } from "~shared/Logger";

const getTestLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    TEST_LOG_LEVEL: t.Optional(
      t.Union([
        t.Literal("trace"),
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
      ])
    ),
  })
);

/** 測試用 logger，預設只輸出 error 以上 */
export function buildTestLogger(): Logger {
  const { TEST_LOG_LEVEL } = getTestLoggerConfig();
  return new LoggerConsole(TEST_LOG_LEVEL ?? "error", [], {}, defaultEmojiMap, [
    "test",
  ]);
}

import { Type as t } from "@sinclair/typebox";
import path from "node:path";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

import { LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export * from "./LoggerConsole";

export const loggerConfigSchema = t.Object({
  LOG_LEVEL: t.Union(
    [
      t.Literal("trace"),
      t.Literal("debug"),
      t.Literal("info"),
      t.Literal("warn"),
      t.Literal("error"),
      t.Literal("silent"),
    ],
    { default: "info" }
  ),
  LOG_FILE: t.Optional(t.String()),
});

export const getLoggerConfig = buildConfigFactoryEnv(loggerConfigSchema);

/**
 * 依環境變數建立根 logger；設定 LOG_FILE 時另外寫入輪替檔案。
 */
export function createDefaultLoggerFromEnv(): LoggerConsole {
  const { LOG_LEVEL, LOG_FILE } = getLoggerConfig();
  const logger = new LoggerConsole(LOG_LEVEL);
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

import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "../ConfigFactory";
import type { LoggerLevel } from "./Logger";
import { LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export * from "./LoggerConsole";

const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Optional(
      t.Union([
        t.Literal("trace"),
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
        t.Literal("silent"),
      ])
    ),
    LOG_DIR: t.Optional(t.String()),
    LOG_FILE: t.Optional(t.String()),
  })
);

export function createDefaultLoggerFromEnv(): LoggerConsole {
  const { LOG_LEVEL, LOG_DIR, LOG_FILE } = getLoggerConfig();
  const level: LoggerLevel = LOG_LEVEL ?? "info";
  const logger = new LoggerConsole(level);
  if (LOG_FILE) {
    logger.attachTransport(
      new RfsTransport({
        filename: LOG_FILE,
        rfs: { path: LOG_DIR ?? "logs" },
      })
    );
  }
  return logger;
}

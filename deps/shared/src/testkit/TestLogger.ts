import { LoggerConsole, type LoggerLevel } from "../Logger";

/** 測試預設不輸出，需要時以 TEST_LOG_LEVEL=debug 開啟 */
export function buildTestLogger(): LoggerConsole {
  const level = parseLevel(process.env.TEST_LOG_LEVEL);
  return new LoggerConsole(level).extend("test");
}

function parseLevel(value: string | undefined): LoggerLevel {
  switch (value) {
    case "trace":
    case "debug":
    case "info":
    case "warn":
    case "error":
      return value;
    default:
      return "silent";
  }
}

import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv, envNumber } from "~shared/ConfigFactory";

import { defaultMaxPathLength } from "@/constants";

/** CLI 參數優先於環境變數 */
export const getAppConfig = buildConfigFactoryEnv(
  t.Object({
    LIBRARY_ROOT: t.Optional(t.String()),
    JSON_REPOSITORY_DIR: t.Optional(t.String()),
    PROCESSED_LOG_PATH: t.Optional(t.String()),
    MAX_PATH_LENGTH: t.Optional(envNumber({ minimum: 1 })),
    REPORT_DIR: t.Optional(t.String()),
    /** 以逗號分隔，這些目錄中的檔案只複製不搬移 */
    PROTECTED_DIRS: t.Optional(t.String()),
  })
);

export const defaultAppConfig = {
  libraryRoot: "~/pictures/library",
  maxPathLength: defaultMaxPathLength,
  reportDir: "dist/dumps",
} as const;

export function splitList(value: string | undefined) {
  return (value ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s !== "");
}

import { Type as t } from "@sinclair/typebox";
import { describe, expect, test } from "vitest";

import {
  buildConfigFactoryEnv,
  envBoolean,
  envNumber,
} from "~shared/ConfigFactory";

const schema = t.Object({
  NAME: t.Optional(t.String()),
  ENABLED: t.Optional(envBoolean()),
  LIMIT: t.Optional(envNumber({ minimum: 1 })),
});

describe("buildConfigFactoryEnv", () => {
  test("只取 schema 宣告的 key 並轉型", () => {
    const getConfig = buildConfigFactoryEnv(schema, {
      NAME: "library",
      ENABLED: "yes",
      LIMIT: " 240 ",
      OTHER: "ignored",
    });
    expect(getConfig()).toEqual({ NAME: "library", ENABLED: true, LIMIT: 240 });
  });

  test("空字串視為未設定", () => {
    const getConfig = buildConfigFactoryEnv(schema, { NAME: "", LIMIT: "" });
    expect(getConfig()).toEqual({});
  });

  test("非 true 類的字串轉為 false", () => {
    const getConfig = buildConfigFactoryEnv(schema, { ENABLED: "0" });
    expect(getConfig().ENABLED).toBe(false);
  });

  test("第一次呼叫後快取結果", () => {
    const env: Record<string, string | undefined> = { NAME: "a" };
    const getConfig = buildConfigFactoryEnv(schema, env);
    const first = getConfig();
    env.NAME = "b";
    expect(getConfig()).toBe(first);
    expect(getConfig().NAME).toBe("a");
  });

  test("格式錯誤時丟出錯誤", () => {
    const getConfig = buildConfigFactoryEnv(schema, { LIMIT: "abc" });
    expect(() => getConfig()).toThrow("環境變數設定錯誤");
  });

  test("數值超出範圍時丟出錯誤", () => {
    const getConfig = buildConfigFactoryEnv(schema, { LIMIT: "0" });
    expect(() => getConfig()).toThrow();
  });
});

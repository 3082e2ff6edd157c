import {
  type StaticDecode,
  type TObject,
  type TSchema,
  Type as t,
} from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);

/** 環境變數布林值："1" / "true" / "yes" / "on" 視為 true */
export function envBoolean() {
  return t
    .Transform(t.String())
    .Decode((value) => TRUE_VALUES.has(value.trim().toLowerCase()))
    .Encode((value) => (value ? "true" : "false"));
}

export function envNumber(options?: { minimum?: number; maximum?: number }) {
  return t
    .Transform(t.String({ pattern: "^\\s*-?\\d+(\\.\\d+)?\\s*$" }))
    .Decode((value) => {
      const n = Number(value);
      if (options?.minimum !== undefined && n < options.minimum)
        throw new Error(`數值 ${n} 小於下限 ${options.minimum}`);
      if (options?.maximum !== undefined && n > options.maximum)
        throw new Error(`數值 ${n} 大於上限 ${options.maximum}`);
      return n;
    })
    .Encode((value) => String(value));
}

/**
 * 以 typebox schema 驗證環境變數並建立設定 getter。
 * 只取 schema 中宣告的 key，第一次呼叫後快取結果。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  env: Record<string, string | undefined> = process.env
): () => StaticDecode<T> {
  let cached: StaticDecode<T> | undefined;
  return () => {
    if (cached) return cached;
    const picked: Record<string, string> = {};
    for (const key of Object.keys(schema.properties)) {
      const value = env[key];
      if (value !== undefined && value !== "") picked[key] = value;
    }
    cached = decodeOrThrow(schema, picked);
    return cached;
  };
}

function decodeOrThrow<T extends TSchema>(
  schema: T,
  value: unknown
): StaticDecode<T> {
  if (!Value.Check(schema, value)) {
    const details = [...Value.Errors(schema, value)]
      .map((e) => `${e.path || "/"}: ${e.message}`)
      .join("; ");
    throw new Error(`環境變數設定錯誤: ${details}`);
  }
  return Value.Decode(schema, value);
}

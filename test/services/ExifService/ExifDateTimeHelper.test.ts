import { ExifDateTime } from "exiftool-vendored";
import { describe, expect, test } from "vitest";

import {
  formatExifDateTime,
  getFirstTime,
  getTime,
} from "@/services/ExifService";

describe("getTime", () => {
  test("沒有時區的字串視為 UTC", () => {
    expect(getTime("2024:08:17 11:26:57")).toEqual(
      new Date("2024-08-17T11:26:57.000Z")
    );
  });

  test("帶時區的 ExifDateTime 轉成 UTC", () => {
    const time = ExifDateTime.fromISO("2025-07-23T18:26:02+08:00");
    expect(getTime(time)).toEqual(new Date("2025-07-23T10:26:02.000Z"));
  });

  test("沒有時區的 ExifDateTime 與字串一樣視為 UTC", () => {
    const time = ExifDateTime.fromEXIF("2021:12:31 23:30:00");
    expect(getTime(time)).toEqual(new Date("2021-12-31T23:30:00.000Z"));
    expect(getTime(time)).toEqual(getTime("2021:12:31 23:30:00"));
  });

  test("無效資料回傳 undefined", () => {
    expect(getTime("0000:00:00 00:00:00")).toBeUndefined();
    expect(getTime("garbage")).toBeUndefined();
    expect(getTime(undefined)).toBeUndefined();
    expect(getTime(42)).toBeUndefined();
  });
});

describe("getFirstTime", () => {
  test("回傳第一個有效值", () => {
    expect(
      getFirstTime([undefined, "0000:00:00 00:00:00", "2021:08:18 12:29:59"])
    ).toEqual(new Date("2021-08-18T12:29:59.000Z"));
  });
});

describe("formatExifDateTime", () => {
  test("以 UTC 輸出", () => {
    expect(formatExifDateTime(new Date("2021-08-18T12:29:59Z"))).toBe(
      "2021:08:18 12:29:59"
    );
  });
});

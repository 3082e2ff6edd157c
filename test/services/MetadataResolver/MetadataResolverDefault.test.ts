import { describe, expect, test } from "vitest";

import {
  MetadataResolverDefault,
  isValidCoordinate,
} from "@/services/MetadataResolver";

import { buildMatch, record } from "~test/fakes/buildMatch";

const resolver = new MetadataResolverDefault();
const mediaPath = "/t/IMG_0001.jpg";

describe("isValidCoordinate", () => {
  test("只有經緯度同時為 0 才無效", () => {
    expect(isValidCoordinate({ latitude: 0, longitude: 0 })).toBe(false);
    expect(isValidCoordinate({ latitude: 0.00001, longitude: -0.00002 })).toBe(
      false
    );
    expect(isValidCoordinate({ latitude: 0, longitude: 78.4677 })).toBe(true);
    expect(isValidCoordinate({ latitude: 51.4769, longitude: 0 })).toBe(true);
    expect(
      isValidCoordinate({ latitude: 45.569666, longitude: -122.674138 })
    ).toBe(true);
  });
});

describe("MetadataResolverDefault 時間", () => {
  test("內嵌時間優先於 JSON", () => {
    const match = buildMatch(mediaPath, {
      primary: record("/t/IMG_0001.jpg.json", {
        photoTakenTime: { timestamp: 1629289799 },
      }),
    });
    const { metadata, issues } = resolver.resolve(match, {
      captureTime: new Date("2015-06-01T00:00:00Z"),
    });
    expect(metadata.timestamp).toEqual({
      value: new Date("2015-06-01T00:00:00Z"),
      source: "embedded",
      sourcePath: undefined,
    });
    expect(issues).toEqual([]);
  });

  test("沒有內嵌與 primary 時使用 supplemental", () => {
    const match = buildMatch(mediaPath, {
      supplemental: [
        record("/t/IMG_0001.jpg.supplemental-metadata.json", {}),
        record("/t/IMG_0001.jpg.sup.json", {
          photoTakenTime: { timestamp: "1629289799" },
        }),
      ],
    });
    const { metadata } = resolver.resolve(match, {});
    expect(metadata.timestamp?.value.toISOString()).toBe(
      "2021-08-18T12:29:59.000Z"
    );
    expect(metadata.timestamp?.source).toBe("supplemental");
    expect(metadata.timestamp?.sourcePath).toBe("/t/IMG_0001.jpg.sup.json");
  });

  test("超出範圍的時間回報後改用下一個來源", () => {
    const match = buildMatch(mediaPath, {
      primary: record("/t/IMG_0001.jpg.json", {
        photoTakenTime: { timestamp: 1893456001 },
      }),
      supplemental: [
        record("/t/IMG_0001.jpg.sup.json", {
          photoTakenTime: { timestamp: 1433116800 },
        }),
      ],
    });
    const { metadata, issues } = resolver.resolve(match, {
      captureTime: new Date("1969-12-31T23:59:59Z"),
    });
    expect(metadata.timestamp?.source).toBe("supplemental");
    expect(metadata.timestamp?.value.toISOString()).toBe(
      "2015-06-01T00:00:00.000Z"
    );
    expect(issues.map((i) => [i.type, i.source])).toEqual([
      ["TIMESTAMP_OUT_OF_RANGE", "embedded"],
      ["TIMESTAMP_OUT_OF_RANGE", "primary"],
    ]);
  });

  test("範圍上下限本身有效", () => {
    const upper = resolver.resolve(
      buildMatch(mediaPath, {
        primary: record("/t/IMG_0001.jpg.json", {
          photoTakenTime: { timestamp: 1893456000 },
        }),
      }),
      {}
    );
    expect(upper.metadata.timestamp?.value.toISOString()).toBe(
      "2030-01-01T00:00:00.000Z"
    );
    const lower = resolver.resolve(buildMatch(mediaPath), {
      captureTime: new Date(0),
    });
    expect(lower.metadata.timestamp?.value.getTime()).toBe(0);
  });

  test("完全沒有時間時不給預設值", () => {
    const match = buildMatch(mediaPath, {
      primary: record("/t/IMG_0001.jpg.json", { title: "IMG_0001.jpg" }),
    });
    const { metadata, issues } = resolver.resolve(match, {});
    expect(metadata.timestamp).toBeUndefined();
    expect(issues).toEqual([]);
  });
});

describe("MetadataResolverDefault GPS", () => {
  test("geoDataExif 優先於 geoData，高度一起帶出", () => {
    const match = buildMatch(mediaPath, {
      primary: record("/t/IMG_0001.jpg.json", {
        geoDataExif: { latitude: 45.5231, longitude: -122.6765, altitude: 15 },
        geoData: { latitude: 10, longitude: 20, altitude: 0 },
      }),
    });
    const { metadata } = resolver.resolve(match, {});
    expect(metadata.gps).toEqual({
      latitude: 45.5231,
      longitude: -122.6765,
      altitude: 15,
      source: "geoDataExif",
      sourcePath: "/t/IMG_0001.jpg.json",
    });
  });

  test("補充 JSON 的 geoDataExif 也優先於 primary 的 geoData", () => {
    const match = buildMatch(mediaPath, {
      primary: record("/t/IMG_0001.jpg.json", {
        geoData: { latitude: 10, longitude: 20 },
      }),
      supplemental: [
        record("/t/IMG_0001.jpg.sup.json", {
          geoDataExif: { latitude: 1.5, longitude: 2.5 },
        }),
      ],
    });
    const { metadata } = resolver.resolve(match, {});
    expect(metadata.gps?.source).toBe("geoDataExif");
    expect(metadata.gps?.sourcePath).toBe("/t/IMG_0001.jpg.sup.json");
  });

  test("Null Island 回報後改用下一個來源", () => {
    const match = buildMatch(mediaPath, {
      primary: record("/t/IMG_0001.jpg.json", {
        geoDataExif: { latitude: 0, longitude: 0 },
        geoData: { latitude: 0, longitude: 78.4677 },
      }),
    });
    const { metadata, issues } = resolver.resolve(match, {
      gps: { latitude: 0, longitude: 0 },
    });
    expect(metadata.gps).toMatchObject({
      latitude: 0,
      longitude: 78.4677,
      source: "geoData",
    });
    expect(issues.map((i) => [i.type, i.source])).toEqual([
      ["NULL_ISLAND", "embedded"],
      ["NULL_ISLAND", "geoDataExif"],
    ]);
  });

  test("內嵌 GPS 有效時不看 JSON", () => {
    const match = buildMatch(mediaPath, {
      primary: record("/t/IMG_0001.jpg.json", {
        geoDataExif: { latitude: 10, longitude: 20 },
      }),
    });
    const { metadata } = resolver.resolve(match, {
      gps: { latitude: 51.4769, longitude: 0, altitude: 3 },
    });
    expect(metadata.gps).toEqual({
      latitude: 51.4769,
      longitude: 0,
      altitude: 3,
      source: "embedded",
      sourcePath: undefined,
    });
  });

  test("沒有有效座標時不輸出 GPS", () => {
    const match = buildMatch(mediaPath, {
      primary: record("/t/IMG_0001.jpg.json", {
        geoData: { latitude: 0, longitude: 0 },
      }),
    });
    const { metadata } = resolver.resolve(match, {});
    expect(metadata.gps).toBeUndefined();
  });
});

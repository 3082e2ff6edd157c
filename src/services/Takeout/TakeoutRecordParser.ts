import { Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import path from "node:path";

import { parseSidecarFileName } from "./SidecarNameHelper";
import type { GeoPoint, TakeoutRecord } from "./TakeoutRecord";

// Takeout 有時把數值寫成字串，兩者都接受
const numeric = t.Union([t.Number(), t.String()]);

const timeSchema = t.Object({ timestamp: numeric });

const geoSchema = t.Object({
  latitude: numeric,
  longitude: numeric,
  altitude: t.Optional(numeric),
});

/**
 * 將 sidecar JSON 轉為 TakeoutRecord。
 * 每個欄位各自驗證，格式不對的欄位當作不存在，不會讓整筆失敗。
 */
export function parseTakeoutRecord(
  sourcePath: string,
  raw: unknown
): TakeoutRecord {
  const fileName = path.basename(sourcePath);
  const name = parseSidecarFileName(fileName);
  const data = isPlainObject(raw) ? raw : {};

  return Object.freeze({
    sourcePath,
    fileName,
    title: typeof data.title === "string" ? data.title : undefined,
    captureTimestamp:
      parseTime(data.photoTakenTime) ?? parseTime(data.creationTime),
    geoData: parseGeo(data.geoData),
    geoDataExif: parseGeo(data.geoDataExif),
    kind: name?.kind ?? "primary",
    marker: name?.marker,
    suffix: name?.suffix,
  });
}

function parseTime(value: unknown): number | undefined {
  if (!Value.Check(timeSchema, value)) return undefined;
  const seconds = toNumber(value.timestamp);
  return seconds === undefined ? undefined : Math.trunc(seconds);
}

function parseGeo(value: unknown): GeoPoint | undefined {
  if (!Value.Check(geoSchema, value)) return undefined;
  const latitude = toNumber(value.latitude);
  const longitude = toNumber(value.longitude);
  if (latitude === undefined || longitude === undefined) return undefined;
  const altitude =
    value.altitude === undefined ? undefined : toNumber(value.altitude);
  return { latitude, longitude, altitude };
}

export function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed === "") return undefined;
    const n = Number(trimmed);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

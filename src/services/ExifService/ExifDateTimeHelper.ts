import { ExifDateTime } from "exiftool-vendored";

const RAW_BASIC_RE = /^(\d{4}):(\d{2}):(\d{2})\s+(\d{2}):(\d{2}):(\d{2})$/;

/**
 * 將 ExifDateTime 或字串轉為 JS Date。
 * 規則：
 * 1) 沒有時區（字串亦同）視為 UTC 牆上時間。
 * 2) rawValue = "YYYY:MM:DD HH:mm:ss" 且具 tzoffsetMinutes，以 raw + offset 算出 UTC。
 * 3) 否則使用 time.toDate()。
 * 4) 無效資料（含 0000:00:00）回傳 undefined。
 */
export function getTime(time: unknown): Date | undefined {
  if (typeof time === "string") return parseExifString(time);
  if (!(time instanceof ExifDateTime)) return undefined;
  if (!time.isValid) return undefined;

  if (!time.hasZone) {
    // 與字串相同，視為 UTC 牆上時間，不看執行環境時區
    const { year, month, day, hour, minute, second } = time;
    if (year === 0 || month === 0 || day === 0) return undefined;
    return validDate(
      Date.UTC(year, month - 1, day, hour, minute, second, time.millisecond ?? 0)
    );
  }

  const raw = time.rawValue;
  const tz = time.tzoffsetMinutes;
  const m = raw ? RAW_BASIC_RE.exec(raw) : null;

  if (m && typeof tz === "number" && Number.isFinite(tz)) {
    // 例：raw=2025:07:23 18:26:02 且 tz=+480(UTC+8) → UTC 10:26:02
    const baseUtcMs = toUtcMs(m);
    if (baseUtcMs === undefined) return undefined;
    return validDate(baseUtcMs - tz * 60 * 1000);
  }

  try {
    const d = time.toDate();
    if (!Number.isNaN(d.getTime())) return d;
  } catch {
    return undefined;
  }
  return undefined;
}

/** 依序嘗試多個時間 tag，回傳第一個有效值 */
export function getFirstTime(candidates: unknown[]): Date | undefined {
  for (const candidate of candidates) {
    const time = getTime(candidate);
    if (time) return time;
  }
  return undefined;
}

/** 以 UTC 輸出 EXIF 格式 "YYYY:MM:DD HH:mm:ss" */
export function formatExifDateTime(date: Date) {
  // 2021-08-18T12:29:59.000Z → 2021:08:18 12:29:59
  return date.toISOString().slice(0, 19).replace("T", " ").replace(/-/g, ":");
}

function parseExifString(value: string): Date | undefined {
  const m = RAW_BASIC_RE.exec(value.trim());
  if (m) {
    const ms = toUtcMs(m);
    return ms === undefined ? undefined : validDate(ms);
  }
  return validDate(new Date(value).getTime());
}

function toUtcMs(m: RegExpExecArray): number | undefined {
  const [year, month, day, hour, minute, second] = m.slice(1).map(Number);
  if (year === 0 || month === 0 || day === 0) return undefined;
  return Date.UTC(year, month - 1, day, hour, minute, second, 0);
}

function validDate(ms: number): Date | undefined {
  if (!Number.isFinite(ms)) return undefined;
  const d = new Date(ms);
  return Number.isNaN(d.getTime()) ? undefined : d;
}

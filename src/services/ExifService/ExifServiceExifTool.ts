import { type Tags, type WriteTags, exiftool } from "exiftool-vendored";
import { access } from "node:fs/promises";

import { type Result, err, ok } from "~shared/utils/Result";

import { type GeoPoint, toNumber } from "@/services/Takeout";

import type {
  EmbeddedMetadata,
  MetadataPatch,
  ReadError,
  WriteError,
} from "./Exif";
import { formatExifDateTime, getFirstTime } from "./ExifDateTimeHelper";
import type { ExifService } from "./ExifService";

/** 實際用到的 ExifTool 方法 */
export interface ExifToolClient {
  read(file: string): Promise<Tags>;
  write(
    file: string,
    tags: WriteTags,
    options?: { writeArgs?: string[] }
  ): Promise<unknown>;
  end(): Promise<unknown>;
}

export class ExifServiceExifTool implements ExifService {
  private readonly tool: ExifToolClient;

  constructor(deps?: { exiftool?: ExifToolClient }) {
    this.tool = deps?.exiftool ?? exiftool;
  }

  async readEmbedded(
    filePath: string
  ): Promise<Result<EmbeddedMetadata, ReadError>> {
    try {
      await access(filePath);
    } catch {
      return err({ type: "FILE_NOT_FOUND", message: `找不到檔案: ${filePath}` });
    }

    let tags: Tags;
    try {
      tags = await this.tool.read(filePath);
    } catch (e) {
      return err({
        type: "READ_FAILED",
        message: `讀取 EXIF 失敗: ${filePath} (${e instanceof Error ? e.message : String(e)})`,
      });
    }

    // 影片的時間多半只在 QuickTime tag
    const captureTime = getFirstTime([
      tags.DateTimeOriginal,
      tags.CreateDate,
      tags.MediaCreateDate,
      tags.TrackCreateDate,
    ]);

    return ok({
      filePath,
      captureTime,
      gps: readGps(tags),
      fileTypeExtension: tags.FileTypeExtension
        ? `.${String(tags.FileTypeExtension).toLowerCase()}`
        : undefined,
    });
  }

  async writeMetadata(
    filePath: string,
    patch: MetadataPatch
  ): Promise<Result<void, WriteError>> {
    const tags: WriteTags = {};
    if (patch.captureTime) {
      const value = formatExifDateTime(patch.captureTime);
      tags.DateTimeOriginal = value;
      tags.CreateDate = value;
    }
    if (patch.gps) {
      const { latitude, longitude, altitude } = patch.gps;
      tags.GPSLatitude = Math.abs(latitude);
      tags.GPSLatitudeRef = latitude < 0 ? "S" : "N";
      tags.GPSLongitude = Math.abs(longitude);
      tags.GPSLongitudeRef = longitude < 0 ? "W" : "E";
      if (altitude !== undefined) tags.GPSAltitude = altitude;
    }
    if (Object.keys(tags).length === 0) return ok();

    try {
      await this.tool.write(filePath, tags, {
        writeArgs: ["-overwrite_original", "-P"],
      });
      return ok();
    } catch (e) {
      return err({
        type: "WRITE_FAILED",
        message: `寫入 metadata 失敗: ${filePath} (${e instanceof Error ? e.message : String(e)})`,
      });
    }
  }

  async dispose() {
    await this.tool.end();
  }
}

function readGps(tags: Tags): GeoPoint | undefined {
  let latitude = toNumber(tags.GPSLatitude);
  let longitude = toNumber(tags.GPSLongitude);
  if (latitude === undefined || longitude === undefined) return undefined;
  if (String(tags.GPSLatitudeRef ?? "").toUpperCase().startsWith("S"))
    latitude = -Math.abs(latitude);
  if (String(tags.GPSLongitudeRef ?? "").toUpperCase().startsWith("W"))
    longitude = -Math.abs(longitude);
  return { latitude, longitude, altitude: toNumber(tags.GPSAltitude) };
}

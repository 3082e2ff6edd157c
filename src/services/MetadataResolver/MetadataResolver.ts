import type { EmbeddedMetadata } from "@/services/ExifService";
import type { MatchResult } from "@/services/MatchingService";
import type { GeoPoint } from "@/services/Takeout";

export type TimestampSource = "embedded" | "primary" | "supplemental";

export type GpsSource = "embedded" | "geoDataExif" | "geoData";

export type ResolvedTimestamp = {
  value: Date;
  source: TimestampSource;
  /** 來自 JSON 時，該 JSON 的路徑 */
  sourcePath?: string;
};

export type ResolvedGps = GeoPoint & {
  source: GpsSource;
  sourcePath?: string;
};

export type ResolvedMetadata = {
  timestamp?: ResolvedTimestamp;
  gps?: ResolvedGps;
};

export type ResolveIssueType = "TIMESTAMP_OUT_OF_RANGE" | "NULL_ISLAND";

export interface ResolveIssue {
  mediaPath: string;
  type: ResolveIssueType;
  message: string;
  source: TimestampSource | GpsSource;
  sourcePath?: string;
}

export interface MetadataResolver {
  /**
   * 依優先順序決定最終的拍攝時間與 GPS。
   * 時間：embedded → primary JSON → 第一個可用的 supplemental JSON
   * GPS：embedded → geoDataExif → geoData，Null Island 一律排除
   */
  resolve(
    match: MatchResult,
    embedded: Partial<EmbeddedMetadata>
  ): { metadata: ResolvedMetadata; issues: ResolveIssue[] };
}

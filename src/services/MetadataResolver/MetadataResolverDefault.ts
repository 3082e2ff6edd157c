import { fromUnixTime, getUnixTime, isValid } from "date-fns";

import { captureTimeWindow } from "@/constants";
import type { EmbeddedMetadata } from "@/services/ExifService";
import type { MatchResult } from "@/services/MatchingService";
import type { GeoPoint, TakeoutRecord } from "@/services/Takeout";

import { isValidCoordinate } from "./GpsHelper";
import type {
  GpsSource,
  MetadataResolver,
  ResolveIssue,
  ResolvedGps,
  ResolvedTimestamp,
  TimestampSource,
} from "./MetadataResolver";

type TimeCandidate = {
  seconds: number;
  source: TimestampSource;
  sourcePath?: string;
};

type GpsCandidate = {
  point: GeoPoint;
  source: GpsSource;
  sourcePath?: string;
};

export class MetadataResolverDefault implements MetadataResolver {
  resolve(match: MatchResult, embedded: Partial<EmbeddedMetadata>) {
    const issues: ResolveIssue[] = [];
    const mediaPath = match.media.path;
    const records: TakeoutRecord[] = [
      ...(match.primaryRecord ? [match.primaryRecord] : []),
      ...match.supplementalRecords,
    ];

    const timestamp = this.resolveTimestamp(
      timeCandidates(match, embedded),
      mediaPath,
      issues
    );
    const gps = this.resolveGps(
      gpsCandidates(records, embedded),
      mediaPath,
      issues
    );

    return { metadata: { timestamp, gps }, issues };
  }

  private resolveTimestamp(
    candidates: Iterable<TimeCandidate>,
    mediaPath: string,
    issues: ResolveIssue[]
  ): ResolvedTimestamp | undefined {
    for (const candidate of candidates) {
      const { seconds, source, sourcePath } = candidate;
      if (seconds < captureTimeWindow.min || seconds > captureTimeWindow.max) {
        issues.push({
          mediaPath,
          type: "TIMESTAMP_OUT_OF_RANGE",
          message: `拍攝時間超出 1970~2030 範圍: ${describeEpoch(seconds)} (${source})`,
          source,
          sourcePath,
        });
        continue;
      }
      return { value: fromUnixTime(seconds), source, sourcePath };
    }
    return undefined;
  }

  private resolveGps(
    candidates: Iterable<GpsCandidate>,
    mediaPath: string,
    issues: ResolveIssue[]
  ): ResolvedGps | undefined {
    for (const { point, source, sourcePath } of candidates) {
      if (!isValidCoordinate(point)) {
        issues.push({
          mediaPath,
          type: "NULL_ISLAND",
          message: `忽略 (0,0) 座標 (${source})`,
          source,
          sourcePath,
        });
        continue;
      }
      // 高度不做檢查，跟著經緯度的來源走
      return {
        latitude: point.latitude,
        longitude: point.longitude,
        altitude: point.altitude,
        source,
        sourcePath,
      };
    }
    return undefined;
  }
}

function* timeCandidates(
  match: MatchResult,
  embedded: Partial<EmbeddedMetadata>
): Generator<TimeCandidate> {
  if (embedded.captureTime && isValid(embedded.captureTime)) {
    yield { seconds: getUnixTime(embedded.captureTime), source: "embedded" };
  }
  const primary = match.primaryRecord;
  if (primary?.captureTimestamp !== undefined) {
    yield {
      seconds: primary.captureTimestamp,
      source: "primary",
      sourcePath: primary.sourcePath,
    };
  }
  for (const record of match.supplementalRecords) {
    if (record.captureTimestamp === undefined) continue;
    yield {
      seconds: record.captureTimestamp,
      source: "supplemental",
      sourcePath: record.sourcePath,
    };
  }
}

/** geoDataExif 不論來自哪一筆 record，都優先於 geoData */
function* gpsCandidates(
  records: readonly TakeoutRecord[],
  embedded: Partial<EmbeddedMetadata>
): Generator<GpsCandidate> {
  if (embedded.gps) yield { point: embedded.gps, source: "embedded" };
  for (const record of records) {
    if (record.geoDataExif)
      yield {
        point: record.geoDataExif,
        source: "geoDataExif",
        sourcePath: record.sourcePath,
      };
  }
  for (const record of records) {
    if (record.geoData)
      yield {
        point: record.geoData,
        source: "geoData",
        sourcePath: record.sourcePath,
      };
  }
}

function describeEpoch(seconds: number) {
  const date = fromUnixTime(seconds);
  return isValid(date) ? `${seconds} (${date.toISOString()})` : `${seconds}`;
}

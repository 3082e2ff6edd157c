import type { CandidateSet } from "@/services/CandidateGenerator";
import type { JsonIndex } from "@/services/JsonIndex";
import type {
  MediaFile,
  SidecarKind,
  TakeoutRecord,
} from "@/services/Takeout";

import type {
  MatchIssue,
  MatchResult,
  MatchingService,
} from "./MatchingService";

export class MatchingServiceDefault implements MatchingService {
  match(media: MediaFile, candidates: CandidateSet, index: JsonIndex) {
    const issues: MatchIssue[] = [];

    // 候選產生已保證 suffix 一致，查到後仍再檢查一次
    const accept = (record: TakeoutRecord, kind: SidecarKind) => {
      if (record.suffix !== media.suffix) {
        issues.push({
          mediaPath: media.path,
          type: "SUFFIX_MISMATCH",
          message: `suffix 不一致: 媒體 ${describe(media.suffix)}，JSON ${describe(record.suffix)} (${record.fileName})`,
          sourcePath: record.sourcePath,
        });
        return false;
      }
      if (record.kind !== kind) {
        issues.push({
          mediaPath: media.path,
          type: "KIND_MISMATCH",
          message: `JSON 類型不一致: 預期 ${kind}，實際 ${record.kind} (${record.fileName})`,
          sourcePath: record.sourcePath,
        });
        return false;
      }
      return true;
    };

    let primaryRecord: TakeoutRecord | undefined;
    for (const candidate of candidates.primary) {
      const record = index.lookup(candidate);
      if (!record || !accept(record, "primary")) continue;
      if (!primaryRecord) {
        primaryRecord = record;
        continue;
      }
      if (record.sourcePath === primaryRecord.sourcePath) continue;
      issues.push({
        mediaPath: media.path,
        type: "DUPLICATE_PRIMARY",
        message: `已採用 ${primaryRecord.fileName}，忽略 ${record.fileName}`,
        sourcePath: record.sourcePath,
      });
    }

    // 補充 JSON 全部保留，Google 可能為同一檔案輸出多份
    const supplementalRecords: TakeoutRecord[] = [];
    const seen = new Set<string>();
    for (const candidate of candidates.supplemental) {
      const record = index.lookup(candidate);
      if (!record || seen.has(record.sourcePath)) continue;
      if (!accept(record, "supplemental")) continue;
      seen.add(record.sourcePath);
      supplementalRecords.push(record);
    }

    const result: MatchResult = Object.freeze({
      media,
      primaryRecord,
      supplementalRecords: Object.freeze(supplementalRecords),
    });
    return { result, issues };
  }
}

function describe(suffix: number | undefined) {
  return suffix === undefined ? "無" : `(${suffix})`;
}

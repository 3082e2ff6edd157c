import type { CandidateSet } from "@/services/CandidateGenerator";
import type { JsonIndex } from "@/services/JsonIndex";
import type { MediaFile, TakeoutRecord } from "@/services/Takeout";

export interface MatchResult {
  readonly media: MediaFile;
  readonly primaryRecord?: TakeoutRecord;
  readonly supplementalRecords: readonly TakeoutRecord[];
}

export type MatchIssueType =
  | "SUFFIX_MISMATCH"
  | "KIND_MISMATCH"
  | "DUPLICATE_PRIMARY";

export interface MatchIssue {
  mediaPath: string;
  type: MatchIssueType;
  message: string;
  sourcePath: string;
}

export interface MatchingService {
  /**
   * 以候選檔名查索引，挑出真正屬於此媒體檔的 record。
   * 找不到是正常結果，不會產生 issue。
   */
  match(
    media: MediaFile,
    candidates: CandidateSet,
    index: JsonIndex
  ): { result: MatchResult; issues: MatchIssue[] };
}

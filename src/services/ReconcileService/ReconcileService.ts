import type { BundleKey } from "@/services/BundleAssigner";
import type { CandidateSet } from "@/services/CandidateGenerator";
import type { EmbeddedMetadata, ReadError } from "@/services/ExifService";
import type { JsonIndex } from "@/services/JsonIndex";
import type { MatchIssue, MatchResult } from "@/services/MatchingService";
import type {
  ResolveIssue,
  ResolvedMetadata,
} from "@/services/MetadataResolver";
import type { MediaFile } from "@/services/Takeout";

type OutcomeBase = {
  media: MediaFile;
  candidates: CandidateSet;
  match: MatchResult;
  /** 讀不到內嵌 metadata 時為 undefined */
  embedded?: EmbeddedMetadata;
  metadata: ResolvedMetadata;
};

export type ReconcileOutcome =
  | (OutcomeBase & { type: "BUNDLE"; bundle: BundleKey })
  | (OutcomeBase & { type: "MANUAL_REVIEW"; reason: "no-timestamp" });

export type EmbeddedReadIssue = {
  mediaPath: string;
  type: "EMBEDDED_READ_FAILED";
  message: string;
  cause: ReadError["type"];
};

export type ReconcileIssue = MatchIssue | ResolveIssue | EmbeddedReadIssue;

export interface ReconcileService {
  /**
   * 對單一媒體檔依序執行：候選檔名 → 比對 → 讀取內嵌 metadata → 決定 metadata → 分組。
   */
  reconcile(
    mediaPath: string,
    index: JsonIndex
  ): Promise<{ outcome: ReconcileOutcome; issues: ReconcileIssue[] }>;
}

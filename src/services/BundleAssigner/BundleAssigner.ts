import type { ResolvedMetadata } from "@/services/MetadataResolver";
import type { MediaFile } from "@/services/Takeout";

export type BundleKey = {
  /** yyyy */
  year: string;
  /** MM */
  month: string;
  baseName: string;
};

export type ManualReview = { type: "MANUAL_REVIEW"; reason: "no-timestamp" };

export type BundleAssignment = { type: "BUNDLE"; bundle: BundleKey } | ManualReview;

export interface BundleAssigner {
  /**
   * 唯一計算 year/month 分組的地方。沒有可信時間時回傳 MANUAL_REVIEW。
   */
  assign(media: MediaFile, metadata: ResolvedMetadata): BundleAssignment;
}

import type { Result } from "~shared/utils/Result";

/** reconcile 會輸出的報告名稱 */
export const reportNames = [
  "sidecar-issues",
  "index-conflicts",
  "skipped-files",
  "reconcile-issues",
  "library-plan",
  "execute-issues",
] as const;

export type ReportName = (typeof reportNames)[number];

export type ReportTally = {
  name: ReportName;
  filePath: string;
  /** issue type → 數量 */
  counts: Record<string, number>;
};

export type StatusSummary = {
  /** 只保留每種報告最新的一份 */
  reports: ReportTally[];
};

export type StatusReportError = {
  type: "READ_FAILED" | "INVALID_REPORT";
  message: string;
  filePath: string;
};

export interface StatusReport {
  summarize(): Promise<Result<StatusSummary, StatusReportError>>;
}

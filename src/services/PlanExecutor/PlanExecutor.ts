import type { LibraryPlan } from "@/types";

export type ExecuteIssue = {
  path: string;
  type:
    | "TARGET_EXISTS"
    | "TRANSFER_FAILED"
    | "SIDECAR_COPY_FAILED"
    | "WRITE_FAILED";
  message: string;
};

export type ExecuteSummary = {
  /** 成功搬移或複製的來源媒體檔 */
  transferred: string[];
  /** 目標已存在而略過的來源媒體檔 */
  skippedExisting: string[];
  sidecarsCopied: number;
  metadataWritten: number;
  issues: ExecuteIssue[];
};

export interface PlanExecutor {
  /** 依計畫操作檔案，既有檔案一律不覆蓋 */
  execute(plan: LibraryPlan): Promise<ExecuteSummary>;
}

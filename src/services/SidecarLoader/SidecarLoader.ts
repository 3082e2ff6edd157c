import type { TakeoutRecord } from "@/services/Takeout";

export type SidecarIssue = {
  sourcePath: string;
  type: "READ_FAILED" | "INVALID_JSON";
  message: string;
};

export interface SidecarLoader {
  /** 讀取並解析 sidecar，單一檔案失敗只記錄 issue */
  load(
    paths: readonly string[]
  ): Promise<{ records: TakeoutRecord[]; issues: SidecarIssue[] }>;
}

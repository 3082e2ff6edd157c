import type { ReconcileOutcome } from "@/services/ReconcileService";
import type { LibraryPlan } from "@/types";

export type PlanIssue = {
  mediaPath: string;
  type: "PATH_TOO_LONG" | "DUPLICATE_TARGET";
  message: string;
  target: string;
};

export interface LibraryPlanService {
  /**
   * 根據比對結果產生整理計畫：媒體檔搬移、sidecar 複製與 metadata 寫回。
   * 不會碰檔案系統；同一目標路徑只保留第一個媒體檔。
   */
  plan(outcomes: readonly ReconcileOutcome[]): {
    plan: LibraryPlan;
    issues: PlanIssue[];
  };
}

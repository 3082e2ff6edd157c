import type { TakeoutRecord } from "@/services/Takeout";

/** sidecar 檔名（不分大小寫）→ 唯一可信的 record */
export interface JsonIndex {
  lookup(fileName: string): TakeoutRecord | undefined;
  readonly size: number;
}

export interface JsonIndexBuilder {
  /**
   * 由整批 record 建立索引。
   * 同名但內容不同的 record 全部排除，並交給 QuarantineSink。
   */
  build(records: readonly TakeoutRecord[]): JsonIndex;
}

export interface IndexConflict {
  fileName: string;
  records: TakeoutRecord[];
}

export interface QuarantineSink {
  report(conflict: IndexConflict): void;
}

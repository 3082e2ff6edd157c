import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

/** 匯出目錄掃描結果，皆為排序後的完整路徑 */
export type TakeoutScan = {
  mediaPaths: string[];
  sidecarPaths: string[];
  /** 不在 allowExts 內的非 JSON 檔 */
  skippedPaths: string[];
};

export interface FileSystemScanner {
  /**
   * 掃描目錄，將 .json sidecar 與媒體檔分開。
   * allowExts 只限制媒體檔，未指定時所有非 JSON 檔都視為媒體。
   */
  scan(
    rootPath: string,
    options?: { recursive?: boolean; allowExts?: readonly string[] }
  ): Promise<Result<TakeoutScan, ScanError>>;
}

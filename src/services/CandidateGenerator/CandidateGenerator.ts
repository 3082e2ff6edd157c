import type { MediaFile } from "@/services/Takeout";

/**
 * 一個媒體檔可能對應的 sidecar 檔名，尚未檢查是否存在。
 * primary 是同一個 primary sidecar 的各種寫法，最多只會採用其中一個。
 */
export interface CandidateSet {
  primary: string[];
  supplemental: string[];
}

export interface CandidateGenerator {
  generate(media: MediaFile): CandidateSet;
}

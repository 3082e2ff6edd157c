import type { SupplementalMarker } from "@/constants";

export type GeoPoint = {
  latitude: number;
  longitude: number;
  altitude?: number;
};

export type SidecarKind = "primary" | "supplemental";

/**
 * 一個 Takeout JSON sidecar 解析後的內容。
 * 欄位無法解析時視為不存在。
 */
export type TakeoutRecord = {
  readonly sourcePath: string;
  readonly fileName: string;
  /** JSON 的 title，可能因截斷或字元替換而與實際檔名不同 */
  readonly title?: string;
  /** epoch 秒：photoTakenTime，沒有時退回 creationTime */
  readonly captureTimestamp?: number;
  readonly geoData?: GeoPoint;
  readonly geoDataExif?: GeoPoint;
  readonly kind: SidecarKind;
  readonly marker?: SupplementalMarker;
  readonly suffix?: number;
};

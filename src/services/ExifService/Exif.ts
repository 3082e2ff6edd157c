import type { GeoPoint } from "@/services/Takeout";

/** 媒體檔內嵌的 metadata，讀不到的欄位為 undefined */
export type EmbeddedMetadata = {
  /** 檔案完整路徑 */
  filePath: string;

  /** 拍攝時間 */
  captureTime?: Date;

  /** 內嵌 GPS（已依 Ref 轉為帶正負號的十進位） */
  gps?: GeoPoint;

  /** 依檔案內容判斷的副檔名，例如 ".jpg" */
  fileTypeExtension?: string;
};

/** 要寫回檔案的欄位 */
export type MetadataPatch = {
  captureTime?: Date;
  gps?: GeoPoint;
};

export type ReadError =
  | { type: "FILE_NOT_FOUND"; message: string }
  | { type: "READ_FAILED"; message: string }
  | { type: "PARSE_FAILED"; message: string }
  | { type: "NO_EXIF_DATA"; message: string };

export type WriteError = { type: "WRITE_FAILED"; message: string };

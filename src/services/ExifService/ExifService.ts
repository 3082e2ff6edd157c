import type { Result } from "~shared/utils/Result";

import type {
  EmbeddedMetadata,
  MetadataPatch,
  ReadError,
  WriteError,
} from "./Exif";

/** 只負責讀取內嵌 metadata 的部分，比對流程只依賴這個介面 */
export interface EmbeddedMetadataReader {
  /**
   * 嘗試讀取檔案的拍攝時間、GPS 與實際檔案類型。
   * 讀取失敗時包含具體錯誤原因，呼叫端視為沒有內嵌 metadata。
   */
  readEmbedded(filePath: string): Promise<Result<EmbeddedMetadata, ReadError>>;
}

export interface ExifService extends EmbeddedMetadataReader {
  /**
   * 將拍攝時間與 GPS 寫入檔案，未提供的欄位不會變動。
   */
  writeMetadata(
    filePath: string,
    patch: MetadataPatch
  ): Promise<Result<void, WriteError>>;

  dispose(): Promise<void>;
}

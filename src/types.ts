import type { MetadataPatch } from "@/services/ExifService";

/** 受保護目錄中的檔案只複製，不搬移 */
export type TransferMode = "move" | "copy";

export type Transfer = { mode: TransferMode; from: string; to: string };

export type CopyFile = { from: string; to: string };

export type MetadataWrite = { filePath: string; patch: MetadataPatch };

export type LibraryPlan = {
  transfers: Transfer[];
  sidecarCopies: CopyFile[];
  /** filePath 指向搬移後的位置 */
  metadataWrites: MetadataWrite[];
};

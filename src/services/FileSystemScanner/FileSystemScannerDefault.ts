import { readdir } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { sidecarExtension } from "@/constants";
import { parseMediaFileName } from "@/services/Takeout";

import type { FileSystemScanner, ScanError, TakeoutScan } from "./FileSystemScanner";

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    options?: { recursive?: boolean; allowExts?: readonly string[] }
  ): Promise<Result<TakeoutScan, ScanError>> {
    const allowExts = options?.allowExts ?? [];
    const isRecursive = options?.recursive ?? true;
    const allowExtsSet = new Set(
      allowExts.map((e) =>
        e.startsWith(".") ? e.toLowerCase() : `.${e.toLowerCase()}`
      )
    );
    try {
      const entries = await readdir(rootPath, {
        recursive: isRecursive,
        withFileTypes: true,
      });
      const mediaPaths: string[] = [];
      const sidecarPaths: string[] = [];
      const skippedPaths: string[] = [];
      for (const d of entries) {
        if (!d.isFile()) continue;
        const fullPath = path.join(d.parentPath, d.name);
        const ext = path.extname(d.name).toLowerCase();
        if (ext === sidecarExtension) {
          sidecarPaths.push(fullPath);
          continue;
        }
        // IMG.jpg(1) 的副檔名是 .jpg，不是 extname 給的 .jpg(1)
        const mediaExt = parseMediaFileName(d.name).extension.toLowerCase();
        if (allowExtsSet.size > 0 && !allowExtsSet.has(mediaExt)) {
          skippedPaths.push(fullPath);
          continue;
        }
        mediaPaths.push(fullPath);
      }
      // 不依賴目錄列舉順序
      mediaPaths.sort();
      sidecarPaths.sort();
      skippedPaths.sort();
      return ok({ mediaPaths, sidecarPaths, skippedPaths });
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}

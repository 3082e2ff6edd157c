import path from "node:path";

import { parseMediaFileName } from "./SuffixHelper";

export type MediaFile = {
  readonly path: string;
  readonly fileName: string;
  /** 不含副檔名與 duplicate suffix */
  readonly name: string;
  /** 不含副檔名，保留 suffix，作為 bundle 名稱 */
  readonly stem: string;
  readonly extension: string;
  readonly suffix?: number;
};

export function parseMediaFile(filePath: string): MediaFile {
  const fileName = path.basename(filePath);
  const parsed = parseMediaFileName(fileName);
  return Object.freeze({
    path: filePath,
    fileName,
    name: parsed.name,
    stem: parsed.stem,
    extension: parsed.extension,
    suffix: parsed.suffix,
  });
}

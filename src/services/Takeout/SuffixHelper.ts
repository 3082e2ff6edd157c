import path from "node:path";

import { maxSuffixDigits } from "@/constants";

const TRAILING_SUFFIX_RE = /\((\d+)\)$/;
const SUFFIX_AFTER_EXT_RE = /^(.+)(\.[^.()]+)\((\d+)\)$/;

/**
 * 取出 stem 結尾的 duplicate suffix，例如 IMG_3136(1) → 1。
 * 只接受 1~3 位數；IMG(2020) 會回傳 undefined。
 */
export function parseSuffix(stem: string): number | undefined {
  const match = TRAILING_SUFFIX_RE.exec(stem);
  if (!match) return undefined;
  return toSuffix(match[1]);
}

export function toSuffix(digits: string | undefined): number | undefined {
  if (!digits || digits.length > maxSuffixDigits) return undefined;
  if (!/^\d+$/.test(digits)) return undefined;
  return Number(digits);
}

export function formatSuffix(suffix: number) {
  return `(${suffix})`;
}

export type ParsedMediaName = {
  /** 不含副檔名與 suffix，IMG_3136(1).MOV → IMG_3136 */
  name: string;
  /** 不含副檔名，IMG_3136(1).MOV → IMG_3136(1) */
  stem: string;
  /** 含 "."，保留原本大小寫；沒有副檔名時為空字串 */
  extension: string;
  suffix?: number;
};

/**
 * 拆解媒體檔名。suffix 可能在副檔名前 (IMG(1).jpg) 或後 (IMG.jpg(1))。
 */
export function parseMediaFileName(fileName: string): ParsedMediaName {
  const after = SUFFIX_AFTER_EXT_RE.exec(fileName);
  if (after) {
    const suffix = toSuffix(after[3]);
    if (suffix !== undefined) {
      const name = after[1];
      return {
        name,
        stem: `${name}${formatSuffix(suffix)}`,
        extension: after[2],
        suffix,
      };
    }
  }

  let extension = path.extname(fileName);
  if (extension.includes("(")) extension = "";
  const stem = extension ? fileName.slice(0, -extension.length) : fileName;
  const suffix = parseSuffix(stem);
  const name =
    suffix === undefined ? stem : stem.replace(TRAILING_SUFFIX_RE, "");
  return { name, stem, extension, suffix };
}

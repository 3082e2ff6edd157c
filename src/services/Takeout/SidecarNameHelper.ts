import {
  type SupplementalMarker,
  sidecarExtension,
  supplementalMarkers,
} from "@/constants";

import { parseMediaFileName, toSuffix } from "./SuffixHelper";
import type { SidecarKind } from "./TakeoutRecord";

export type ParsedSidecarName = {
  /** 去掉 .json 與補充標記後的媒體檔名部分 */
  mediaFileName: string;
  kind: SidecarKind;
  marker?: SupplementalMarker;
  suffix?: number;
};

const markerPattern = new RegExp(
  `^(.+)\\.(${supplementalMarkers.map(escapeRegExp).join("|")})(?:\\((\\d+)\\))?$`,
  "i"
);

/**
 * 解析 sidecar 檔名：
 * - IMG_1234.jpg.json → primary
 * - IMG_1234.jpg(2).json / IMG_1234(2).jpg.json → primary, suffix 2
 * - IMG_1234.jpg.supplemental-metadata(2).json → supplemental, suffix 2
 * - IMG_1234(2).jpg.sup.json → supplemental, suffix 2
 * 標記上的 suffix 優先於媒體檔名部分的 suffix。
 */
export function parseSidecarFileName(
  fileName: string
): ParsedSidecarName | undefined {
  if (!fileName.toLowerCase().endsWith(sidecarExtension)) return undefined;
  const body = fileName.slice(0, -sidecarExtension.length);

  const match = markerPattern.exec(body);
  if (!match) {
    return {
      mediaFileName: body,
      kind: "primary",
      suffix: parseMediaFileName(body).suffix,
    };
  }

  const mediaFileName = match[1];
  const marker = toMarker(match[2]);
  const markerSuffix = toSuffix(match[3]);
  return {
    mediaFileName,
    kind: "supplemental",
    marker,
    suffix: markerSuffix ?? parseMediaFileName(mediaFileName).suffix,
  };
}

function toMarker(value: string): SupplementalMarker | undefined {
  const lower = value.toLowerCase();
  return supplementalMarkers.find((m) => m === lower);
}

function escapeRegExp(value: string) {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

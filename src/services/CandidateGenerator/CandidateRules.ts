import type { SupplementalMarker } from "@/constants";
import { formatSuffix } from "@/services/Takeout";

/**
 * suffix 在媒體檔名部分的位置：
 * - none: IMG.jpg
 * - beforeExtension: IMG(1).jpg
 * - afterExtension: IMG.jpg(1)
 */
export type SuffixPlacement = "none" | "beforeExtension" | "afterExtension";

export type CandidateRule =
  | { kind: "primary"; mediaSuffix: SuffixPlacement }
  | {
      kind: "supplemental";
      mediaSuffix: SuffixPlacement;
      /** 標記後是否帶 suffix：IMG.jpg.supplemental-metadata(1).json */
      markerSuffix: boolean;
    };

export const primaryRules: readonly CandidateRule[] = [
  { kind: "primary", mediaSuffix: "none" },
  { kind: "primary", mediaSuffix: "beforeExtension" },
  { kind: "primary", mediaSuffix: "afterExtension" },
];

// Google 放 suffix 的位置並不一致，以下列出所有觀察到的寫法
export const supplementalRules: readonly CandidateRule[] = [
  { kind: "supplemental", mediaSuffix: "none", markerSuffix: false },
  { kind: "supplemental", mediaSuffix: "none", markerSuffix: true },
  { kind: "supplemental", mediaSuffix: "beforeExtension", markerSuffix: false },
  { kind: "supplemental", mediaSuffix: "beforeExtension", markerSuffix: true },
  { kind: "supplemental", mediaSuffix: "afterExtension", markerSuffix: false },
  { kind: "supplemental", mediaSuffix: "afterExtension", markerSuffix: true },
];

/** 規則產生的檔名是否帶 suffix */
export function ruleCarriesSuffix(rule: CandidateRule) {
  if (rule.mediaSuffix !== "none") return true;
  return rule.kind === "supplemental" && rule.markerSuffix;
}

/**
 * 只有「帶 suffix 與否」和媒體檔一致的規則才適用，
 * 因此候選檔名的 suffix 一定等於媒體檔的 suffix。
 */
export function ruleApplies(rule: CandidateRule, suffix: number | undefined) {
  return ruleCarriesSuffix(rule) === (suffix !== undefined);
}

export function renderCandidate(
  rule: CandidateRule,
  parts: {
    name: string;
    extension: string;
    suffix: number | undefined;
    marker?: SupplementalMarker;
  }
): string {
  const suffixText =
    parts.suffix === undefined ? "" : formatSuffix(parts.suffix);
  const mediaPart = renderMediaPart(
    rule.mediaSuffix,
    parts.name,
    parts.extension,
    suffixText
  );

  if (rule.kind === "primary") return `${mediaPart}.json`;
  const markerText = rule.markerSuffix ? suffixText : "";
  return `${mediaPart}.${parts.marker}${markerText}.json`;
}

function renderMediaPart(
  placement: SuffixPlacement,
  name: string,
  extension: string,
  suffixText: string
): string {
  switch (placement) {
    case "none":
      return `${name}${extension}`;
    case "beforeExtension":
      return `${name}${suffixText}${extension}`;
    case "afterExtension":
      return `${name}${extension}${suffixText}`;
  }
}

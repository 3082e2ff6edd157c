import {
  type SupplementalMarker,
  extensionAliases,
  supplementalMarkers,
} from "@/constants";
import { type MediaFile, extensionVariants } from "@/services/Takeout";

import type { CandidateGenerator, CandidateSet } from "./CandidateGenerator";
import {
  type CandidateRule,
  primaryRules,
  renderCandidate,
  ruleApplies,
  supplementalRules,
} from "./CandidateRules";

/**
 * 依規則表產生候選 sidecar 檔名。純函式，不存取檔案系統或索引。
 * 不會展開 suffix 範圍，也不會退回無 suffix 的檔名。
 */
export class CandidateGeneratorDefault implements CandidateGenerator {
  private readonly markers: readonly SupplementalMarker[];
  private readonly aliases: ReadonlyArray<readonly [string, string]>;

  constructor(options?: {
    markers?: readonly SupplementalMarker[];
    extensionAliases?: ReadonlyArray<readonly [string, string]>;
  }) {
    this.markers = options?.markers ?? supplementalMarkers;
    this.aliases = options?.extensionAliases ?? extensionAliases;
  }

  generate(media: MediaFile): CandidateSet {
    const extensions = extensionVariants(media.extension, this.aliases);
    const render = (rule: CandidateRule, marker?: SupplementalMarker) =>
      extensions.map((extension) =>
        renderCandidate(rule, {
          name: media.name,
          extension,
          suffix: media.suffix,
          marker,
        })
      );

    const primary = primaryRules
      .filter((rule) => ruleApplies(rule, media.suffix))
      .flatMap((rule) => render(rule));

    const supplemental = this.markers.flatMap((marker) =>
      supplementalRules
        .filter((rule) => ruleApplies(rule, media.suffix))
        .flatMap((rule) => render(rule, marker))
    );

    return {
      primary: uniqueIgnoreCase(primary),
      supplemental: uniqueIgnoreCase(supplemental),
    };
  }
}

function uniqueIgnoreCase(names: string[]) {
  const seen = new Set<string>();
  return names.filter((name) => {
    const key = name.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

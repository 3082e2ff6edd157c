import { isValid } from "date-fns";

import type { ResolvedMetadata } from "@/services/MetadataResolver";
import type { MediaFile } from "@/services/Takeout";

import type { BundleAssigner, BundleAssignment } from "./BundleAssigner";

export class BundleAssignerDefault implements BundleAssigner {
  assign(media: MediaFile, metadata: ResolvedMetadata): BundleAssignment {
    const value = metadata.timestamp?.value;
    if (!value || !isValid(value)) {
      return { type: "MANUAL_REVIEW", reason: "no-timestamp" };
    }
    // 以 UTC 的年月分組，不受執行環境時區影響
    return {
      type: "BUNDLE",
      bundle: {
        year: String(value.getUTCFullYear()).padStart(4, "0"),
        month: String(value.getUTCMonth() + 1).padStart(2, "0"),
        baseName: media.stem,
      },
    };
  }
}

import path from "node:path";

import {
  defaultMaxPathLength,
  needsReviewDirName,
  pathTooLongDirName,
  unmatchedMediaDirName,
} from "@/constants";
import type { MetadataPatch } from "@/services/ExifService";
import type { ReconcileOutcome } from "@/services/ReconcileService";
import { isSameExtension } from "@/services/Takeout";
import type { LibraryPlan } from "@/types";
import { isUnderDir } from "@/utils/helper";

import type { LibraryPlanService, PlanIssue } from "./LibraryPlanService";

function lc(p: string) {
  return p.toLowerCase();
}

export class LibraryPlanServiceDefault implements LibraryPlanService {
  private readonly libraryRoot: string;
  private readonly maxPathLength: number;
  private readonly protectedDirs: readonly string[];

  constructor(deps: {
    libraryRoot: string;
    maxPathLength?: number;
    protectedDirs?: readonly string[];
  }) {
    this.libraryRoot = deps.libraryRoot;
    this.maxPathLength = deps.maxPathLength ?? defaultMaxPathLength;
    this.protectedDirs = deps.protectedDirs ?? [];
  }

  plan(outcomes: readonly ReconcileOutcome[]) {
    const plan: LibraryPlan = {
      transfers: [],
      sidecarCopies: [],
      metadataWrites: [],
    };
    const issues: PlanIssue[] = [];
    // 目標路徑不分大小寫，避免在不分大小寫的檔案系統上互相覆蓋
    const takenTargets = new Set<string>();
    const takenSidecars = new Set<string>();

    for (const outcome of outcomes) {
      const mediaPath = outcome.media.path;
      let target = this.targetOf(outcome);
      if (target.length >= this.maxPathLength) {
        const fallback = path.join(
          this.libraryRoot,
          needsReviewDirName,
          pathTooLongDirName,
          outcome.media.fileName
        );
        issues.push({
          mediaPath,
          type: "PATH_TOO_LONG",
          message: `目標路徑長度 ${target.length} 超過上限 ${this.maxPathLength}`,
          target,
        });
        target = fallback;
      }

      if (takenTargets.has(lc(target))) {
        issues.push({
          mediaPath,
          type: "DUPLICATE_TARGET",
          message: "目標路徑已被其他媒體檔使用，略過",
          target,
        });
        continue;
      }
      takenTargets.add(lc(target));

      const isProtected = this.protectedDirs.some((d) =>
        isUnderDir(mediaPath, d)
      );
      plan.transfers.push({
        mode: isProtected ? "copy" : "move",
        from: mediaPath,
        to: target,
      });

      const dir = path.dirname(target);
      const { primaryRecord, supplementalRecords } = outcome.match;
      const records = primaryRecord
        ? [primaryRecord, ...supplementalRecords]
        : supplementalRecords;
      for (const record of records) {
        const to = path.join(dir, path.basename(record.sourcePath));
        if (takenSidecars.has(lc(to))) continue;
        takenSidecars.add(lc(to));
        plan.sidecarCopies.push({ from: record.sourcePath, to });
      }

      const patch = patchOf(outcome);
      if (patch) plan.metadataWrites.push({ filePath: target, patch });
    }

    return { plan, issues };
  }

  private targetOf(outcome: ReconcileOutcome) {
    const { media } = outcome;
    if (outcome.type === "MANUAL_REVIEW") {
      return path.join(
        this.libraryRoot,
        needsReviewDirName,
        unmatchedMediaDirName,
        media.fileName
      );
    }
    const { year, month, baseName } = outcome.bundle;
    const ext = realExtension(
      media.extension,
      outcome.embedded?.fileTypeExtension
    );
    return path.join(this.libraryRoot, year, month, baseName, baseName + ext);
  }
}

/** 檔案內容判斷出的類型與檔名不符時，以實際類型為準 */
function realExtension(nameExt: string, fileTypeExt: string | undefined) {
  if (!fileTypeExt) return nameExt;
  if (nameExt !== "" && isSameExtension(nameExt, fileTypeExt)) return nameExt;
  return fileTypeExt;
}

/** 只寫回來自 JSON 的值，檔案原本的 metadata 不動 */
function patchOf(outcome: ReconcileOutcome): MetadataPatch | undefined {
  const { timestamp, gps } = outcome.metadata;
  const patch: MetadataPatch = {};
  if (timestamp && timestamp.source !== "embedded") {
    patch.captureTime = timestamp.value;
  }
  if (gps && gps.source !== "embedded") {
    patch.gps = {
      latitude: gps.latitude,
      longitude: gps.longitude,
      altitude: gps.altitude,
    };
  }
  return patch.captureTime || patch.gps ? patch : undefined;
}

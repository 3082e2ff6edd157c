import { constants } from "node:fs";
import { copyFile, mkdir, rename, unlink } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import type { ExifService } from "@/services/ExifService";
import type { LibraryPlan, Transfer } from "@/types";
import { exists } from "@/utils/helper";

import type { ExecuteSummary, PlanExecutor } from "./PlanExecutor";

export class PlanExecutorFs implements PlanExecutor {
  private readonly logger: Logger;

  constructor(
    private readonly deps: {
      exifService: Pick<ExifService, "writeMetadata">;
      logger: Logger;
    }
  ) {
    this.logger = deps.logger.extend("PlanExecutorFs");
  }

  async execute(plan: LibraryPlan) {
    const summary: ExecuteSummary = {
      transferred: [],
      skippedExisting: [],
      sidecarsCopied: 0,
      metadataWritten: 0,
      issues: [],
    };
    const landed = new Set<string>();

    for (const transfer of plan.transfers) {
      if (await exists(transfer.to)) {
        summary.issues.push({
          path: transfer.from,
          type: "TARGET_EXISTS",
          message: `目標已存在，略過: ${transfer.to}`,
        });
        summary.skippedExisting.push(transfer.from);
        continue;
      }
      try {
        await mkdir(path.dirname(transfer.to), { recursive: true });
        await this.transfer(transfer);
      } catch (error) {
        summary.issues.push({
          path: transfer.from,
          type: "TRANSFER_FAILED",
          message: messageOf(error),
        });
        continue;
      }
      landed.add(transfer.to);
      summary.transferred.push(transfer.from);
    }

    for (const sidecar of plan.sidecarCopies) {
      if (await exists(sidecar.to)) continue;
      try {
        await mkdir(path.dirname(sidecar.to), { recursive: true });
        await copyFile(sidecar.from, sidecar.to, constants.COPYFILE_EXCL);
        summary.sidecarsCopied++;
      } catch (error) {
        summary.issues.push({
          path: sidecar.from,
          type: "SIDECAR_COPY_FAILED",
          message: messageOf(error),
        });
      }
    }

    for (const write of plan.metadataWrites) {
      // 沒有實際搬到目標的檔案不寫，避免改到別人的檔案
      if (!landed.has(write.filePath)) continue;
      const res = await this.deps.exifService.writeMetadata(
        write.filePath,
        write.patch
      );
      if (isErr(res)) {
        summary.issues.push({
          path: write.filePath,
          type: "WRITE_FAILED",
          message: res.error.message,
        });
        continue;
      }
      summary.metadataWritten++;
    }

    this.logger.info({
      emoji: "✅",
      transferred: summary.transferred.length,
      sidecars: summary.sidecarsCopied,
      writes: summary.metadataWritten,
      issues: summary.issues.length,
    })`執行完成`;
    return summary;
  }

  private async transfer({ mode, from, to }: Transfer) {
    if (mode === "copy") {
      await copyFile(from, to, constants.COPYFILE_EXCL);
      return;
    }
    try {
      await rename(from, to);
    } catch (error) {
      if (!isCrossDevice(error)) throw error;
      // 跨磁碟時 rename 不可用，改為複製後刪除
      await copyFile(from, to, constants.COPYFILE_EXCL);
      await unlink(from);
    }
  }
}

function isCrossDevice(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "EXDEV";
}

function messageOf(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

import { readFile } from "node:fs/promises";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import { type TakeoutRecord, parseTakeoutRecord } from "@/services/Takeout";
import { chunk } from "@/utils/helper";

import type { SidecarIssue, SidecarLoader } from "./SidecarLoader";

export class SidecarLoaderFs implements SidecarLoader {
  private readonly logger: Logger;
  private readonly batchSize: number;

  constructor(deps: { logger: Logger; batchSize?: number }) {
    this.logger = deps.logger.extend("SidecarLoaderFs");
    this.batchSize = deps.batchSize ?? 64;
  }

  async load(paths: readonly string[]) {
    const records: TakeoutRecord[] = [];
    const issues: SidecarIssue[] = [];
    let loaded = 0;

    // 分批讀取，避免一次開太多檔案
    for (const batch of chunk(paths, this.batchSize)) {
      const results = await Promise.all(batch.map((p) => this.loadOne(p)));
      for (const result of results) {
        if (result.ok) records.push(result.value);
        else issues.push(result.error);
      }
      loaded += batch.length;
      this.logger.debug({
        emoji: "📄",
        count: loaded,
      })`已讀取 ${loaded}/${paths.length} 個 JSON`;
    }

    if (issues.length > 0) {
      this.logger.warn({
        count: issues.length,
      })`有 ${issues.length} 個 JSON 無法讀取或解析`;
    }
    return { records, issues };
  }

  private async loadOne(
    sourcePath: string
  ): Promise<Result<TakeoutRecord, SidecarIssue>> {
    let text: string;
    try {
      text = await readFile(sourcePath, "utf8");
    } catch (e) {
      return err({
        sourcePath,
        type: "READ_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }
    try {
      return ok(parseTakeoutRecord(sourcePath, JSON.parse(text)));
    } catch (e) {
      return err({
        sourcePath,
        type: "INVALID_JSON",
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}

import { Type as t } from "@sinclair/typebox";
import { Assert } from "@sinclair/typebox/value";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type { PlanIssue } from "@/services/LibraryPlanService";
import type { ExecuteSummary } from "@/services/PlanExecutor";

const processedLogSchema = t.Array(t.String());

export type ReadError = { type: "READ_ERROR"; message: string };
export type WriteError = { type: "WRITE_ERROR"; message: string };

/** 已處理過的媒體檔路徑，下次執行時略過 */
export class ProcessedLogStoreJson {
  constructor(private readonly filePath: string) {}

  async read(): Promise<Result<Set<string>, ReadError>> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isNotFound(error)) return ok(new Set<string>());
      return err({ type: "READ_ERROR", message: messageOf(error) });
    }

    try {
      const raw: unknown = JSON.parse(text);
      Assert(processedLogSchema, raw);
      return ok(new Set(raw));
    } catch (error) {
      return err({ type: "READ_ERROR", message: messageOf(error) });
    }
  }

  async write(processed: Iterable<string>): Promise<Result<void, WriteError>> {
    try {
      const data = JSON.stringify([...processed].sort(), null, 2);
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, data);
      return ok();
    } catch (error) {
      return err({ type: "WRITE_ERROR", message: messageOf(error) });
    }
  }
}

/**
 * 本次執行後可視為已處理的媒體檔：已落地、目標已存在，
 * 或與其他媒體檔撞到同一目標。後兩者重跑也只會再被略過。
 */
export function settledMediaPaths(
  summary: Pick<ExecuteSummary, "transferred" | "skippedExisting">,
  planIssues: readonly PlanIssue[]
) {
  const duplicates = planIssues
    .filter((i) => i.type === "DUPLICATE_TARGET")
    .map((i) => i.mediaPath);
  return [...summary.transferred, ...summary.skippedExisting, ...duplicates];
}

function isNotFound(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function messageOf(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

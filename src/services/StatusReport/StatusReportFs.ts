import { Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { readFile, readdir } from "node:fs/promises";
import path from "node:path";

import { type Result, err, isErr, ok } from "~shared/utils/Result";

import {
  type ReportName,
  type ReportTally,
  type StatusReport,
  type StatusReportError,
  type StatusSummary,
  reportNames,
} from "./StatusReport";

const DUMP_FILE_RE = /^\d{8}-\d{6}-\d{3}-(.+)\.json$/;

const typedItem = t.Object({ type: t.String() });
const planReport = t.Object({ issues: t.Array(t.Unknown()) });
const listReport = t.Array(t.Unknown());

export class StatusReportFs implements StatusReport {
  constructor(private readonly reportDir: string) {}

  async summarize(): Promise<Result<StatusSummary, StatusReportError>> {
    let fileNames: string[];
    try {
      fileNames = await readdir(this.reportDir);
    } catch (error) {
      if (isNotFound(error)) return ok({ reports: [] });
      return err({
        type: "READ_FAILED",
        message: messageOf(error),
        filePath: this.reportDir,
      });
    }

    // 檔名以時間開頭，排序後最後一份即最新
    const latest = new Map<ReportName, string>();
    for (const fileName of [...fileNames].sort()) {
      const name = toReportName(DUMP_FILE_RE.exec(fileName)?.[1]);
      if (name) latest.set(name, path.join(this.reportDir, fileName));
    }

    const reports: ReportTally[] = [];
    for (const name of reportNames) {
      const filePath = latest.get(name);
      if (!filePath) continue;
      const res = await tally(name, filePath);
      if (isErr(res)) return res;
      reports.push(res.value);
    }
    return ok({ reports });
  }
}

async function tally(
  name: ReportName,
  filePath: string
): Promise<Result<ReportTally, StatusReportError>> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, "utf8"));
  } catch (error) {
    return err({ type: "READ_FAILED", message: messageOf(error), filePath });
  }

  const items = Value.Check(listReport, raw)
    ? raw
    : Value.Check(planReport, raw)
      ? raw.issues
      : undefined;
  if (!items) {
    return err({
      type: "INVALID_REPORT",
      message: `無法辨識的報告格式: ${name}`,
      filePath,
    });
  }

  const counts: Record<string, number> = {};
  for (const item of items) {
    // index-conflicts 的項目沒有 type，以報告名稱計
    const type = Value.Check(typedItem, item) ? item.type : name;
    counts[type] = (counts[type] ?? 0) + 1;
  }
  return ok({ name, filePath, counts });
}

function toReportName(value: string | undefined): ReportName | undefined {
  return reportNames.find((n) => n === value);
}

function isNotFound(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function messageOf(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

import type { CAC } from "cac";
import path from "node:path";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { defaultAppConfig, getAppConfig, splitList } from "@/config";
import { mediaExtensions } from "@/constants";
import { BundleAssignerDefault } from "@/services/BundleAssigner";
import { CandidateGeneratorDefault } from "@/services/CandidateGenerator";
import { ExifServiceExifTool } from "@/services/ExifService";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import {
  JsonIndexBuilderDefault,
  QuarantineSinkCollector,
} from "@/services/JsonIndex";
import { LibraryPlanServiceDefault } from "@/services/LibraryPlanService";
import { MatchingServiceDefault } from "@/services/MatchingService";
import { MetadataResolverDefault } from "@/services/MetadataResolver";
import { PlanExecutorFs } from "@/services/PlanExecutor";
import {
  ProcessedLogStoreJson,
  settledMediaPaths,
} from "@/services/ProcessedLogStoreJson";
import {
  type ReconcileIssue,
  type ReconcileOutcome,
  ReconcileServiceDefault,
} from "@/services/ReconcileService";
import { SidecarLoaderFs } from "@/services/SidecarLoader";
import { chunk, confirm, expandHome } from "@/utils/helper";

type ReconcileOptions = {
  library?: string;
  jsonDir?: string;
  processedLog?: string;
  maxPathLength?: number | string;
  protected?: string | string[];
  reportDir?: string;
  batch?: number | string;
  yes?: boolean;
};

export function registerReconcile(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "reconcile <source>",
      "比對 Takeout 媒體檔與 JSON，整理到年/月資料夾"
    )
    .option("--library <path>", "目標圖庫根目錄，預設讀 LIBRARY_ROOT")
    .option("--json-dir <path>", "JSON 所在目錄，預設與來源相同")
    .option("--processed-log <path>", "已處理清單，用於中斷後續跑")
    .option("--max-path-length <n>", "目標路徑長度上限")
    .option("--protected <dir>", "只複製不搬移的目錄，可重複指定")
    .option("--report-dir <path>", "報告輸出目錄")
    .option("--batch <n>", "同時讀取 EXIF 的檔案數", { default: 16 })
    .option("--yes", "略過確認，直接執行", { default: false })
    .action(async (source: string, options: ReconcileOptions) => {
      const logger = baseLogger.extend("reconcile", { source });
      const config = getAppConfig();
      const sourceRoot = expandHome(source);
      const libraryRoot = expandHome(
        options.library ?? config.LIBRARY_ROOT ?? defaultAppConfig.libraryRoot
      );
      const jsonDir = expandHome(
        options.jsonDir ?? config.JSON_REPOSITORY_DIR ?? sourceRoot
      );
      const processedLogPath =
        options.processedLog ?? config.PROCESSED_LOG_PATH;
      const maxPathLength = toInt(
        options.maxPathLength,
        config.MAX_PATH_LENGTH ?? defaultAppConfig.maxPathLength
      );
      const protectedDirs = [
        ...toList(options.protected),
        ...splitList(config.PROTECTED_DIRS),
      ].map(expandHome);
      const reporter = new DumpWriterDefault(
        logger,
        options.reportDir ?? config.REPORT_DIR ?? defaultAppConfig.reportDir
      );

      logger.info({
        emoji: "📁",
      })`來源: ${sourceRoot} → 圖庫: ${libraryRoot}`;

      // 1) 掃描媒體檔與 JSON
      const scanner = new FileSystemScannerDefault();
      const scanRes = await scanner.scan(sourceRoot, {
        allowExts: mediaExtensions,
      });
      if (isErr(scanRes)) {
        logger.error({ emoji: "❌", error: scanRes.error })`掃描來源目錄失敗`;
        process.exit(1);
      }
      const { skippedPaths } = scanRes.value;
      if (skippedPaths.length > 0) {
        logger.warn({
          emoji: "🟡",
          skipped: skippedPaths.length,
        })`有非媒體副檔名的檔案未處理`;
        await reporter.dump(
          "skipped-files",
          skippedPaths.map((p) => ({
            path: p,
            type: "UNSUPPORTED_EXTENSION",
            message: "副檔名不在媒體清單內",
          }))
        );
      }
      let sidecarPaths = scanRes.value.sidecarPaths;
      if (path.resolve(jsonDir) !== path.resolve(sourceRoot)) {
        const jsonScanRes = await scanner.scan(jsonDir);
        if (isErr(jsonScanRes)) {
          logger.error({
            emoji: "❌",
            error: jsonScanRes.error,
          })`掃描 JSON 目錄失敗`;
          process.exit(1);
        }
        sidecarPaths = jsonScanRes.value.sidecarPaths;
      }

      // 2) 略過已處理過的檔案
      const processedLog = processedLogPath
        ? new ProcessedLogStoreJson(expandHome(processedLogPath))
        : undefined;
      let processed = new Set<string>();
      if (processedLog) {
        const readRes = await processedLog.read();
        if (isErr(readRes)) {
          logger.error({ error: readRes.error })`讀取已處理清單失敗`;
          process.exit(1);
        }
        processed = readRes.value;
      }
      const mediaPaths = scanRes.value.mediaPaths.filter(
        (p) => !processed.has(p)
      );
      logger.info({
        emoji: "🔎",
        media: mediaPaths.length,
        skipped: scanRes.value.mediaPaths.length - mediaPaths.length,
        sidecars: sidecarPaths.length,
      })`掃描完成`;
      if (mediaPaths.length === 0) {
        logger.warn("沒有需要處理的媒體檔");
        return;
      }

      // 3) 讀取 JSON 並建立索引
      const loaded = await new SidecarLoaderFs({ logger }).load(sidecarPaths);
      if (loaded.issues.length > 0) {
        await reporter.dump("sidecar-issues", loaded.issues);
      }
      const quarantine = new QuarantineSinkCollector(logger);
      const index = new JsonIndexBuilderDefault({ quarantine, logger }).build(
        loaded.records
      );
      if (quarantine.conflicts.length > 0) {
        await reporter.dump("index-conflicts", quarantine.conflicts);
      }

      const exifService = new ExifServiceExifTool();
      try {
        // 4) 逐檔比對
        const reconciler = new ReconcileServiceDefault({
          candidateGenerator: new CandidateGeneratorDefault(),
          matchingService: new MatchingServiceDefault(),
          embeddedReader: exifService,
          metadataResolver: new MetadataResolverDefault(),
          bundleAssigner: new BundleAssignerDefault(),
          logger,
        });
        const outcomes: ReconcileOutcome[] = [];
        const issues: ReconcileIssue[] = [];
        for (const batch of chunk(mediaPaths, toInt(options.batch, 16))) {
          const results = await Promise.all(
            batch.map((p) => reconciler.reconcile(p, index))
          );
          for (const result of results) {
            outcomes.push(result.outcome);
            issues.push(...result.issues);
          }
        }
        const review = outcomes.filter((o) => o.type === "MANUAL_REVIEW");
        logger.info({
          emoji: "📚",
          bundles: outcomes.length - review.length,
          review: review.length,
          issues: issues.length,
        })`比對完成`;
        if (issues.length > 0) {
          await reporter.dump("reconcile-issues", issues);
        }

        // 5) 產生整理計畫
        const planned = new LibraryPlanServiceDefault({
          libraryRoot,
          maxPathLength,
          protectedDirs,
        }).plan(outcomes);
        await reporter.dump("library-plan", {
          ...planned.plan,
          issues: planned.issues,
        });
        const { transfers } = planned.plan;
        if (transfers.length === 0) {
          logger.warn({ emoji: "🟡" })`沒有可搬移項目`;
          return;
        }

        // 6) 確認 / 執行
        const proceed =
          options.yes ||
          (await confirm(
            `即將處理 ${transfers.length} 個檔案，是否繼續？ [y/N] `
          ));
        if (!proceed) {
          logger.warn({ emoji: "⏹️" })`使用者取消`;
          return;
        }

        const summary = await new PlanExecutorFs({
          exifService,
          logger,
        }).execute(planned.plan);
        if (summary.issues.length > 0) {
          await reporter.dump("execute-issues", summary.issues);
        }

        if (processedLog) {
          const writeRes = await processedLog.write(
            new Set([
              ...processed,
              ...settledMediaPaths(summary, planned.issues),
            ])
          );
          if (isErr(writeRes)) {
            logger.error({ error: writeRes.error })`寫入已處理清單失敗`;
            process.exit(1);
          }
        }
      } finally {
        await exifService.dispose();
      }
    });
}

function toInt(value: number | string | undefined, fallback: number) {
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

function toList(value: string | string[] | undefined) {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { defaultAppConfig, getAppConfig } from "@/config";
import { ProcessedLogStoreJson } from "@/services/ProcessedLogStoreJson";
import { StatusReportFs } from "@/services/StatusReport";
import { expandHome } from "@/utils/helper";

export function registerStatus(cli: CAC, baseLogger: Logger) {
  cli
    .command("status", "顯示已處理數量與最近一次各報告的 issue 統計")
    .option("--processed-log <path>", "已處理清單，預設讀 PROCESSED_LOG_PATH")
    .option("--report-dir <path>", "報告輸出目錄")
    .action(
      async (options: { processedLog?: string; reportDir?: string }) => {
        const logger = baseLogger.extend("status");
        const config = getAppConfig();

        const processedLogPath =
          options.processedLog ?? config.PROCESSED_LOG_PATH;
        if (processedLogPath) {
          const readRes = await new ProcessedLogStoreJson(
            expandHome(processedLogPath)
          ).read();
          if (isErr(readRes)) {
            logger.error({ error: readRes.error })`讀取已處理清單失敗`;
            process.exit(1);
          }
          logger.info({
            emoji: "✅",
            processed: readRes.value.size,
          })`已處理 ${readRes.value.size} 個媒體檔`;
        } else {
          logger.warn("未設定已處理清單");
        }

        const reportDir = expandHome(
          options.reportDir ?? config.REPORT_DIR ?? defaultAppConfig.reportDir
        );
        const summaryRes = await new StatusReportFs(reportDir).summarize();
        if (isErr(summaryRes)) {
          logger.error({ error: summaryRes.error })`讀取報告失敗`;
          process.exit(1);
        }
        const { reports } = summaryRes.value;
        if (reports.length === 0) {
          logger.info({ emoji: "📭", reportDir })`沒有報告`;
          return;
        }
        for (const report of reports) {
          const total = Object.values(report.counts).reduce(
            (sum, n) => sum + n,
            0
          );
          logger.info({
            emoji: total > 0 ? "⚠️" : "📄",
            event: report.name,
            filePath: report.filePath,
            counts: report.counts,
          })`${report.name}: ${total} 項`;
        }
      }
    );
}

import type { CAC } from "cac";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { BundleAssignerDefault } from "@/services/BundleAssigner";
import { CandidateGeneratorDefault } from "@/services/CandidateGenerator";
import { ExifServiceExifTool } from "@/services/ExifService";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import {
  JsonIndexBuilderDefault,
  QuarantineSinkCollector,
} from "@/services/JsonIndex";
import { MatchingServiceDefault } from "@/services/MatchingService";
import { MetadataResolverDefault } from "@/services/MetadataResolver";
import { ReconcileServiceDefault } from "@/services/ReconcileService";
import { SidecarLoaderFs } from "@/services/SidecarLoader";
import { expandHome } from "@/utils/helper";

export function registerInspect(cli: CAC, baseLogger: Logger) {
  cli
    .command("inspect <media>", "顯示單一媒體檔的比對過程，不移動任何檔案")
    .option("--json-dir <path>", "JSON 所在目錄，預設為媒體檔所在目錄")
    .action(async (media: string, options: { jsonDir?: string }) => {
      const mediaPath = expandHome(media);
      const logger = baseLogger.extend("inspect", { mediaPath });
      const jsonDir = expandHome(options.jsonDir ?? path.dirname(mediaPath));

      const scanRes = await new FileSystemScannerDefault().scan(jsonDir);
      if (isErr(scanRes)) {
        logger.error({ error: scanRes.error })`掃描 JSON 目錄失敗`;
        process.exit(1);
      }
      const loaded = await new SidecarLoaderFs({ logger }).load(
        scanRes.value.sidecarPaths
      );
      const quarantine = new QuarantineSinkCollector(logger);
      const index = new JsonIndexBuilderDefault({ quarantine, logger }).build(
        loaded.records
      );

      const exifService = new ExifServiceExifTool();
      try {
        const { outcome, issues } = await new ReconcileServiceDefault({
          candidateGenerator: new CandidateGeneratorDefault(),
          matchingService: new MatchingServiceDefault(),
          embeddedReader: exifService,
          metadataResolver: new MetadataResolverDefault(),
          bundleAssigner: new BundleAssignerDefault(),
          logger,
        }).reconcile(mediaPath, index);

        const { media: file, candidates, match, metadata } = outcome;
        logger.info({
          event: "media",
          name: file.name,
          stem: file.stem,
          extension: file.extension,
          suffix: file.suffix,
        })`${file.fileName}`;
        logger.info({
          event: "candidates",
          primary: candidates.primary,
          supplemental: candidates.supplemental,
        })`候選 JSON 檔名`;
        logger.info({
          event: "match",
          primary: match.primaryRecord?.sourcePath,
          supplemental: match.supplementalRecords.map((r) => r.sourcePath),
        })`比對結果`;
        logger.info({
          event: "resolve",
          timestamp: metadata.timestamp?.value.toISOString(),
          timestampSource: metadata.timestamp?.source,
          gps: metadata.gps,
        })`採用的 metadata`;
        if (outcome.type === "BUNDLE") {
          const { year, month, baseName } = outcome.bundle;
          logger.info({
            emoji: "📦",
            event: "bundle",
          })`${year}/${month}/${baseName}`;
        } else {
          logger.warn({
            emoji: "🟡",
            event: "bundle",
          })`需要人工確認：${outcome.reason}`;
        }
        for (const issue of issues) {
          logger.warn({
            event: issue.type,
            mediaPath: issue.mediaPath,
          })`${issue.message}`;
        }
      } finally {
        await exifService.dispose();
      }
    });
}

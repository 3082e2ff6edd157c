import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import type { BundleAssigner } from "@/services/BundleAssigner";
import type { CandidateGenerator } from "@/services/CandidateGenerator";
import type {
  EmbeddedMetadata,
  EmbeddedMetadataReader,
} from "@/services/ExifService";
import type { JsonIndex } from "@/services/JsonIndex";
import type { MatchingService } from "@/services/MatchingService";
import type { MetadataResolver } from "@/services/MetadataResolver";
import { parseMediaFile } from "@/services/Takeout";

import type {
  ReconcileIssue,
  ReconcileOutcome,
  ReconcileService,
} from "./ReconcileService";

export class ReconcileServiceDefault implements ReconcileService {
  private readonly logger: Logger;

  constructor(
    private readonly deps: {
      candidateGenerator: CandidateGenerator;
      matchingService: MatchingService;
      embeddedReader: EmbeddedMetadataReader;
      metadataResolver: MetadataResolver;
      bundleAssigner: BundleAssigner;
      logger: Logger;
    }
  ) {
    this.logger = deps.logger.extend("ReconcileServiceDefault");
  }

  async reconcile(mediaPath: string, index: JsonIndex) {
    const issues: ReconcileIssue[] = [];
    const media = parseMediaFile(mediaPath);

    const candidates = this.deps.candidateGenerator.generate(media);
    const matched = this.deps.matchingService.match(media, candidates, index);
    issues.push(...matched.issues);

    let embedded: EmbeddedMetadata | undefined;
    const readRes = await this.deps.embeddedReader.readEmbedded(mediaPath);
    if (isErr(readRes)) {
      // 讀不到就當作沒有內嵌 metadata，改用 JSON
      issues.push({
        mediaPath,
        type: "EMBEDDED_READ_FAILED",
        message: readRes.error.message,
        cause: readRes.error.type,
      });
    } else {
      embedded = readRes.value;
    }

    const resolved = this.deps.metadataResolver.resolve(
      matched.result,
      embedded ?? {}
    );
    issues.push(...resolved.issues);

    const assignment = this.deps.bundleAssigner.assign(
      media,
      resolved.metadata
    );
    const base = {
      media,
      candidates,
      match: matched.result,
      embedded,
      metadata: resolved.metadata,
    };
    const outcome: ReconcileOutcome =
      assignment.type === "BUNDLE"
        ? { ...base, type: "BUNDLE", bundle: assignment.bundle }
        : { ...base, type: "MANUAL_REVIEW", reason: assignment.reason };

    this.logger.debug({
      event: "reconciled",
      mediaPath,
      outcome: outcome.type,
      primary: matched.result.primaryRecord?.sourcePath,
      supplemental: matched.result.supplementalRecords.length,
      timestampSource: resolved.metadata.timestamp?.source,
    })`${media.fileName}`;

    return { outcome, issues };
  }
}

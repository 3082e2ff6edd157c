import type { Logger } from "~shared/Logger";

import type { IndexConflict, QuarantineSink } from "./JsonIndex";

/** 收集衝突，之後由呼叫端輸出報告 */
export class QuarantineSinkCollector implements QuarantineSink {
  private readonly collected: IndexConflict[] = [];

  constructor(private readonly logger: Logger) {}

  report(conflict: IndexConflict) {
    this.collected.push(conflict);
    this.logger.warn({
      event: "index-conflict",
      fileName: conflict.fileName,
      sources: conflict.records.map((r) => r.sourcePath),
    })`同名 JSON 內容不一致，已排除: ${conflict.fileName}`;
  }

  get conflicts(): readonly IndexConflict[] {
    return this.collected;
  }
}

import type { Logger } from "~shared/Logger";

import type { TakeoutRecord } from "@/services/Takeout";

import type {
  IndexConflict,
  JsonIndex,
  JsonIndexBuilder,
  QuarantineSink,
} from "./JsonIndex";

class JsonIndexMap implements JsonIndex {
  constructor(private readonly records: ReadonlyMap<string, TakeoutRecord>) {}

  lookup(fileName: string) {
    return this.records.get(fileName.toLowerCase());
  }

  get size() {
    return this.records.size;
  }
}

export class JsonIndexBuilderDefault implements JsonIndexBuilder {
  private readonly quarantine: QuarantineSink;
  private readonly logger: Logger;

  constructor(deps: { quarantine: QuarantineSink; logger: Logger }) {
    this.quarantine = deps.quarantine;
    this.logger = deps.logger.extend("JsonIndexBuilderDefault");
  }

  build(records: readonly TakeoutRecord[]): JsonIndex {
    const groups = new Map<string, TakeoutRecord[]>();
    for (const record of records) {
      const key = record.fileName.toLowerCase();
      const group = groups.get(key);
      if (group) group.push(record);
      else groups.set(key, [record]);
    }

    const index = new Map<string, TakeoutRecord>();
    let duplicates = 0;
    let conflicts = 0;
    for (const [key, group] of groups) {
      // 依來源路徑排序，結果不受輸入順序影響
      group.sort((a, b) => a.sourcePath.localeCompare(b.sourcePath));
      const distinct = new Set(group.map(contentKey));
      if (distinct.size > 1) {
        conflicts++;
        const conflict: IndexConflict = {
          fileName: group[0].fileName,
          records: group,
        };
        this.quarantine.report(conflict);
        continue;
      }
      if (group.length > 1) duplicates += group.length - 1;
      index.set(key, group[0]);
    }

    this.logger.info({
      emoji: "🗂️",
      records: records.length,
      indexed: index.size,
      duplicates,
      conflicts,
    })`JSON 索引建立完成：${index.size} 筆，相同重複 ${duplicates} 筆，衝突 ${conflicts} 組`;

    return new JsonIndexMap(index);
  }
}

/** 比對內容用的 key，不含來源路徑 */
function contentKey(record: TakeoutRecord) {
  return JSON.stringify([
    record.title,
    record.captureTimestamp,
    record.geoData,
    record.geoDataExif,
  ]);
}

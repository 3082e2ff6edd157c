import { describe, expect, test } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";

import { CandidateGeneratorDefault } from "@/services/CandidateGenerator";
import {
  JsonIndexBuilderDefault,
  QuarantineSinkCollector,
} from "@/services/JsonIndex";
import { MatchingServiceDefault } from "@/services/MatchingService";
import { parseMediaFile, parseTakeoutRecord } from "@/services/Takeout";

function buildIndex(paths: string[]) {
  const logger = buildTestLogger();
  const builder = new JsonIndexBuilderDefault({
    quarantine: new QuarantineSinkCollector(logger),
    logger,
  });
  // 以路徑當 title，避免同名檔被視為內容相同
  return builder.build(
    paths.map((p) => parseTakeoutRecord(p, { title: p }))
  );
}

describe("MatchingServiceDefault", () => {
  const generator = new CandidateGeneratorDefault();
  const matcher = new MatchingServiceDefault();

  test("suffix 必須完全一致", () => {
    const index = buildIndex([
      "/t/IMG_3136.MOV.supplemental-metadata(1).json",
      "/t/IMG_3136.MOV.supplemental-metadata.json",
      "/t/IMG_3136.MOV.supplemental-metadata(2).json",
      "/t/IMG_3136.MOV.json",
      "/t/IMG_3136.MOV(1).json",
    ]);
    const media = parseMediaFile("/t/IMG_3136(1).MOV");
    const { result, issues } = matcher.match(
      media,
      generator.generate(media),
      index
    );

    expect(result.primaryRecord?.sourcePath).toBe("/t/IMG_3136.MOV(1).json");
    expect(result.supplementalRecords.map((r) => r.sourcePath)).toEqual([
      "/t/IMG_3136.MOV.supplemental-metadata(1).json",
    ]);
    expect(issues).toEqual([]);
  });

  test("找不到 JSON 是正常結果", () => {
    const media = parseMediaFile("/t/lonely.jpg");
    const { result, issues } = matcher.match(
      media,
      generator.generate(media),
      buildIndex([])
    );
    expect(result.primaryRecord).toBeUndefined();
    expect(result.supplementalRecords).toEqual([]);
    expect(issues).toEqual([]);
  });

  test("多個 primary 寫法同時存在時採用第一個並回報", () => {
    const index = buildIndex([
      "/t/IMG_3136.MOV(1).json",
      "/t/IMG_3136(1).MOV.json",
    ]);
    const media = parseMediaFile("/t/IMG_3136(1).MOV");
    const { result, issues } = matcher.match(
      media,
      generator.generate(media),
      index
    );
    expect(result.primaryRecord?.sourcePath).toBe("/t/IMG_3136(1).MOV.json");
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({
      type: "DUPLICATE_PRIMARY",
      mediaPath: "/t/IMG_3136(1).MOV",
      sourcePath: "/t/IMG_3136.MOV(1).json",
    });
  });

  test("查到 suffix 不同的 record 時拒絕並回報", () => {
    const index = buildIndex(["/t/IMG.jpg.json"]);
    const media = parseMediaFile("/t/IMG(2).jpg");
    const { result, issues } = matcher.match(
      media,
      { primary: ["IMG.jpg.json"], supplemental: [] },
      index
    );
    expect(result.primaryRecord).toBeUndefined();
    expect(issues.map((i) => i.type)).toEqual(["SUFFIX_MISMATCH"]);
  });

  test("查到類型不同的 record 時拒絕並回報", () => {
    const index = buildIndex(["/t/IMG.jpg.sup.json"]);
    const media = parseMediaFile("/t/IMG.jpg");
    const { result, issues } = matcher.match(
      media,
      { primary: ["IMG.jpg.sup.json"], supplemental: [] },
      index
    );
    expect(result.primaryRecord).toBeUndefined();
    expect(issues.map((i) => i.type)).toEqual(["KIND_MISMATCH"]);
  });

  test("同一個補充 JSON 只保留一次", () => {
    const index = buildIndex(["/t/a.jpg.sup.json"]);
    const media = parseMediaFile("/t/a.jpg");
    const { result } = matcher.match(
      media,
      { primary: [], supplemental: ["a.jpg.sup.json", "A.JPG.SUP.JSON"] },
      index
    );
    expect(result.supplementalRecords.map((r) => r.sourcePath)).toEqual([
      "/t/a.jpg.sup.json",
    ]);
  });
});

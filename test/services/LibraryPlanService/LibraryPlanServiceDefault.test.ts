import { describe, expect, test } from "vitest";

import type { EmbeddedMetadata } from "@/services/ExifService";
import { LibraryPlanServiceDefault } from "@/services/LibraryPlanService";
import type { ResolvedMetadata } from "@/services/MetadataResolver";
import type { ReconcileOutcome } from "@/services/ReconcileService";
import type { TakeoutRecord } from "@/services/Takeout";

import { buildMatch, record } from "~test/fakes/buildMatch";

const taken = new Date("2021-08-18T12:29:59Z");

function outcomeOf(
  mediaPath: string,
  options: {
    metadata?: ResolvedMetadata;
    embedded?: Omit<EmbeddedMetadata, "filePath">;
    primary?: TakeoutRecord;
    supplemental?: TakeoutRecord[];
  } = {}
): ReconcileOutcome {
  const match = buildMatch(mediaPath, options);
  const metadata: ResolvedMetadata = options.metadata ?? {
    timestamp: { value: taken, source: "embedded" },
  };
  const base = {
    media: match.media,
    candidates: { primary: [], supplemental: [] },
    match,
    embedded: options.embedded
      ? { filePath: mediaPath, ...options.embedded }
      : undefined,
    metadata,
  };
  if (!metadata.timestamp) {
    return { ...base, type: "MANUAL_REVIEW", reason: "no-timestamp" };
  }
  return {
    ...base,
    type: "BUNDLE",
    bundle: { year: "2021", month: "08", baseName: match.media.stem },
  };
}

describe("LibraryPlanServiceDefault", () => {
  const planner = new LibraryPlanServiceDefault({ libraryRoot: "/lib" });

  test("搬到 年/月/名稱 資料夾，並複製 JSON 與寫回 JSON 的 metadata", () => {
    const { plan, issues } = planner.plan([
      outcomeOf("/src/IMG_0001.jpg", {
        primary: record("/src/IMG_0001.jpg.json"),
        supplemental: [record("/src/IMG_0001.jpg.sup.json")],
        metadata: {
          timestamp: {
            value: taken,
            source: "primary",
            sourcePath: "/src/IMG_0001.jpg.json",
          },
          gps: { latitude: 25.03, longitude: 121.56, source: "geoData" },
        },
      }),
    ]);

    expect(issues).toEqual([]);
    expect(plan.transfers).toEqual([
      {
        mode: "move",
        from: "/src/IMG_0001.jpg",
        to: "/lib/2021/08/IMG_0001/IMG_0001.jpg",
      },
    ]);
    expect(plan.sidecarCopies).toEqual([
      {
        from: "/src/IMG_0001.jpg.json",
        to: "/lib/2021/08/IMG_0001/IMG_0001.jpg.json",
      },
      {
        from: "/src/IMG_0001.jpg.sup.json",
        to: "/lib/2021/08/IMG_0001/IMG_0001.jpg.sup.json",
      },
    ]);
    expect(plan.metadataWrites).toEqual([
      {
        filePath: "/lib/2021/08/IMG_0001/IMG_0001.jpg",
        patch: {
          captureTime: taken,
          gps: { latitude: 25.03, longitude: 121.56, altitude: undefined },
        },
      },
    ]);
  });

  test("metadata 都來自檔案本身時不寫回", () => {
    const { plan } = planner.plan([
      outcomeOf("/src/IMG_0001.jpg", {
        metadata: {
          timestamp: { value: taken, source: "embedded" },
          gps: { latitude: 1, longitude: 2, source: "embedded" },
        },
      }),
    ]);
    expect(plan.metadataWrites).toEqual([]);
  });

  test("以檔案實際類型修正副檔名", () => {
    const { plan } = planner.plan([
      outcomeOf("/src/IMG_0002.HEIC", {
        embedded: { fileTypeExtension: ".jpg" },
      }),
      outcomeOf("/src/IMG_0003.JPG", {
        embedded: { fileTypeExtension: ".jpeg" },
      }),
    ]);
    expect(plan.transfers.map((t) => t.to)).toEqual([
      "/lib/2021/08/IMG_0002/IMG_0002.jpg",
      "/lib/2021/08/IMG_0003/IMG_0003.JPG",
    ]);
  });

  test("沒有時間的檔案放到人工確認資料夾", () => {
    const { plan } = planner.plan([
      outcomeOf("/src/scan.png", {
        metadata: {},
        supplemental: [record("/src/scan.png.sup.json")],
      }),
    ]);
    expect(plan.transfers).toEqual([
      {
        mode: "move",
        from: "/src/scan.png",
        to: "/lib/__NEEDS_REVIEW__/unmatched-media/scan.png",
      },
    ]);
    expect(plan.sidecarCopies).toEqual([
      {
        from: "/src/scan.png.sup.json",
        to: "/lib/__NEEDS_REVIEW__/unmatched-media/scan.png.sup.json",
      },
    ]);
  });

  test("路徑過長時放到 path-too-long", () => {
    const short = new LibraryPlanServiceDefault({
      libraryRoot: "/lib",
      maxPathLength: 34,
    });
    const { plan, issues } = short.plan([outcomeOf("/src/IMG_0001.jpg")]);
    expect(plan.transfers[0].to).toBe(
      "/lib/__NEEDS_REVIEW__/path-too-long/IMG_0001.jpg"
    );
    expect(issues).toEqual([
      {
        mediaPath: "/src/IMG_0001.jpg",
        type: "PATH_TOO_LONG",
        message: "目標路徑長度 34 超過上限 34",
        target: "/lib/2021/08/IMG_0001/IMG_0001.jpg",
      },
    ]);
  });

  test("目標路徑重複時略過後者", () => {
    const { plan, issues } = planner.plan([
      outcomeOf("/src/a/IMG_0001.jpg"),
      outcomeOf("/src/b/img_0001.JPG"),
    ]);
    expect(plan.transfers.map((t) => t.from)).toEqual(["/src/a/IMG_0001.jpg"]);
    expect(issues).toEqual([
      {
        mediaPath: "/src/b/img_0001.JPG",
        type: "DUPLICATE_TARGET",
        message: "目標路徑已被其他媒體檔使用，略過",
        target: "/lib/2021/08/img_0001/img_0001.JPG",
      },
    ]);
  });

  test("受保護目錄中的檔案只複製", () => {
    const guarded = new LibraryPlanServiceDefault({
      libraryRoot: "/lib",
      protectedDirs: ["/src/archive"],
    });
    const { plan } = guarded.plan([
      outcomeOf("/src/archive/IMG_0001.jpg"),
      outcomeOf("/src/archive-2/IMG_0002.jpg"),
    ]);
    expect(plan.transfers.map((t) => t.mode)).toEqual(["copy", "move"]);
  });

  test("同一個 JSON 目標只複製一次", () => {
    const { plan } = planner.plan([
      outcomeOf("/src/x/a.png", {
        metadata: {},
        primary: record("/src/x/meta.json"),
      }),
      outcomeOf("/src/y/b.png", {
        metadata: {},
        primary: record("/src/y/meta.json"),
      }),
    ]);
    expect(plan.sidecarCopies).toEqual([
      {
        from: "/src/x/meta.json",
        to: "/lib/__NEEDS_REVIEW__/unmatched-media/meta.json",
      },
    ]);
  });
});

export const rawExtensions = [
  ".nef",
  ".arw",
  ".cr2",
  ".cr3",
  ".dng",
  ".orf",
  ".rw2",
  ".raf",
] as const;

export const jpgExtensions = [".jpg", ".jpeg"] as const;

export const photoExtensions = [
  ...jpgExtensions,
  ".heic",
  ".heif",
  ".png",
  ".gif",
  ".webp",
  ".tif",
  ".tiff",
  ".bmp",
  ...rawExtensions,
] as const;

export const videoExtensions = [
  ".mp4",
  ".mov",
  ".m4v",
  ".3gp",
  ".avi",
  ".mkv",
  ".mts",
  ".wmv",
] as const;

export const mediaExtensions = [...photoExtensions, ...videoExtensions] as const;

export const sidecarExtension = ".json";

/** 視為同一種格式的副檔名（小寫） */
export const extensionAliases: ReadonlyArray<readonly [string, string]> = [
  [".jpg", ".jpeg"],
  [".tif", ".tiff"],
];

/** Takeout 補充 metadata 檔名中的標記，例如 IMG.jpg.supplemental-metadata.json */
export const supplementalMarkers = ["supplemental-metadata", "sup"] as const;

export type SupplementalMarker = (typeof supplementalMarkers)[number];

/** duplicate suffix 只接受 1~3 位數，(2020) 這類四位數視為年份 */
export const maxSuffixDigits = 3;

/** 可信的拍攝時間範圍（epoch 秒）：1970-01-01T00:00:00Z ~ 2030-01-01T00:00:00Z */
export const captureTimeWindow = { min: 0, max: 1893456000 } as const;

/** 經緯度都落在此範圍內視為 Null Island (0,0) */
export const nullIslandEpsilon = 0.0001;

export const defaultMaxPathLength = 240;

export const needsReviewDirName = "__NEEDS_REVIEW__";
export const unmatchedMediaDirName = "unmatched-media";
export const pathTooLongDirName = "path-too-long";

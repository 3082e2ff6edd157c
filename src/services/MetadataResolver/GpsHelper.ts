import { nullIslandEpsilon } from "@/constants";
import type { GeoPoint } from "@/services/Takeout";

/**
 * 經緯度同時接近 0 才視為無效 (Null Island)。
 * 赤道 (lat=0) 或本初子午線 (lon=0) 上的點是有效的。
 */
export function isValidCoordinate(
  point: Pick<GeoPoint, "latitude" | "longitude">
) {
  const { latitude, longitude } = point;
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) return false;
  return !(
    Math.abs(latitude) < nullIslandEpsilon &&
    Math.abs(longitude) < nullIslandEpsilon
  );
}

import { extensionAliases } from "@/constants";

/**
 * 回傳副檔名本身與其別名，別名沿用原本的大小寫風格。
 * .JPG → [.JPG, .JPEG]、.heic → [.heic]
 */
export function extensionVariants(
  extension: string,
  aliases: ReadonlyArray<readonly [string, string]> = extensionAliases
): string[] {
  const lower = extension.toLowerCase();
  const variants = [extension];
  for (const [a, b] of aliases) {
    const alias = lower === a ? b : lower === b ? a : undefined;
    if (!alias) continue;
    const isUpper = extension === extension.toUpperCase();
    variants.push(isUpper ? alias.toUpperCase() : alias);
  }
  return variants;
}

export function isSameExtension(
  a: string,
  b: string,
  aliases: ReadonlyArray<readonly [string, string]> = extensionAliases
) {
  const lowerB = b.toLowerCase();
  return extensionVariants(a, aliases).some(
    (v) => v.toLowerCase() === lowerB
  );
}

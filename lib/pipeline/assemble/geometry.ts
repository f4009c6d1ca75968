import type { ImageSize } from "../../images/raster";

/**
 * Scale `width`×`height` so the long edge equals `targetLongEdge`, keeping
 * the aspect ratio and truncating to whole pixels. Images already within
 * the target come back unchanged.
 */
export function calculateOptimalSize(
  width: number,
  height: number,
  targetLongEdge: number
): ImageSize {
  const longEdge = Math.max(width, height);
  if (longEdge <= targetLongEdge) return { width, height };
  if (width >= height) {
    return {
      width: targetLongEdge,
      height: Math.max(1, Math.floor((height * targetLongEdge) / width)),
    };
  }
  return {
    width: Math.max(1, Math.floor((width * targetLongEdge) / height)),
    height: targetLongEdge,
  };
}

export interface SizePolicy {
  resizeToOriginal: boolean;
  /** Long-edge cap; null leaves large images alone */
  longEdgeCap: number | null;
}

/**
 * Size a page image should be written at. Returns null when the upscaled
 * image goes in as-is.
 */
export function resolveTargetSize(
  upscaled: ImageSize,
  original: ImageSize,
  policy: SizePolicy
): ImageSize | null {
  if (policy.resizeToOriginal) {
    if (upscaled.width === original.width && upscaled.height === original.height) return null;
    return { width: original.width, height: original.height };
  }
  if (policy.longEdgeCap !== null && Math.max(upscaled.width, upscaled.height) > policy.longEdgeCap) {
    return calculateOptimalSize(upscaled.width, upscaled.height, policy.longEdgeCap);
  }
  return null;
}

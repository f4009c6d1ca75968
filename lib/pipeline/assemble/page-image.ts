import fs from "node:fs";
import { encodeImage, probeImage, type ImageSize, type RasterFormat } from "../../images/raster";
import type { PageRecord } from "../types";
import { resolveTargetSize, type SizePolicy } from "./geometry";

export interface PageImage extends ImageSize {
  bytes: Buffer;
}

export interface PageImageOptions {
  format: RasterFormat;
  quality: number;
  policy: SizePolicy;
}

/**
 * Bytes to store for the image at `file`, resized per the size policy and
 * encoded as `format`. An image that already has the right format and size
 * is passed through untouched.
 */
export async function renderImageFile(
  file: string,
  original: ImageSize,
  options: PageImageOptions
): Promise<PageImage> {
  const probe = await probeImage(file);
  const target = resolveTargetSize(probe, original, options.policy);

  if (!target && probe.format === options.format) {
    return {
      bytes: fs.readFileSync(file),
      width: probe.width,
      height: probe.height,
    };
  }

  const bytes = await encodeImage(file, {
    format: options.format,
    quality: options.quality,
    size: target ?? undefined,
    flatten: options.format === "jpeg",
  });
  const size = target ?? probe;
  return { bytes, width: size.width, height: size.height };
}

/** A reconciled page's upscaled output, rendered for storage */
export function renderPageImage(
  record: PageRecord & { outputPath: string },
  options: PageImageOptions
): Promise<PageImage> {
  return renderImageFile(
    record.outputPath,
    { width: record.width, height: record.height },
    options
  );
}

export function hasOutput(record: PageRecord): record is PageRecord & { outputPath: string } {
  return record.outputPath !== undefined;
}

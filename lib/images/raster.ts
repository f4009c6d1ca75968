import sharp from "sharp";
import type { OutputFormat } from "../config";

export type RasterFormat = "jpeg" | "png" | "webp" | "gif";

export interface ImageSize {
  width: number;
  height: number;
}

export interface ImageProbe extends ImageSize {
  format: string;
}

const MEDIA_TYPES: Record<RasterFormat, string> = {
  jpeg: "image/jpeg",
  png: "image/png",
  webp: "image/webp",
  gif: "image/gif",
};

const EXTENSIONS: Record<RasterFormat, string> = {
  jpeg: "jpg",
  png: "png",
  webp: "webp",
  gif: "gif",
};

export const RASTER_MEDIA_TYPES = new Set(Object.values(MEDIA_TYPES));

export function rasterFormat(format: OutputFormat): RasterFormat {
  switch (format) {
    case "JPEG":
      return "jpeg";
    case "PNG":
      return "png";
    case "WEBP":
      return "webp";
  }
}

export function formatFromMediaType(mediaType: string | undefined): RasterFormat | null {
  switch (mediaType?.toLowerCase()) {
    case "image/jpeg":
    case "image/jpg":
      return "jpeg";
    case "image/png":
      return "png";
    case "image/webp":
      return "webp";
    case "image/gif":
      return "gif";
    default:
      return null;
  }
}

export function mediaTypeFor(format: RasterFormat): string {
  return MEDIA_TYPES[format];
}

export function extensionFor(format: RasterFormat): string {
  return EXTENSIONS[format];
}

/**
 * Read pixel dimensions without decoding the whole image.
 * Rejects when the bytes are not a decodable raster image.
 */
export async function probeImage(input: Buffer | string): Promise<ImageProbe> {
  const meta = await sharp(input).metadata();
  if (!meta.width || !meta.height || !meta.format) {
    throw new Error("image has no readable dimensions");
  }
  return { width: meta.width, height: meta.height, format: meta.format };
}

export interface EncodeOptions {
  format: RasterFormat;
  quality: number;
  /** Resample to exactly this size (Lanczos); omitted keeps the source size */
  size?: ImageSize;
  /** Composite transparent pixels onto white before encoding */
  flatten?: boolean;
}

export async function encodeImage(
  input: Buffer | string,
  options: EncodeOptions
): Promise<Buffer> {
  let pipeline = sharp(input);
  if (options.flatten) {
    pipeline = pipeline.flatten({ background: "#ffffff" });
  }
  if (options.size) {
    pipeline = pipeline.resize(options.size.width, options.size.height, {
      fit: "fill",
      kernel: sharp.kernel.lanczos3,
    });
  }
  switch (options.format) {
    case "jpeg":
      pipeline = pipeline.jpeg({ quality: options.quality });
      break;
    case "png":
      pipeline = pipeline.png({ compressionLevel: 9 });
      break;
    case "webp":
      pipeline = pipeline.webp({ quality: options.quality });
      break;
    case "gif":
      pipeline = pipeline.gif();
      break;
  }
  return pipeline.toBuffer();
}

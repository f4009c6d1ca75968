import type { ImageSize } from "../../images/raster";
import type { Logger } from "../../logger";
import type { SourceMetadata } from "../metadata";
import type { Result, SourceKind, SourceLocator } from "../types";

export interface EnumeratedImage {
  locator: SourceLocator;
  bytes: Buffer;
  width: number;
  height: number;
  /** The source container marks this image as its cover */
  coverHint: boolean;
}

export interface EnumerationFailure {
  locator: SourceLocator;
  reason: string;
}

export type EnumerationItem = Result<EnumeratedImage, EnumerationFailure>;

export interface EnumerateOptions {
  /** Both edges must reach these values for an image to count as a page */
  minImageSize: ImageSize;
  /** Render scale for fixed-layout pages (1 = 72 dpi) */
  pdfScale?: number;
  logger?: Logger;
}

/**
 * An opened source book: its metadata plus a single-pass walk over its
 * page images in presentation order.
 */
export interface ImageSource {
  kind: SourceKind;
  metadata: SourceMetadata;
  images(): AsyncGenerator<EnumerationItem>;
}

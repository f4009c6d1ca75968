import fs from "node:fs";
import path from "node:path";
import type { OutputFormat } from "../../config";
import { NoContentError, errorMessage } from "../../errors";
import { encodeImage, extensionFor, rasterFormat } from "../../images/raster";
import { nullLogger, type Logger } from "../../logger";
import type { EnumerationFailure, ImageSource } from "../enumerate";
import { IdentityAssigner, stagedName } from "../identity";
import type { SourceMetadata } from "../metadata";
import type { PageRecord, SourceKind } from "../types";

export interface ExtractProgress {
  /** Pages staged so far */
  page: number;
  label: string;
}

export interface ExtractResult {
  kind: SourceKind;
  records: PageRecord[];
  metadata: SourceMetadata;
  failures: EnumerationFailure[];
}

export interface ExtractOptions {
  source: ImageSource;
  imagesDir: string;
  /** Book name used in logs and errors */
  book: string;
  format: OutputFormat;
  quality: number;
  logger?: Logger;
  onProgress?: (progress: ExtractProgress) => void;
}

/**
 * Pull every image out of `source`, give it a page identity and write it
 * to `imagesDir` as `page_NNNN.<ext>`, re-encoded to the configured output
 * format with transparency flattened onto white.
 *
 * Images that cannot be decoded or re-encoded are collected in `failures`
 * and never consume a page number. Throws NoContentError when nothing
 * usable remains.
 */
export async function extractImages(options: ExtractOptions): Promise<ExtractResult> {
  const { source, imagesDir, book } = options;
  const logger = options.logger ?? nullLogger;
  const format = rasterFormat(options.format);
  const extension = extensionFor(format);
  const identities = new IdentityAssigner();
  const records: PageRecord[] = [];
  const failures: EnumerationFailure[] = [];

  fs.mkdirSync(imagesDir, { recursive: true });

  for await (const item of source.images()) {
    if (!item.ok) {
      logger.warn("Skipping unreadable image", {
        book,
        href: item.error.locator.href,
        reason: item.error.reason,
      });
      failures.push(item.error);
      continue;
    }

    const image = item.value;
    let staged: Buffer;
    try {
      staged = await encodeImage(image.bytes, {
        format,
        quality: options.quality,
        flatten: true,
      });
    } catch (error) {
      const reason = errorMessage(error);
      logger.warn("Skipping image that failed to re-encode", {
        book,
        href: image.locator.href,
        reason,
      });
      failures.push({ locator: image.locator, reason });
      continue;
    }

    const { pageNumber, isCover } = identities.assign(image.coverHint);
    const stagedPath = path.join(imagesDir, stagedName(pageNumber, extension));
    fs.writeFileSync(stagedPath, staged);

    records.push({
      pageNumber,
      isCover,
      sourceLocator: image.locator,
      stagedPath,
      width: image.width,
      height: image.height,
    });
    options.onProgress?.({ page: pageNumber, label: book });
  }

  if (records.length === 0) {
    throw new NoContentError(book, { failures: failures.length });
  }

  logger.info("Extracted images", {
    book,
    pages: records.length,
    skipped: failures.length,
  });
  return { kind: source.kind, records, metadata: source.metadata, failures };
}

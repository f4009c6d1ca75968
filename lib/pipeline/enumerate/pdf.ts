import mupdf, { type Document as MupdfDocument } from "mupdf";
import { ExtractionError, errorMessage } from "../../errors";
import type { SourceMetadata } from "../metadata";
import { err, ok, type SourceLocator } from "../types";
import type { EnumerateOptions, EnumerationItem } from "./types";

export function openPdf(buffer: Buffer): MupdfDocument {
  // Suppress mupdf stderr warnings
  const origWrite = process.stderr.write;
  process.stderr.write = () => true;
  try {
    return mupdf.Document.openDocument(buffer, "application/pdf");
  } catch (error) {
    throw new ExtractionError(`Not a readable PDF: ${errorMessage(error)}`);
  } finally {
    process.stderr.write = origWrite;
  }
}

export function readPdfMetadata(doc: MupdfDocument): SourceMetadata {
  const info = (key: string) => doc.getMetaData(key) || undefined;
  const metadata: SourceMetadata = {
    title: info("info:Title"),
    creator: info("info:Author"),
    extras: [],
  };
  const subject = info("info:Subject");
  if (subject) {
    metadata.extras.push({ namespace: "dc", name: "subject", value: subject, attributes: {} });
  }
  const producer = info("info:Producer");
  if (producer) {
    metadata.extras.push({ namespace: "dc", name: "contributor", value: producer, attributes: {} });
  }
  return metadata;
}

const tick = () => new Promise<void>((r) => setImmediate(r));

/**
 * Render every page of a PDF to PNG, in page order. Pages come out at
 * `pdfScale` times 72 dpi; undersized renders are dropped.
 */
export async function* enumeratePdf(
  doc: MupdfDocument,
  options: EnumerateOptions
): AsyncGenerator<EnumerationItem> {
  const scale = options.pdfScale ?? 1;
  const matrix = mupdf.Matrix.scale(scale, scale);
  const total = doc.countPages();

  for (let i = 0; i < total; i++) {
    const locator: SourceLocator = { href: `page:${i + 1}`, mediaType: "image/png" };
    let bytes: Buffer;
    try {
      const page = doc.loadPage(i);
      const pixmap = page.toPixmap(matrix, mupdf.ColorSpace.DeviceRGB, false);
      bytes = Buffer.from(pixmap.asPNG());
    } catch (error) {
      yield err({ locator, reason: errorMessage(error) });
      continue;
    }

    // IHDR width/height
    const width = bytes.readUInt32BE(16);
    const height = bytes.readUInt32BE(20);
    if (width < options.minImageSize.width || height < options.minImageSize.height) {
      options.logger?.debug("Page render below minimum size", { page: i + 1, width, height });
      continue;
    }

    yield ok({ locator, bytes, width, height, coverHint: false });
    // let progress render between pages
    await tick();
  }
}

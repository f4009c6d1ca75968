import JSZip from "jszip";
import { AssemblyError, errorMessage } from "../../errors";
import { formatFromMediaType } from "../../images/raster";
import { nullLogger, type Logger } from "../../logger";
import { loadEpubArchive } from "../enumerate";
import type { PageRecord } from "../types";
import type { SizePolicy } from "./geometry";
import { hasOutput, renderPageImage } from "./page-image";

export const EPUB_MIMETYPE = "application/epub+zip";

const MODIFIED_META =
  /(<(?:opf:)?meta\b[^>]*\bproperty\s*=\s*["']dcterms:modified["'][^>]*>)[^<]*(<\/(?:opf:)?meta>)/i;
const MODIFIED_META_NAME =
  /(<(?:opf:)?meta\b[^>]*\bname\s*=\s*["']dcterms:modified["'][^>]*\bcontent\s*=\s*["'])[^"']*(["'])/i;
const METADATA_CLOSE = /<\/((?:opf:)?metadata)>/i;

/**
 * Set the package's modification timestamp, leaving every other byte of
 * the document alone. EPUB 3 packages get a `dcterms:modified` property,
 * EPUB 2 packages a name/content meta.
 */
export function refreshModified(opf: string, modified: string, version: string): string {
  if (MODIFIED_META.test(opf)) {
    return opf.replace(MODIFIED_META, `$1${modified}$2`);
  }
  if (MODIFIED_META_NAME.test(opf)) {
    return opf.replace(MODIFIED_META_NAME, `$1${modified}$2`);
  }
  const element = version.startsWith("3")
    ? `<meta property="dcterms:modified">${modified}</meta>`
    : `<meta name="dcterms:modified" content="${modified}"/>`;
  return opf.replace(METADATA_CLOSE, (close) => `  ${element}\n  ${close}`);
}

async function readEntry(entry: JSZip.JSZipObject, book: string | undefined): Promise<Buffer> {
  try {
    return await entry.async("nodebuffer");
  } catch (error) {
    throw new AssemblyError(
      `Cannot copy ${entry.name} from the original archive: ${errorMessage(error)}`,
      { entry: entry.name },
      { book, operation: "patch", cause: error instanceof Error ? error : undefined }
    );
  }
}

export interface PatchOptions {
  original: Buffer;
  records: readonly PageRecord[];
  policy: SizePolicy;
  quality: number;
  modified: string;
  book?: string;
  logger?: Logger;
}

export interface PatchResult {
  buffer: Buffer;
  replaced: number;
}

/**
 * Rewrite the original EPUB with upscaled images swapped in.
 *
 * Each reconciled page replaces the entry its locator names, re-encoded to
 * that entry's own media type. Pages without output, and every entry that
 * is not a page image, keep their original bytes. `mimetype` is written
 * first and uncompressed.
 */
export async function patchEpub(options: PatchOptions): Promise<PatchResult> {
  const logger = options.logger ?? nullLogger;
  const { zip, pkg } = await loadEpubArchive(options.original);

  const replacements = new Map<string, Buffer>();
  for (const record of options.records) {
    if (!hasOutput(record)) continue;
    const href = record.sourceLocator.href;
    if (!zip.file(href)) {
      logger.warn("Page resource missing from archive, not replaced", {
        book: options.book,
        page: record.pageNumber,
        href,
      });
      continue;
    }
    const format = formatFromMediaType(record.sourceLocator.mediaType) ?? "jpeg";
    const image = await renderPageImage(record, {
      format,
      quality: options.quality,
      policy: options.policy,
    });
    replacements.set(href, image.bytes);
  }

  const opfEntry = zip.file(pkg.opfPath);
  if (opfEntry) {
    const opf = await opfEntry.async("string");
    zip.file(pkg.opfPath, refreshModified(opf, options.modified, pkg.version));
  }

  const out = new JSZip();
  out.file("mimetype", EPUB_MIMETYPE, { compression: "STORE" });
  const entries: JSZip.JSZipObject[] = [];
  zip.forEach((_relativePath, entry) => {
    if (entry.name !== "mimetype") entries.push(entry);
  });
  for (const entry of entries) {
    if (entry.dir) {
      out.folder(entry.name);
      continue;
    }
    const data = replacements.get(entry.name) ?? (await readEntry(entry, options.book));
    out.file(entry.name, data, { date: entry.date, comment: entry.comment });
  }

  const buffer = await out.generateAsync({
    type: "nodebuffer",
    compression: "DEFLATE",
    mimeType: EPUB_MIMETYPE,
  });
  return { buffer, replaced: replacements.size };
}

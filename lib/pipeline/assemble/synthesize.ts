import JSZip from "jszip";
import { extensionFor, mediaTypeFor, type RasterFormat } from "../../images/raster";
import { nullLogger, type Logger } from "../../logger";
import { pageStem } from "../identity";
import { validateExtras, type BookMetadata } from "../metadata";
import type { PageRecord } from "../types";
import type { SizePolicy } from "./geometry";
import { hasOutput, renderImageFile, renderPageImage } from "./page-image";
import { EPUB_MIMETYPE } from "./patch";
import { renderTemplate } from "./templates";

const CONTENT_DIR = "OEBPS";

export interface SynthesizeOptions {
  records: readonly PageRecord[];
  metadata: BookMetadata;
  format: RasterFormat;
  quality: number;
  policy: SizePolicy;
  book?: string;
  logger?: Logger;
}

interface PageEntry {
  id: string;
  href: string;
  imageId: string;
  imageHref: string;
  mediaType: string;
  label: string;
  isCover: boolean;
  width: number;
  height: number;
}

function attributeList(attributes: Record<string, string>): { name: string; value: string }[] {
  return Object.entries(attributes).map(([name, value]) => ({ name, value }));
}

/**
 * Build a new EPUB 3 with one XHTML page per image, in page order. Pages
 * without upscaled output carry their staged image, which extraction
 * already wrote in `format`, under the same size policy. A record flagged as cover is declared as the
 * package's cover image.
 */
export async function synthesizeEpub(options: SynthesizeOptions): Promise<Buffer> {
  const logger = options.logger ?? nullLogger;
  const { metadata, format } = options;
  const extension = extensionFor(format);
  const ordered = [...options.records].sort((a, b) => a.pageNumber - b.pageNumber);

  const zip = new JSZip();
  zip.file("mimetype", EPUB_MIMETYPE, { compression: "STORE" });

  const pages: PageEntry[] = [];
  for (const record of ordered) {
    const imageOptions = { format, quality: options.quality, policy: options.policy };
    const image = hasOutput(record)
      ? await renderPageImage(record, imageOptions)
      : await renderImageFile(
          record.stagedPath,
          { width: record.width, height: record.height },
          imageOptions
        );

    const name = pageStem(record.pageNumber);
    const page: PageEntry = {
      id: name,
      href: `pages/${name}.xhtml`,
      imageId: record.isCover ? "cover-image" : `img_${name}`,
      imageHref: `images/${name}.${extension}`,
      mediaType: mediaTypeFor(format),
      label: record.isCover ? "Cover" : `Page ${record.pageNumber}`,
      isCover: record.isCover,
      width: image.width,
      height: image.height,
    };
    pages.push(page);

    zip.file(`${CONTENT_DIR}/${page.imageHref}`, image.bytes);
    zip.file(
      `${CONTENT_DIR}/${page.href}`,
      await renderTemplate("page.xhtml", { page, language: metadata.language })
    );
  }

  const { valid, rejected } = validateExtras(metadata.extras);
  for (const { entry, reason } of rejected) {
    logger.warn("Skipping invalid metadata entry", {
      book: options.book,
      name: `${entry.namespace}:${entry.name}`,
      reason,
    });
  }
  const dcExtras = valid
    .filter((entry) => entry.namespace === "dc")
    .map((entry) => ({ ...entry, attributes: attributeList(entry.attributes) }));
  const metaExtras = valid.filter((entry) => entry.namespace !== "dc");

  const cover = pages.find((page) => page.isCover);
  const context = {
    metadata,
    pages,
    dcExtras,
    metaExtras,
    coverId: cover?.imageId,
    opfPath: `${CONTENT_DIR}/content.opf`,
  };

  zip.file("META-INF/container.xml", await renderTemplate("container.xml", context));
  zip.file(`${CONTENT_DIR}/content.opf`, await renderTemplate("content.opf", context));
  zip.file(`${CONTENT_DIR}/nav.xhtml`, await renderTemplate("nav.xhtml", context));
  zip.file(`${CONTENT_DIR}/toc.ncx`, await renderTemplate("toc.ncx", context));
  zip.file(`${CONTENT_DIR}/style/nav.css`, await renderTemplate("nav.css", context));

  return zip.generateAsync({
    type: "nodebuffer",
    compression: "DEFLATE",
    mimeType: EPUB_MIMETYPE,
  });
}

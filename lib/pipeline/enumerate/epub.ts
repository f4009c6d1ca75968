import path from "node:path";
import JSZip from "jszip";
import { DomUtils, parseDocument } from "htmlparser2";
import type { Element } from "domhandler";
import { ExtractionError, errorMessage } from "../../errors";
import { probeImage, RASTER_MEDIA_TYPES } from "../../images/raster";
import { nullLogger } from "../../logger";
import { err, ok, type SourceLocator } from "../types";
import {
  CONTAINER_PATH,
  DOCUMENT_MEDIA_TYPES,
  localName,
  parseContainer,
  parsePackage,
  type EpubPackage,
  type ManifestItem,
} from "./epub-package";
import { matchResource, resolveReference } from "./match";
import type { EnumerateOptions, EnumerationItem } from "./types";

export interface EpubArchive {
  zip: JSZip;
  pkg: EpubPackage;
}

export async function loadEpubArchive(buffer: Buffer): Promise<EpubArchive> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(buffer);
  } catch (error) {
    throw new ExtractionError(`Not a readable EPUB archive: ${errorMessage(error)}`);
  }

  const container = zip.file(CONTAINER_PATH);
  if (!container) {
    throw new ExtractionError(`EPUB has no ${CONTAINER_PATH}`);
  }

  try {
    const opfPath = parseContainer(await container.async("string"));
    const opf = zip.file(opfPath);
    if (!opf) {
      throw new Error(`package document ${opfPath} is missing`);
    }
    return { zip, pkg: parsePackage(await opf.async("string"), opfPath) };
  } catch (error) {
    throw new ExtractionError(`Invalid EPUB package: ${errorMessage(error)}`);
  }
}

function isRaster(item: ManifestItem): boolean {
  return RASTER_MEDIA_TYPES.has(item.mediaType);
}

/**
 * Manifest items the package marks as the cover, strongest signal first:
 * the EPUB 3 `cover-image` property, then the EPUB 2 `<meta name="cover">`,
 * then any id or file name containing "cover".
 */
export function coverCandidates(pkg: EpubPackage): ManifestItem[] {
  const rasters = pkg.manifest.filter(isRaster);
  const ordered = [
    ...rasters.filter((item) => item.properties.includes("cover-image")),
    ...rasters.filter((item) => item.id === pkg.coverMetaId),
    ...rasters.filter(
      (item) =>
        item.id.toLowerCase().includes("cover") ||
        path.posix.basename(item.href).toLowerCase().includes("cover")
    ),
  ];
  return [...new Set(ordered)];
}

/** Content documents in reading order, then any left out of the spine. */
export function readingOrder(pkg: EpubPackage): ManifestItem[] {
  const byId = new Map(pkg.manifest.map((item) => [item.id, item]));
  const inSpine = pkg.spine
    .map((id) => byId.get(id))
    .filter((item): item is ManifestItem => !!item);
  const seen = new Set(inSpine.map((item) => item.id));
  const rest = pkg.manifest.filter(
    (item) => DOCUMENT_MEDIA_TYPES.has(item.mediaType) && !seen.has(item.id)
  );
  return [...inSpine, ...rest];
}

/** `<img src>` and SVG `<image href>` values, in document order. */
export function imageReferences(markup: string): string[] {
  const doc = parseDocument(markup);
  const refs: string[] = [];
  for (const el of DomUtils.findAll(isImageElement, doc.children)) {
    const src =
      localName(el) === "img"
        ? el.attribs.src
        : (el.attribs.href ?? el.attribs["xlink:href"]);
    if (src && !src.startsWith("data:")) refs.push(src);
  }
  return refs;
}

function isImageElement(el: Element): boolean {
  const name = localName(el);
  return name === "img" || name === "image";
}

/**
 * Walk an EPUB's raster images in presentation order.
 *
 * The package's cover (when one qualifies) comes first with `coverHint`
 * set; after it every image is yielded in the order the content documents
 * first reference it. A resource is yielded at most once. Images smaller
 * than `minImageSize` are dropped without a failure entry.
 */
export async function* enumerateEpub(
  archive: EpubArchive,
  options: EnumerateOptions
): AsyncGenerator<EnumerationItem> {
  const { zip, pkg } = archive;
  const logger = options.logger ?? nullLogger;
  const rasters = pkg.manifest.filter(isRaster);
  const candidates = rasters.map((item) => item.href);
  const byHref = new Map(rasters.map((item) => [item.href, item]));
  const claimed = new Set<string>();

  const load = async (item: ManifestItem, coverHint: boolean): Promise<EnumerationItem> => {
    const locator: SourceLocator = {
      href: item.href,
      id: item.id,
      mediaType: item.mediaType,
    };
    const entry = zip.file(item.href);
    if (!entry) {
      return err({ locator, reason: "resource listed in manifest but missing from archive" });
    }
    try {
      const bytes = await entry.async("nodebuffer");
      const { width, height } = await probeImage(bytes);
      return ok({ locator, bytes, width, height, coverHint });
    } catch (error) {
      return err({ locator, reason: errorMessage(error) });
    }
  };

  const qualifies = (width: number, height: number) =>
    width >= options.minImageSize.width && height >= options.minImageSize.height;

  for (const item of coverCandidates(pkg)) {
    const result = await load(item, true);
    if (result.ok && qualifies(result.value.width, result.value.height)) {
      claimed.add(item.href);
      yield result;
      break;
    }
  }

  for (const doc of readingOrder(pkg)) {
    const entry = zip.file(doc.href);
    if (!entry) {
      logger.debug("Content document missing from archive", { href: doc.href });
      continue;
    }
    const markup = await entry.async("string");

    for (const src of imageReferences(markup)) {
      const reference = resolveReference(doc.href, src);
      const href = matchResource(reference, candidates, claimed);
      const item = href ? byHref.get(href) : undefined;
      if (!item) {
        logger.debug("Image reference matches no unclaimed resource", {
          document: doc.href,
          src,
        });
        continue;
      }
      claimed.add(item.href);

      const result = await load(item, false);
      if (result.ok && !qualifies(result.value.width, result.value.height)) {
        logger.debug("Image below minimum size", {
          href: item.href,
          width: result.value.width,
          height: result.value.height,
        });
        continue;
      }
      yield result;
    }
  }
}

import fs from "node:fs";
import path from "node:path";
import { ExtractionError } from "../../errors";
import type { SourceKind } from "../types";
import { enumerateEpub, loadEpubArchive } from "./epub";
import { enumeratePdf, openPdf, readPdfMetadata } from "./pdf";
import type { EnumerateOptions, ImageSource } from "./types";

export type {
  EnumeratedImage,
  EnumerationFailure,
  EnumerationItem,
  EnumerateOptions,
  ImageSource,
} from "./types";
export { matchResource, resolveReference } from "./match";
export { enumerateEpub, loadEpubArchive, type EpubArchive } from "./epub";
export { enumeratePdf, openPdf } from "./pdf";

export const SOURCE_EXTENSIONS: Record<string, SourceKind> = {
  ".epub": "epub",
  ".pdf": "pdf",
};

export function sourceKind(filePath: string): SourceKind | null {
  return SOURCE_EXTENSIONS[path.extname(filePath).toLowerCase()] ?? null;
}

/**
 * Open a book file and pick the enumerator for its container type.
 */
export async function openImageSource(
  filePath: string,
  options: EnumerateOptions
): Promise<ImageSource> {
  const kind = sourceKind(filePath);
  if (!kind) {
    throw new ExtractionError(`Unsupported source type: ${path.basename(filePath)}`);
  }
  const buffer = fs.readFileSync(filePath);

  if (kind === "pdf") {
    const doc = openPdf(buffer);
    return {
      kind,
      metadata: readPdfMetadata(doc),
      images: () => enumeratePdf(doc, options),
    };
  }

  const archive = await loadEpubArchive(buffer);
  return {
    kind,
    metadata: archive.pkg.metadata,
    images: () => enumerateEpub(archive, options),
  };
}

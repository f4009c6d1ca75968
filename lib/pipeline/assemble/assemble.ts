import fs from "node:fs";
import path from "node:path";
import type { AppConfig, EpubConfig } from "../../config";
import { AssemblyError, wrapError } from "../../errors";
import { rasterFormat } from "../../images/raster";
import { nullLogger, type Logger } from "../../logger";
import { buildBookMetadata, type SourceMetadata } from "../metadata";
import type { PageRecord, SourceKind } from "../types";
import type { SizePolicy } from "./geometry";
import { patchEpub } from "./patch";
import { synthesizeEpub } from "./synthesize";

export type AssemblyStrategy = "patch" | "synthesize";

/**
 * PDFs have no package to patch. EPUBs are patched unless a new book was
 * asked for.
 */
export function chooseStrategy(kind: SourceKind, epub: EpubConfig): AssemblyStrategy {
  if (kind === "pdf") return "synthesize";
  return epub.create_new || epub.create_eink ? "synthesize" : "patch";
}

export function sizePolicy(config: AppConfig): SizePolicy {
  return {
    resizeToOriginal: config.epub.resize_to_original,
    longEdgeCap: config.epub.create_eink ? config.upscale.target_long_edge : null,
  };
}

export interface AssembleOptions {
  kind: SourceKind;
  sourcePath: string;
  records: readonly PageRecord[];
  metadata: SourceMetadata;
  outputPath: string;
  config: AppConfig;
  logger?: Logger;
  now?: Date;
}

export interface AssembleResult {
  outputPath: string;
  strategy: AssemblyStrategy;
}

/**
 * Write the output EPUB for a book. The file only appears under its final
 * name once it has been written in full.
 */
export async function assembleBook(options: AssembleOptions): Promise<AssembleResult> {
  const { config, outputPath } = options;
  const logger = options.logger ?? nullLogger;
  const book = path.basename(options.sourcePath);
  const strategy = chooseStrategy(options.kind, config.epub);
  const policy = sizePolicy(config);
  const metadata = buildBookMetadata(
    options.metadata,
    path.basename(options.sourcePath, path.extname(options.sourcePath)),
    options.now
  );

  logger.info("Assembling EPUB", { book, strategy, pages: options.records.length });

  const partial = `${outputPath}.part`;
  try {
    const buffer =
      strategy === "patch"
        ? (
            await patchEpub({
              original: fs.readFileSync(options.sourcePath),
              records: options.records,
              policy,
              quality: config.upscale.output_quality,
              modified: metadata.modified,
              book,
              logger,
            })
          ).buffer
        : await synthesizeEpub({
            records: options.records,
            metadata,
            format: rasterFormat(config.upscale.output_format),
            quality: config.upscale.output_quality,
            policy,
            book,
            logger,
          });

    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(partial, buffer);
    fs.renameSync(partial, outputPath);
  } catch (error) {
    fs.rmSync(partial, { force: true });
    throw wrapError(error, AssemblyError, { book, operation: `assemble (${strategy})` });
  }

  return { outputPath, strategy };
}

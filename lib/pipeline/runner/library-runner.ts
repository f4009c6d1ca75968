import fs from "node:fs";
import path from "node:path";
import { getOutputDir } from "../../config";
import { FileOperationError } from "../../errors";
import { sourceKind } from "../enumerate";
import { assertUpscalerAvailable } from "../upscale/supervisor";
import { outputPathFor, runBook } from "./book-runner";
import type { BookOutcome, LibraryStats, RunnerDeps } from "./types";

export interface ProcessedStatus {
  /** Source files with a non-empty output EPUB */
  processed: string[];
  /** Source files still to do */
  pending: string[];
}

/**
 * Sort the EPUB and PDF files of `inputDir` into done and not done. A
 * source counts as done when `<outputDir>/<stem>.epub` exists and is not
 * empty.
 */
export function checkProcessedFiles(inputDir: string, outputDir: string): ProcessedStatus {
  if (!fs.existsSync(inputDir)) {
    throw new FileOperationError(`Input directory does not exist: ${inputDir}`, inputDir);
  }
  const sources = fs
    .readdirSync(inputDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && sourceKind(entry.name) !== null)
    .map((entry) => path.join(inputDir, entry.name))
    .sort();

  const processed: string[] = [];
  const pending: string[] = [];
  for (const source of sources) {
    const output = outputPathFor(source, outputDir);
    const done = fs.existsSync(output) && fs.statSync(output).size > 0;
    (done ? processed : pending).push(source);
  }
  return { processed, pending };
}

/**
 * Process every pending book of the configured input directory, one at a
 * time. A book's failure is recorded in its outcome and the run moves on.
 */
export async function runLibrary(deps: RunnerDeps): Promise<LibraryStats> {
  const { config, logger } = deps;
  const started = Date.now();
  const inputDir = config.directories.input;
  const outputDir = getOutputDir(config);
  const { processed, pending } = checkProcessedFiles(inputDir, outputDir);

  logger.info("Scanned input directory", {
    inputDir,
    outputDir,
    processed: processed.length,
    pending: pending.length,
  });

  const outcomes: BookOutcome[] = [];
  if (pending.length > 0) {
    assertUpscalerAvailable(config.upscaler.binary);
    fs.mkdirSync(outputDir, { recursive: true });
  }

  for (const source of pending) {
    outcomes.push(await runBook(source, outputDir, deps));
  }

  const count = (status: BookOutcome["status"]) =>
    outcomes.filter((o) => o.status === status).length;

  const stats: LibraryStats = {
    total: processed.length + pending.length,
    skipped: processed.length,
    succeeded: count("success"),
    partial: count("partial"),
    failed: count("failed"),
    durationMs: Date.now() - started,
    outcomes,
  };
  logger.info("Library run complete", {
    total: stats.total,
    skipped: stats.skipped,
    succeeded: stats.succeeded,
    partial: stats.partial,
    failed: stats.failed,
    durationMs: stats.durationMs,
  });
  return stats;
}

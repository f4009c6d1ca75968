import fs from "node:fs";
import path from "node:path";
import { FileOperationError, errorMessage } from "../../errors";
import { nullLogger, type Logger } from "../../logger";
import { STAGED_PREFIX } from "../identity";
import type { Batch, BatchResult, PageRecord, ReconciliationGap } from "../types";

const OUTPUT_EXTENSIONS = new Set([
  ".png",
  ".jpg",
  ".jpeg",
  ".webp",
  ".gif",
  ".bmp",
  ".tif",
  ".tiff",
]);

const PAGE_TOKEN = new RegExp(`${STAGED_PREFIX}\\D*(\\d+)`, "i");

function stem(fileName: string): string {
  return path.basename(fileName, path.extname(fileName));
}

/**
 * Page number embedded in an output file name: the digits after the
 * `page_` marker, ignoring whatever the upscaler added around them.
 * `4x-page_0007.png` gives 7. Names without the marker give null.
 */
export function extractPageToken(fileName: string): number | null {
  const match = PAGE_TOKEN.exec(stem(fileName));
  return match ? Number.parseInt(match[1], 10) : null;
}

/**
 * How well `outputName` matches the staged name of a page: 2 for an exact
 * stem match, 1 when the staged stem appears with decoration around it,
 * 0 otherwise. The staged stem must not run on into more digits, so
 * `page_0001` never matches `page_00012`.
 */
export function nameMatchScore(outputName: string, stagedStem: string): 0 | 1 | 2 {
  const outStem = stem(outputName);
  if (outStem === stagedStem) return 2;
  const at = outStem.indexOf(stagedStem);
  if (at === -1) return 0;
  const next = outStem.charAt(at + stagedStem.length);
  return /\d/.test(next) ? 0 : 1;
}

export function listOutputFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && OUTPUT_EXTENSIONS.has(path.extname(entry.name).toLowerCase()))
    .map((entry) => path.join(dir, entry.name))
    .sort();
}

/**
 * Move the outputs of every successful batch into `consolidatedDir`.
 * A file already there under the same name is replaced. Outputs of failed
 * batches are left behind for cleanup. Returns the consolidated files.
 */
export function mergeBatchOutputs(
  results: readonly BatchResult[],
  consolidatedDir: string
): string[] {
  fs.mkdirSync(consolidatedDir, { recursive: true });
  for (const result of results) {
    if (!result.success || !result.outputsDir) continue;
    for (const file of listOutputFiles(result.outputsDir)) {
      const target = path.join(consolidatedDir, path.basename(file));
      try {
        fs.rmSync(target, { force: true });
        fs.renameSync(file, target);
      } catch (error) {
        throw new FileOperationError(
          `Cannot move ${path.basename(file)} out of batch ${result.batchIndex}: ${errorMessage(error)}`,
          file,
          { batchIndex: result.batchIndex }
        );
      }
    }
  }
  return listOutputFiles(consolidatedDir);
}

export interface ReconcileOptions {
  batches?: readonly Batch[];
  results?: readonly BatchResult[];
  book?: string;
  logger?: Logger;
}

export interface ReconcileResult {
  records: PageRecord[];
  gaps: ReconciliationGap[];
}

/**
 * Attach an upscaled output file to every page record.
 *
 * For each page, in order: an output whose name carries the page's staged
 * name (exact before decorated), then any output whose page token equals
 * the page number. Each output file is used once. Pages left without a
 * file become gaps and keep their original image downstream.
 */
export function reconcileOutputs(
  records: readonly PageRecord[],
  outputFiles: readonly string[],
  options: ReconcileOptions = {}
): ReconcileResult {
  const logger = options.logger ?? nullLogger;
  const claimed = new Set<string>();
  const batchOf = new Map<number, number>();
  for (const batch of options.batches ?? []) {
    for (const record of batch.records) batchOf.set(record.pageNumber, batch.index);
  }
  const failedBatches = new Set(
    (options.results ?? []).filter((r) => !r.success).map((r) => r.batchIndex)
  );

  const byName = (stagedStem: string): string | undefined => {
    let decorated: string | undefined;
    for (const file of outputFiles) {
      if (claimed.has(file)) continue;
      const score = nameMatchScore(path.basename(file), stagedStem);
      if (score === 2) return file;
      if (score === 1 && decorated === undefined) decorated = file;
    }
    return decorated;
  };

  const byToken = (pageNumber: number): string | undefined =>
    outputFiles.find(
      (file) => !claimed.has(file) && extractPageToken(path.basename(file)) === pageNumber
    );

  const reconciled: PageRecord[] = [];
  const gaps: ReconciliationGap[] = [];

  for (const record of records) {
    const stagedStem = stem(record.stagedPath);
    const output = byName(stagedStem) ?? byToken(record.pageNumber);

    if (output) {
      claimed.add(output);
      reconciled.push({ ...record, outputPath: output });
      continue;
    }

    const batchIndex = batchOf.get(record.pageNumber);
    const gap: ReconciliationGap = {
      pageNumber: record.pageNumber,
      stagedName: path.basename(record.stagedPath),
      batchIndex,
      reason: batchIndex !== undefined && failedBatches.has(batchIndex) ? "batch-failed" : "no-output",
    };
    gaps.push(gap);
    logger.warn("No upscaled output for page, keeping original", {
      book: options.book,
      page: record.pageNumber,
      batch: batchIndex,
      reason: gap.reason,
    });
    const { outputPath: _unset, ...rest } = record;
    reconciled.push(rest);
  }

  return { records: reconciled, gaps };
}

export function cleanupBatchWorkspaces(batches: readonly Batch[]): void {
  for (const batch of batches) {
    fs.rmSync(batch.workspace.dir, { recursive: true, force: true });
  }
}

/**
 * Book Runner
 *
 * Orchestrates the pipeline for one source book:
 * 1. Image extraction into a fresh project directory
 * 2. Batched upscaling through the external tool
 * 3. Reconciliation of the tool's outputs with page identities
 * 4. EPUB assembly
 */

import fs from "node:fs";
import path from "node:path";
import { Subject, lastValueFrom, tap } from "rxjs";
import { getConcurrency, getMinImageSize } from "../../config";
import { errorMessage } from "../../errors";
import { assembleBook, type AssembleResult } from "../assemble/assemble";
import { planBatches, prepareBatchWorkspace } from "../batch/planner";
import { openImageSource } from "../enumerate";
import { extractImages, type ExtractResult } from "../extract/extract";
import {
  cleanupBatchWorkspaces,
  mergeBatchOutputs,
  reconcileOutputs,
  type ReconcileResult,
} from "../reconcile/reconcile";
import { timestampLabel, slugFromPath } from "../slug";
import {
  resolveProjectPaths,
  type Batch,
  type BatchResult,
  type PageRecord,
  type ProjectPaths,
} from "../types";
import { monitorOutputs } from "../upscale/monitor";
import { assertUpscalerAvailable, runBatches } from "../upscale/supervisor";
import {
  nullProgress,
  type BookOutcome,
  type BookStepName,
  type Progress,
  type RunnerDeps,
} from "./types";

async function step<T>(
  name: BookStepName,
  progress: Progress,
  run: () => Promise<T>
): Promise<T> {
  progress.emit({ type: "step-start", step: name });
  try {
    const result = await run();
    progress.emit({ type: "step-complete", step: name });
    return result;
  } catch (err) {
    progress.emit({ type: "step-error", step: name, error: errorMessage(err) });
    throw err;
  }
}

// ============================================================================
// Project directory
// ============================================================================

/**
 * Create `<temp_dir>/<slug>_extracted_<timestamp>/` with the source copied
 * into `original/`.
 */
export function createProject(
  sourcePath: string,
  tempDir: string,
  now = new Date()
): { paths: ProjectPaths; sourceCopy: string } {
  const projectDir = path.join(
    tempDir,
    `${slugFromPath(sourcePath)}_extracted_${timestampLabel(now)}`
  );
  const paths = resolveProjectPaths(projectDir);
  fs.rmSync(paths.projectDir, { recursive: true, force: true });
  for (const dir of [paths.originalDir, paths.imagesDir, paths.upscaledDir]) {
    fs.mkdirSync(dir, { recursive: true });
  }
  const sourceCopy = path.join(paths.originalDir, path.basename(sourcePath));
  fs.copyFileSync(sourcePath, sourceCopy);
  return { paths, sourceCopy };
}

// ============================================================================
// Stage runners
// ============================================================================

export async function runExtract(
  sourcePath: string,
  paths: ProjectPaths,
  deps: RunnerDeps
): Promise<ExtractResult> {
  const { config, logger } = deps;
  const progress = deps.progress ?? nullProgress;
  const book = path.basename(sourcePath);

  return step("extract", progress, async () => {
    const source = await openImageSource(sourcePath, {
      minImageSize: getMinImageSize(config),
      pdfScale: config.extract.pdf_scale,
      logger,
    });
    return extractImages({
      source,
      imagesDir: paths.imagesDir,
      book,
      format: config.upscale.output_format,
      quality: config.upscale.output_quality,
      logger,
      onProgress: (p) =>
        progress.emit({
          type: "step-progress",
          step: "extract",
          message: `Staged page ${p.page}`,
          current: p.page,
        }),
    });
  });
}

export interface UpscaleResult {
  batches: Batch[];
  results: BatchResult[];
}

/**
 * Split the pages into batches and run the upscaler over them, with the
 * output monitor reporting progress alongside.
 */
export async function runUpscale(
  records: readonly PageRecord[],
  paths: ProjectPaths,
  deps: RunnerDeps
): Promise<UpscaleResult> {
  const { config, logger } = deps;
  const progress = deps.progress ?? nullProgress;
  const concurrency = getConcurrency(config);

  return step("upscale", progress, async () => {
    const batches = planBatches(records, concurrency, paths);
    for (const batch of batches) prepareBatchWorkspace(batch);
    progress.emit({ type: "batches-planned", batches: batches.length, pages: records.length });

    const done$ = new Subject<void>();
    const monitored = lastValueFrom(
      monitorOutputs({
        directories: [...batches.map((b) => b.workspace.outputsDir), paths.consolidatedDir],
        expectedTotal: records.length,
        done$,
        intervalMs: deps.monitorIntervalMs,
        graceMs: deps.monitorGraceMs,
      }).pipe(
        tap((p) =>
          progress.emit({
            type: "step-progress",
            step: "upscale",
            message: "Upscaled images",
            current: p.current,
            total: p.total,
          })
        )
      ),
      { defaultValue: null }
    );

    let results: BatchResult[];
    try {
      results = await runBatches(batches, {
        binary: config.upscaler.binary,
        args: config.upscaler.args,
        device: config.upscaler.device,
        modelName: config.upscale.model_name,
        scale: config.upscale.scale,
        timeoutMs: config.upscaler.timeout_ms,
        concurrency,
        launcher: deps.launcher,
        logger,
        onBatchStart: (batch) =>
          progress.emit({ type: "batch-start", batchIndex: batch.index, pages: batch.records.length }),
        onBatchComplete: (result) =>
          progress.emit({
            type: "batch-complete",
            batchIndex: result.batchIndex,
            success: result.success,
            durationMs: result.durationMs,
          }),
      });
    } finally {
      done$.next();
      done$.complete();
    }
    await monitored;

    return { batches, results };
  });
}

export async function runReconcile(
  records: readonly PageRecord[],
  upscale: UpscaleResult,
  paths: ProjectPaths,
  deps: RunnerDeps & { book: string }
): Promise<ReconcileResult> {
  const progress = deps.progress ?? nullProgress;

  return step("reconcile", progress, async () => {
    try {
      const outputs = mergeBatchOutputs(upscale.results, paths.consolidatedDir);
      return reconcileOutputs(records, outputs, {
        batches: upscale.batches,
        results: upscale.results,
        book: deps.book,
        logger: deps.logger,
      });
    } finally {
      cleanupBatchWorkspaces(upscale.batches);
    }
  });
}

// ============================================================================
// Full book pipeline
// ============================================================================

export function outputPathFor(sourcePath: string, outputDir: string): string {
  return path.join(outputDir, `${path.basename(sourcePath, path.extname(sourcePath))}.epub`);
}

function toMb(bytes: number): number {
  return Math.round((bytes / (1024 * 1024)) * 100) / 100;
}

/**
 * Run every stage for one book. Never throws: a failure anywhere yields a
 * `failed` outcome, and the project directory is removed either way unless
 * `keep_workspace` is set.
 */
export async function runBook(
  sourcePath: string,
  outputDir: string,
  deps: RunnerDeps
): Promise<BookOutcome> {
  const { config } = deps;
  const progress = deps.progress ?? nullProgress;
  const book = path.basename(sourcePath);
  const logger = deps.logger.child({ book });
  const stageDeps = { ...deps, logger };
  const started = Date.now();
  let paths: ProjectPaths | undefined;
  let pages = 0;

  progress.emit({ type: "book-start", book });

  const finish = (outcome: Omit<BookOutcome, "book" | "durationMs">): BookOutcome => {
    progress.emit({ type: "book-complete", book, status: outcome.status });
    return { book, durationMs: Date.now() - started, ...outcome };
  };

  try {
    assertUpscalerAvailable(config.upscaler.binary);

    const project = createProject(sourcePath, config.temp_dir);
    paths = project.paths;

    const extracted = await runExtract(project.sourceCopy, paths, stageDeps);
    pages = extracted.records.length;

    const upscale = await runUpscale(extracted.records, paths, stageDeps);
    const failedBatches = upscale.results.filter((r) => !r.success).map((r) => r.batchIndex);

    const reconciled = await runReconcile(extracted.records, upscale, paths, {
      ...stageDeps,
      book,
    });

    const outputPath = outputPathFor(sourcePath, outputDir);
    const assembled: AssembleResult = await step("assemble", progress, () =>
      assembleBook({
        kind: extracted.kind,
        sourcePath: project.sourceCopy,
        records: reconciled.records,
        metadata: extracted.metadata,
        outputPath,
        config,
        logger,
      })
    );

    const originalSize = fs.statSync(sourcePath).size;
    const outputSize = fs.statSync(assembled.outputPath).size;
    logger.info("Book complete", {
      originalMb: toMb(originalSize),
      outputMb: toMb(outputSize),
      growthPercent:
        originalSize > 0 ? Math.round(((outputSize - originalSize) / originalSize) * 1000) / 10 : null,
      gaps: reconciled.gaps.length,
      failedBatches,
    });

    return finish({
      status: failedBatches.length > 0 || reconciled.gaps.length > 0 ? "partial" : "success",
      pages,
      gaps: reconciled.gaps,
      failedBatches,
      outputPath: assembled.outputPath,
    });
  } catch (err) {
    logger.error("Book failed", { error: errorMessage(err) });
    return finish({
      status: "failed",
      pages,
      gaps: [],
      failedBatches: [],
      error: errorMessage(err),
    });
  } finally {
    if (paths && !config.keep_workspace) {
      fs.rmSync(paths.projectDir, { recursive: true, force: true });
    }
  }
}

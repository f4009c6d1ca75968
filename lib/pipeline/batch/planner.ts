import fs from "node:fs";
import path from "node:path";
import { FileOperationError, errorMessage } from "../../errors";
import {
  batchDir,
  type Batch,
  type BatchWorkspace,
  type PageRecord,
  type ProjectPaths,
} from "../types";

export function batchWorkspace(paths: ProjectPaths, index: number): BatchWorkspace {
  const dir = batchDir(paths, index);
  return {
    dir,
    inputsDir: path.join(dir, "inputs"),
    outputsDir: path.join(dir, "outputs"),
    jobFile: path.join(dir, "job.yaml"),
  };
}

/**
 * Split records into `min(targetBatchCount, records.length)` contiguous
 * batches in page order. Sizes differ by at most one, larger batches
 * first: 10 records over 4 batches gives 3, 3, 2, 2.
 */
export function planBatches(
  records: readonly PageRecord[],
  targetBatchCount: number,
  paths: ProjectPaths
): Batch[] {
  if (!Number.isInteger(targetBatchCount) || targetBatchCount < 1) {
    throw new RangeError(`batch count must be a positive integer, got ${targetBatchCount}`);
  }
  const count = Math.min(targetBatchCount, records.length);
  if (count === 0) return [];

  const ordered = [...records].sort((a, b) => a.pageNumber - b.pageNumber);
  const base = Math.floor(ordered.length / count);
  const larger = ordered.length % count;

  const batches: Batch[] = [];
  let start = 0;
  for (let index = 0; index < count; index++) {
    const size = base + (index < larger ? 1 : 0);
    batches.push({
      index,
      records: ordered.slice(start, start + size),
      workspace: batchWorkspace(paths, index),
    });
    start += size;
  }
  return batches;
}

/**
 * Give a batch a clean workspace: any leftover directory from an earlier
 * run is removed, then `inputs/` is filled with copies of the staged images
 * (same file names) and an empty `outputs/` is created.
 */
export function prepareBatchWorkspace(batch: Batch): void {
  const { dir, inputsDir, outputsDir } = batch.workspace;
  try {
    fs.rmSync(dir, { recursive: true, force: true });
    fs.mkdirSync(inputsDir, { recursive: true });
    fs.mkdirSync(outputsDir, { recursive: true });
    for (const record of batch.records) {
      fs.copyFileSync(
        record.stagedPath,
        path.join(inputsDir, path.basename(record.stagedPath))
      );
    }
  } catch (error) {
    throw new FileOperationError(
      `Cannot prepare workspace for batch ${batch.index}: ${errorMessage(error)}`,
      dir,
      { batchIndex: batch.index }
    );
  }
}

export function batchInputPaths(batch: Batch): string[] {
  return batch.records.map((record) =>
    path.join(batch.workspace.inputsDir, path.basename(record.stagedPath))
  );
}

import path from "node:path";

/**
 * On-disk layout of one book's transient workspace:
 *
 *   <projectDir>/original/<source file>
 *   <projectDir>/images/page_NNNN.<ext>
 *   <projectDir>/upscaled/batch_<i>/{job.yaml, inputs/, outputs/}
 *   <projectDir>/upscaled/outputs/
 */
export interface ProjectPaths {
  projectDir: string;
  originalDir: string;
  imagesDir: string;
  upscaledDir: string;
  consolidatedDir: string;
}

export function resolveProjectPaths(projectDir: string): ProjectPaths {
  const root = path.resolve(projectDir);
  const upscaledDir = path.join(root, "upscaled");
  return {
    projectDir: root,
    originalDir: path.join(root, "original"),
    imagesDir: path.join(root, "images"),
    upscaledDir,
    consolidatedDir: path.join(upscaledDir, "outputs"),
  };
}

export function batchDir(paths: ProjectPaths, index: number): string {
  return path.join(paths.upscaledDir, `batch_${index}`);
}

export type SourceKind = "epub" | "pdf";

/**
 * Where an image came from inside the source container. Only the
 * enumerator and the assembler interpret it.
 */
export interface SourceLocator {
  /** Zip entry path for EPUB resources, `page:<n>` for PDF pages */
  href: string;
  /** Manifest item id, when the container has one */
  id?: string;
  mediaType?: string;
}

export interface PageRecord {
  /** 1-based, dense and unique within a book */
  pageNumber: number;
  isCover: boolean;
  sourceLocator: SourceLocator;
  /** Extracted image handed to the external tool */
  stagedPath: string;
  width: number;
  height: number;
  /** Set by reconciliation; absent means the page falls back to its original image */
  outputPath?: string;
}

export interface BatchWorkspace {
  dir: string;
  inputsDir: string;
  outputsDir: string;
  jobFile: string;
}

export interface Batch {
  readonly index: number;
  readonly records: readonly PageRecord[];
  readonly workspace: BatchWorkspace;
}

export interface BatchResult {
  batchIndex: number;
  success: boolean;
  exitCode: number | null;
  signal: string | null;
  timedOut: boolean;
  /** Tail of the process's standard error */
  stderr: string;
  durationMs: number;
  /** Present on success: the directory to reconcile */
  outputsDir?: string;
  /** Launch or timeout failure description */
  error?: string;
}

export interface ReconciliationGap {
  pageNumber: number;
  stagedName: string;
  /** Batch the page was submitted in, when known */
  batchIndex?: number;
  reason: "batch-failed" | "no-output";
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

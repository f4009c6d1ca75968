/**
 * Runner layer types.
 *
 * These interfaces define the contracts between the pipeline stages and
 * whoever drives them (the CLI, tests, a library caller).
 */

import type { AppConfig } from "../../config";
import type { Logger } from "../../logger";
import type { Launcher } from "../upscale/supervisor";
import type { ReconciliationGap } from "../types";

// ============================================================================
// Progress Interface
// ============================================================================

export type BookStepName = "extract" | "upscale" | "reconcile" | "assemble";

export type ProgressEvent =
  // Book-level events
  | { type: "book-start"; book: string }
  | { type: "book-complete"; book: string; status: BookStatus }
  // Step-level events
  | { type: "step-start"; step: BookStepName }
  | {
      type: "step-progress";
      step: BookStepName;
      message: string;
      current?: number;
      total?: number;
    }
  | { type: "step-complete"; step: BookStepName }
  | { type: "step-error"; step: BookStepName; error: string }
  // Batch-level events
  | { type: "batches-planned"; batches: number; pages: number }
  | { type: "batch-start"; batchIndex: number; pages: number }
  | { type: "batch-complete"; batchIndex: number; success: boolean; durationMs: number };

/**
 * Progress emitter interface.
 *
 * Implementations can print to the console, drive a progress bar, or
 * collect events in tests.
 */
export interface Progress {
  emit(event: ProgressEvent): void;
}

/**
 * No-op progress emitter for when progress tracking isn't needed.
 */
export const nullProgress: Progress = {
  emit: () => {},
};

/**
 * Console-based progress emitter for CLI usage.
 */
export function createConsoleProgress(): Progress {
  return {
    emit(event) {
      switch (event.type) {
        case "book-start":
          console.log(`\n${event.book}`);
          break;
        case "book-complete":
          console.log(`Finished ${event.book}: ${event.status}`);
          break;
        case "step-start":
          console.log(`Starting ${formatStepName(event.step)}...`);
          break;
        case "step-progress":
          if (event.current !== undefined && event.total !== undefined) {
            console.log(
              `${formatStepName(event.step)}: ${event.message} (${event.current}/${event.total})`
            );
          } else {
            console.log(`${formatStepName(event.step)}: ${event.message}`);
          }
          break;
        case "step-complete":
          console.log(`Completed ${formatStepName(event.step)}`);
          break;
        case "step-error":
          console.error(`Error in ${formatStepName(event.step)}: ${event.error}`);
          break;
        case "batches-planned":
          console.log(`Upscaling ${event.pages} pages in ${event.batches} batches`);
          break;
        case "batch-start":
          console.log(`[batch ${event.batchIndex}] ${event.pages} pages`);
          break;
        case "batch-complete":
          console.log(
            `[batch ${event.batchIndex}] ${event.success ? "done" : "failed"} in ${event.durationMs} ms`
          );
          break;
      }
    },
  };
}

export function formatStepName(step: BookStepName): string {
  switch (step) {
    case "extract":
      return "image extraction";
    case "upscale":
      return "upscaling";
    case "reconcile":
      return "output reconciliation";
    case "assemble":
      return "EPUB assembly";
  }
}

// ============================================================================
// Outcomes
// ============================================================================

export type BookStatus = "success" | "partial" | "failed";

export interface BookOutcome {
  /** Source file name */
  book: string;
  status: BookStatus;
  /** Page records enumerated */
  pages: number;
  /** Pages that went out at their original resolution */
  gaps: ReconciliationGap[];
  failedBatches: number[];
  outputPath?: string;
  error?: string;
  durationMs: number;
}

export interface LibraryStats {
  total: number;
  skipped: number;
  succeeded: number;
  partial: number;
  failed: number;
  durationMs: number;
  outcomes: BookOutcome[];
}

// ============================================================================
// Runner Configuration
// ============================================================================

export interface RunnerDeps {
  config: AppConfig;
  logger: Logger;
  progress?: Progress;
  /** Process launcher for the upscaler; defaults to child_process.spawn */
  launcher?: Launcher;
  /** Poll interval of the output monitor */
  monitorIntervalMs?: number;
  /** Time the output monitor keeps watching after the batches finish */
  monitorGraceMs?: number;
}

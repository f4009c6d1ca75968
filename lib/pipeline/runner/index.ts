/**
 * Pipeline Runner Module
 *
 * Provides the orchestration layer that drives the pipeline stages for a
 * single book or a whole input directory.
 */

export {
  type Progress,
  type ProgressEvent,
  type BookStepName,
  type BookStatus,
  type BookOutcome,
  type LibraryStats,
  type RunnerDeps,
  nullProgress,
  createConsoleProgress,
  formatStepName,
} from "./types";

// Book-level runners
export {
  runBook,
  runExtract,
  runUpscale,
  runReconcile,
  createProject,
  outputPathFor,
  type UpscaleResult,
} from "./book-runner";

// Directory-level runner
export { runLibrary, checkProcessedFiles, type ProcessedStatus } from "./library-runner";

/**
 * Dynamic CLI Progress Display
 *
 * Shows parallel batch progress with animated spinners and progress bars.
 */

import type { Progress, ProgressEvent } from "../pipeline/runner/types";
import { formatStepName } from "../pipeline/runner/types";

// ANSI escape codes
const ESC = "\x1b";
const CLEAR_LINE = `${ESC}[2K`;
const MOVE_UP = (n: number) => `${ESC}[${n}A`;
const HIDE_CURSOR = `${ESC}[?25l`;
const SHOW_CURSOR = `${ESC}[?25h`;
const DIM = `${ESC}[2m`;
const RESET = `${ESC}[0m`;
const GREEN = `${ESC}[32m`;
const YELLOW = `${ESC}[33m`;
const RED = `${ESC}[31m`;
const CYAN = `${ESC}[36m`;
const BOLD = `${ESC}[1m`;

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
const BAR_WIDTH = 30;

// ============================================================================
// Parallel Progress Display
// ============================================================================

export type TaskStatus = "pending" | "running" | "completed" | "failed";

export interface TaskState {
  id: string;
  label: string;
  status: TaskStatus;
  step?: string;
  startTime?: number;
}

export interface ParallelProgressOptions {
  /** Header text, e.g. "Upscaling" */
  title?: string;
  /** What a task is, for the summary line */
  unit?: string;
  stream?: NodeJS.WriteStream;
}

/**
 * Dynamic progress display for parallel task execution.
 */
export class ParallelProgress {
  private tasks = new Map<string, TaskState>();
  private completedCount = 0;
  private failedCount = 0;
  private totalCount = 0;
  private frame = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private renderedLines = 0;
  private stream: NodeJS.WriteStream;
  private title: string;
  private unit: string;
  private detail = "";
  private startTime = Date.now();
  private maxVisibleTasks = 16;

  constructor(options: ParallelProgressOptions = {}) {
    this.stream = options.stream ?? process.stderr;
    this.title = options.title ?? "Processing";
    this.unit = options.unit ?? "tasks";
  }

  /**
   * Start the progress display.
   */
  start(totalCount: number): void {
    this.totalCount = totalCount;
    this.startTime = Date.now();
    this.stream.write(HIDE_CURSOR);
    this.timer = setInterval(() => {
      this.frame++;
      this.render();
    }, 80);
    this.render();
  }

  /**
   * Stop the progress display.
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.clearDisplay();
    this.stream.write(SHOW_CURSOR);
    this.renderSummary();
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** Free-form text shown under the header, e.g. an output count */
  setDetail(detail: string): void {
    this.detail = detail;
  }

  /**
   * Update a task's state.
   */
  updateTask(id: string, update: Partial<TaskState>): void {
    const existing: TaskState = this.tasks.get(id) ?? {
      id,
      label: id,
      status: "pending",
    };

    const newState = { ...existing, ...update };

    // Track completion/failure
    if (existing.status !== "completed" && newState.status === "completed") {
      this.completedCount++;
    }
    if (existing.status !== "failed" && newState.status === "failed") {
      this.failedCount++;
    }
    if (newState.status === "running" && !existing.startTime) {
      newState.startTime = Date.now();
    }

    this.tasks.set(id, newState);
  }

  /**
   * Get current statistics.
   */
  getStats(): { completed: number; failed: number; running: number; pending: number } {
    let running = 0;
    for (const task of this.tasks.values()) {
      if (task.status === "running") running++;
    }
    return {
      completed: this.completedCount,
      failed: this.failedCount,
      running,
      pending: this.totalCount - this.tasks.size,
    };
  }

  private clearDisplay(): void {
    if (this.renderedLines > 0) {
      this.stream.write(MOVE_UP(this.renderedLines));
      for (let i = 0; i < this.renderedLines; i++) {
        this.stream.write(CLEAR_LINE + "\n");
      }
      this.stream.write(MOVE_UP(this.renderedLines));
    }
  }

  private render(): void {
    this.clearDisplay();

    const lines: string[] = [];
    const spinner = SPINNER_FRAMES[this.frame % SPINNER_FRAMES.length];
    const elapsed = formatDuration(Date.now() - this.startTime);
    const stats = this.getStats();

    // Header with overall progress
    const progress = this.completedCount + this.failedCount;
    const pct = this.totalCount > 0 ? Math.round((progress / this.totalCount) * 100) : 0;
    const filled = Math.round((progress / Math.max(this.totalCount, 1)) * BAR_WIDTH);
    const bar = `${GREEN}${"█".repeat(filled)}${RESET}${DIM}${"░".repeat(BAR_WIDTH - filled)}${RESET}`;

    lines.push("");
    lines.push(
      `${BOLD}${CYAN}${spinner}${RESET} ${this.title}  ${bar}  ${BOLD}${progress}${RESET}/${this.totalCount}  ${DIM}${pct}%${RESET}  ${DIM}${elapsed}${RESET}`
    );
    if (this.detail) lines.push(`  ${DIM}${this.detail}${RESET}`);
    lines.push("");

    // Running tasks
    const running = [...this.tasks.values()]
      .filter((t) => t.status === "running")
      .slice(0, this.maxVisibleTasks);

    running.forEach((task, i) => {
      const taskSpinner = SPINNER_FRAMES[(this.frame + i) % SPINNER_FRAMES.length];
      const taskElapsed = task.startTime ? formatDuration(Date.now() - task.startTime) : "";
      const step = task.step ? `${DIM}${task.step}${RESET}` : "";
      lines.push(
        `  ${YELLOW}${taskSpinner}${RESET} ${task.label}  ${step}  ${DIM}${taskElapsed}${RESET}`
      );
    });

    // Stats footer
    lines.push("");
    lines.push(
      `  ${DIM}Running: ${RESET}${stats.running}${DIM}  |  Pending: ${RESET}${stats.pending}${DIM}  |  Completed: ${RESET}${GREEN}${stats.completed}${RESET}${this.failedCount > 0 ? `${DIM}  |  Failed: ${RESET}${RED}${this.failedCount}${RESET}` : ""}${RESET}`
    );
    lines.push("");

    this.stream.write(lines.join("\n"));
    this.renderedLines = lines.length;
  }

  private renderSummary(): void {
    const elapsed = formatDuration(Date.now() - this.startTime);
    const success = this.completedCount;
    const failed = this.failedCount;

    this.stream.write("\n");
    if (failed === 0) {
      this.stream.write(
        `${GREEN}✔${RESET} ${BOLD}Completed${RESET} ${success} ${this.unit} in ${elapsed}\n`
      );
    } else {
      this.stream.write(
        `${YELLOW}⚠${RESET} ${BOLD}Completed${RESET} ${success} ${this.unit}, ${RED}${failed} failed${RESET} in ${elapsed}\n`
      );
    }
    this.stream.write("\n");
  }
}

// ============================================================================
// Pipeline progress renderer
// ============================================================================

/**
 * Progress emitter that prints stage lines and switches to the live batch
 * display while the upscaler runs.
 */
export function createCliProgress(stream: NodeJS.WriteStream = process.stderr): Progress {
  let display: ParallelProgress | null = null;

  const line = (text: string) => {
    if (!display?.running) stream.write(`${text}\n`);
  };

  return {
    emit(event: ProgressEvent) {
      switch (event.type) {
        case "book-start":
          line(`\n${BOLD}${event.book}${RESET}`);
          break;
        case "book-complete": {
          const colour =
            event.status === "success" ? GREEN : event.status === "partial" ? YELLOW : RED;
          line(`${colour}${event.status}${RESET} ${event.book}`);
          break;
        }
        case "step-start":
          line(`${DIM}${formatStepName(event.step)}...${RESET}`);
          break;
        case "step-progress":
          if (display?.running && event.current !== undefined && event.total !== undefined) {
            display.setDetail(`${event.current}/${event.total} images written`);
          }
          break;
        case "step-complete":
          if (event.step === "upscale" && display?.running) {
            display.stop();
            display = null;
          }
          break;
        case "step-error":
          if (display?.running) {
            display.stop();
            display = null;
          }
          line(`${RED}✗${RESET} ${formatStepName(event.step)}: ${event.error}`);
          break;
        case "batches-planned":
          display = new ParallelProgress({ title: "Upscaling", unit: "batches", stream });
          display.start(event.batches);
          break;
        case "batch-start":
          display?.updateTask(`batch_${event.batchIndex}`, {
            label: `batch ${event.batchIndex}`,
            step: `${event.pages} pages`,
            status: "running",
          });
          break;
        case "batch-complete":
          display?.updateTask(`batch_${event.batchIndex}`, {
            status: event.success ? "completed" : "failed",
          });
          break;
      }
    },
  };
}

// ============================================================================
// Helpers
// ============================================================================

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  const secs = seconds % 60;
  if (minutes < 60) return `${minutes}m ${secs}s`;
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return `${hours}h ${mins}m`;
}

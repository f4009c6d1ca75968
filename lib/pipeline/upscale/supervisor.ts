import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import fs from "node:fs";
import path from "node:path";
import type { Readable } from "node:stream";
import { UpscalerNotFoundError, errorMessage } from "../../errors";
import { nullLogger, type Logger } from "../../logger";
import { runParallel } from "../parallel";
import type { Batch, BatchResult } from "../types";
import { writeJobFile, type JobSettings } from "./job-file";

/** The slice of a child process the supervisor relies on */
export interface LaunchedProcess extends EventEmitter {
  stdout: Readable | null;
  stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type Launcher = (command: string, args: string[]) => LaunchedProcess;

export const spawnLauncher: Launcher = (command, args) =>
  spawn(command, args, { stdio: ["ignore", "pipe", "pipe"], windowsHide: true });

const STDERR_TAIL_CHARS = 4000;
const KILL_GRACE_MS = 5000;

function isExecutableFile(candidate: string): boolean {
  try {
    if (!fs.statSync(candidate).isFile()) return false;
    if (process.platform !== "win32") fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locate the upscaler before any batch starts. Paths are checked directly;
 * bare command names are searched on PATH. Returns the resolved path.
 */
export function assertUpscalerAvailable(binary: string, env = process.env): string {
  if (binary.includes("/") || binary.includes("\\")) {
    if (!fs.existsSync(binary)) {
      throw new UpscalerNotFoundError(binary, "file does not exist");
    }
    if (!isExecutableFile(binary)) {
      throw new UpscalerNotFoundError(binary, "not an executable file");
    }
    return binary;
  }

  const extensions =
    process.platform === "win32" ? (env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";") : [""];
  for (const dir of (env.PATH ?? "").split(path.delimiter).filter(Boolean)) {
    for (const ext of extensions) {
      const candidate = path.join(dir, binary + ext);
      if (isExecutableFile(candidate)) return candidate;
    }
  }
  throw new UpscalerNotFoundError(binary, "not found on PATH");
}

export function expandArgs(template: readonly string[], jobFile: string): string[] {
  return template.map((arg) => arg.replaceAll("{job}", jobFile));
}

export interface RunBatchOptions extends JobSettings {
  binary: string;
  /** Argument template; `{job}` is replaced with the job file path */
  args: readonly string[];
  /** Wall-clock limit per batch; 0 disables it */
  timeoutMs: number;
  launcher?: Launcher;
  logger?: Logger;
}

/**
 * Run the upscaler once for a batch and wait for it to exit.
 *
 * Never rejects on tool failure: a non-zero exit, a signal, a launch error
 * or a timeout all resolve to a `BatchResult` with `success: false`.
 */
export async function runBatch(batch: Batch, options: RunBatchOptions): Promise<BatchResult> {
  const logger = (options.logger ?? nullLogger).child({ batch: batch.index });
  const launcher = options.launcher ?? spawnLauncher;
  const started = Date.now();

  const failure = (error: string): BatchResult => ({
    batchIndex: batch.index,
    success: false,
    exitCode: null,
    signal: null,
    timedOut: false,
    stderr: "",
    durationMs: Date.now() - started,
    error,
  });

  let child: LaunchedProcess;
  try {
    const jobFile = writeJobFile(batch, options);
    const args = expandArgs(options.args, jobFile);
    logger.debug("Launching upscaler", { binary: options.binary, args, pages: batch.records.length });
    child = launcher(options.binary, args);
  } catch (error) {
    return failure(`launch failed: ${errorMessage(error)}`);
  }

  return new Promise<BatchResult>((resolve) => {
    let stderr = "";
    let timedOut = false;
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;
    let killTimer: ReturnType<typeof setTimeout> | undefined;

    const finish = (result: Omit<BatchResult, "batchIndex" | "durationMs" | "stderr">) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      clearTimeout(killTimer);
      resolve({
        batchIndex: batch.index,
        durationMs: Date.now() - started,
        stderr,
        ...result,
      });
    };

    child.stdout?.on("data", (chunk: Buffer) => {
      const text = chunk.toString().trim();
      if (text) logger.debug(text);
    });
    child.stderr?.on("data", (chunk: Buffer) => {
      stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL_CHARS);
    });

    child.on("error", (error: Error) => {
      finish({
        success: false,
        exitCode: null,
        signal: null,
        timedOut,
        error: `launch failed: ${error.message}`,
      });
    });

    child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
      const success = code === 0 && !timedOut;
      finish({
        success,
        exitCode: code,
        signal,
        timedOut,
        outputsDir: success ? batch.workspace.outputsDir : undefined,
        error: timedOut
          ? `timed out after ${options.timeoutMs} ms`
          : success
            ? undefined
            : `exited with ${signal ? `signal ${signal}` : `code ${code}`}`,
      });
    });

    if (options.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        logger.warn("Upscaler timed out, terminating", { timeoutMs: options.timeoutMs });
        child.kill("SIGTERM");
        killTimer = setTimeout(() => child.kill("SIGKILL"), KILL_GRACE_MS);
        killTimer.unref();
      }, options.timeoutMs);
    }
  });
}

export interface RunBatchesOptions extends RunBatchOptions {
  concurrency: number;
  onBatchStart?: (batch: Batch) => void;
  onBatchComplete?: (result: BatchResult) => void;
}

/**
 * Run every batch with at most `concurrency` upscaler processes alive at
 * once. Results come back ordered by batch index. Failed batches are not
 * retried.
 */
export async function runBatches(
  batches: readonly Batch[],
  options: RunBatchesOptions
): Promise<BatchResult[]> {
  const logger = options.logger ?? nullLogger;
  const results = new Map<number, BatchResult>();

  const { errors } = await runParallel(
    batches,
    (batch) => `batch_${batch.index}`,
    async (batch) => {
      options.onBatchStart?.(batch);
      const result = await runBatch(batch, options);
      results.set(batch.index, result);
      if (!result.success) {
        logger.warn("Batch failed", {
          batch: batch.index,
          exitCode: result.exitCode,
          error: result.error,
          stderr: result.stderr,
        });
      }
      options.onBatchComplete?.(result);
    },
    { concurrency: options.concurrency }
  );
  for (const { id, error } of errors) {
    logger.error("Batch supervision failed", { task: id, error: error.message });
  }

  return batches.flatMap((batch) => {
    const result = results.get(batch.index);
    return result ? [result] : [];
  });
}

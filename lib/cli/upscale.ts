#!/usr/bin/env tsx
/**
 * Upscale CLI
 *
 * Upscale the page images of EPUB and PDF books and write them out as EPUB.
 *
 * Usage:
 *   inkscale run                 Process every pending book in the input directory
 *   inkscale book <file>         Process a single book
 *   inkscale status              List processed and pending books
 */

import path from "node:path";
import { getOutputDir, loadConfig, type AppConfig } from "../config";
import { ConfigurationError, InkscaleError, errorMessage } from "../errors";
import { createLogger } from "../logger";
import {
  checkProcessedFiles,
  createConsoleProgress,
  runBook,
  runLibrary,
  type BookOutcome,
  type Progress,
} from "../pipeline/runner";
import { flagOverrides, parseFlags } from "./args";
import { createCliProgress, formatDuration } from "./progress";

const USAGE = `Usage: inkscale <command> [args] [options]

Commands:
  run                   Process every pending book in the input directory
  book <file>           Process a single EPUB or PDF
  status                List processed and pending books

Options:
  --config <path>       Configuration file (default: $INKSCALE_CONFIG or ./config.yaml)
  --input <dir>         Input directory (overrides directories.input)
  --output <dir>        Output directory for the book command
  --concurrency <n>     Parallel upscaler processes (overrides upscale.num_processes)
  --keep-workspace      Keep each book's project directory
  --log-level <level>   debug | info | warn | error
  --json-logs           Write logs as JSON lines`;

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_CONFIG = 2;

// The live display needs cursor control; piped output gets plain lines
function progressFor(stream: NodeJS.WriteStream): Progress {
  return stream.isTTY ? createCliProgress(stream) : createConsoleProgress();
}

function printOutcome(outcome: BookOutcome): void {
  const took = formatDuration(outcome.durationMs);
  switch (outcome.status) {
    case "success":
      console.log(`✔ ${outcome.book}: ${outcome.pages} pages in ${took} → ${outcome.outputPath}`);
      break;
    case "partial":
      console.log(
        `⚠ ${outcome.book}: ${outcome.pages} pages, ${outcome.gaps.length} kept at original resolution` +
          (outcome.failedBatches.length > 0
            ? ` (failed batches: ${outcome.failedBatches.join(", ")})`
            : "") +
          ` → ${outcome.outputPath}`
      );
      for (const gap of outcome.gaps) {
        console.log(
          `    page ${gap.pageNumber} (${gap.stagedName})` +
            (gap.batchIndex !== undefined ? ` batch ${gap.batchIndex}` : "") +
            `: ${gap.reason}`
        );
      }
      break;
    case "failed":
      console.log(`✗ ${outcome.book}: ${outcome.error}`);
      break;
  }
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    console.log(USAGE);
    return EXIT_OK;
  }

  const flags = parseFlags(args.slice(1));
  const config: AppConfig = loadConfig(flags.config, flagOverrides(flags));
  const logger = createLogger(config.log);

  switch (command) {
    case "run": {
      const stats = await runLibrary({ config, logger, progress: progressFor(process.stderr) });
      console.log();
      for (const outcome of stats.outcomes) printOutcome(outcome);
      console.log(
        `\n${stats.total} books: ${stats.skipped} already done, ${stats.succeeded} succeeded, ` +
          `${stats.partial} partial, ${stats.failed} failed in ${formatDuration(stats.durationMs)}`
      );
      return stats.failed > 0 ? EXIT_FAILURE : EXIT_OK;
    }

    case "book": {
      const [file] = flags.positional;
      if (!file) {
        console.error("Usage: inkscale book <file> [--output <dir>]");
        return EXIT_FAILURE;
      }
      const outputDir = path.resolve(flags.output ?? getOutputDir(config));
      const outcome = await runBook(path.resolve(file), outputDir, {
        config,
        logger,
        progress: progressFor(process.stderr),
      });
      console.log();
      printOutcome(outcome);
      return outcome.status === "failed" ? EXIT_FAILURE : EXIT_OK;
    }

    case "status": {
      const outputDir = getOutputDir(config);
      const { processed, pending } = checkProcessedFiles(config.directories.input, outputDir);
      console.log(`Input:  ${config.directories.input}`);
      console.log(`Output: ${outputDir}\n`);
      for (const file of processed) console.log(`  done     ${path.basename(file)}`);
      for (const file of pending) console.log(`  pending  ${path.basename(file)}`);
      console.log(`\n${processed.length} done, ${pending.length} pending`);
      return EXIT_OK;
    }

    default:
      console.error(`Unknown command: ${command}\n`);
      console.log(USAGE);
      return EXIT_FAILURE;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof ConfigurationError) {
      console.error(`\nConfiguration error: ${err.message}`);
      const issues = err.details?.issues;
      if (Array.isArray(issues)) {
        for (const issue of issues) console.error(`  ${JSON.stringify(issue)}`);
      } else if (err.details?.reason) {
        console.error(`  ${String(err.details.reason)}`);
      }
      process.exitCode = EXIT_CONFIG;
      return;
    }
    console.error(
      `\nUpscale failed: ${errorMessage(err)}` + (err instanceof InkscaleError ? ` [${err.code}]` : "")
    );
    process.exitCode = EXIT_FAILURE;
  });

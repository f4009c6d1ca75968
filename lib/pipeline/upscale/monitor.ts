import fs from "node:fs";
import { Observable } from "rxjs";

export interface OutputProgress {
  /** Distinct output files seen so far */
  current: number;
  total: number;
  /** Files first seen by this poll */
  added: number;
}

export interface MonitorOptions {
  directories: readonly string[];
  expectedTotal: number;
  /** Emits (or completes) once every batch process has exited */
  done$: Observable<unknown>;
  intervalMs?: number;
  graceMs?: number;
}

function listFiles(dir: string): string[] {
  try {
    return fs
      .readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name);
  } catch {
    // not created yet
    return [];
  }
}

/**
 * Watch the batch output directories and report how many upscaled files
 * have appeared. Emits only when the count grows.
 *
 * Completes once `expectedTotal` files are present, or `graceMs` after
 * `done$` fires, whichever comes first; a last poll runs at the end of the
 * grace period. The count is informational and never drives control flow.
 */
export function monitorOutputs(options: MonitorOptions): Observable<OutputProgress> {
  const { directories, expectedTotal, intervalMs = 500, graceMs = 2000 } = options;

  return new Observable<OutputProgress>((subscriber) => {
    const seen = new Set<string>();
    let graceTimer: ReturnType<typeof setTimeout> | undefined;

    const poll = () => {
      let added = 0;
      for (const dir of directories) {
        for (const name of listFiles(dir)) {
          if (!seen.has(name)) {
            seen.add(name);
            added++;
          }
        }
      }
      if (added > 0) {
        subscriber.next({ current: seen.size, total: expectedTotal, added });
      }
      if (seen.size >= expectedTotal) {
        subscriber.complete();
      }
    };

    const startGrace = () => {
      if (graceTimer !== undefined) return;
      graceTimer = setTimeout(() => {
        poll();
        subscriber.complete();
      }, graceMs);
    };

    const timer = setInterval(poll, intervalMs);
    const doneSubscription = options.done$.subscribe({
      next: startGrace,
      complete: startGrace,
    });
    poll();

    return () => {
      clearInterval(timer);
      clearTimeout(graceTimer);
      doneSubscription.unsubscribe();
    };
  });
}

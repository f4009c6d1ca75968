import path from "node:path";

export interface ParsedFlags {
  positional: string[];
  config?: string;
  input?: string;
  output?: string;
  concurrency?: number;
  keepWorkspace: boolean;
  logLevel?: string;
  jsonLogs: boolean;
}

export function parseFlags(args: string[]): ParsedFlags {
  const flags: ParsedFlags = { positional: [], keepWorkspace: false, jsonLogs: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if (arg === "--config" && next) {
      flags.config = next;
      i++;
    } else if (arg === "--input" && next) {
      flags.input = next;
      i++;
    } else if (arg === "--output" && next) {
      flags.output = next;
      i++;
    } else if (arg === "--concurrency" && next) {
      flags.concurrency = parseInt(next, 10);
      i++;
    } else if (arg === "--log-level" && next) {
      flags.logLevel = next;
      i++;
    } else if (arg === "--keep-workspace") {
      flags.keepWorkspace = true;
    } else if (arg === "--json-logs") {
      flags.jsonLogs = true;
    } else if (!arg.startsWith("-")) {
      flags.positional.push(arg);
    }
  }

  return flags;
}

/**
 * Config overrides named by command-line flags. Paths resolve against the
 * working directory. Values are left to schema validation, so
 * `--concurrency abc` surfaces as a configuration error.
 */
export function flagOverrides(flags: ParsedFlags): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (flags.input !== undefined) {
    overrides.directories = { input: path.resolve(flags.input) };
  }
  if (flags.concurrency !== undefined) {
    overrides.upscale = { num_processes: flags.concurrency };
  }
  if (flags.keepWorkspace) {
    overrides.keep_workspace = true;
  }
  const log: Record<string, unknown> = {};
  if (flags.logLevel !== undefined) log.level = flags.logLevel;
  if (flags.jsonLogs) log.structured = true;
  if (Object.keys(log).length > 0) overrides.log = log;
  return overrides;
}

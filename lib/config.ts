import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";
import { ConfigurationError } from "./errors";

export const OUTPUT_FORMATS = ["JPEG", "PNG", "WEBP"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

const configSchema = z.object({
  temp_dir: z.string().min(1),
  keep_workspace: z.boolean().default(false),
  directories: z.object({
    input: z.string().min(1),
    output_suffix: z.string().min(1).default("_upscale"),
  }),
  upscaler: z.object({
    binary: z.string().min(1),
    args: z
      .array(z.string())
      .refine((args) => args.some((a) => a.includes("{job}")), {
        message: "args must reference the job file with {job}",
      })
      .default(["--YAML", "{job}", "--NOTOPENFOLDER"]),
    device: z.string().default("auto"),
    timeout_ms: z.number().int().min(0).default(0),
  }),
  upscale: z.object({
    model_name: z.string().min(1),
    scale: z.number().int().min(1),
    target_long_edge: z.number().int().min(1).default(1872),
    num_processes: z.number().int().min(1).optional(),
    output_format: z
      .string()
      .transform((s) => s.toUpperCase())
      .pipe(z.enum(OUTPUT_FORMATS))
      .default("JPEG"),
    output_quality: z.number().int().min(1).max(100).default(95),
  }),
  extract: z
    .object({
      min_image_size: z
        .tuple([z.number().int().min(0), z.number().int().min(0)])
        .default([100, 100]),
      pdf_scale: z.number().positive().default(1),
    })
    .default({ min_image_size: [100, 100], pdf_scale: 1 }),
  epub: z
    .object({
      resize_to_original: z.boolean().default(false),
      create_new: z.boolean().default(false),
      create_eink: z.boolean().default(false),
    })
    .default({ resize_to_original: false, create_new: false, create_eink: false }),
  log: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).default("info"),
      structured: z.boolean().default(false),
    })
    .default({ level: "info", structured: false }),
});

export type AppConfig = z.infer<typeof configSchema>;
export type UpscaleConfig = AppConfig["upscale"];
export type UpscalerConfig = AppConfig["upscaler"];
export type EpubConfig = AppConfig["epub"];
export type LogConfig = AppConfig["log"];

/**
 * Deep-merge two plain objects. Plain objects recurse;
 * arrays and primitives: override wins.
 */
export function deepMerge(
  base: Record<string, unknown>,
  overrides: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const key of Object.keys(overrides)) {
    const baseVal = result[key];
    const overVal = overrides[key];
    if (isPlainObject(baseVal) && isPlainObject(overVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else if (overVal !== undefined) {
      result[key] = overVal;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function resolveConfigPath(configPath?: string): string {
  return path.resolve(
    configPath ?? process.env.INKSCALE_CONFIG ?? path.join(process.cwd(), "config.yaml")
  );
}

/**
 * Validate a raw settings object. Relative directories are resolved against
 * `baseDir` (the directory holding the config file).
 */
export function parseConfig(raw: unknown, baseDir = process.cwd()): AppConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError("Invalid configuration", {
      issues: parsed.error.issues.map((i) => ({
        path: i.path.map(String).join("."),
        message: i.message,
      })),
    });
  }
  const cfg = parsed.data;
  return {
    ...cfg,
    temp_dir: path.resolve(baseDir, cfg.temp_dir),
    directories: {
      ...cfg.directories,
      input: path.resolve(baseDir, cfg.directories.input),
    },
    upscaler: {
      ...cfg.upscaler,
      binary: resolveBinary(cfg.upscaler.binary, baseDir),
    },
  };
}

// Bare command names stay as-is so they can be looked up on PATH
function resolveBinary(binary: string, baseDir: string): string {
  if (!binary.includes("/") && !binary.includes("\\")) return binary;
  return path.resolve(baseDir, binary);
}

export function loadConfig(
  configPath?: string,
  overrides: Record<string, unknown> = {}
): AppConfig {
  const resolved = resolveConfigPath(configPath);
  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(resolved, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot read configuration file ${resolved}`, {
      path: resolved,
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  if (!isPlainObject(raw)) {
    throw new ConfigurationError(`Configuration file ${resolved} is not a mapping`, {
      path: resolved,
    });
  }
  return parseConfig(deepMerge(raw, overrides), path.dirname(resolved));
}

export function getConcurrency(cfg: AppConfig): number {
  return cfg.upscale.num_processes ?? os.availableParallelism();
}

export function getOutputDir(cfg: AppConfig): string {
  return cfg.directories.input + cfg.directories.output_suffix;
}

export function getMinImageSize(cfg: AppConfig): { width: number; height: number } {
  const [width, height] = cfg.extract.min_image_size;
  return { width, height };
}

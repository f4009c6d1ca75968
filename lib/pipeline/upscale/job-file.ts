import fs from "node:fs";
import yaml from "js-yaml";
import { batchInputPaths } from "../batch/planner";
import type { Batch } from "../types";

/** Settings that are the same for every batch of a run */
export interface JobSettings {
  device: string;
  modelName: string;
  scale: number;
}

/** Key names are the upscaler's own */
export interface JobDocument {
  device: string;
  input_path: string[];
  output_path: string;
  pretrained_model_name: string;
  target_scale: number;
}

/**
 * `output_path` is the batch directory: the upscaler writes its results
 * into an `outputs/` folder it creates there, which is `workspace.outputsDir`.
 */
export function buildJob(batch: Batch, settings: JobSettings): JobDocument {
  return {
    device: settings.device,
    input_path: batchInputPaths(batch),
    output_path: batch.workspace.dir,
    pretrained_model_name: settings.modelName,
    target_scale: settings.scale,
  };
}

export function writeJobFile(batch: Batch, settings: JobSettings): string {
  const job = buildJob(batch, settings);
  fs.writeFileSync(batch.workspace.jobFile, yaml.dump(job, { lineWidth: -1 }));
  return batch.workspace.jobFile;
}

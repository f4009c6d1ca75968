/**
 * Fixtures shared by the pipeline tests: generated images, EPUBs built in
 * memory, a config value and a fake upscaler process.
 */
import { EventEmitter } from "node:events";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { PassThrough } from "node:stream";
import yaml from "js-yaml";
import JSZip from "jszip";
import sharp from "sharp";
import { parseConfig, type AppConfig } from "../../config";
import type { LaunchedProcess, Launcher } from "../upscale/supervisor";

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

export async function makeImage(
  width: number,
  height: number,
  format: "png" | "jpeg" = "png",
  color = { r: 200, g: 60, b: 60 }
): Promise<Buffer> {
  const image = sharp({ create: { width, height, channels: 3, background: color } });
  return format === "png" ? image.png().toBuffer() : image.jpeg().toBuffer();
}

export interface EpubImage {
  id: string;
  href: string;
  bytes: Buffer;
  mediaType?: string;
  properties?: string;
}

export interface EpubDocument {
  id: string;
  href: string;
  body: string;
}

export interface EpubFixture {
  images: EpubImage[];
  documents: EpubDocument[];
  /** Document ids in reading order; defaults to all documents */
  spine?: string[];
  /** Extra XML placed inside <metadata> */
  metadataXml?: string;
  version?: string;
}

export function xhtml(body: string): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:xlink="http://www.w3.org/1999/xlink">
<head><title>t</title></head>
<body>${body}</body>
</html>`;
}

/** Build an EPUB with its package at OEBPS/content.opf. */
export async function buildEpub(fixture: EpubFixture): Promise<Buffer> {
  const zip = new JSZip();
  zip.file("mimetype", "application/epub+zip", { compression: "STORE" });
  zip.file(
    "META-INF/container.xml",
    `<?xml version="1.0"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles><rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/></rootfiles>
</container>`
  );

  const items = [
    ...fixture.images.map(
      (img) =>
        `<item id="${img.id}" href="${img.href}" media-type="${img.mediaType ?? "image/png"}"${
          img.properties ? ` properties="${img.properties}"` : ""
        }/>`
    ),
    ...fixture.documents.map(
      (doc) => `<item id="${doc.id}" href="${doc.href}" media-type="application/xhtml+xml"/>`
    ),
  ];
  const spine = (fixture.spine ?? fixture.documents.map((d) => d.id))
    .map((id) => `<itemref idref="${id}"/>`)
    .join("");

  zip.file(
    "OEBPS/content.opf",
    `<?xml version="1.0" encoding="utf-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="${fixture.version ?? "3.0"}" unique-identifier="uid">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:identifier id="uid">urn:uuid:00000000-0000-0000-0000-000000000001</dc:identifier>
    <dc:title>Test Book</dc:title>
    <dc:language>en</dc:language>
    <meta property="dcterms:modified">2020-01-01T00:00:00Z</meta>${fixture.metadataXml ?? ""}
  </metadata>
  <manifest>${items.join("")}</manifest>
  <spine>${spine}</spine>
</package>`
  );

  for (const img of fixture.images) zip.file(`OEBPS/${img.href}`, img.bytes);
  for (const doc of fixture.documents) zip.file(`OEBPS/${doc.href}`, xhtml(doc.body));

  return zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
}

const LOCAL_HEADER = Buffer.from([0x50, 0x4b, 0x03, 0x04]);

/**
 * Copy of a zip archive with the compressed data of one entry overwritten,
 * so that inflating it fails. Sizes and names are left intact.
 */
export function corruptEntry(archive: Buffer, name: string): Buffer {
  const out = Buffer.from(archive);
  const wanted = Buffer.from(name, "utf-8");
  for (let at = out.indexOf(LOCAL_HEADER); at !== -1; at = out.indexOf(LOCAL_HEADER, at + 4)) {
    const nameLength = out.readUInt16LE(at + 26);
    const extraLength = out.readUInt16LE(at + 28);
    if (!out.subarray(at + 30, at + 30 + nameLength).equals(wanted)) continue;
    const start = at + 30 + nameLength + extraLength;
    out.fill(0xff, start, start + out.readUInt32LE(at + 18));
    return out;
  }
  throw new Error(`no entry named ${name}`);
}

export function testConfig(root: string, overrides: Record<string, unknown> = {}): AppConfig {
  return parseConfig(
    {
      temp_dir: path.join(root, "projects"),
      directories: { input: path.join(root, "books") },
      upscaler: { binary: path.join(root, "bin", "upscaler") },
      upscale: { model_name: "test-model", scale: 2, num_processes: 2 },
      ...overrides,
    },
    root
  );
}

/** Create an executable placeholder so the binary precondition passes. */
export function installFakeBinary(config: AppConfig): void {
  fs.mkdirSync(path.dirname(config.upscaler.binary), { recursive: true });
  fs.writeFileSync(config.upscaler.binary, "#!/bin/sh\nexit 0\n", { mode: 0o755 });
}

export class FakeProcess extends EventEmitter implements LaunchedProcess {
  stdout = new PassThrough();
  stderr = new PassThrough();
  killedWith: NodeJS.Signals | number | undefined;

  kill(signal?: NodeJS.Signals | number): boolean {
    this.killedWith = signal;
    setImmediate(() => this.emit("close", null, typeof signal === "string" ? signal : "SIGTERM"));
    return true;
  }

  exit(code: number, stderr = ""): void {
    if (stderr) this.stderr.write(stderr);
    setImmediate(() => this.emit("close", code, null));
  }
}

export interface JobView {
  input_path: string[];
  output_path: string;
}

function isJobView(value: unknown): value is JobView {
  return (
    typeof value === "object" &&
    value !== null &&
    "input_path" in value &&
    Array.isArray(value.input_path) &&
    "output_path" in value &&
    typeof value.output_path === "string"
  );
}

export function readJob(args: string[]): JobView {
  const job = yaml.load(fs.readFileSync(args[1], "utf-8"));
  if (!isJobView(job)) throw new Error("unexpected job document");
  return job;
}

/**
 * Launcher that behaves like the upscaler: every input is written to an
 * `outputs/` folder under the job's `output_path` as `2x-<name>.png`,
 * doubled in size. Batches listed in `failBatches` (by the `batch_<i>`
 * directory name) exit with 1 without writing anything.
 */
export function upscalingLauncher(options: { failBatches?: number[] } = {}): Launcher & {
  calls: string[][];
} {
  const calls: string[][] = [];
  const launcher = (_command: string, args: string[]) => {
    calls.push(args);
    const child = new FakeProcess();
    const job = readJob(args);
    const failing = (options.failBatches ?? []).some(
      (i) => path.basename(job.output_path) === `batch_${i}`
    );
    if (failing) {
      child.exit(1, "CUDA out of memory\n");
      return child;
    }
    const outputsDir = path.join(job.output_path, "outputs");
    fs.mkdirSync(outputsDir, { recursive: true });
    void Promise.all(
      job.input_path.map(async (input) => {
        const { width = 1, height = 1 } = await sharp(input).metadata();
        const stem = path.basename(input, path.extname(input));
        await sharp(input)
          .resize(width * 2, height * 2)
          .png()
          .toFile(path.join(outputsDir, `2x-${stem}.png`));
      })
    ).then(
      () => child.exit(0),
      (err: unknown) => child.exit(3, String(err))
    );
    return child;
  };
  return Object.assign(launcher, { calls });
}

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import fs from "node:fs";
import path from "node:path";
import JSZip from "jszip";
import sharp from "sharp";
import { AssemblyError } from "../../../errors";
import { buildEpub, corruptEntry, makeImage, makeTempDir } from "../../__tests__/helpers";
import type { PageRecord } from "../../types";
import { EPUB_MIMETYPE, patchEpub, refreshModified } from "../patch";

const MODIFIED = "2024-05-01T12:00:00Z";

describe("refreshModified", () => {
  it("replaces an existing EPUB 3 timestamp", () => {
    const opf = `<metadata><meta property="dcterms:modified">2020-01-01T00:00:00Z</meta></metadata>`;
    expect(refreshModified(opf, MODIFIED, "3.0")).toBe(
      `<metadata><meta property="dcterms:modified">${MODIFIED}</meta></metadata>`
    );
  });

  it("replaces an existing name/content timestamp", () => {
    const opf = `<metadata><meta name="dcterms:modified" content="old"/></metadata>`;
    expect(refreshModified(opf, MODIFIED, "2.0")).toBe(
      `<metadata><meta name="dcterms:modified" content="${MODIFIED}"/></metadata>`
    );
  });

  it("adds a timestamp in the package's own dialect", () => {
    const opf = `<package version="2.0"><metadata><dc:title>T</dc:title></metadata></package>`;
    expect(refreshModified(opf, MODIFIED, "2.0")).toBe(
      `<package version="2.0"><metadata><dc:title>T</dc:title>` +
        `  <meta name="dcterms:modified" content="${MODIFIED}"/>\n  </metadata></package>`
    );
    expect(refreshModified(`<metadata></metadata>`, MODIFIED, "3.0")).toBe(
      `<metadata>  <meta property="dcterms:modified">${MODIFIED}</meta>\n  </metadata>`
    );
  });
});

describe("patchEpub", () => {
  let dir: string;
  let original: Buffer;
  let p2: Buffer;
  let upscaledPath: string;

  beforeAll(async () => {
    dir = makeTempDir("patch");
    p2 = await makeImage(200, 300, "jpeg");
    original = await buildEpub({
      images: [
        { id: "p1", href: "images/p1.png", bytes: await makeImage(200, 300) },
        { id: "p2", href: "images/p2.jpg", bytes: p2, mediaType: "image/jpeg" },
      ],
      documents: [
        { id: "ch1", href: "ch1.xhtml", body: `<img src="images/p1.png"/><img src="images/p2.jpg"/>` },
      ],
    });
    upscaledPath = path.join(dir, "2x-page_0001.png");
    fs.writeFileSync(upscaledPath, await makeImage(400, 600, "png", { r: 10, g: 10, b: 10 }));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const records = (): PageRecord[] => [
    {
      pageNumber: 1,
      isCover: false,
      sourceLocator: { href: "OEBPS/images/p1.png", id: "p1", mediaType: "image/png" },
      stagedPath: path.join(dir, "page_0001.jpg"),
      width: 200,
      height: 300,
      outputPath: upscaledPath,
    },
    {
      pageNumber: 2,
      isCover: false,
      sourceLocator: { href: "OEBPS/images/p2.jpg", id: "p2", mediaType: "image/jpeg" },
      stagedPath: path.join(dir, "page_0002.jpg"),
      width: 200,
      height: 300,
    },
  ];

  it("swaps in upscaled images and keeps everything else", async () => {
    const { buffer, replaced } = await patchEpub({
      original,
      records: records(),
      policy: { resizeToOriginal: false, longEdgeCap: null },
      quality: 90,
      modified: MODIFIED,
    });

    expect(replaced).toBe(1);
    const before = await JSZip.loadAsync(original);
    const after = await JSZip.loadAsync(buffer);

    const p1 = await after.file("OEBPS/images/p1.png")?.async("nodebuffer");
    expect(p1?.equals(fs.readFileSync(upscaledPath))).toBe(true);

    const p2After = await after.file("OEBPS/images/p2.jpg")?.async("nodebuffer");
    expect(p2After?.equals(p2)).toBe(true);

    expect(await after.file("OEBPS/ch1.xhtml")?.async("string")).toBe(
      await before.file("OEBPS/ch1.xhtml")?.async("string")
    );
    expect(Object.keys(after.files).sort()).toEqual(Object.keys(before.files).sort());
  });

  it("fails with the entry name when an untouched entry cannot be read", async () => {
    const error = await patchEpub({
      original: corruptEntry(original, "OEBPS/ch1.xhtml"),
      records: records(),
      policy: { resizeToOriginal: false, longEdgeCap: null },
      quality: 90,
      modified: MODIFIED,
      book: "comic.epub",
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AssemblyError);
    expect(error).toMatchObject({
      book: "comic.epub",
      operation: "patch",
      details: { entry: "OEBPS/ch1.xhtml" },
    });
  });

  it("re-encodes to the entry's own format and refreshes the timestamp", async () => {
    const [page1, page2] = records();
    const { buffer } = await patchEpub({
      original,
      records: [page1, { ...page2, outputPath: upscaledPath }],
      policy: { resizeToOriginal: true, longEdgeCap: null },
      quality: 90,
      modified: MODIFIED,
    });

    const after = await JSZip.loadAsync(buffer);
    const jpeg = await after.file("OEBPS/images/p2.jpg")?.async("nodebuffer");
    const meta = await sharp(jpeg).metadata();
    expect(meta.format).toBe("jpeg");
    expect([meta.width, meta.height]).toEqual([200, 300]);

    const opf = await after.file("OEBPS/content.opf")?.async("string");
    expect(opf).toContain(`<meta property="dcterms:modified">${MODIFIED}</meta>`);
    expect(opf).not.toContain("2020-01-01T00:00:00Z");
  });

  it("stores mimetype first and uncompressed", async () => {
    const { buffer } = await patchEpub({
      original,
      records: records(),
      policy: { resizeToOriginal: false, longEdgeCap: null },
      quality: 90,
      modified: MODIFIED,
    });

    expect(buffer.readUInt32LE(0)).toBe(0x04034b50);
    expect(buffer.readUInt16LE(8)).toBe(0);
    expect(buffer.subarray(30, 38).toString()).toBe("mimetype");
    const after = await JSZip.loadAsync(buffer);
    expect(await after.file("mimetype")?.async("string")).toBe(EPUB_MIMETYPE);
  });
});

import { describe, it, expect, beforeAll } from "vitest";
import { buildEpub, corruptEntry, makeImage } from "../../__tests__/helpers";
import { enumerateEpub, loadEpubArchive, imageReferences, readingOrder } from "../epub";
import { parseContainer, parsePackage } from "../epub-package";
import type { EnumerationItem } from "../types";
import { ExtractionError } from "../../../errors";

const MIN = { minImageSize: { width: 100, height: 100 } };

async function collect(buffer: Buffer): Promise<EnumerationItem[]> {
  const items: EnumerationItem[] = [];
  for await (const item of enumerateEpub(await loadEpubArchive(buffer), MIN)) {
    items.push(item);
  }
  return items;
}

function hrefs(items: EnumerationItem[]): string[] {
  return items.map((i) => (i.ok ? i.value.locator.href : `!${i.error.locator.href}`));
}

describe("enumerateEpub", () => {
  let png300x400: Buffer;
  let png200x300: Buffer;
  let jpeg200x300: Buffer;
  let png50: Buffer;

  beforeAll(async () => {
    png300x400 = await makeImage(300, 400);
    png200x300 = await makeImage(200, 300);
    jpeg200x300 = await makeImage(200, 300, "jpeg");
    png50 = await makeImage(50, 50);
  });

  it("yields the cover first, then images in reading order, each resource once", async () => {
    const epub = await buildEpub({
      images: [
        { id: "unused", href: "images/unused.png", bytes: png200x300 },
        { id: "p2", href: "images/p2.jpg", bytes: jpeg200x300, mediaType: "image/jpeg" },
        { id: "p1", href: "images/p1.png", bytes: png200x300 },
        { id: "tiny", href: "images/tiny.png", bytes: png50 },
        { id: "cover-img", href: "images/front.png", bytes: png300x400, properties: "cover-image" },
      ],
      documents: [
        { id: "ch2", href: "text/ch2.xhtml", body: `<img src="../images/p2.jpg"/><img src="../images/tiny.png"/>` },
        {
          id: "ch1",
          href: "text/ch1.xhtml",
          body:
            `<img src="../images/front.png"/>` +
            `<svg><image width="10" height="10" xlink:href="../images/p1.png"/></svg>` +
            `<img src="../images/p1.png"/>`,
        },
      ],
      spine: ["ch1", "ch2"],
    });

    const items = await collect(epub);

    expect(hrefs(items)).toEqual([
      "OEBPS/images/front.png",
      "OEBPS/images/p1.png",
      "OEBPS/images/p2.jpg",
    ]);
    const first = items[0];
    expect(first.ok && first.value.coverHint).toBe(true);
    expect(items.slice(1).every((i) => i.ok && !i.value.coverHint)).toBe(true);
  });

  it("reports dimensions and media type of each image", async () => {
    const epub = await buildEpub({
      images: [{ id: "p2", href: "images/p2.jpg", bytes: jpeg200x300, mediaType: "image/jpeg" }],
      documents: [{ id: "ch1", href: "ch1.xhtml", body: `<img src="images/p2.jpg"/>` }],
    });

    const [item] = await collect(epub);

    expect(item.ok).toBe(true);
    if (!item.ok) return;
    expect(item.value.width).toBe(200);
    expect(item.value.height).toBe(300);
    expect(item.value.locator).toEqual({
      href: "OEBPS/images/p2.jpg",
      id: "p2",
      mediaType: "image/jpeg",
    });
    expect(item.value.bytes.equals(jpeg200x300)).toBe(true);
  });

  it("records undecodable images as failures and keeps going", async () => {
    const epub = await buildEpub({
      images: [
        { id: "bad", href: "bad.png", bytes: Buffer.from("not an image") },
        { id: "good", href: "good.png", bytes: png200x300 },
      ],
      documents: [{ id: "ch1", href: "ch1.xhtml", body: `<img src="bad.png"/><img src="good.png"/>` }],
    });

    const items = await collect(epub);

    expect(hrefs(items)).toEqual(["!OEBPS/bad.png", "OEBPS/good.png"]);
  });

  it("records an entry whose compressed data is damaged and keeps going", async () => {
    const epub = await buildEpub({
      images: ["p1", "p2", "p3"].map((id) => ({ id, href: `images/${id}.png`, bytes: png200x300 })),
      documents: [
        {
          id: "ch1",
          href: "ch1.xhtml",
          body: `<img src="images/p1.png"/><img src="images/p2.png"/><img src="images/p3.png"/>`,
        },
      ],
    });

    const items = await collect(corruptEntry(epub, "OEBPS/images/p2.png"));

    expect(hrefs(items)).toEqual([
      "OEBPS/images/p1.png",
      "!OEBPS/images/p2.png",
      "OEBPS/images/p3.png",
    ]);
  });

  it("takes the EPUB 2 cover meta as a cover hint", async () => {
    const epub = await buildEpub({
      version: "2.0",
      metadataXml: `<meta name="cover" content="img7"/>`,
      images: [
        { id: "img1", href: "a.png", bytes: png200x300 },
        { id: "img7", href: "b.png", bytes: png300x400 },
      ],
      documents: [{ id: "ch1", href: "ch1.xhtml", body: `<img src="a.png"/><img src="b.png"/>` }],
    });

    const items = await collect(epub);

    expect(hrefs(items)).toEqual(["OEBPS/b.png", "OEBPS/a.png"]);
    expect(items[0].ok && items[0].value.coverHint).toBe(true);
  });

  it("ignores a cover candidate below the size threshold", async () => {
    const epub = await buildEpub({
      images: [
        { id: "cover", href: "cover.png", bytes: png50 },
        { id: "p1", href: "p1.png", bytes: png200x300 },
      ],
      documents: [{ id: "ch1", href: "ch1.xhtml", body: `<img src="cover.png"/><img src="p1.png"/>` }],
    });

    const items = await collect(epub);

    expect(hrefs(items)).toEqual(["OEBPS/p1.png"]);
    expect(items[0].ok && items[0].value.coverHint).toBe(false);
  });

  it("rejects archives without a container document", async () => {
    await expect(loadEpubArchive(Buffer.from("plain text"))).rejects.toBeInstanceOf(
      ExtractionError
    );
  });
});

describe("imageReferences", () => {
  it("lists img and svg image sources in document order", () => {
    const markup =
      `<p><img src="a.png"/></p>` +
      `<svg><image href="b.png"/></svg>` +
      `<img src="data:image/png;base64,AAAA"/>` +
      `<img src="c.png"/>`;
    expect(imageReferences(markup)).toEqual(["a.png", "b.png", "c.png"]);
  });
});

describe("parsePackage", () => {
  const opf = `<?xml version="1.0"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:title>First</dc:title>
    <dc:title>Second</dc:title>
    <dc:creator>Someone</dc:creator>
    <dc:publisher>Pub House</dc:publisher>
    <meta property="dcterms:modified">2020-01-01T00:00:00Z</meta>
    <meta name="calibre:series" content="Saga"/>
    <meta name="cover" content="c1"/>
  </metadata>
  <manifest>
    <item id="c1" href="img/c%201.png" media-type="image/png"/>
    <item id="ch1" href="ch1.xhtml" media-type="application/xhtml+xml"/>
    <item id="extra" href="extra.xhtml" media-type="application/xhtml+xml"/>
  </manifest>
  <spine><itemref idref="ch1"/></spine>
</package>`;

  it("reads manifest paths relative to the package document", () => {
    const pkg = parsePackage(opf, "OPS/package.opf");
    expect(pkg.manifest.map((m) => m.href)).toEqual([
      "OPS/img/c 1.png",
      "OPS/ch1.xhtml",
      "OPS/extra.xhtml",
    ]);
    expect(pkg.spine).toEqual(["ch1"]);
    expect(pkg.coverMetaId).toBe("c1");
    expect(pkg.version).toBe("3.0");
  });

  it("puts documents outside the spine after it", () => {
    const pkg = parsePackage(opf, "OPS/package.opf");
    expect(readingOrder(pkg).map((m) => m.id)).toEqual(["ch1", "extra"]);
  });

  it("separates closed fields from passthrough entries", () => {
    const { metadata } = parsePackage(opf, "OPS/package.opf");
    expect(metadata.title).toBe("First");
    expect(metadata.creator).toBe("Someone");
    expect(metadata.language).toBeUndefined();
    expect(metadata.extras).toEqual([
      { namespace: "dc", name: "title", value: "Second", attributes: {} },
      { namespace: "dc", name: "publisher", value: "Pub House", attributes: {} },
      { namespace: "opf", name: "calibre:series", value: "Saga", attributes: {} },
    ]);
  });
});

describe("parseContainer", () => {
  it("returns the package path", () => {
    const xml = `<container><rootfiles><rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/></rootfiles></container>`;
    expect(parseContainer(xml)).toBe("OEBPS/content.opf");
  });
});

import path from "node:path";
import { DomUtils, parseDocument } from "htmlparser2";
import type { AnyNode, Element } from "domhandler";
import type { MetadataEntry, SourceMetadata } from "../metadata";
import { safeDecode } from "./match";

export const CONTAINER_PATH = "META-INF/container.xml";

export interface ManifestItem {
  id: string;
  /** Full zip entry path */
  href: string;
  mediaType: string;
  properties: string[];
}

export interface EpubPackage {
  opfPath: string;
  version: string;
  manifest: ManifestItem[];
  /** Manifest ids in reading order */
  spine: string[];
  /** Manifest id named by `<meta name="cover">` (EPUB 2) */
  coverMetaId?: string;
  metadata: SourceMetadata;
}

export const DOCUMENT_MEDIA_TYPES = new Set([
  "application/xhtml+xml",
  "text/html",
  "application/x-dtbook+xml",
]);

/** Element name without any namespace prefix, lowercased */
export function localName(el: Element): string {
  const name = el.name.toLowerCase();
  const colon = name.indexOf(":");
  return colon === -1 ? name : name.slice(colon + 1);
}

function elementsNamed(nodes: AnyNode[], name: string): Element[] {
  return DomUtils.findAll((el) => localName(el) === name, nodes);
}

function attr(el: Element, name: string): string | undefined {
  return el.attribs[name];
}

export function parseContainer(xml: string): string {
  const doc = parseDocument(xml, { xmlMode: true });
  const rootfile = elementsNamed(doc.children, "rootfile").find((el) => {
    const type = attr(el, "media-type");
    return !type || type === "application/oebps-package+xml";
  });
  const fullPath = rootfile ? attr(rootfile, "full-path") : undefined;
  if (!fullPath) {
    throw new Error("container.xml has no package rootfile");
  }
  return safeDecode(fullPath);
}

export function parsePackage(xml: string, opfPath: string): EpubPackage {
  const doc = parseDocument(xml, { xmlMode: true });
  const pkg = elementsNamed(doc.children, "package")[0];
  if (!pkg) {
    throw new Error(`${opfPath} has no <package> element`);
  }
  const baseDir = path.posix.dirname(opfPath);

  const manifest: ManifestItem[] = [];
  for (const item of elementsNamed(doc.children, "item")) {
    const id = attr(item, "id");
    const href = attr(item, "href");
    if (!id || !href) continue;
    manifest.push({
      id,
      href: path.posix.normalize(path.posix.join(baseDir, safeDecode(href))),
      mediaType: (attr(item, "media-type") ?? "").toLowerCase(),
      properties: (attr(item, "properties") ?? "").split(/\s+/).filter(Boolean),
    });
  }

  const spine = elementsNamed(doc.children, "itemref")
    .map((ref) => attr(ref, "idref"))
    .filter((id): id is string => !!id);

  const metadataEl = elementsNamed(doc.children, "metadata")[0];
  const { metadata, coverMetaId } = metadataEl
    ? readMetadata(metadataEl)
    : { metadata: { extras: [] }, coverMetaId: undefined };

  return {
    opfPath,
    version: attr(pkg, "version") ?? "2.0",
    manifest,
    spine,
    coverMetaId,
    metadata,
  };
}

type ClosedField = "title" | "creator" | "language" | "identifier";

function closedField(name: string): ClosedField | null {
  switch (name) {
    case "title":
    case "creator":
    case "language":
    case "identifier":
      return name;
    default:
      return null;
  }
}

function readMetadata(metadataEl: Element): {
  metadata: SourceMetadata;
  coverMetaId?: string;
} {
  const metadata: SourceMetadata = { extras: [] };
  let coverMetaId: string | undefined;

  for (const element of DomUtils.getChildren(metadataEl)) {
    if (!DomUtils.isTag(element)) continue;
    const prefixed = element.name.includes(":");
    const name = localName(element);
    const text = DomUtils.textContent(element).trim();
    const attributes = { ...element.attribs };

    if (prefixed && element.name.toLowerCase().startsWith("dc:")) {
      const key = closedField(name);
      // first occurrence wins; repeats are carried as extras
      if (key && metadata[key] === undefined && text) {
        metadata[key] = text;
        continue;
      }
      metadata.extras.push({ namespace: "dc", name, value: text, attributes });
      continue;
    }

    if (name !== "meta") continue;

    const metaName = attributes.name;
    const property = attributes.property;
    if (metaName === "cover") {
      coverMetaId = attributes.content;
      continue;
    }
    if (property === "dcterms:modified") continue;

    if (metaName) {
      const rest = omit(attributes, "name", "content");
      metadata.extras.push(entry("opf", metaName, attributes.content ?? "", rest));
    } else if (property) {
      metadata.extras.push(entry("opf", property, text, omit(attributes, "property")));
    }
  }

  return { metadata, coverMetaId };
}

function omit(
  attributes: Record<string, string>,
  ...keys: string[]
): Record<string, string> {
  return Object.fromEntries(
    Object.entries(attributes).filter(([key]) => !keys.includes(key))
  );
}

function entry(
  namespace: string,
  name: string,
  value: string,
  attributes: Record<string, string>
): MetadataEntry {
  return { namespace, name, value, attributes };
}

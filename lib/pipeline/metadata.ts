import { randomUUID } from "node:crypto";
import { z } from "zod/v4";

/**
 * A metadata element copied through from the source container as-is,
 * e.g. `dc:publisher` or an OPF `<meta property="...">`.
 */
export interface MetadataEntry {
  namespace: string;
  name: string;
  value: string;
  attributes: Record<string, string>;
}

export interface BookMetadata {
  title: string;
  creator?: string;
  language: string;
  identifier: string;
  /** ISO-8601 UTC timestamp, second precision */
  modified: string;
  extras: MetadataEntry[];
}

/** Closed fields as read from the source, before defaults are applied */
export interface SourceMetadata {
  title?: string;
  creator?: string;
  language?: string;
  identifier?: string;
  extras: MetadataEntry[];
}

const metadataEntrySchema = z.object({
  namespace: z.string().regex(/^[a-z][a-z0-9-]*$/i),
  // single-character names are never meaningful metadata keys
  name: z.string().regex(/^[A-Za-z][\w.:-]+$/),
  value: z.string().trim().min(1),
  attributes: z.record(z.string().regex(/^[A-Za-z_][\w.:-]*$/), z.string()),
});

export interface RejectedEntry {
  entry: MetadataEntry;
  reason: string;
}

export function validateExtras(entries: readonly MetadataEntry[]): {
  valid: MetadataEntry[];
  rejected: RejectedEntry[];
} {
  const valid: MetadataEntry[] = [];
  const rejected: RejectedEntry[] = [];
  for (const entry of entries) {
    const parsed = metadataEntrySchema.safeParse(entry);
    if (parsed.success) {
      valid.push(entry);
    } else {
      rejected.push({
        entry,
        reason: parsed.error.issues
          .map((i) => `${i.path.map(String).join(".")}: ${i.message}`)
          .join("; "),
      });
    }
  }
  return { valid, rejected };
}

export function modifiedTimestamp(date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function buildBookMetadata(
  source: SourceMetadata,
  fallbackTitle: string,
  now = new Date()
): BookMetadata {
  return {
    title: source.title?.trim() || fallbackTitle,
    creator: source.creator?.trim() || undefined,
    language: source.language?.trim() || "en",
    identifier: source.identifier?.trim() || `urn:uuid:${randomUUID()}`,
    modified: modifiedTimestamp(now),
    extras: source.extras,
  };
}

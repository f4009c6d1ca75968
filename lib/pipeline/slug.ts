import path from "node:path";

/**
 * Directory-safe label for a book file. Letters and digits of any script
 * survive; everything else collapses to single hyphens.
 */
export function slugFromPath(filePath: string): string {
  const base = path.basename(filePath, path.extname(filePath));
  const slug = base
    .normalize("NFKC")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "book";
}

export function timestampLabel(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

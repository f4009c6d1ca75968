import path from "node:path";

/**
 * Resolve an `src`/`href` found in a document to a normalised zip path.
 * Query strings and fragments are dropped and percent-escapes decoded.
 */
export function resolveReference(documentPath: string, src: string): string {
  const bare = safeDecode(src.split(/[?#]/)[0]);
  const joined = path.posix.join(path.posix.dirname(documentPath), bare);
  return path.posix.normalize(joined).replace(/^(\.\.\/)+/, "");
}

export function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function endsWithSegment(whole: string, tail: string): boolean {
  return whole === tail || whole.endsWith(`/${tail}`);
}

/**
 * Pick the resource an image reference points at.
 *
 * A candidate matches when the reference's file name is a path-segment
 * suffix of the candidate, or the candidate is a suffix of the reference.
 * Candidates in `claimed` are skipped; the first remaining match wins.
 * Callers add the returned path to `claimed` so a resource maps to at
 * most one page.
 */
export function matchResource(
  reference: string,
  candidates: readonly string[],
  claimed: ReadonlySet<string>
): string | null {
  const fileName = path.posix.basename(reference);
  if (!fileName) return null;

  for (const candidate of candidates) {
    if (claimed.has(candidate)) continue;
    if (endsWithSegment(candidate, fileName) || endsWithSegment(reference, candidate)) {
      return candidate;
    }
  }
  return null;
}

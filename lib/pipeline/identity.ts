export const STAGED_PREFIX = "page_";

/**
 * File name an image carries through the external tool. The page number
 * is zero-padded to four digits and widens past 9999.
 */
export function stagedName(pageNumber: number, extension: string): string {
  return `${pageStem(pageNumber)}.${extension}`;
}

export function pageStem(pageNumber: number): string {
  return `${STAGED_PREFIX}${String(pageNumber).padStart(4, "0")}`;
}

export interface PageIdentity {
  pageNumber: number;
  isCover: boolean;
}

/**
 * Hands out page identities in a single forward pass.
 *
 * Only an image that carries the cover hint and arrives first becomes the
 * cover. A cover hint seen later is numbered like any other page; numbers
 * already handed out are never revised.
 */
export class IdentityAssigner {
  private next = 1;

  assign(coverHint: boolean): PageIdentity {
    const pageNumber = this.next++;
    return { pageNumber, isCover: coverHint && pageNumber === 1 };
  }

  get assigned(): number {
    return this.next - 1;
  }
}

/**
 * Builds small PDFs with mupdf so the tests don't depend on external files.
 */
import mupdf from "mupdf";

export interface TestPage {
  width: number;
  height: number;
}

/**
 * One filled rectangle per page, sized as given in points. Title and author
 * land in the document info dictionary when provided.
 */
export function createTestPdf(
  pages: TestPage[],
  info: { title?: string; author?: string; subject?: string } = {}
): Buffer {
  const doc = new mupdf.PDFDocument();
  for (const { width, height } of pages) {
    const buf = new mupdf.Buffer();
    buf.writeLine(`q\n0.8 0.2 0.2 rg\n0 0 ${width} ${height} re f\nQ`);
    const resources = doc.addObject(doc.newDictionary());
    doc.insertPage(-1, doc.addPage([0, 0, width, height], 0, resources, buf));
  }
  if (info.title) doc.setMetaData("info:Title", info.title);
  if (info.author) doc.setMetaData("info:Author", info.author);
  if (info.subject) doc.setMetaData("info:Subject", info.subject);
  return Buffer.from(doc.saveToBuffer("").asUint8Array());
}

import path from "node:path";
import { fileURLToPath } from "node:url";
import { Liquid } from "liquidjs";

const TEMPLATES_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "../../../templates/epub"
);

// Every {{ output }} is XML-escaped
const engine = new Liquid({
  root: [TEMPLATES_DIR],
  extname: ".liquid",
  strictVariables: false,
  outputEscape: "escape",
});

export type EpubTemplate =
  | "container.xml"
  | "content.opf"
  | "nav.xhtml"
  | "toc.ncx"
  | "page.xhtml"
  | "nav.css";

export async function renderTemplate(
  name: EpubTemplate,
  context: Record<string, unknown>
): Promise<string> {
  const rendered: string = await engine.renderFile(`${name}.liquid`, context);
  return rendered;
}

import path from "node:path";
import { fileURLToPath } from "node:url";
import { Liquid } from "liquidjs";

/** `templates/` at the package root, two levels above this module. */
export function templatesDir(moduleUrl: string): string {
  return path.resolve(path.dirname(fileURLToPath(moduleUrl)), "../../templates");
}

const TEMPLATES_DIR = templatesDir(import.meta.url);

// ConTeXt is full of braces, so Liquid gets angle-bracket delimiters instead.
const engine = new Liquid({
  root: [TEMPLATES_DIR],
  extname: ".liquid",
  strictVariables: false,
  outputDelimiterLeft: "<<",
  outputDelimiterRight: ">>",
  tagDelimiterLeft: "<%",
  tagDelimiterRight: "%>",
});

export interface PreambleContext {
  /** Book title, already rendered as ConTeXt. */
  title: string;
  toc_command: string;
}

/**
 * Render the document preamble. `template` is a name under `templates/`
 * or a path to a `.liquid` file.
 */
export function renderPreamble(template: string, context: PreambleContext): string {
  const file = template.endsWith(".liquid") ? path.resolve(template) : template;
  return engine.renderFileSync(file, context);
}

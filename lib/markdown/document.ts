/**
 * Document model built from the Markdown event stream.
 *
 * Elements are plain data; building, rendering and navigation extraction
 * live in their own modules. A fragment owns its elements outright, so the
 * whole structure is a strict tree.
 */

export type Fragment = DocumentElement[];

export type FormatKind = "emphasis" | "strong" | "strikethrough";

/** `' '` none, `'l'` left, `'c'` center, `'r'` right. */
export type AlignmentCode = " " | "l" | "c" | "r";

export interface Table {
  alignments: AlignmentCode[];
  headerRows: Fragment[][];
  bodyRows: Fragment[][];
}

export type DocumentElement =
  | { type: "text"; text: string }
  | { type: "heading"; level: number; content: Fragment }
  | { type: "paragraph"; content: Fragment }
  /** `start` is null for bullet lists. */
  | { type: "list"; items: Fragment[]; start: number | null }
  | { type: "link"; destination: string; label: Fragment }
  | { type: "image"; destination: string; altText: Fragment }
  | { type: "code"; text: string }
  | { type: "blockQuote"; content: Fragment }
  | { type: "codeBlock"; content: Fragment }
  | { type: "formatting"; format: FormatKind; content: Fragment }
  | { type: "table"; table: Table }
  | { type: "html"; raw: string }
  | { type: "footnoteReference"; name: string }
  | { type: "footnoteDefinition"; name: string; content: Fragment }
  | { type: "lineBreak" }
  | { type: "rule" };

export type ElementType = DocumentElement["type"];

export function describeElement(element: DocumentElement): string {
  switch (element.type) {
    case "text":
      return `text ${JSON.stringify(element.text)}`;
    case "code":
      return `inline code ${JSON.stringify(element.text)}`;
    case "html":
      return `html ${JSON.stringify(element.raw)}`;
    case "heading":
      return `heading (level ${element.level})`;
    case "list":
      return `list (${element.items.length} items)`;
    case "link":
      return `link to ${JSON.stringify(element.destination)}`;
    case "image":
      return `image ${JSON.stringify(element.destination)}`;
    case "formatting":
      return `${element.format} span`;
    case "footnoteReference":
      return `footnote reference [^${element.name}]`;
    case "footnoteDefinition":
      return `footnote definition [^${element.name}]`;
    default:
      return element.type;
  }
}

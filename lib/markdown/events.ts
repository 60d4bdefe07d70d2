/**
 * Flat Markdown event stream.
 *
 * A document arrives as a well-nested sequence of start/end pairs with leaf
 * events in between. Nothing here checks that an `end` matches its `start`;
 * consumers trust the tokenizer for that.
 */

export type Alignment = "none" | "left" | "center" | "right";

export type Tag =
  | { name: "paragraph" }
  | { name: "heading"; level: number }
  | { name: "blockQuote" }
  | { name: "codeBlock" }
  | { name: "list"; start: number | null }
  | { name: "item" }
  | { name: "footnoteDefinition"; label: string }
  | { name: "table"; alignments: Alignment[] }
  | { name: "tableHead" }
  | { name: "tableRow" }
  | { name: "tableCell" }
  | { name: "emphasis" }
  | { name: "strong" }
  | { name: "strikethrough" }
  | { name: "link"; destination: string; title: string }
  | { name: "image"; destination: string; title: string };

export type TagName = Tag["name"];

export type MarkdownEvent =
  | { type: "start"; tag: Tag }
  | { type: "end"; tag: TagName }
  | { type: "text"; text: string }
  | { type: "code"; code: string }
  | { type: "html"; html: string }
  | { type: "footnoteReference"; label: string }
  | { type: "softBreak" }
  | { type: "hardBreak" }
  | { type: "rule" };

export function start(tag: Tag): MarkdownEvent {
  return { type: "start", tag };
}

export function end(tag: TagName): MarkdownEvent {
  return { type: "end", tag };
}

export function text(value: string): MarkdownEvent {
  return { type: "text", text: value };
}

export function describeEvent(event: MarkdownEvent): string {
  switch (event.type) {
    case "start":
      return `start of ${event.tag.name}`;
    case "end":
      return `end of ${event.tag}`;
    case "text":
      return `text ${JSON.stringify(event.text)}`;
    case "code":
      return `inline code ${JSON.stringify(event.code)}`;
    case "html":
      return `html ${JSON.stringify(event.html)}`;
    case "footnoteReference":
      return `footnote reference [^${event.label}]`;
    default:
      return event.type;
  }
}

import { BuildError } from "../errors.js";
import type { AlignmentCode, DocumentElement, Fragment, Table } from "./document.js";
import { describeEvent, type Alignment, type MarkdownEvent, type Tag } from "./events.js";

const ALIGNMENT_CODES: Record<Alignment, AlignmentCode> = {
  none: " ",
  left: "l",
  center: "c",
  right: "r",
};

/**
 * Build a document fragment from a flat event stream.
 *
 * There is no start/end pair around the whole document, so the recursive
 * builder is run repeatedly at the outermost level until a run comes back
 * empty.
 */
export function buildFragment(events: Iterable<MarkdownEvent>): Fragment {
  const cursor = events[Symbol.iterator]();
  const elements: Fragment = [];
  for (;;) {
    const fragment = parseUntilEnd(cursor);
    if (fragment.length === 0) break;
    elements.push(...fragment);
  }
  return elements;
}

function next(cursor: Iterator<MarkdownEvent>): MarkdownEvent | undefined {
  const result = cursor.next();
  return result.done ? undefined : result.value;
}

/** Consume events up to the next `end`, whichever construct it closes. */
function parseUntilEnd(cursor: Iterator<MarkdownEvent>): Fragment {
  const elements: Fragment = [];
  for (let event = next(cursor); event !== undefined; event = next(cursor)) {
    switch (event.type) {
      case "end":
        return elements;
      case "text":
        elements.push({ type: "text", text: event.text });
        break;
      case "code":
        elements.push({ type: "code", text: event.code });
        break;
      case "softBreak":
        elements.push({ type: "text", text: "\n" });
        break;
      case "hardBreak":
        elements.push({ type: "lineBreak" });
        break;
      case "rule":
        elements.push({ type: "rule" });
        break;
      case "html":
        elements.push({ type: "html", raw: event.html });
        break;
      case "footnoteReference":
        elements.push({ type: "footnoteReference", name: event.label });
        break;
      case "start":
        elements.push(buildConstruct(event.tag, cursor));
        break;
    }
  }
  return elements;
}

function buildConstruct(tag: Tag, cursor: Iterator<MarkdownEvent>): DocumentElement {
  switch (tag.name) {
    case "paragraph":
      return { type: "paragraph", content: parseUntilEnd(cursor) };
    case "heading":
      return { type: "heading", level: tag.level, content: parseUntilEnd(cursor) };
    case "blockQuote":
      return { type: "blockQuote", content: parseUntilEnd(cursor) };
    case "codeBlock":
      return { type: "codeBlock", content: parseUntilEnd(cursor) };
    case "emphasis":
    case "strong":
    case "strikethrough":
      return { type: "formatting", format: tag.name, content: parseUntilEnd(cursor) };
    case "link":
      // TODO: carry the link title once the renderer has a place to put it
      return { type: "link", destination: tag.destination, label: parseUntilEnd(cursor) };
    case "image":
      return { type: "image", destination: tag.destination, altText: parseUntilEnd(cursor) };
    case "footnoteDefinition":
      return { type: "footnoteDefinition", name: tag.label, content: parseUntilEnd(cursor) };
    case "list":
      return { type: "list", items: parseListItems(cursor), start: tag.start };
    case "table":
      return {
        type: "table",
        table: parseTable(
          cursor,
          tag.alignments.map((alignment) => ALIGNMENT_CODES[alignment])
        ),
      };
    case "item":
    case "tableHead":
    case "tableRow":
    case "tableCell":
      throw new BuildError(
        "unexpected-event",
        "unhandled markdown event",
        describeEvent({ type: "start", tag })
      );
  }
}

function parseListItems(cursor: Iterator<MarkdownEvent>): Fragment[] {
  const items: Fragment[] = [];
  for (let event = next(cursor); event !== undefined; event = next(cursor)) {
    if (event.type === "end" && event.tag === "list") break;
    if (event.type === "start" && event.tag.name === "item") {
      items.push(parseUntilEnd(cursor));
      continue;
    }
    throw new BuildError(
      "unexpected-list-event",
      "unexpected event while parsing list items",
      describeEvent(event)
    );
  }
  return items;
}

function parseTable(cursor: Iterator<MarkdownEvent>, alignments: AlignmentCode[]): Table {
  const headerRows: Fragment[][] = [];
  const bodyRows: Fragment[][] = [];
  for (let event = next(cursor); event !== undefined; event = next(cursor)) {
    if (event.type === "end" && event.tag === "table") break;
    if (event.type === "start" && event.tag.name === "tableHead") {
      headerRows.push(parseTableRow(cursor));
      continue;
    }
    if (event.type === "start" && event.tag.name === "tableRow") {
      bodyRows.push(parseTableRow(cursor));
      continue;
    }
    throw new BuildError(
      "unexpected-table-event",
      "unexpected event while parsing table",
      describeEvent(event)
    );
  }
  // Row width is not checked against alignments.length.
  return { alignments, headerRows, bodyRows };
}

/** Header rows close with `end tableHead`, body rows with `end tableRow`. */
function parseTableRow(cursor: Iterator<MarkdownEvent>): Fragment[] {
  const cells: Fragment[] = [];
  for (let event = next(cursor); event !== undefined; event = next(cursor)) {
    if (event.type === "end" && (event.tag === "tableRow" || event.tag === "tableHead")) break;
    if (event.type === "start" && event.tag.name === "tableCell") {
      cells.push(parseUntilEnd(cursor));
      continue;
    }
    throw new BuildError(
      "unexpected-row-event",
      "unexpected event while parsing table row",
      describeEvent(event)
    );
  }
  return cells;
}

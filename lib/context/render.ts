import { RenderError } from "../errors.js";
import {
  describeElement,
  type AlignmentCode,
  type DocumentElement,
  type FormatKind,
  type Fragment,
  type Table,
} from "../markdown/document.js";
import { escapeText, smartQuotes, toVerbatim } from "./escape.js";

const ALIGN_KEYWORDS: Record<AlignmentCode, string> = {
  " ": "",
  l: "flushleft",
  c: "middle",
  r: "flushright",
};

/** Render a fragment as ConTeXt markup. */
export function renderFragment(fragment: Fragment): string {
  let out = "";
  for (const element of fragment) {
    out += renderElement(element);
  }
  return out;
}

function renderElement(element: DocumentElement): string {
  switch (element.type) {
    case "text":
      return smartQuotes(escapeText(element.text));
    case "code":
      return toVerbatim(element.text);
    case "codeBlock":
      return `\n\\starttyping\n${collectText(element.content)}\n\\stoptyping\n`;
    case "blockQuote":
      return `\n\\startblockquote\n${renderFragment(element.content)}\n\\stopblockquote\n`;
    case "heading":
      // level 1 is written from the navigation tree
      if (element.level === 1) return "";
      return `\\${"sub".repeat(element.level - 1)}section{${renderFragment(element.content)}}\n`;
    case "paragraph":
      return `${renderFragment(element.content)}\n\n`;
    case "list":
      return renderList(element.items, element.start);
    case "link":
      return `\\goto{${renderFragment(element.label)}}[url(${element.destination})]`;
    case "image":
      return `\\externalfigure[${element.destination}]`;
    case "formatting":
      return renderFormatting(element.format, renderFragment(element.content));
    case "table":
      return renderTable(element.table);
    case "html":
      return renderHtml(element.raw);
    case "footnoteReference":
      return `\\note[${element.name}]`;
    case "footnoteDefinition":
      return `\\footnotetext[${element.name}]{${renderFragment(element.content).trim()}}\n`;
    case "lineBreak":
      return "\\crlf\n";
    case "rule":
      return "\n\\hairline\n";
    default: {
      const unhandled: never = element;
      throw new RenderError("unknown-element", "unknown element type", describeElement(unhandled));
    }
  }
}

function renderList(items: Fragment[], start: number | null): string {
  let options = "";
  if (start !== null) options = start === 1 ? "[n]" : `[n][start=${start}]`;
  let out = `\n\\startitemize${options}\n`;
  for (const item of items) {
    out += `\\item ${renderFragment(item)}\n`;
  }
  return `${out}\n\\stopitemize\n`;
}

function renderFormatting(format: FormatKind, content: string): string {
  switch (format) {
    case "strikethrough":
      return `\\overstrike{${content}}`;
    case "emphasis":
      return `{\\it ${content}}`;
    case "strong":
      return `{\\bf ${content}}`;
    default: {
      const unexpected: never = format;
      throw new RenderError("unexpected-format", "unexpected formatting type", String(unexpected));
    }
  }
}

function renderTable(table: Table): string {
  let out = "";
  table.alignments.forEach((alignment, i) => {
    const keyword = ALIGN_KEYWORDS[alignment];
    if (keyword === "") return;
    out += `\\setupTABLE[c][${i + 1}][align=${keyword}]\n`;
  });
  out += "\\bTABLE\n";
  const groups: Array<[string, Fragment[][]]> = [
    ["TH", table.headerRows],
    ["TD", table.bodyRows],
  ];
  for (const [cell, rows] of groups) {
    for (const row of rows) {
      out += "\\bTR\n";
      for (const col of row) {
        out += `\\b${cell} ${renderFragment(col)} \\e${cell}\n`;
      }
      out += "\\eTR\n";
    }
  }
  return `${out}\\eTABLE\n\n`;
}

/** Raw HTML is kept for inspection as a comment block. */
function renderHtml(raw: string): string {
  const lines = raw.replace(/\n$/, "").split("\n");
  return `\n${lines.map((line) => `% ${line}`).join("\n")}\n`;
}

/** Flatten a code block's content; anything but text is rejected. */
export function collectText(fragment: Fragment): string {
  let out = "";
  for (const element of fragment) {
    if (element.type !== "text") {
      throw new RenderError(
        "non-text-in-code-block",
        "content of a code block must be text only",
        describeElement(element)
      );
    }
    out += element.text;
  }
  return out;
}

import MarkdownIt from "markdown-it";
import footnote from "markdown-it-footnote";
import { TokenizationError, errorMessage } from "../errors.js";
import { end, start, text, type Alignment, type MarkdownEvent } from "./events.js";

type Token = ReturnType<MarkdownIt["parse"]>[number];

export interface TokenizeOptions {
  /** Pass raw HTML through as `html` events. */
  html?: boolean;
  /** Recognise `[^label]` references and their definitions. */
  footnotes?: boolean;
}

export function createMarkdown(options: TokenizeOptions = {}): MarkdownIt {
  // The default preset already enables tables and strikethrough.
  const md = new MarkdownIt("default", {
    html: options.html ?? true,
    linkify: false,
    typographer: false,
  });
  if (options.footnotes ?? true) md.use(footnote);
  return md;
}

/**
 * Tokenize one Markdown document into the flat event stream the tree builder
 * consumes.
 */
export function tokenize(source: string, options?: TokenizeOptions): MarkdownEvent[] {
  let tokens: Token[];
  try {
    tokens = createMarkdown(options).parse(source, {});
  } catch (err) {
    throw new TokenizationError(
      "parse-failed",
      `markdown parser failed: ${errorMessage(err)}`,
      undefined,
      { cause: err }
    );
  }
  return toEvents(tokens);
}

/**
 * Normalise markdown-it block tokens into events.
 *
 * Hidden paragraphs (tight list items) are dropped, inline children are
 * spliced in place, and the table head/body wrappers are folded so the header
 * row reads `start tableHead .. end tableHead` and each body row reads
 * `start tableRow .. end tableRow`.
 */
export function toEvents(tokens: Token[]): MarkdownEvent[] {
  const events: MarkdownEvent[] = [];
  let inTableHead = false;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    switch (token.type) {
      case "paragraph_open":
        if (!token.hidden) events.push(start({ name: "paragraph" }));
        break;
      case "paragraph_close":
        if (!token.hidden) events.push(end("paragraph"));
        break;
      case "heading_open":
        events.push(start({ name: "heading", level: Number(token.tag.slice(1)) }));
        break;
      case "heading_close":
        events.push(end("heading"));
        break;
      case "blockquote_open":
        events.push(start({ name: "blockQuote" }));
        break;
      case "blockquote_close":
        events.push(end("blockQuote"));
        break;
      case "bullet_list_open":
        events.push(start({ name: "list", start: null }));
        break;
      case "ordered_list_open":
        events.push(start({ name: "list", start: Number(token.attrGet("start") ?? 1) }));
        break;
      case "bullet_list_close":
      case "ordered_list_close":
        events.push(end("list"));
        break;
      case "list_item_open":
        events.push(start({ name: "item" }));
        break;
      case "list_item_close":
        events.push(end("item"));
        break;
      case "code_block":
      case "fence":
        events.push(start({ name: "codeBlock" }));
        if (token.content !== "") events.push(text(token.content));
        events.push(end("codeBlock"));
        break;
      case "hr":
        events.push({ type: "rule" });
        break;
      case "html_block":
        events.push({ type: "html", html: token.content });
        break;
      case "table_open":
        events.push(start({ name: "table", alignments: tableAlignments(tokens, i) }));
        break;
      case "table_close":
        events.push(end("table"));
        break;
      case "thead_open":
        inTableHead = true;
        events.push(start({ name: "tableHead" }));
        break;
      case "thead_close":
        inTableHead = false;
        events.push(end("tableHead"));
        break;
      case "tr_open":
        if (!inTableHead) events.push(start({ name: "tableRow" }));
        break;
      case "tr_close":
        if (!inTableHead) events.push(end("tableRow"));
        break;
      case "th_open":
      case "td_open":
        events.push(start({ name: "tableCell" }));
        break;
      case "th_close":
      case "td_close":
        events.push(end("tableCell"));
        break;
      case "tbody_open":
      case "tbody_close":
      case "footnote_block_open":
      case "footnote_block_close":
      case "footnote_anchor":
        break;
      case "footnote_open":
        events.push(start({ name: "footnoteDefinition", label: footnoteLabel(token) }));
        break;
      case "footnote_close":
        events.push(end("footnoteDefinition"));
        break;
      case "inline":
        pushInline(token.children ?? [], events);
        break;
      default:
        throw unsupported(token);
    }
  }

  return events;
}

function pushInline(children: Token[], events: MarkdownEvent[]): void {
  for (const token of children) {
    switch (token.type) {
      case "text":
      // entities and backslash escapes; only left unjoined inside image alt text
      case "text_special":
        events.push(text(token.content));
        break;
      case "softbreak":
        events.push({ type: "softBreak" });
        break;
      case "hardbreak":
        events.push({ type: "hardBreak" });
        break;
      case "code_inline":
        events.push({ type: "code", code: token.content });
        break;
      case "html_inline":
        events.push({ type: "html", html: token.content });
        break;
      case "em_open":
        events.push(start({ name: "emphasis" }));
        break;
      case "em_close":
        events.push(end("emphasis"));
        break;
      case "strong_open":
        events.push(start({ name: "strong" }));
        break;
      case "strong_close":
        events.push(end("strong"));
        break;
      case "s_open":
        events.push(start({ name: "strikethrough" }));
        break;
      case "s_close":
        events.push(end("strikethrough"));
        break;
      case "link_open":
        events.push(
          start({
            name: "link",
            destination: token.attrGet("href") ?? "",
            title: token.attrGet("title") ?? "",
          })
        );
        break;
      case "link_close":
        events.push(end("link"));
        break;
      case "image":
        // markdown-it keeps the alt text as children of a single token
        events.push(
          start({
            name: "image",
            destination: token.attrGet("src") ?? "",
            title: token.attrGet("title") ?? "",
          })
        );
        pushInline(token.children ?? [], events);
        events.push(end("image"));
        break;
      case "footnote_ref":
        events.push({ type: "footnoteReference", label: footnoteLabel(token) });
        break;
      case "footnote_anchor":
        break;
      default:
        throw unsupported(token);
    }
  }
}

const TEXT_ALIGN = /text-align:\s*(left|center|right)/;

function tableAlignments(tokens: Token[], tableIndex: number): Alignment[] {
  const alignments: Alignment[] = [];
  for (let i = tableIndex + 1; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.type === "tr_close" || token.type === "table_close") break;
    if (token.type !== "th_open") continue;
    const match = TEXT_ALIGN.exec(token.attrGet("style") ?? "");
    alignments.push(match ? toAlignment(match[1]) : "none");
  }
  return alignments;
}

function toAlignment(value: string): Alignment {
  switch (value) {
    case "left":
    case "center":
    case "right":
      return value;
    default:
      return "none";
  }
}

/** Named footnotes keep their label; inline ones are numbered. */
function footnoteLabel(token: Token): string {
  const meta: unknown = token.meta;
  if (typeof meta === "object" && meta !== null) {
    if ("label" in meta && typeof meta.label === "string") return meta.label;
    if ("id" in meta && typeof meta.id === "number") return String(meta.id + 1);
  }
  throw new TokenizationError(
    "unsupported-token",
    "footnote token without a label or id",
    token.type
  );
}

function unsupported(token: Token): TokenizationError {
  const line = token.map ? ` (line ${token.map[0] + 1})` : "";
  return new TokenizationError(
    "unsupported-token",
    `unsupported markdown token${line}`,
    token.type
  );
}

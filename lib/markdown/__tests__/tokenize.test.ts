import { describe, it, expect } from "vitest";
import { tokenize } from "../tokenize.js";
import { end, start, text } from "../events.js";
import { TokenizationError } from "../../errors.js";

describe("tokenize", () => {
  it("emits headings and inline formatting as start/end pairs", () => {
    expect(tokenize("# Title\n\nHello *world*\n")).toEqual([
      start({ name: "heading", level: 1 }),
      text("Title"),
      end("heading"),
      start({ name: "paragraph" }),
      text("Hello "),
      start({ name: "emphasis" }),
      text("world"),
      end("emphasis"),
      end("paragraph"),
    ]);
  });

  it("drops the hidden paragraphs of tight lists", () => {
    expect(tokenize("- [A](a.md)\n  - [B](b.md)\n")).toEqual([
      start({ name: "list", start: null }),
      start({ name: "item" }),
      start({ name: "link", destination: "a.md", title: "" }),
      text("A"),
      end("link"),
      start({ name: "list", start: null }),
      start({ name: "item" }),
      start({ name: "link", destination: "b.md", title: "" }),
      text("B"),
      end("link"),
      end("item"),
      end("list"),
      end("item"),
      end("list"),
    ]);
  });

  it("records the start number of ordered lists", () => {
    const events = tokenize("3. three\n4. four\n");
    expect(events[0]).toEqual(start({ name: "list", start: 3 }));
  });

  it("folds the table head into a single header row", () => {
    expect(tokenize("| a | b | c |\n|:--|--:|---|\n| 1 | 2 | 3 |\n")).toEqual([
      start({ name: "table", alignments: ["left", "right", "none"] }),
      start({ name: "tableHead" }),
      start({ name: "tableCell" }),
      text("a"),
      end("tableCell"),
      start({ name: "tableCell" }),
      text("b"),
      end("tableCell"),
      start({ name: "tableCell" }),
      text("c"),
      end("tableCell"),
      end("tableHead"),
      start({ name: "tableRow" }),
      start({ name: "tableCell" }),
      text("1"),
      end("tableCell"),
      start({ name: "tableCell" }),
      text("2"),
      end("tableCell"),
      start({ name: "tableCell" }),
      text("3"),
      end("tableCell"),
      end("tableRow"),
      end("table"),
    ]);
  });

  it("emits soft breaks between lines of a paragraph", () => {
    expect(tokenize("a\nb\n")).toEqual([
      start({ name: "paragraph" }),
      text("a"),
      { type: "softBreak" },
      text("b"),
      end("paragraph"),
    ]);
  });

  it("wraps fenced code in a code block with one text event", () => {
    expect(tokenize("```\ncode {x}\n```\n")).toEqual([
      start({ name: "codeBlock" }),
      text("code {x}\n"),
      end("codeBlock"),
    ]);
  });

  it("emits inline code and strikethrough", () => {
    expect(tokenize("`x` ~~gone~~\n")).toEqual([
      start({ name: "paragraph" }),
      { type: "code", code: "x" },
      text(" "),
      start({ name: "strikethrough" }),
      text("gone"),
      end("strikethrough"),
      end("paragraph"),
    ]);
  });

  it("emits images with their alt text inside", () => {
    expect(tokenize('![A cat](cat.png "Cat")\n')).toEqual([
      start({ name: "paragraph" }),
      start({ name: "image", destination: "cat.png", title: "Cat" }),
      text("A cat"),
      end("image"),
      end("paragraph"),
    ]);
  });

  it("keeps entities and escapes in image alt text", () => {
    expect(tokenize("![Tom &amp; Jerry](p.png)\n")).toEqual([
      start({ name: "paragraph" }),
      start({ name: "image", destination: "p.png", title: "" }),
      text("Tom "),
      text("&"),
      text(" Jerry"),
      end("image"),
      end("paragraph"),
    ]);
    expect(tokenize("![a\\*b](p.png)\n")).toEqual([
      start({ name: "paragraph" }),
      start({ name: "image", destination: "p.png", title: "" }),
      text("a"),
      text("*"),
      text("b"),
      end("image"),
      end("paragraph"),
    ]);
  });

  it("keeps formatting in image alt text", () => {
    expect(tokenize("![*big* cat](c.png)\n")).toEqual([
      start({ name: "paragraph" }),
      start({ name: "image", destination: "c.png", title: "" }),
      start({ name: "emphasis" }),
      text("big"),
      end("emphasis"),
      text(" cat"),
      end("image"),
      end("paragraph"),
    ]);
  });

  it("passes raw HTML blocks through", () => {
    expect(tokenize("<div>\nhi\n</div>\n")).toEqual([
      { type: "html", html: "<div>\nhi\n</div>\n" },
    ]);
  });

  it("treats HTML as text when html is disabled", () => {
    const events = tokenize("<b>x</b>\n", { html: false });
    expect(events.some((e) => e.type === "html")).toBe(false);
  });

  it("emits footnote references and definitions", () => {
    expect(tokenize("Text[^n].\n\n[^n]: Note.\n")).toEqual([
      start({ name: "paragraph" }),
      text("Text"),
      { type: "footnoteReference", label: "n" },
      text("."),
      end("paragraph"),
      start({ name: "footnoteDefinition", label: "n" }),
      start({ name: "paragraph" }),
      text("Note."),
      end("paragraph"),
      end("footnoteDefinition"),
    ]);
  });

  it("emits thematic breaks as rules", () => {
    expect(tokenize("a\n\n***\n")).toEqual([
      start({ name: "paragraph" }),
      text("a"),
      end("paragraph"),
      { type: "rule" },
    ]);
  });

  it("returns no events for an empty document", () => {
    expect(tokenize("")).toEqual([]);
  });

  it("exports TokenizationError with the tokenization kind", () => {
    const err = new TokenizationError("unsupported-token", "unsupported markdown token", "dl_open");
    expect(err.kind).toBe("tokenization");
    expect(err.message).toBe("unsupported markdown token: dl_open");
  });
});

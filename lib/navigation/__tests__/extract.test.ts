import { describe, it, expect } from "vitest";
import { extractNavigation } from "../extract.js";
import { ExtractionError } from "../../errors.js";
import { buildFragment } from "../../markdown/build.js";
import { tokenize } from "../../markdown/tokenize.js";
import type { DocumentElement, Fragment } from "../../markdown/document.js";

const t = (value: string): DocumentElement => ({ type: "text", text: value });
const link = (destination: string, label: string): DocumentElement => ({
  type: "link",
  destination,
  label: [t(label)],
});
const list = (...items: Fragment[]): DocumentElement => ({ type: "list", start: null, items });

function extractionError(fragment: Fragment): ExtractionError {
  try {
    extractNavigation(fragment);
  } catch (err) {
    if (err instanceof ExtractionError) return err;
    throw err;
  }
  throw new Error("expected extractNavigation to fail");
}

describe("extractNavigation", () => {
  it("splits the manifest into front, body and back matter", () => {
    const tree = extractNavigation([
      { type: "heading", level: 1, content: [t("Book")] },
      { type: "paragraph", content: [link("preface.md", "Preface")] },
      list([link("a.md", "A")], [link("b.md", "B"), list([link("c.md", "C")])]),
      { type: "paragraph", content: [link("afterword.md", "Afterword")] },
    ]);

    expect(tree.title).toBe("Book");
    expect(tree.frontMatter).toHaveLength(1);
    expect(tree.bodyMatter).toHaveLength(2);
    expect(tree.bodyMatter[0].children).toHaveLength(0);
    expect(tree.bodyMatter[1].children).toHaveLength(1);
    expect(tree.backMatter).toHaveLength(1);
    expect(tree.appendices).toHaveLength(0);
  });

  it("builds entries with levels, titles and paths", () => {
    const tree = extractNavigation(
      buildFragment(
        tokenize(
          "# Book\n\n[Preface](preface.md)\n\n- [A](a.md)\n- [B](b.md)\n  - [C](c.md)\n\n[Afterword](after.md)\n"
        )
      )
    );

    expect(tree).toEqual({
      title: "Book",
      frontMatter: [
        { level: { kind: "section", depth: 0 }, title: "Preface", sourcePath: "preface.md", children: [] },
      ],
      bodyMatter: [
        { level: { kind: "section", depth: 0 }, title: "A", sourcePath: "a.md", children: [] },
        {
          level: { kind: "section", depth: 0 },
          title: "B",
          sourcePath: "b.md",
          children: [
            { level: { kind: "section", depth: 1 }, title: "C", sourcePath: "c.md", children: [] },
          ],
        },
      ],
      appendices: [],
      backMatter: [
        { level: { kind: "section", depth: 0 }, title: "Afterword", sourcePath: "after.md", children: [] },
      ],
    });
  });

  it("renders titles as markup", () => {
    const tree = extractNavigation([
      { type: "heading", level: 1, content: [t("Book #1")] },
      list([link("a.md", "50% off")]),
    ]);
    expect(tree.title).toBe("Book \\char`\\#1");
    expect(tree.bodyMatter[0].title).toBe("50\\char`\\% off");
  });

  it("treats an empty link destination as an entry without a document", () => {
    const tree = extractNavigation([list([link("", "Draft")])]);
    expect(tree.bodyMatter[0].sourcePath).toBeNull();
  });

  it("reads lists nested in paragraphs as depth-0 entries", () => {
    const tree = extractNavigation([
      { type: "paragraph", content: [list([link("a.md", "A")], [link("b.md", "B")])] },
    ]);
    expect(tree.frontMatter.map((e) => e.title)).toEqual(["A", "B"]);
    expect(tree.bodyMatter).toEqual([]);
  });

  it("keeps the most recent level-1 heading as the title", () => {
    const tree = extractNavigation([
      { type: "heading", level: 1, content: [t("First")] },
      { type: "heading", level: 1, content: [t("Second")] },
    ]);
    expect(tree.title).toBe("Second");
  });

  it("fails on a sublist before any entry", () => {
    const err = extractionError([list([list([link("a.md", "A")])])]);
    expect(err.reason).toBe("sublist-without-entry");
    expect(err.message).toBe("sublist without an entry: list (1 items)");
  });

  it("fails on list items that are not links or lists", () => {
    expect(extractionError([list([t("loose text")])]).reason).toBe("unexpected-list-item");
  });

  it("fails on paragraph content that is not a link or list", () => {
    const err = extractionError([{ type: "paragraph", content: [t("prose")] }]);
    expect(err.reason).toBe("unexpected-paragraph-item");
    expect(err.offending).toBe('text "prose"');
  });

  it("fails on headings other than level 1", () => {
    const err = extractionError([{ type: "heading", level: 2, content: [t("Part")] }]);
    expect(err.reason).toBe("unexpected-element");
    expect(err.offending).toBe("heading (level 2)");
  });

  it("fails on other top-level elements", () => {
    expect(extractionError([{ type: "rule" }]).offending).toBe("rule");
  });
});

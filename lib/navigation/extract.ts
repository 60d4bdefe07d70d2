import { renderFragment } from "../context/render.js";
import { ExtractionError } from "../errors.js";
import { describeElement, type DocumentElement, type Fragment } from "../markdown/document.js";
import { sectionLevel, type NavigationEntry, type NavigationTree } from "./types.js";

/**
 * Interpret the manifest fragment as a navigation tree.
 *
 * Paragraphs before the first top-level list are front matter and paragraphs
 * after it are back matter; the list itself is the body. A level-1 heading
 * names the book.
 */
export function extractNavigation(fragment: Fragment): NavigationTree {
  let title = "";
  let frontMatterDone = false;
  const frontMatter: NavigationEntry[] = [];
  const bodyMatter: NavigationEntry[] = [];
  const backMatter: NavigationEntry[] = [];

  for (const element of fragment) {
    switch (element.type) {
      case "heading":
        if (element.level !== 1) throw unexpectedElement(element);
        title = renderFragment(element.content);
        break;
      case "paragraph":
        for (const inline of element.content) {
          let entries: NavigationEntry[];
          if (inline.type === "link") {
            entries = linksToEntries([inline], 0);
          } else if (inline.type === "list") {
            entries = linksToEntries(inline.items.flat(), 0);
          } else {
            throw new ExtractionError(
              "unexpected-paragraph-item",
              "unexpected item in manifest paragraph",
              describeElement(inline)
            );
          }
          (frontMatterDone ? backMatter : frontMatter).push(...entries);
        }
        break;
      case "list":
        frontMatterDone = true;
        for (const item of element.items) {
          bodyMatter.push(...linksToEntries(item, 0));
        }
        break;
      default:
        throw unexpectedElement(element);
    }
  }

  return { title, frontMatter, bodyMatter, appendices: [], backMatter };
}

/**
 * Convert links at `depth` into entries. A nested list belongs to the entry
 * right before it and is converted one level deeper.
 */
function linksToEntries(elements: DocumentElement[], depth: number): NavigationEntry[] {
  const entries: NavigationEntry[] = [];
  for (const element of elements) {
    if (element.type === "link") {
      entries.push({
        level: sectionLevel(depth),
        title: renderFragment(element.label),
        sourcePath: element.destination === "" ? null : element.destination,
        children: [],
      });
    } else if (element.type === "list") {
      const parent = entries[entries.length - 1];
      if (parent === undefined) {
        throw new ExtractionError(
          "sublist-without-entry",
          "sublist without an entry",
          describeElement(element)
        );
      }
      for (const item of element.items) {
        parent.children.push(...linksToEntries(item, depth + 1));
      }
    } else {
      throw new ExtractionError(
        "unexpected-list-item",
        "unexpected manifest list item",
        describeElement(element)
      );
    }
  }
  return entries;
}

function unexpectedElement(element: DocumentElement): ExtractionError {
  return new ExtractionError(
    "unexpected-element",
    "unexpected manifest element",
    describeElement(element)
  );
}

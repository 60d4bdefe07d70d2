import fs from "node:fs";
import { BookError, BookIoError, errorMessage } from "../errors.js";
import { buildFragment } from "../markdown/build.js";
import type { Fragment } from "../markdown/document.js";
import { tokenize, type TokenizeOptions } from "../markdown/tokenize.js";
import { extractNavigation } from "../navigation/extract.js";
import type { NavigationTree } from "../navigation/types.js";

/** Read, tokenize and build one Markdown document. */
export function loadDocument(filePath: string, options?: TokenizeOptions): Fragment {
  let source: string;
  try {
    source = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new BookIoError(
      "read-failed",
      `failed to read Markdown file ${filePath}`,
      errorMessage(err),
      { cause: err }
    );
  }
  return withFile(filePath, () => buildFragment(tokenize(source, options)));
}

export function loadNavigation(manifestFile: string, options?: TokenizeOptions): NavigationTree {
  const fragment = loadDocument(manifestFile, options);
  return withFile(manifestFile, () => extractNavigation(fragment));
}

/** Run `fn`, attaching `file` to any pipeline error it throws. */
export function withFile<T>(file: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof BookError) throw err.inFile(file);
    throw err;
  }
}

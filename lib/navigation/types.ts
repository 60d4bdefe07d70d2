/**
 * Navigation tree extracted from the book manifest.
 */

export type NavigationLevel =
  | { kind: "part" }
  | { kind: "chapter" }
  | { kind: "section"; depth: number };

export interface NavigationEntry {
  level: NavigationLevel;
  /** Rendered ConTeXt, ready to drop into a heading command. */
  title: string;
  /** Relative to the book directory; null for a heading with no document. */
  sourcePath: string | null;
  children: NavigationEntry[];
}

export interface NavigationTree {
  title: string;
  frontMatter: NavigationEntry[];
  bodyMatter: NavigationEntry[];
  /** Never populated by the manifest rules; kept for the output structure. */
  appendices: NavigationEntry[];
  backMatter: NavigationEntry[];
}

export type MatterGroup = "frontmatter" | "bodymatter" | "appendices" | "backmatter";

export function sectionLevel(depth: number): NavigationLevel {
  return { kind: "section", depth };
}

/** part 0, chapter 1, section(i) 2 + i */
export function levelRank(level: NavigationLevel): number {
  switch (level.kind) {
    case "part":
      return 0;
    case "chapter":
      return 1;
    case "section":
      return 2 + level.depth;
  }
}

/** Name of the ConTeXt sectioning command for a level, without the backslash. */
export function levelCommand(level: NavigationLevel): string {
  const rank = levelRank(level);
  if (rank === 0) return "part";
  if (rank === 1) return "chapter";
  return `${"sub".repeat(rank - 2)}section`;
}

export function matterGroups(
  tree: NavigationTree
): Array<[MatterGroup, NavigationEntry[]]> {
  return [
    ["frontmatter", tree.frontMatter],
    ["bodymatter", tree.bodyMatter],
    ["appendices", tree.appendices],
    ["backmatter", tree.backMatter],
  ];
}

export function countSources(entries: NavigationEntry[]): number {
  let count = 0;
  for (const entry of entries) {
    if (entry.sourcePath !== null) count++;
    count += countSources(entry.children);
  }
  return count;
}

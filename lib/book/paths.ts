import path from "node:path";

export interface BookPaths {
  bookDir: string;
  manifestFile: string;
  outputFile: string;
}

export function resolveBookPaths(
  directory: string,
  outputFile: string,
  manifest = "SUMMARY.md"
): BookPaths {
  const bookDir = path.resolve(directory);
  return {
    bookDir,
    manifestFile: path.join(bookDir, manifest),
    outputFile: path.resolve(outputFile),
  };
}

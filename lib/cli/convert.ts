#!/usr/bin/env node
/**
 * Book conversion CLI
 *
 * Converts a directory of Markdown documents, ordered by its SUMMARY.md
 * manifest, into one ConTeXt file.
 *
 * Usage:
 *   md2context [directory] [output] [options]
 */

import { lastValueFrom } from "rxjs";
import { convertBook, hasPartialOutput } from "../book/convert.js";
import { resolveBookPaths } from "../book/paths.js";
import { loadBookConfig, loadConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { parseFlags } from "./flags.js";
import { runWithProgress } from "./progress.js";

const USAGE = `Usage: md2context [directory] [output] [options]

Arguments:
  directory           Book directory holding the manifest (default: src)
  output              ConTeXt file to write (default: book.tex)

Options:
  --config <path>     Configuration file (default: ./config.yaml when present)
  --quiet             No progress display`;

/** Set once the output path is known, for the failure report. */
let outputFile: string | undefined;

async function main(): Promise<void> {
  const flags = parseFlags(process.argv.slice(2));
  if (flags.help) {
    console.log(USAGE);
    return;
  }

  const [directory, output] = flags.positional;
  const base = loadConfig(flags.config);
  const bookDir = directory ?? base.source_dir;
  const config = loadBookConfig(bookDir, base);
  const paths = resolveBookPaths(bookDir, output ?? config.output_file, config.manifest);
  outputFile = paths.outputFile;

  console.log(`Converting ${paths.manifestFile} -> ${paths.outputFile}`);

  const conversion = convertBook(paths, config);
  if (flags.quiet) {
    await lastValueFrom(conversion, { defaultValue: null });
  } else {
    await runWithProgress(conversion, (p) => ({ current: p.current, total: p.total }), {
      label: "convert",
    });
  }

  console.log(`Wrote ${paths.outputFile}`);
}

main().catch((err: unknown) => {
  console.error("\nConversion failed:", errorMessage(err));
  if (outputFile !== undefined && hasPartialOutput(outputFile, err)) {
    console.error(`The output file may be incomplete: ${outputFile}`);
  }
  process.exit(1);
});

import fs from "node:fs";
import path from "node:path";
import { asyncScheduler, Observable, type SchedulerLike } from "rxjs";
import type { AppConfig } from "../config.js";
import { renderPreamble } from "../context/preamble.js";
import { renderFragment } from "../context/render.js";
import { BookIoError, errorMessage } from "../errors.js";
import type { Fragment } from "../markdown/document.js";
import {
  countSources,
  levelCommand,
  matterGroups,
  type NavigationEntry,
  type NavigationTree,
} from "../navigation/types.js";
import { loadDocument, loadNavigation, withFile } from "./load.js";
import type { BookPaths } from "./paths.js";

export interface BookSink {
  write(chunk: string): void;
}

export interface WriteBookOptions {
  /** Markup written before the first group, normally from `renderPreamble`. */
  preamble: string;
  /** Load the fragment behind an entry's source path. */
  loadSection: (sourcePath: string) => Fragment;
}

export interface ConvertProgress {
  current: number;
  total: number;
  title: string;
}

/**
 * Write the whole book to `sink` in document order, yielding each entry once
 * its document has been written.
 *
 * Output goes out as soon as each document is rendered; a failure part way
 * through leaves everything before it in the sink.
 */
export function* writeBook(
  tree: NavigationTree,
  sink: BookSink,
  options: WriteBookOptions
): Generator<NavigationEntry, void, undefined> {
  sink.write(options.preamble);

  for (const [group, entries] of matterGroups(tree)) {
    if (entries.length === 0) continue;
    sink.write(`\n\\start${group}\n`);
    for (const entry of entries) {
      yield* writeEntry(entry, sink, options);
    }
    sink.write(`\n\\stop${group}\n`);
  }

  sink.write("\\stoptext\n");
}

function* writeEntry(
  entry: NavigationEntry,
  sink: BookSink,
  options: WriteBookOptions
): Generator<NavigationEntry, void, undefined> {
  sink.write(`\n\\${levelCommand(entry.level)}{${entry.title}}\n`);

  if (entry.sourcePath !== null) {
    const sourcePath = entry.sourcePath;
    const fragment = options.loadSection(sourcePath);
    sink.write(withFile(sourcePath, () => renderFragment(fragment)));
    yield entry;
  }

  for (const child of entry.children) {
    yield* writeEntry(child, sink, options);
  }
}

export function fileSink(fd: number, outputFile: string): BookSink {
  return {
    write(chunk: string): void {
      try {
        fs.writeSync(fd, chunk);
      } catch (err) {
        throw new BookIoError(
          "write-failed",
          `failed to write ${outputFile}`,
          errorMessage(err),
          { cause: err }
        );
      }
    },
  };
}

function openOutput(outputFile: string): number {
  try {
    return fs.openSync(outputFile, "w");
  } catch (err) {
    throw new BookIoError(
      "open-failed",
      `failed to open output file ${outputFile}`,
      errorMessage(err),
      { cause: err }
    );
  }
}

/**
 * Convert the book at `paths.bookDir` into `paths.outputFile`.
 *
 * Each document is written in its own task on `scheduler`, so the event loop
 * turns between documents. One progress event is emitted per document.
 */
export function convertBook(
  paths: BookPaths,
  config: AppConfig,
  scheduler: SchedulerLike = asyncScheduler
): Observable<ConvertProgress> {
  return new Observable<ConvertProgress>((subscriber) => {
    let fd: number | undefined;
    let sections: Iterator<NavigationEntry, void, undefined> | undefined;
    let total = 0;
    let current = 0;

    const start = (): Iterator<NavigationEntry, void, undefined> => {
      const out = openOutput(paths.outputFile);
      fd = out;
      const tree = loadNavigation(paths.manifestFile, config.markdown);
      total = matterGroups(tree).reduce((sum, [, entries]) => sum + countSources(entries), 0);
      return writeBook(tree, fileSink(out, paths.outputFile), {
        preamble: renderPreamble(config.preamble_template, {
          title: tree.title,
          toc_command: config.toc_command,
        }),
        loadSection: (sourcePath) =>
          loadDocument(path.join(paths.bookDir, sourcePath), config.markdown),
      });
    };

    const task = scheduler.schedule(function () {
      try {
        if (sections === undefined) sections = start();
        const step = sections.next();
        if (step.done) {
          subscriber.complete();
          return;
        }
        current++;
        subscriber.next({ current, total, title: step.value.title });
        this.schedule();
      } catch (err) {
        subscriber.error(err);
      }
    });

    return () => {
      task.unsubscribe();
      if (fd !== undefined) fs.closeSync(fd);
    };
  });
}

/**
 * True when a failed conversion left some of its output behind. An output
 * file that could not be opened still holds whatever was there before.
 */
export function hasPartialOutput(outputFile: string, err: unknown): boolean {
  if (err instanceof BookIoError && err.reason === "open-failed") return false;
  return fs.existsSync(outputFile) && fs.statSync(outputFile).size > 0;
}
